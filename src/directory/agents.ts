import { NotRegisteredError } from '../errors.js';
import { agentCardSchema } from '../schemas.js';
import type { AgentTable, RegistryStore } from '../store.js';
import type { AgentCard, AgentRecord } from '../types.js';

/** Read side of the agent directory, shared by the local directory and the HTTP client. */
export interface AgentLookup {
  get(name: string): Promise<AgentCard | null>;
  list(): Promise<AgentCard[]>;
}

/** Write side used by heartbeat loops. */
export interface AgentRegistrar {
  register(name: string, card: AgentCard, expireAt: number): Promise<void>;
  heartbeat(name: string, expireAt: number): Promise<void>;
}

export function isExpired(record: AgentRecord, now: number): boolean {
  return record.expire_at < now;
}

function decodeCard(record: AgentRecord): AgentCard | null {
  let raw: unknown = null;
  try {
    raw = JSON.parse(record.card);
  } catch {
    raw = null;
  }
  const parsed = agentCardSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  console.warn(`[registry] dropping agent '${record.name}' with unreadable card`);
  return null;
}

export class AgentDirectory implements AgentLookup, AgentRegistrar {
  private readonly table: AgentTable;
  private readonly now: () => number;

  constructor(store: RegistryStore, options: { now?: () => number } = {}) {
    this.table = store.agents;
    this.now = options.now ?? Date.now;
  }

  async register(name: string, card: AgentCard, expireAt: number): Promise<void> {
    await this.table.put({ name, card: JSON.stringify(card), expire_at: expireAt });
  }

  async heartbeat(name: string, expireAt: number): Promise<void> {
    const updated = await this.table.updateExpiry(name, expireAt);
    if (!updated) throw new NotRegisteredError(name);
  }

  async get(name: string): Promise<AgentCard | null> {
    const record = await this.table.get(name);
    if (!record || isExpired(record, this.now())) return null;
    return decodeCard(record);
  }

  async list(): Promise<AgentCard[]> {
    const now = this.now();
    const records = await this.table.scan();
    const cards: AgentCard[] = [];
    for (const record of records) {
      if (isExpired(record, now)) continue;
      const card = decodeCard(record);
      if (card) cards.push(card);
    }
    return cards;
  }

  /** Live records including their expiry, for diagnostics. */
  async listRecords(): Promise<AgentRecord[]> {
    const now = this.now();
    const records = await this.table.scan();
    return records.filter((record) => !isExpired(record, now));
  }
}
