import type { AgentRecord, ToolServer, ToolServerRecord } from './types.js';

export interface AgentTable {
  put(record: AgentRecord): Promise<void>;
  get(name: string): Promise<AgentRecord | null>;
  scan(): Promise<AgentRecord[]>;
  /** Returns false when no record exists for `name`; never creates one. */
  updateExpiry(name: string, expireAt: number): Promise<boolean>;
}

export interface ToolServerTable {
  /** Upserts the server description. Existing grants for the same name are kept. */
  put(server: ToolServer): Promise<void>;
  get(name: string): Promise<ToolServerRecord | null>;
  scan(): Promise<ToolServerRecord[]>;
  /** Atomic set-add. Returns false when the server does not exist. */
  addAllowedAgent(serverName: string, agentName: string): Promise<boolean>;
  /** Atomic set-remove. Returns false when the server does not exist. */
  removeAllowedAgent(serverName: string, agentName: string): Promise<boolean>;
  scanByAllowedAgent(agentName: string): Promise<ToolServerRecord[]>;
}

export interface RegistryStore {
  readonly kind: string;
  readonly agents: AgentTable;
  readonly toolServers: ToolServerTable;
  close(): void;
}

function copyToolServerRecord(server: ToolServer, allowed: Set<string>): ToolServerRecord {
  return { server: { ...server }, allowed_agents: new Set(allowed) };
}

class InMemoryAgentTable implements AgentTable {
  private readonly records = new Map<string, AgentRecord>();

  async put(record: AgentRecord): Promise<void> {
    this.records.set(record.name, { ...record });
  }

  async get(name: string): Promise<AgentRecord | null> {
    const record = this.records.get(name);
    return record ? { ...record } : null;
  }

  async scan(): Promise<AgentRecord[]> {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  async updateExpiry(name: string, expireAt: number): Promise<boolean> {
    const record = this.records.get(name);
    if (!record) return false;
    this.records.set(name, { ...record, expire_at: expireAt });
    return true;
  }
}

class InMemoryToolServerTable implements ToolServerTable {
  private readonly servers = new Map<string, ToolServer>();
  private readonly allowedAgents = new Map<string, Set<string>>();

  async put(server: ToolServer): Promise<void> {
    this.servers.set(server.name, { ...server });
    if (!this.allowedAgents.has(server.name)) {
      this.allowedAgents.set(server.name, new Set());
    }
  }

  async get(name: string): Promise<ToolServerRecord | null> {
    const server = this.servers.get(name);
    if (!server) return null;
    return copyToolServerRecord(server, this.allowedAgents.get(name) ?? new Set());
  }

  async scan(): Promise<ToolServerRecord[]> {
    return [...this.servers.values()].map((server) =>
      copyToolServerRecord(server, this.allowedAgents.get(server.name) ?? new Set()));
  }

  async addAllowedAgent(serverName: string, agentName: string): Promise<boolean> {
    if (!this.servers.has(serverName)) return false;
    const allowed = this.allowedAgents.get(serverName) ?? new Set<string>();
    allowed.add(agentName);
    this.allowedAgents.set(serverName, allowed);
    return true;
  }

  async removeAllowedAgent(serverName: string, agentName: string): Promise<boolean> {
    if (!this.servers.has(serverName)) return false;
    this.allowedAgents.get(serverName)?.delete(agentName);
    return true;
  }

  async scanByAllowedAgent(agentName: string): Promise<ToolServerRecord[]> {
    const records = await this.scan();
    return records.filter((record) => record.allowed_agents.has(agentName));
  }
}

export class InMemoryRegistryStore implements RegistryStore {
  readonly kind = 'memory';
  readonly agents: AgentTable = new InMemoryAgentTable();
  readonly toolServers: ToolServerTable = new InMemoryToolServerTable();

  close(): void {
    // nothing to release
  }
}
