import Database from 'better-sqlite3';
import { StoreUnavailableError } from './errors.js';
import { toolServerSchema } from './schemas.js';
import type { AgentTable, RegistryStore, ToolServerTable } from './store.js';
import type { AgentRecord, ToolServer, ToolServerRecord } from './types.js';

interface AgentRow {
  id: string;
  card: string;
  expire_at: number;
}

interface ToolServerRow {
  id: string;
  server: string;
}

export function openDatabase(dbPath?: string): Database.Database {
  const d = new Database(dbPath || ':memory:');
  d.pragma('journal_mode = WAL');
  d.pragma('foreign_keys = ON');
  initSchema(d);
  return d;
}

function initSchema(d: Database.Database): void {
  d.exec(`
    CREATE TABLE IF NOT EXISTS agents (
      id TEXT PRIMARY KEY,
      card TEXT NOT NULL,
      expire_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS tool_servers (
      id TEXT PRIMARY KEY,
      server TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS tool_server_agents (
      server_id TEXT NOT NULL,
      agent_name TEXT NOT NULL,
      PRIMARY KEY (server_id, agent_name),
      FOREIGN KEY (server_id) REFERENCES tool_servers(id) ON DELETE CASCADE
    );
  `);

  d.exec(`
    CREATE INDEX IF NOT EXISTS idx_agents_expire_at ON agents(expire_at);
    CREATE INDEX IF NOT EXISTS idx_tool_server_agents_agent_name ON tool_server_agents(agent_name);
  `);
}

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw new StoreUnavailableError(operation, error);
  }
}

function parseToolServer(raw: string): ToolServer {
  return toolServerSchema.parse(JSON.parse(raw));
}

class SqliteAgentTable implements AgentTable {
  constructor(private readonly d: Database.Database) {}

  async put(record: AgentRecord): Promise<void> {
    guard('agents.put', () => {
      this.d.prepare(`
        INSERT INTO agents (id, card, expire_at)
        VALUES (?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          card = excluded.card,
          expire_at = excluded.expire_at
      `).run(record.name, record.card, record.expire_at);
    });
  }

  async get(name: string): Promise<AgentRecord | null> {
    const row = guard('agents.get', () =>
      this.d.prepare('SELECT id, card, expire_at FROM agents WHERE id = ?').get(name) as AgentRow | undefined);
    return row ? { name: row.id, card: row.card, expire_at: row.expire_at } : null;
  }

  async scan(): Promise<AgentRecord[]> {
    const rows = guard('agents.scan', () =>
      this.d.prepare('SELECT id, card, expire_at FROM agents').all() as AgentRow[]);
    return rows.map((row) => ({ name: row.id, card: row.card, expire_at: row.expire_at }));
  }

  async updateExpiry(name: string, expireAt: number): Promise<boolean> {
    const result = guard('agents.updateExpiry', () =>
      this.d.prepare('UPDATE agents SET expire_at = ? WHERE id = ?').run(expireAt, name));
    return result.changes === 1;
  }
}

class SqliteToolServerTable implements ToolServerTable {
  constructor(private readonly d: Database.Database) {}

  private allowedAgentsFor(serverId: string): Set<string> {
    const rows = this.d.prepare('SELECT agent_name FROM tool_server_agents WHERE server_id = ?')
      .all(serverId) as Array<{ agent_name: string }>;
    return new Set(rows.map((row) => row.agent_name));
  }

  private toRecord(row: ToolServerRow): ToolServerRecord {
    return { server: parseToolServer(row.server), allowed_agents: this.allowedAgentsFor(row.id) };
  }

  private exists(serverName: string): boolean {
    return this.d.prepare('SELECT 1 FROM tool_servers WHERE id = ?').get(serverName) !== undefined;
  }

  async put(server: ToolServer): Promise<void> {
    guard('tool_servers.put', () => {
      this.d.prepare(`
        INSERT INTO tool_servers (id, server)
        VALUES (?, ?)
        ON CONFLICT(id) DO UPDATE SET server = excluded.server
      `).run(server.name, JSON.stringify(server));
    });
  }

  async get(name: string): Promise<ToolServerRecord | null> {
    return guard('tool_servers.get', () => {
      const row = this.d.prepare('SELECT id, server FROM tool_servers WHERE id = ?').get(name) as ToolServerRow | undefined;
      return row ? this.toRecord(row) : null;
    });
  }

  async scan(): Promise<ToolServerRecord[]> {
    return guard('tool_servers.scan', () => {
      const rows = this.d.prepare('SELECT id, server FROM tool_servers').all() as ToolServerRow[];
      return rows.map((row) => this.toRecord(row));
    });
  }

  async addAllowedAgent(serverName: string, agentName: string): Promise<boolean> {
    return guard('tool_servers.addAllowedAgent', () => this.d.transaction(() => {
      if (!this.exists(serverName)) return false;
      this.d.prepare('INSERT OR IGNORE INTO tool_server_agents (server_id, agent_name) VALUES (?, ?)')
        .run(serverName, agentName);
      return true;
    })());
  }

  async removeAllowedAgent(serverName: string, agentName: string): Promise<boolean> {
    return guard('tool_servers.removeAllowedAgent', () => this.d.transaction(() => {
      if (!this.exists(serverName)) return false;
      this.d.prepare('DELETE FROM tool_server_agents WHERE server_id = ? AND agent_name = ?')
        .run(serverName, agentName);
      return true;
    })());
  }

  async scanByAllowedAgent(agentName: string): Promise<ToolServerRecord[]> {
    return guard('tool_servers.scanByAllowedAgent', () => {
      const rows = this.d.prepare(`
        SELECT s.id, s.server
        FROM tool_servers s
        JOIN tool_server_agents g ON g.server_id = s.id
        WHERE g.agent_name = ?
      `).all(agentName) as ToolServerRow[];
      return rows.map((row) => this.toRecord(row));
    });
  }
}

export class SqliteRegistryStore implements RegistryStore {
  readonly kind = 'sqlite';
  readonly agents: AgentTable;
  readonly toolServers: ToolServerTable;
  private readonly d: Database.Database;

  constructor(dbPath?: string) {
    this.d = openDatabase(dbPath);
    this.agents = new SqliteAgentTable(this.d);
    this.toolServers = new SqliteToolServerTable(this.d);
  }

  close(): void {
    if (this.d.open) this.d.close();
  }
}
