import { NotFoundError } from '../errors.js';
import type { RegistryStore, ToolServerTable } from '../store.js';
import type { ToolServer } from '../types.js';

// Grants go through the store's atomic set-add/remove; no read-modify-write here.
export class ToolDirectory {
  private readonly table: ToolServerTable;

  constructor(store: RegistryStore) {
    this.table = store.toolServers;
  }

  async put(server: ToolServer): Promise<void> {
    await this.table.put(server);
  }

  async get(name: string): Promise<ToolServer | null> {
    const record = await this.table.get(name);
    return record ? record.server : null;
  }

  async list(): Promise<ToolServer[]> {
    const records = await this.table.scan();
    return records.map((record) => record.server);
  }

  async grant(serverName: string, agentName: string): Promise<void> {
    const found = await this.table.addAllowedAgent(serverName, agentName);
    if (!found) throw new NotFoundError(`MCP server '${serverName}' not found`);
  }

  async revoke(serverName: string, agentName: string): Promise<void> {
    const found = await this.table.removeAllowedAgent(serverName, agentName);
    if (!found) throw new NotFoundError(`MCP server '${serverName}' not found`);
  }

  async allowedAgents(serverName: string): Promise<Set<string>> {
    const record = await this.table.get(serverName);
    return record ? record.allowed_agents : new Set();
  }

  async serversFor(agentName: string): Promise<ToolServer[]> {
    const records = await this.table.scanByAllowedAgent(agentName);
    return records.map((record) => record.server);
  }
}
