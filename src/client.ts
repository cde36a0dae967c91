import { z } from 'zod';
import type { AgentLookup, AgentRegistrar } from './directory/agents.js';
import { NotFoundError, NotRegisteredError, StoreUnavailableError } from './errors.js';
import { agentCardSchema, toolServerSchema } from './schemas.js';
import type { AgentCard, ToolServer } from './types.js';

export interface RegistryClientOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/** HTTP client for the registry server; also usable wherever an AgentLookup or AgentRegistrar is expected. */
export class RegistryClient implements AgentLookup, AgentRegistrar {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(options: RegistryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = { Accept: 'application/json', ...options.headers };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async register(name: string, card: AgentCard, expireAt: number): Promise<void> {
    const response = await this.request('PUT', `/agent-card/${encodeURIComponent(name)}`, { expire_at: expireAt }, card);
    await this.expectOk(response, 'PUT /agent-card');
  }

  async heartbeat(name: string, expireAt: number): Promise<void> {
    const response = await this.request('PATCH', `/agent-card/${encodeURIComponent(name)}/heartbeat`, { expire_at: expireAt });
    if (response.status === 404) throw new NotRegisteredError(name);
    await this.expectOk(response, 'PATCH /agent-card/heartbeat');
  }

  async get(name: string): Promise<AgentCard | null> {
    const response = await this.request('GET', `/agent-card/${encodeURIComponent(name)}`);
    if (response.status === 404) return null;
    await this.expectOk(response, 'GET /agent-card');
    return agentCardSchema.parse(await response.json());
  }

  async list(): Promise<AgentCard[]> {
    const response = await this.request('GET', '/agent-cards');
    await this.expectOk(response, 'GET /agent-cards');
    return z.array(agentCardSchema).parse(await response.json());
  }

  async putToolServer(server: ToolServer): Promise<void> {
    const response = await this.request('PUT', '/mcp/server', undefined, server);
    await this.expectOk(response, 'PUT /mcp/server');
  }

  async getToolServer(name: string): Promise<ToolServer | null> {
    const response = await this.request('GET', `/mcp/server/${encodeURIComponent(name)}`);
    if (response.status === 404) return null;
    await this.expectOk(response, 'GET /mcp/server');
    return toolServerSchema.parse(await response.json());
  }

  async listToolServers(): Promise<ToolServer[]> {
    const response = await this.request('GET', '/mcp/servers');
    await this.expectOk(response, 'GET /mcp/servers');
    return z.array(toolServerSchema).parse(await response.json());
  }

  async grant(serverName: string, agentName: string): Promise<void> {
    const response = await this.request('PUT', `/mcp/${encodeURIComponent(serverName)}/agent/${encodeURIComponent(agentName)}`);
    if (response.status === 404) throw new NotFoundError(`MCP server '${serverName}' not found`);
    await this.expectOk(response, 'PUT /mcp/agent');
  }

  async revoke(serverName: string, agentName: string): Promise<void> {
    const response = await this.request('DELETE', `/mcp/${encodeURIComponent(serverName)}/agent/${encodeURIComponent(agentName)}`);
    if (response.status === 404) throw new NotFoundError(`MCP server '${serverName}' not found`);
    await this.expectOk(response, 'DELETE /mcp/agent');
  }

  async allowedAgents(serverName: string): Promise<Set<string>> {
    const response = await this.request('GET', `/mcp/${encodeURIComponent(serverName)}/agent`);
    await this.expectOk(response, 'GET /mcp/agent');
    return new Set(z.array(z.string()).parse(await response.json()));
  }

  async serversFor(agentName: string): Promise<ToolServer[]> {
    const response = await this.request('GET', `/mcp/agent/${encodeURIComponent(agentName)}/servers`);
    await this.expectOk(response, 'GET /mcp/agent/servers');
    return z.array(toolServerSchema).parse(await response.json());
  }

  private async request(
    method: string,
    path: string,
    query?: Record<string, string | number>,
    body?: unknown,
  ): Promise<Response> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    const headers: Record<string, string> = { ...this.headers };
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    try {
      return await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new StoreUnavailableError(`${method} ${path}`, error);
    }
  }

  private async expectOk(response: Response, operation: string): Promise<void> {
    if (response.ok) return;
    const text = await response.text();
    if (response.status === 503 || response.status === 502 || response.status === 504) {
      throw new StoreUnavailableError(operation, new Error(`HTTP ${response.status}: ${text}`));
    }
    console.error(`[registry] HTTP ${response.status} during ${operation}: ${text || '<empty>'}`);
    throw new Error(`Registry request ${operation} failed with HTTP ${response.status}`);
  }
}
