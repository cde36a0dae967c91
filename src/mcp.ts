import type { IncomingMessage, ServerResponse } from 'http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { z } from 'zod';
import type { AgentLookup } from './directory/agents.js';
import type { ToolDirectory } from './directory/tool-servers.js';
import { errorMessage } from './utils.js';

export interface RegistryMcpDeps {
  agents: AgentLookup;
  tools: ToolDirectory;
}

export const registryToolDescriptions = {
  agent_card_lookup: 'Gets all available agent cards',
  get_agent_card: 'Gets the agent card registered under a name, if the agent is alive',
  list_mcp_servers_for_agent: 'Lists the MCP servers an agent is allowed to use',
} as const;

function mcpTextResponse(payload: unknown, isError = false) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload) }],
    ...(isError ? { isError: true } : {}),
  };
}

export function createRegistryMcpServer(deps: RegistryMcpDeps): McpServer {
  const server = new McpServer({
    name: 'agent-switchboard-registry',
    version: '0.1.0',
  });

  server.tool(
    'agent_card_lookup',
    registryToolDescriptions.agent_card_lookup,
    async () => mcpTextResponse(await deps.agents.list())
  );

  server.tool(
    'get_agent_card',
    registryToolDescriptions.get_agent_card,
    {
      name: z.string().describe('Agent name'),
    },
    async ({ name }) => {
      const card = await deps.agents.get(name);
      if (!card) {
        return mcpTextResponse({ success: false, error_code: 'NOT_FOUND', error: `Agent card '${name}' not found` }, true);
      }
      return mcpTextResponse(card);
    }
  );

  server.tool(
    'list_mcp_servers_for_agent',
    registryToolDescriptions.list_mcp_servers_for_agent,
    {
      agent_name: z.string().describe('Agent name'),
    },
    async ({ agent_name }) => mcpTextResponse(await deps.tools.serversFor(agent_name))
  );

  return server;
}

function upsertRawHeader(rawHeaders: string[], name: string, value: string) {
  const target = name.toLowerCase();
  let replaced = false;

  for (let i = 0; i < rawHeaders.length; i += 2) {
    if ((rawHeaders[i] ?? '').toLowerCase() === target) {
      rawHeaders[i + 1] = value;
      replaced = true;
    }
  }

  if (!replaced) {
    rawHeaders.push(name, value);
  }
}

/** One stateless MCP exchange: a fresh server and transport per POST. */
export async function handleMcpRequest(
  deps: RegistryMcpDeps,
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
): Promise<void> {
  // SDK requires both media types in Accept for POST requests.
  const acceptHeader = req.headers.accept ?? '';
  if (!acceptHeader.includes('application/json') || !acceptHeader.includes('text/event-stream')) {
    const normalizedAccept = 'application/json, text/event-stream';
    req.headers.accept = normalizedAccept;
    upsertRawHeader(req.rawHeaders, 'Accept', normalizedAccept);
  }

  const server = createRegistryMcpServer(deps);
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
    enableJsonResponse: true,
  });
  res.on('close', () => {
    Promise.allSettled([transport.close(), server.close()]).then((results) => {
      for (const result of results) {
        if (result.status === 'rejected') console.warn(`[mcp] close failed: ${errorMessage(result.reason)}`);
      }
    }, (error: unknown) => console.warn(`[mcp] close failed: ${errorMessage(error)}`));
  });
  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}
