import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { AgentDirectory } from './directory/agents.js';
import type { ToolDirectory } from './directory/tool-servers.js';
import { isRegistryError } from './errors.js';
import { handleMcpRequest } from './mcp.js';
import { agentCardSchema, agentNameSchema, expireAtSchema, toolServerSchema } from './schemas.js';
import { errorMessage } from './utils.js';

export interface RegistryAppOptions {
  agents: AgentDirectory;
  tools: ToolDirectory;
  /** Mounts the stateless MCP endpoint at POST /mcp (default true). */
  mcp?: boolean;
  bodyLimit?: string;
}

class BadRequestError extends Error {}

function errorResponse(errorCode: string, error: string) {
  return { success: false, error_code: errorCode, error };
}

function readName(value: string | undefined, label: string): string {
  const parsed = agentNameSchema.safeParse(value);
  if (!parsed.success) throw new BadRequestError(`${label} is required`);
  return parsed.data;
}

function readExpireAt(req: Request): number {
  const parsed = expireAtSchema.safeParse(req.query.expire_at);
  if (!parsed.success) throw new BadRequestError('expire_at query parameter must be a non-negative integer');
  return parsed.data;
}

function statusForError(error: unknown): number {
  if (error instanceof BadRequestError) return 400;
  if (isRegistryError(error)) {
    switch (error.error_code) {
      case 'NOT_FOUND':
      case 'NOT_REGISTERED':
        return 404;
      case 'STORE_UNAVAILABLE':
        return 503;
      default:
        return 500;
    }
  }
  if (error instanceof SyntaxError) return 400;
  return httpErrorStatus(error) ?? 500;
}

// body-parser errors (413 too large, 415 bad encoding) carry their own status.
function httpErrorStatus(error: unknown): number | null {
  if (!error || typeof error !== 'object') return null;
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createRegistryApp(options: RegistryAppOptions): express.Express {
  const { agents, tools } = options;
  const app = express();
  app.use(express.json({ limit: options.bodyLimit ?? '1mb' }));

  // --- Agent registry ---

  app.put('/agent-card/:name', async (req, res) => {
    const name = readName(req.params.name, 'name');
    const expireAt = readExpireAt(req);
    const card = agentCardSchema.safeParse(req.body);
    if (!card.success) throw new BadRequestError('Agent card must be a JSON object');
    await agents.register(name, card.data, expireAt);
    res.status(200).end();
  });

  app.get('/agent-card/:name', async (req, res) => {
    const name = readName(req.params.name, 'name');
    const card = await agents.get(name);
    if (!card) {
      res.status(404).json(errorResponse('NOT_FOUND', 'Agent card not found'));
      return;
    }
    res.json(card);
  });

  app.get('/agent-cards', async (_req, res) => {
    res.json(await agents.list());
  });

  app.patch('/agent-card/:name/heartbeat', async (req, res) => {
    const name = readName(req.params.name, 'name');
    const expireAt = readExpireAt(req);
    await agents.heartbeat(name, expireAt);
    res.status(200).end();
  });

  // --- MCP server registry ---

  app.put('/mcp/server', async (req, res) => {
    const server = toolServerSchema.safeParse(req.body);
    if (!server.success) {
      throw new BadRequestError(`Invalid MCP server: ${server.error.issues.map((issue) => issue.path.join('.') || issue.message).join(', ')}`);
    }
    await tools.put(server.data);
    res.status(200).end();
  });

  app.get('/mcp/server/:name', async (req, res) => {
    const server = await tools.get(readName(req.params.name, 'name'));
    if (!server) {
      res.status(404).json(errorResponse('NOT_FOUND', 'MCP Server not found'));
      return;
    }
    res.json(server);
  });

  app.get('/mcp/servers', async (_req, res) => {
    res.json(await tools.list());
  });

  app.get('/mcp/agent/:agent/servers', async (req, res) => {
    res.json(await tools.serversFor(readName(req.params.agent, 'agent')));
  });

  app.put('/mcp/:name/agent/:agent', async (req, res) => {
    await tools.grant(readName(req.params.name, 'name'), readName(req.params.agent, 'agent'));
    res.status(200).end();
  });

  app.delete('/mcp/:name/agent/:agent', async (req, res) => {
    await tools.revoke(readName(req.params.name, 'name'), readName(req.params.agent, 'agent'));
    res.status(200).end();
  });

  app.get('/mcp/:name/agent', async (req, res) => {
    const allowed = await tools.allowedAgents(readName(req.params.name, 'name'));
    res.json([...allowed].sort());
  });

  if (options.mcp !== false) {
    app.post('/mcp', async (req, res) => {
      await handleMcpRequest({ agents, tools }, req, res, req.body);
    });

    // Stateless: no standalone SSE stream and no sessions to delete.
    const methodNotAllowed = (_req: Request, res: Response) => {
      res.status(405).set('Allow', 'POST').json({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Method not allowed.' },
        id: null,
      });
    };
    app.get('/mcp', methodNotAllowed);
    app.delete('/mcp', methodNotAllowed);
  }

  app.get('/health', (_req, res) => {
    res.json({ status: 'OK' });
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const status = statusForError(error);
    if (status >= 500) {
      console.error(`[registry] ${req.method} ${req.path} failed`, error);
    }
    if (isRegistryError(error) && status === 404) {
      res.status(404).json(errorResponse(error.error_code, error.message));
    } else if (isRegistryError(error) && error.error_code === 'STORE_UNAVAILABLE') {
      res.status(503).json(errorResponse('STORE_UNAVAILABLE', 'Registry storage is temporarily unavailable'));
    } else if (status >= 400 && status < 500) {
      res.status(status).json(errorResponse('INVALID_REQUEST', errorMessage(error)));
    } else {
      res.status(500).json(errorResponse('INTERNAL_ERROR', 'Internal registry error'));
    }
  });

  return app;
}
