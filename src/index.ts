#!/usr/bin/env node

import path from 'path';
import { SqliteRegistryStore } from './db.js';
import { AgentDirectory } from './directory/agents.js';
import { ToolDirectory } from './directory/tool-servers.js';
import { createRegistryApp } from './server.js';
import { InMemoryRegistryStore } from './store.js';
import type { RegistryStore } from './store.js';

const PORT = parseInt(process.env.SWITCHBOARD_PORT || '3000');
const HOST = process.env.SWITCHBOARD_HOST || '0.0.0.0';
const STORE_KIND = String(process.env.SWITCHBOARD_STORE || 'memory').toLowerCase().trim();
const DB_PATH = process.env.SWITCHBOARD_DB || path.join(process.cwd(), 'switchboard.db');
const MCP_ENABLED = process.env.SWITCHBOARD_MCP !== '0';

function createStore(): RegistryStore {
  if (STORE_KIND === 'sqlite') return new SqliteRegistryStore(DB_PATH);
  if (STORE_KIND !== 'memory') {
    console.warn(`[registry] unknown SWITCHBOARD_STORE=${STORE_KIND}, falling back to memory`);
  }
  return new InMemoryRegistryStore();
}

const store = createStore();
const app = createRegistryApp({
  agents: new AgentDirectory(store),
  tools: new ToolDirectory(store),
  mcp: MCP_ENABLED,
});

const server = app.listen(PORT, HOST, () => {
  console.log(
    `Agent registry running at http://${HOST}:${PORT} (store=${store.kind}${store.kind === 'sqlite' ? ` db=${DB_PATH}` : ''}, mcp=${MCP_ENABLED ? '/mcp' : 'off'})`
  );
});

function shutdown(signal: string) {
  console.log(`[registry] ${signal} received, shutting down`);
  server.close((error) => {
    if (error) console.error('[registry] close error', error);
    store.close();
    process.exit(error ? 1 : 0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
