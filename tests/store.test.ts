import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteRegistryStore } from '../src/db.js';
import { StoreUnavailableError } from '../src/errors.js';
import type { RegistryStore } from '../src/store.js';
import { backends } from './fixtures.js';

const server = { name: 'search', url: 'http://127.0.0.1:9000/mcp', protocol: 'streamable_http', description: 'Web search' };

describe.each(backends)('%s registry store', (_kind, createStore) => {
  let store: RegistryStore;

  beforeEach(() => { store = createStore(); });
  afterEach(() => { store.close(); });

  describe('agents table', () => {
    it('returns null for a missing key', async () => {
      expect(await store.agents.get('nobody')).toBeNull();
    });

    it('overwrites card and expiry on put with the same name', async () => {
      await store.agents.put({ name: 'alpha', card: '{"v":1}', expire_at: 100 });
      await store.agents.put({ name: 'alpha', card: '{"v":2}', expire_at: 200 });

      expect(await store.agents.get('alpha')).toEqual({ name: 'alpha', card: '{"v":2}', expire_at: 200 });
      expect(await store.agents.scan()).toHaveLength(1);
    });

    it('does not filter expired records on scan', async () => {
      await store.agents.put({ name: 'old', card: '{}', expire_at: 0 });
      const names = (await store.agents.scan()).map((record) => record.name);
      expect(names).toEqual(['old']);
    });

    it('updates only the expiry field', async () => {
      await store.agents.put({ name: 'alpha', card: '{"v":1}', expire_at: 100 });
      expect(await store.agents.updateExpiry('alpha', 500)).toBe(true);
      expect(await store.agents.get('alpha')).toEqual({ name: 'alpha', card: '{"v":1}', expire_at: 500 });
    });

    it('reports a missing key on update without creating it', async () => {
      expect(await store.agents.updateExpiry('ghost', 500)).toBe(false);
      expect(await store.agents.get('ghost')).toBeNull();
    });
  });

  describe('tool servers table', () => {
    it('keeps grants when a server is re-put', async () => {
      await store.toolServers.put(server);
      await store.toolServers.addAllowedAgent('search', 'alpha');
      await store.toolServers.put({ ...server, description: 'Updated' });

      const record = await store.toolServers.get('search');
      expect(record?.server.description).toBe('Updated');
      expect([...(record?.allowed_agents ?? [])]).toEqual(['alpha']);
    });

    it('refuses set updates for unknown servers', async () => {
      expect(await store.toolServers.addAllowedAgent('missing', 'alpha')).toBe(false);
      expect(await store.toolServers.removeAllowedAgent('missing', 'alpha')).toBe(false);
      expect(await store.toolServers.scan()).toEqual([]);
    });

    it('filters servers by allowed agent', async () => {
      await store.toolServers.put(server);
      await store.toolServers.put({ ...server, name: 'files' });
      await store.toolServers.addAllowedAgent('files', 'beta');

      const forBeta = await store.toolServers.scanByAllowedAgent('beta');
      expect(forBeta.map((record) => record.server.name)).toEqual(['files']);
      expect(await store.toolServers.scanByAllowedAgent('alpha')).toEqual([]);
    });

    it('returns copies that callers cannot mutate', async () => {
      await store.toolServers.put(server);
      const record = await store.toolServers.get('search');
      record?.allowed_agents.add('intruder');
      expect((await store.toolServers.get('search'))?.allowed_agents.size).toBe(0);
    });
  });
});

describe('SqliteRegistryStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'switchboard-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('persists records and grants across reopen', async () => {
    const dbPath = path.join(dir, 'registry.db');
    const first = new SqliteRegistryStore(dbPath);
    await first.agents.put({ name: 'alpha', card: '{}', expire_at: 42 });
    await first.toolServers.put(server);
    await first.toolServers.addAllowedAgent('search', 'alpha');
    first.close();

    const second = new SqliteRegistryStore(dbPath);
    expect(await second.agents.get('alpha')).toEqual({ name: 'alpha', card: '{}', expire_at: 42 });
    expect([...((await second.toolServers.get('search'))?.allowed_agents ?? [])]).toEqual(['alpha']);
    second.close();
  });

  it('reports a closed database as unavailable', async () => {
    const store = new SqliteRegistryStore(':memory:');
    store.close();
    store.close();

    await expect(store.agents.get('alpha')).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(store.toolServers.scan()).rejects.toThrow('Registry store unavailable during tool_servers.scan');
  });
});
