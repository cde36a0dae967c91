import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RegistryClient } from '../src/client.js';
import { Settings, parseAgentConfig, parseRouterConfig } from '../src/config.js';
import { SqliteRegistryStore } from '../src/db.js';
import { AgentDirectory } from '../src/directory/agents.js';
import { ToolDirectory } from '../src/directory/tool-servers.js';
import { NotRegisteredError } from '../src/errors.js';
import { InMemoryEventQueue, artifactText } from '../src/routing/events.js';
import { createAgentRuntime, createRouterRuntime } from '../src/runtime.js';
import type { AgentRuntime } from '../src/runtime.js';
import { createRegistryApp } from '../src/server.js';
import type { TaskEvent } from '../src/types.js';
import { ScriptedAgent, ScriptedClassifier, listen } from './fixtures.js';
import type { RunningApp } from './fixtures.js';

const settings = new Settings({
  TEST_LLM_KEY: 'test-secret',
  REGISTRY_AUTH_HEADERS: '{"x-api-key":"test-secret"}',
  MCP_AUTH_HEADER: '{"Authorization":"Bearer test-secret"}',
});

function agentConfig(name: string, registryUrl: string) {
  return parseAgentConfig({
    agent: {
      card: { name, description: `${name} agent`, url: `http://127.0.0.1:8100/${name}` },
      llm: { model: 'test-model', api_key_env: 'TEST_LLM_KEY' },
      registry: { agent: { url: registryUrl }, mcp: { url: registryUrl } },
      system_prompt: `You are ${name}.`,
      heartbeat: { interval_sec: 60, ttl_sec: 120 },
    },
  });
}

function kinds(events: readonly TaskEvent[]): string[] {
  return events.map((event) => (event.kind === 'status-update' ? `${event.status.state}${event.final ? '!' : ''}` : event.artifact.name));
}

describe('routing end to end over the registry API', () => {
  let store: SqliteRegistryStore;
  let app: RunningApp;
  let registry: RegistryClient;
  const runtimes: AgentRuntime[] = [];

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    store = new SqliteRegistryStore(':memory:');
    app = await listen(createRegistryApp({ agents: new AgentDirectory(store), tools: new ToolDirectory(store) }));
    registry = new RegistryClient({ baseUrl: app.baseUrl, headers: settings.registryAuthHeaders });

    for (const name of ['alpha', 'beta']) {
      const runtime = createAgentRuntime(agentConfig(name, app.baseUrl), {
        settings,
        createAgent: () => new ScriptedAgent({ status: 'rejected', response: 'not mine' }),
        createClassifier: () => new ScriptedClassifier({ agent_card: null }),
      });
      await runtime.startHeartbeat();
      runtimes.push(runtime);
    }
  });

  afterEach(async () => {
    await Promise.all(runtimes.splice(0).map((runtime) => runtime.stop()));
    await app.close();
    store.close();
    vi.restoreAllMocks();
  });

  it('routes a task to the agent the classifier picks', async () => {
    const classifier = new ScriptedClassifier({ status: 'completed', agent_card: { name: 'beta' } });
    const router = createRouterRuntime(
      parseRouterConfig({
        router: {
          card: { name: 'router', url: 'http://127.0.0.1:8100/router' },
          llm: { model: 'test-model', api_key_env: 'TEST_LLM_KEY' },
          registry: { agent: { url: app.baseUrl } },
        },
      }),
      { settings, createClassifier: () => classifier },
    );
    const queue = new InMemoryEventQueue();

    const outcome = await router.executor.execute({ context_id: 'ctx-a', task_id: 'task-a', input: 'plan my week' }, queue);

    expect(kinds(queue.events)).toEqual(['working', 'target_agent', 'completed!']);
    expect(outcome.state).toBe('completed');
    expect(JSON.parse(artifactText(outcome.artifact))).toMatchObject({ name: 'beta', description: 'beta agent' });
    expect((classifier.requests[0]?.candidates ?? []).map((c) => c.name).sort()).toEqual(['alpha', 'beta']);
  });

  it('hands off a task its own agent rejected', async () => {
    const tools = new ToolDirectory(store);
    await tools.put({ name: 'calendar', url: 'http://127.0.0.1:9100/mcp', protocol: 'streamable_http', description: 'Calendar' });
    await tools.grant('calendar', 'alpha');
    const agent = new ScriptedAgent({ status: 'rejected', response: 'not mine' });
    const alpha = createAgentRuntime(agentConfig('alpha', app.baseUrl), {
      settings,
      createAgent: () => agent,
      createClassifier: () => new ScriptedClassifier({ status: 'completed', agent_card: JSON.stringify({ name: 'beta' }) }),
    });
    const queue = new InMemoryEventQueue();

    const outcome = await alpha.executor.execute({ context_id: 'ctx-b', task_id: 'task-b', input: 'fix my car' }, queue);

    expect(kinds(queue.events)).toEqual(['working', 'target_agent', 'rejected!']);
    expect(queue.events.some((event) => event.kind === 'artifact-update' && event.artifact.name === 'current_result')).toBe(false);
    expect(JSON.parse(artifactText(outcome.artifact))).toMatchObject({ name: 'beta' });
    expect(agent.requests[0]?.tools).toEqual([{
      name: 'calendar',
      url: 'http://127.0.0.1:9100/mcp',
      transport: 'streamable_http',
      headers: { Authorization: 'Bearer test-secret' },
    }]);
  });

  it('refuses a heartbeat for an agent that never registered', async () => {
    await expect(registry.heartbeat('ghost', Date.now() + 60_000)).rejects.toBeInstanceOf(NotRegisteredError);
    expect((await registry.list()).map((c) => c.name).sort()).toEqual(['alpha', 'beta']);
  });
});
