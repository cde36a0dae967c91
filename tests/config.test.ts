import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';
import {
  Settings,
  buildAgentCard,
  loadAgentConfig,
  parseAgentConfig,
  parseRouterConfig,
  toolHeaderEnvName,
} from '../src/config.js';
import { InvalidConfigError, MissingCredentialError } from '../src/errors.js';

const dataFile = (name: string) => fileURLToPath(new URL(`./data/${name}`, import.meta.url));

const minimalAgent = {
  agent: {
    card: { name: 'travel', url: 'http://127.0.0.1:8001/' },
    llm: { model: 'test-model', api_key_env: 'TEST_LLM_KEY' },
    system_prompt: 'You book trips.',
  },
};

describe('Settings', () => {
  it('derives per-tool header variable names', () => {
    expect(toolHeaderEnvName('web-search')).toBe('MCP_AUTH_HEADER_WEB_SEARCH');
    expect(toolHeaderEnvName('files')).toBe('MCP_AUTH_HEADER_FILES');
  });

  it('reads registry auth headers from JSON', () => {
    const settings = new Settings({ REGISTRY_AUTH_HEADERS: '{"x-api-key":"test-secret","retries":3}' });
    expect(settings.registryAuthHeaders).toEqual({ 'x-api-key': 'test-secret', retries: '3' });
  });

  it('ignores header variables that are not JSON objects', () => {
    expect(new Settings({ REGISTRY_AUTH_HEADERS: 'x-api-key=test-secret' }).registryAuthHeaders).toEqual({});
    expect(new Settings({ MCP_AUTH_HEADER: '["test-secret"]' }).mcpAuthHeaders).toEqual({});
    expect(new Settings({}).registryAuthHeaders).toEqual({});
  });

  it('prefers the per-tool header over the shared one', () => {
    const settings = new Settings({
      MCP_AUTH_HEADER: '{"Authorization":"Bearer test-secret"}',
      MCP_AUTH_HEADER_WEB_SEARCH: '{"x-api-key":"test-secret"}',
    });
    expect(settings.mcpAuthHeadersFor('web-search')).toEqual({ 'x-api-key': 'test-secret' });
    expect(settings.mcpAuthHeadersFor('files')).toEqual({ Authorization: 'Bearer test-secret' });
  });

  it('resolves the API key named by the config', () => {
    expect(new Settings({ TEST_LLM_KEY: 'test-secret' }).requireApiKey('TEST_LLM_KEY')).toBe('test-secret');
  });

  it('treats a missing or empty API key as a missing credential', () => {
    expect(() => new Settings({}).requireApiKey('TEST_LLM_KEY')).toThrow(MissingCredentialError);
    expect(() => new Settings({ TEST_LLM_KEY: '' }).requireApiKey('TEST_LLM_KEY'))
      .toThrow('No API key found for LLM (env TEST_LLM_KEY is not set)');
  });

  it('falls back for unset variables', () => {
    const settings = new Settings({ EMPTY: '' });
    expect(settings.getEnv('EMPTY', 'fallback')).toBe('fallback');
    expect(settings.getEnv('UNSET')).toBeUndefined();
  });
});

describe('agent config', () => {
  it('fills defaults', () => {
    const config = parseAgentConfig(minimalAgent);
    expect(config.agent.heartbeat).toEqual({ interval_sec: 10, ttl_sec: 30 });
    expect(config.agent.registry).toEqual({});
    expect(config.agent.card).toMatchObject({
      description: '',
      version: '1.0.0',
      skills: [],
      default_input_modes: ['text'],
      default_output_modes: ['text'],
      preferred_transport: 'HTTP+JSON',
    });
  });

  it('names the first invalid field', () => {
    const { system_prompt: _dropped, ...agent } = minimalAgent.agent;
    expect(() => parseAgentConfig({ agent })).toThrow('Invalid agent config at agent.system_prompt: Required');
  });

  it('requires the TTL to outlast the heartbeat interval', () => {
    const input = { agent: { ...minimalAgent.agent, heartbeat: { interval_sec: 30, ttl_sec: 30 } } };
    expect(() => parseAgentConfig(input)).toThrow('Invalid agent config at agent.heartbeat: ttl_sec must be longer than interval_sec');
  });

  it('loads a config file', () => {
    const config = loadAgentConfig(dataFile('agent-config.json'));
    expect(config.agent.card.name).toBe('travel');
    expect(config.agent.registry.mcp).toEqual({ url: 'http://127.0.0.1:3000' });
    expect(config.agent.heartbeat).toEqual({ interval_sec: 5, ttl_sec: 15 });
    expect(config.agent.card.skills).toEqual([{ id: 'booking', name: 'Trip booking', description: '', tags: ['travel'] }]);
  });

  it('reports unreadable and malformed files', () => {
    expect(() => loadAgentConfig(dataFile('missing.json'))).toThrow(InvalidConfigError);
    expect(() => loadAgentConfig(dataFile('broken-config.json'))).toThrow(/is not valid JSON$/);
  });
});

describe('router config', () => {
  it('rejects an agent config', () => {
    expect(() => parseRouterConfig(minimalAgent)).toThrow('Invalid router config at router: Required');
  });
});

describe('buildAgentCard', () => {
  it('publishes the card in A2A shape', () => {
    const config = loadAgentConfig(dataFile('agent-config.json'));
    expect(buildAgentCard(config.agent.card)).toEqual({
      name: 'travel',
      description: 'Books trips',
      url: 'http://127.0.0.1:8001/',
      version: '1.0.0',
      defaultInputModes: ['text'],
      defaultOutputModes: ['text'],
      preferredTransport: 'HTTP+JSON',
      capabilities: { streaming: true, pushNotifications: false },
      skills: [{ id: 'booking', name: 'Trip booking', description: '', tags: ['travel'] }],
    });
  });
});
