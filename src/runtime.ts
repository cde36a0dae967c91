import { RegistryClient } from './client.js';
import { buildAgentCard, settings as defaultSettings } from './config.js';
import type { AgentConfig, LlmConfig, RouterConfig, Settings } from './config.js';
import type { AgentLookup, AgentRegistrar } from './directory/agents.js';
import { InvalidConfigError } from './errors.js';
import { HeartbeatSupervisor } from './heartbeat.js';
import type { HeartbeatLoop } from './heartbeat.js';
import { RoutingDecisionEngine } from './routing/decision.js';
import type { RoutingClassifier } from './routing/decision.js';
import { AgentTaskExecutor, RouterTaskExecutor } from './routing/executor.js';
import type { SpecializedAgent, ToolBindingSource } from './routing/executor.js';
import type { AgentCard, ToolBinding, ToolServer } from './types.js';
import { expireAfter } from './utils.js';

export const ROUTING_SYSTEM_PROMPT = `
You are a helpful routing assistant which routes user requests to specialized remote agents. Your main task is to:
1. look up available agents via their A2A agent cards
2. select the best matching agent for the user query, in case no agent matches use the generic agent.
3. return the matching agent card for that agent.
`;

export interface ModelSetup {
  llm: LlmConfig;
  apiKey: string;
  systemPrompt: string;
  name: string;
}

export interface ToolServerSource {
  serversFor(agentName: string): Promise<ToolServer[]>;
}

export class RegistryToolBindings implements ToolBindingSource {
  constructor(
    private readonly registry: ToolServerSource,
    private readonly settings: Settings = defaultSettings,
  ) {}

  async bindingsFor(agentName: string): Promise<ToolBinding[]> {
    const servers = await this.registry.serversFor(agentName);
    return servers.map((server) => ({
      name: server.name,
      url: server.url,
      transport: server.protocol,
      headers: this.settings.mcpAuthHeadersFor(server.name),
    }));
  }
}

function registryHeaders(settings: Settings): Record<string, string> {
  const headers = settings.registryAuthHeaders;
  if (!headers['x-api-key']) {
    console.warn('[registry] No API key found for registry communication');
  }
  return headers;
}

function registryClientFor(url: string | undefined, settings: Settings, label: string): RegistryClient {
  if (!url) throw new InvalidConfigError(`${label} registry url is not configured`);
  return new RegistryClient({ baseUrl: url, headers: registryHeaders(settings) });
}

export interface AgentRuntimeDeps {
  createAgent: (setup: ModelSetup) => SpecializedAgent;
  createClassifier: (setup: ModelSetup) => RoutingClassifier;
  settings?: Settings;
  /** Overrides the HTTP registry client, e.g. with a local AgentDirectory. */
  registry?: AgentLookup & AgentRegistrar;
  /** Overrides tool bindings resolved through the MCP registry. */
  tools?: ToolBindingSource;
  supervisor?: HeartbeatSupervisor;
}

export interface AgentRuntime {
  name: string;
  card: AgentCard;
  executor: AgentTaskExecutor;
  startHeartbeat(): Promise<HeartbeatLoop>;
  stop(): Promise<void>;
}

/**
 * Wires one specialized agent from its config. Fails fast with
 * MissingCredentialError when the LLM key is absent.
 */
export function createAgentRuntime(config: AgentConfig, deps: AgentRuntimeDeps): AgentRuntime {
  const settings = deps.settings ?? defaultSettings;
  const { card: cardConfig, llm, registry: registryConfig, system_prompt, heartbeat } = config.agent;
  const apiKey = settings.requireApiKey(llm.api_key_env);
  const name = cardConfig.name;

  const registry = deps.registry ?? registryClientFor(registryConfig.agent?.url, settings, 'agent');
  const tools = deps.tools ?? (registryConfig.mcp
    ? new RegistryToolBindings(registryClientFor(registryConfig.mcp.url, settings, 'mcp'), settings)
    : undefined);

  const agent = deps.createAgent({ llm, apiKey, systemPrompt: system_prompt, name });
  const classifier = deps.createClassifier({ llm, apiKey, systemPrompt: ROUTING_SYSTEM_PROMPT, name: 'Router' });
  const engine = new RoutingDecisionEngine(registry, classifier);
  const executor = new AgentTaskExecutor(name, agent, engine, tools);
  const card = buildAgentCard(cardConfig);
  const supervisor = deps.supervisor ?? new HeartbeatSupervisor();

  return {
    name,
    card,
    executor,
    startHeartbeat: () => supervisor.start({
      name,
      card,
      registrar: registry,
      intervalMs: heartbeat.interval_sec * 1000,
      getExpireAt: expireAfter(heartbeat.ttl_sec * 1000),
    }),
    stop: () => supervisor.stop(name),
  };
}

export interface RouterRuntimeDeps {
  createClassifier: (setup: ModelSetup) => RoutingClassifier;
  settings?: Settings;
  registry?: AgentLookup;
}

export interface RouterRuntime {
  name: string;
  card: AgentCard;
  executor: RouterTaskExecutor;
}

export function createRouterRuntime(config: RouterConfig, deps: RouterRuntimeDeps): RouterRuntime {
  const settings = deps.settings ?? defaultSettings;
  const { card: cardConfig, llm, registry: registryConfig } = config.router;
  const apiKey = settings.requireApiKey(llm.api_key_env);
  const registry = deps.registry ?? registryClientFor(registryConfig.agent?.url, settings, 'agent');
  const classifier = deps.createClassifier({ llm, apiKey, systemPrompt: ROUTING_SYSTEM_PROMPT, name: cardConfig.name });

  const card = buildAgentCard({
    ...cardConfig,
    description: cardConfig.description || 'Agent to redirect to the best matching agent based on the agent card',
    skills: cardConfig.skills.length > 0 ? cardConfig.skills : [{
      id: 'routing',
      name: 'Agent routing',
      description: 'Identifies the most suitable agent for the given task and returns the agent card',
      tags: ['agent', 'routing'],
    }],
  });

  return {
    name: cardConfig.name,
    card,
    executor: new RouterTaskExecutor(new RoutingDecisionEngine(registry, classifier)),
  };
}
