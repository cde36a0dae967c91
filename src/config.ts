import fs from 'fs';
import { z } from 'zod';
import { InvalidConfigError, MissingCredentialError } from './errors.js';
import type { AgentCard } from './types.js';
import { parseJsonObject } from './utils.js';

export type Env = Record<string, string | undefined>;

export function toolHeaderEnvName(toolName: string): string {
  return `MCP_AUTH_HEADER_${toolName.toUpperCase().replace(/-/g, '_')}`;
}

export class Settings {
  constructor(private readonly env: Env = process.env) {}

  get registryAuthHeaders(): Record<string, string> {
    return parseJsonObject(this.env.REGISTRY_AUTH_HEADERS);
  }

  get mcpAuthHeaders(): Record<string, string> {
    return parseJsonObject(this.env.MCP_AUTH_HEADER);
  }

  /** Headers for one tool server: `MCP_AUTH_HEADER_<TOOLNAME>` wins over `MCP_AUTH_HEADER`. */
  mcpAuthHeadersFor(toolName: string): Record<string, string> {
    const specific = this.env[toolHeaderEnvName(toolName)];
    return parseJsonObject(specific || this.env.MCP_AUTH_HEADER);
  }

  getEnv(name: string, fallback?: string): string | undefined {
    const value = this.env[name];
    return value === undefined || value === '' ? fallback : value;
  }

  /** Resolves the LLM API key named by the config; a missing key aborts construction. */
  requireApiKey(envName: string): string {
    const value = this.getEnv(envName);
    if (!value) throw new MissingCredentialError(envName);
    return value;
  }
}

export const settings = new Settings();

const skillConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
});

const cardConfigSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(''),
  version: z.string().default('1.0.0'),
  url: z.string().min(1),
  skills: z.array(skillConfigSchema).default([]),
  default_input_modes: z.array(z.string()).default(['text']),
  default_output_modes: z.array(z.string()).default(['text']),
  preferred_transport: z.string().default('HTTP+JSON'),
});

const llmConfigSchema = z.object({
  base_url: z.string().url().optional(),
  model: z.string().min(1),
  api_key_env: z.string().min(1),
});

const registryItemConfigSchema = z.object({
  url: z.string().url(),
});

const registryConfigSchema = z.object({
  agent: registryItemConfigSchema.optional(),
  mcp: registryItemConfigSchema.optional(),
});

const heartbeatConfigSchema = z.object({
  interval_sec: z.number().positive().default(10),
  ttl_sec: z.number().positive().default(30),
}).refine((value) => value.ttl_sec > value.interval_sec, {
  message: 'ttl_sec must be longer than interval_sec',
});

export const agentConfigSchema = z.object({
  agent: z.object({
    card: cardConfigSchema,
    llm: llmConfigSchema,
    registry: registryConfigSchema.default({}),
    system_prompt: z.string().min(1),
    heartbeat: heartbeatConfigSchema.default({}),
  }),
});

export const routerConfigSchema = z.object({
  router: z.object({
    card: cardConfigSchema,
    llm: llmConfigSchema,
    registry: registryConfigSchema.default({}),
  }),
});

export type CardConfig = z.infer<typeof cardConfigSchema>;
export type LlmConfig = z.infer<typeof llmConfigSchema>;
export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type RouterConfig = z.infer<typeof routerConfigSchema>;

function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new InvalidConfigError(`Invalid ${label} config${where}: ${issue?.message ?? 'unknown error'}`, parsed.error);
  }
  return parsed.data;
}

function readJsonFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new InvalidConfigError(`Cannot read config file ${filePath}`, error);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InvalidConfigError(`Config file ${filePath} is not valid JSON`, error);
  }
}

export function parseAgentConfig(input: unknown): AgentConfig {
  return parseConfig(agentConfigSchema, input, 'agent');
}

export function parseRouterConfig(input: unknown): RouterConfig {
  return parseConfig(routerConfigSchema, input, 'router');
}

export function loadAgentConfig(filePath: string): AgentConfig {
  return parseAgentConfig(readJsonFile(filePath));
}

export function loadRouterConfig(filePath: string): RouterConfig {
  return parseRouterConfig(readJsonFile(filePath));
}

/** Builds the A2A agent card published to the registry. */
export function buildAgentCard(card: CardConfig): AgentCard {
  return {
    name: card.name,
    description: card.description,
    url: card.url,
    version: card.version,
    defaultInputModes: card.default_input_modes,
    defaultOutputModes: card.default_output_modes,
    preferredTransport: card.preferred_transport,
    capabilities: { streaming: true, pushNotifications: false },
    skills: card.skills.map((skill) => ({
      id: skill.id,
      name: skill.name,
      description: skill.description,
      tags: skill.tags,
    })),
  };
}
