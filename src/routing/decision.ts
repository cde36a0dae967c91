import { z } from 'zod';
import type { AgentLookup } from '../directory/agents.js';
import { DanglingRouteError, NoRouteError } from '../errors.js';
import { agentCardSchema, taskStateSchema } from '../schemas.js';
import type { AgentCard, RoutingDecision, TaskState } from '../types.js';

export interface ClassifyRequest {
  message: string;
  context_id: string;
  candidates: AgentCard[];
}

/**
 * Black-box routing model. Implementations usually wrap an LLM call that
 * answers with a structured `{ status, agent_card }` object.
 */
export interface RoutingClassifier {
  classify(request: ClassifyRequest): Promise<unknown>;
}

const routingResponseSchema = z.object({
  status: taskStateSchema.default('completed'),
  agent_card: z.union([z.string(), agentCardSchema]).nullable().optional(),
});

export type RoutingResponse = z.infer<typeof routingResponseSchema>;

function cardName(card: AgentCard): string | null {
  const name = card.name;
  return typeof name === 'string' && name.trim().length > 0 ? name.trim() : null;
}

function readCard(raw: string | AgentCard): AgentCard {
  if (typeof raw !== 'string') return raw;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new DanglingRouteError(null, 'agent_card is not valid JSON');
  }
  const card = agentCardSchema.safeParse(parsed);
  if (!card.success) throw new DanglingRouteError(null, 'agent_card is not a JSON object');
  return card.data;
}

/**
 * Turns one classifier answer into a routing decision. Unparseable answers are
 * treated as dangling routes rather than guessed at.
 */
export class RoutingDecisionEngine {
  constructor(
    private readonly agents: AgentLookup,
    private readonly classifier: RoutingClassifier,
  ) {}

  async decide(request: { message: string; context_id: string }): Promise<RoutingDecision> {
    const candidates = await this.agents.list();
    const raw = await this.classifier.classify({ ...request, candidates });
    const parsed = routingResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DanglingRouteError(null, `classifier output did not match the routing schema (${parsed.error.issues[0]?.message ?? 'invalid'})`);
    }

    const { agent_card: rawCard, status } = parsed.data;
    if (rawCard === null || rawCard === undefined || (typeof rawCard === 'string' && rawCard.trim() === '')) {
      console.log(`[routing] no agent matched request with id ${request.context_id}`);
      return { kind: 'no_match' };
    }

    const name = cardName(readCard(rawCard));
    if (!name) throw new DanglingRouteError(null, 'agent_card has no name');

    const card = await this.agents.get(name);
    if (!card) throw new DanglingRouteError(name, 'agent is not registered or its registration expired');

    console.log(`[routing] request with id ${request.context_id} routed to '${name}'`);
    return { kind: 'agent', name, card, status };
  }

  async route(request: { message: string; context_id: string }): Promise<{ name: string; card: AgentCard; status: TaskState }> {
    const decision = await this.decide(request);
    if (decision.kind === 'no_match') throw new NoRouteError(request.context_id);
    return { name: decision.name, card: decision.card, status: decision.status };
  }
}
