import { PreconditionFailedError, UnsupportedOperationError } from '../errors.js';
import type { AgentCard, AgentResponse, TaskArtifact, TaskContext, TaskState, ToolBinding } from '../types.js';
import { errorMessage } from '../utils.js';
import type { RoutingDecisionEngine } from './decision.js';
import { artifactEvent, statusEvent, textArtifact } from './events.js';
import type { EventQueue } from './events.js';

export interface AttemptRequest {
  message: string;
  context_id: string;
  tools: ToolBinding[];
}

/** The local agent's own attempt at a task, typically an LLM call with tools. */
export interface SpecializedAgent {
  attempt(request: AttemptRequest): Promise<AgentResponse>;
}

export interface ToolBindingSource {
  bindingsFor(agentName: string): Promise<ToolBinding[]>;
}

export interface TaskOutcome {
  state: TaskState;
  artifact: TaskArtifact;
}

export interface TaskExecutor {
  execute(context: TaskContext, queue: EventQueue): Promise<TaskOutcome>;
  cancel(context: TaskContext, queue: EventQueue): Promise<never>;
}

function requireIds(context: TaskContext): { contextId: string; taskId: string } {
  if (!context.context_id || !context.task_id) {
    throw new PreconditionFailedError('Context ID and Task ID must be provided.');
  }
  return { contextId: context.context_id, taskId: context.task_id };
}

function handoffArtifact(name: string, card: AgentCard): TaskArtifact {
  return textArtifact('target_agent', 'New target agent for request.', JSON.stringify({ ...card, name }));
}

/**
 * Emits working, then runs `work`, then emits exactly one artifact and one
 * final status. Any failure inside `work` ends the task with a failed status.
 */
async function runLifecycle(
  context: TaskContext,
  queue: EventQueue,
  work: (contextId: string) => Promise<TaskOutcome>,
): Promise<TaskOutcome> {
  const { contextId, taskId } = requireIds(context);
  await queue.enqueue(statusEvent(contextId, taskId, 'working', false));

  let outcome: TaskOutcome;
  try {
    outcome = await work(contextId);
  } catch (error) {
    console.error(`[routing] request with id ${contextId} failed: ${errorMessage(error)}`);
    await queue.enqueue(statusEvent(contextId, taskId, 'failed', true));
    throw error;
  }

  try {
    await queue.enqueue(artifactEvent(contextId, taskId, outcome.artifact));
  } catch (error) {
    console.error(`[routing] request with id ${contextId} could not publish its artifact: ${errorMessage(error)}`);
    await queue.enqueue(statusEvent(contextId, taskId, 'failed', true));
    throw error;
  }
  // A final status that fails to enqueue is not retried: it may already be delivered.
  await queue.enqueue(statusEvent(contextId, taskId, outcome.state, true));
  return outcome;
}

/**
 * Runs a task on the local specialized agent and, when that agent rejects it,
 * names a replacement agent. The replacement is only named: re-dispatching the
 * task is left to the caller so one process never chains hops.
 */
export class AgentTaskExecutor implements TaskExecutor {
  /** Last bindings the registry returned; only a fallback when a refresh fails. */
  private lastKnownTools: readonly ToolBinding[] = [];

  constructor(
    private readonly agentName: string,
    private readonly agent: SpecializedAgent,
    private readonly engine: RoutingDecisionEngine,
    private readonly toolSource?: ToolBindingSource,
  ) {}

  async execute(context: TaskContext, queue: EventQueue): Promise<TaskOutcome> {
    return runLifecycle(context, queue, async (contextId) => {
      const tools = await this.refreshTools();
      const response = await this.agent.attempt({ message: context.input, context_id: contextId, tools });

      if (response.status !== 'rejected') {
        console.log(`[routing] request with id ${contextId} was processed by agent '${this.agentName}'`);
        return {
          state: response.status,
          artifact: textArtifact('current_result', 'Result of request to agent.', response.response),
        };
      }

      const target = await this.engine.route({ message: context.input, context_id: contextId });
      console.log(`[routing] request with id ${contextId} got rejected and will be rerouted to '${target.name}'`);
      return { state: response.status, artifact: handoffArtifact(target.name, target.card) };
    });
  }

  async cancel(): Promise<never> {
    throw new UnsupportedOperationError('Task cancellation');
  }

  private async refreshTools(): Promise<ToolBinding[]> {
    if (!this.toolSource) return [...this.lastKnownTools];
    let tools: ToolBinding[];
    try {
      tools = await this.toolSource.bindingsFor(this.agentName);
    } catch (error) {
      console.warn(`[routing] keeping previous tools for '${this.agentName}': ${errorMessage(error)}`);
      return [...this.lastKnownTools];
    }
    this.lastKnownTools = tools;
    if (tools.length > 0) {
      console.log(`[routing] agent '${this.agentName}' has access to tools: ${tools.map((tool) => tool.name).join(', ')}`);
    }
    return [...tools];
  }
}

/** Routing-only service: every task ends with a hand-off naming the best agent. */
export class RouterTaskExecutor implements TaskExecutor {
  constructor(private readonly engine: RoutingDecisionEngine) {}

  async execute(context: TaskContext, queue: EventQueue): Promise<TaskOutcome> {
    return runLifecycle(context, queue, async (contextId) => {
      const target = await this.engine.route({ message: context.input, context_id: contextId });
      return { state: target.status, artifact: handoffArtifact(target.name, target.card) };
    });
  }

  async cancel(): Promise<never> {
    throw new UnsupportedOperationError('Task cancellation');
  }
}
