import type {
  ArtifactName,
  TaskArtifact,
  TaskArtifactUpdateEvent,
  TaskEvent,
  TaskState,
  TaskStatusUpdateEvent,
} from '../types.js';
import { newArtifactId } from '../utils.js';

export interface EventQueue {
  enqueue(event: TaskEvent): Promise<void>;
}

type Listener = (event: TaskEvent) => void;

/** Records events in emission order and replays them to subscribers synchronously. */
export class InMemoryEventQueue implements EventQueue {
  private readonly recorded: TaskEvent[] = [];
  private readonly listeners = new Set<Listener>();

  get events(): readonly TaskEvent[] {
    return this.recorded;
  }

  async enqueue(event: TaskEvent): Promise<void> {
    this.recorded.push(event);
    for (const listener of this.listeners) listener(event);
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export function statusEvent(contextId: string, taskId: string, state: TaskState, final: boolean): TaskStatusUpdateEvent {
  return {
    kind: 'status-update',
    context_id: contextId,
    task_id: taskId,
    status: { state, timestamp: new Date().toISOString() },
    final,
  };
}

export function textArtifact(name: ArtifactName, description: string, text: string): TaskArtifact {
  return {
    artifact_id: newArtifactId(),
    name,
    description,
    parts: [{ kind: 'text', text }],
  };
}

export function artifactEvent(contextId: string, taskId: string, artifact: TaskArtifact): TaskArtifactUpdateEvent {
  return {
    kind: 'artifact-update',
    context_id: contextId,
    task_id: taskId,
    append: false,
    last_chunk: true,
    artifact,
  };
}

export function artifactText(artifact: TaskArtifact): string {
  return artifact.parts.map((part) => part.text).join('');
}
