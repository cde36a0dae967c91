export type AgentCard = Record<string, unknown>;

export interface AgentRecord {
  name: string;
  card: string;
  expire_at: number;
}

export interface ToolServer {
  name: string;
  url: string;
  protocol: string;
  description: string;
}

export interface ToolServerRecord {
  server: ToolServer;
  allowed_agents: Set<string>;
}

export interface ToolBinding {
  name: string;
  url: string;
  transport: string;
  headers: Record<string, string>;
}

export type TaskState =
  | 'submitted'
  | 'working'
  | 'input-required'
  | 'completed'
  | 'canceled'
  | 'failed'
  | 'rejected'
  | 'auth-required'
  | 'unknown';

export interface TaskContext {
  context_id?: string | null;
  task_id?: string | null;
  input: string;
}

export interface TextPart {
  kind: 'text';
  text: string;
}

export type ArtifactName = 'current_result' | 'target_agent';

export interface TaskArtifact {
  artifact_id: string;
  name: ArtifactName;
  description: string;
  parts: TextPart[];
}

export interface TaskStatusUpdateEvent {
  kind: 'status-update';
  context_id: string;
  task_id: string;
  status: { state: TaskState; timestamp: string };
  final: boolean;
}

export interface TaskArtifactUpdateEvent {
  kind: 'artifact-update';
  context_id: string;
  task_id: string;
  append: false;
  last_chunk: true;
  artifact: TaskArtifact;
}

export type TaskEvent = TaskStatusUpdateEvent | TaskArtifactUpdateEvent;

export interface AgentResponse {
  status: TaskState;
  response: string;
}

export type RoutingDecision =
  | { kind: 'agent'; name: string; card: AgentCard; status: TaskState }
  | { kind: 'no_match' };
