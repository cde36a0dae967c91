import type { AddressInfo } from 'net';
import type { Express } from 'express';
import { SqliteRegistryStore } from '../src/db.js';
import type { RoutingClassifier, ClassifyRequest } from '../src/routing/decision.js';
import type { AttemptRequest, SpecializedAgent } from '../src/routing/executor.js';
import { InMemoryRegistryStore } from '../src/store.js';
import type { RegistryStore } from '../src/store.js';
import type { AgentResponse } from '../src/types.js';

export const backends: Array<[string, () => RegistryStore]> = [
  ['memory', () => new InMemoryRegistryStore()],
  ['sqlite', () => new SqliteRegistryStore(':memory:')],
];

export function card(name: string, extra: Record<string, unknown> = {}) {
  return { name, description: `${name} agent`, url: `http://127.0.0.1/${name}`, version: '1.0.0', ...extra };
}

export class ScriptedClassifier implements RoutingClassifier {
  readonly requests: ClassifyRequest[] = [];

  constructor(private readonly output: unknown) {}

  async classify(request: ClassifyRequest): Promise<unknown> {
    this.requests.push(request);
    return this.output;
  }
}

export class ScriptedAgent implements SpecializedAgent {
  readonly requests: AttemptRequest[] = [];

  constructor(private readonly response: AgentResponse) {}

  async attempt(request: AttemptRequest): Promise<AgentResponse> {
    this.requests.push(request);
    return this.response;
  }
}

export interface RunningApp {
  baseUrl: string;
  close(): Promise<void>;
}

export function listen(app: Express): Promise<RunningApp> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('server did not bind a TCP port'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((done, fail) => {
          server.closeAllConnections();
          server.close((error) => (error ? fail(error) : done()));
        }),
      });
    });
    server.on('error', reject);
  });
}
