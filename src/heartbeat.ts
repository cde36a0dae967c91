import type { AgentRegistrar } from './directory/agents.js';
import type { AgentCard } from './types.js';
import { errorMessage, sleep } from './utils.js';

export type HeartbeatState = 'starting' | 'running' | 'stopped';

export interface HeartbeatOptions {
  name: string;
  card: AgentCard;
  registrar: AgentRegistrar;
  intervalMs: number;
  /** Computes the next expiry each time it is called. */
  getExpireAt: () => number;
}

/**
 * Keeps one agent registration alive: registers once, then refreshes the
 * expiry every `intervalMs` until stopped. Refresh failures are logged and
 * retried on the next tick. Stopping waits for an in-flight refresh to finish.
 */
export class HeartbeatLoop {
  readonly name: string;
  private currentState: HeartbeatState = 'starting';
  private readonly controller = new AbortController();
  private loop: Promise<void> | null = null;
  private tickCount = 0;
  private failureCount = 0;

  constructor(private readonly options: HeartbeatOptions) {
    this.name = options.name;
  }

  get state(): HeartbeatState {
    return this.currentState;
  }

  get ticks(): number {
    return this.tickCount;
  }

  get failures(): number {
    return this.failureCount;
  }

  async start(): Promise<void> {
    if (this.currentState !== 'starting' || this.loop) {
      throw new Error(`Heartbeat loop for '${this.name}' was already started`);
    }
    const { registrar, name, card, getExpireAt } = this.options;
    const registration = Promise.resolve().then(() => registrar.register(name, card, getExpireAt()));
    // stop() during registration waits for the write, then start() bails out.
    this.loop = registration.then(() => undefined, () => undefined);
    try {
      await registration;
    } catch (error) {
      this.currentState = 'stopped';
      throw error;
    }
    if (this.controller.signal.aborted) {
      this.currentState = 'stopped';
      return;
    }
    this.currentState = 'running';
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    this.controller.abort();
    if (this.loop) await this.loop;
    this.currentState = 'stopped';
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;
    while (!signal.aborted) {
      await sleep(this.options.intervalMs, signal);
      if (signal.aborted) break;
      await this.tick();
    }
    this.currentState = 'stopped';
  }

  private async tick(): Promise<void> {
    const { registrar, name, getExpireAt } = this.options;
    try {
      await registrar.heartbeat(name, getExpireAt());
      this.tickCount += 1;
    } catch (error) {
      this.failureCount += 1;
      console.error(`[heartbeat] failed to refresh '${name}': ${errorMessage(error)}`);
    }
  }
}

/** Background heartbeat loops keyed by agent name. Several loops per name are allowed. */
export class HeartbeatSupervisor {
  private readonly loops = new Map<string, Set<HeartbeatLoop>>();

  /** The loop is tracked before registration starts, so stop(name) also reaches a loop still starting. */
  async start(options: HeartbeatOptions): Promise<HeartbeatLoop> {
    const loop = new HeartbeatLoop(options);
    const existing = this.loops.get(options.name) ?? new Set<HeartbeatLoop>();
    existing.add(loop);
    this.loops.set(options.name, existing);
    try {
      await loop.start();
    } catch (error) {
      this.forget(options.name, loop);
      throw error;
    }
    return loop;
  }

  private forget(name: string, loop: HeartbeatLoop): void {
    const loops = this.loops.get(name);
    if (!loops) return;
    loops.delete(loop);
    if (loops.size === 0) this.loops.delete(name);
  }

  running(name: string): HeartbeatLoop[] {
    return [...(this.loops.get(name) ?? [])].filter((loop) => loop.state === 'running');
  }

  async stop(name: string): Promise<void> {
    const loops = this.loops.get(name);
    if (!loops) return;
    this.loops.delete(name);
    await Promise.all([...loops].map((loop) => loop.stop()));
  }

  async stopAll(): Promise<void> {
    const names = [...this.loops.keys()];
    await Promise.all(names.map((name) => this.stop(name)));
  }
}
