import { randomUUID } from 'crypto';

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, Math.max(0, ms));
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export function expireAfter(ttlMs: number, now: () => number = Date.now): () => number {
  const ttl = Number.isFinite(ttlMs) ? Math.max(0, Math.floor(ttlMs)) : 0;
  return () => now() + ttl;
}

export function parseJsonObject(value: string | undefined): Record<string, string> {
  if (!value) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return {};
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
  const headers: Record<string, string> = {};
  for (const [key, raw] of Object.entries(parsed)) {
    if (typeof raw === 'string') headers[key] = raw;
    else if (typeof raw === 'number' || typeof raw === 'boolean') headers[key] = String(raw);
  }
  return headers;
}

export function newArtifactId(): string {
  return randomUUID();
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
