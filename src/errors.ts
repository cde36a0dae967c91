export type RegistryErrorCode =
  | 'NOT_FOUND'
  | 'NOT_REGISTERED'
  | 'STORE_UNAVAILABLE'
  | 'DANGLING_ROUTE'
  | 'NO_ROUTE'
  | 'PRECONDITION_FAILED'
  | 'MISSING_CREDENTIAL'
  | 'UNSUPPORTED_OPERATION'
  | 'INVALID_CONFIG';

export class RegistryError extends Error {
  readonly error_code: RegistryErrorCode;

  constructor(errorCode: RegistryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.error_code = errorCode;
  }
}

export class NotFoundError extends RegistryError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class NotRegisteredError extends RegistryError {
  readonly agent_name: string;

  constructor(agentName: string) {
    super('NOT_REGISTERED', `Agent '${agentName}' is not registered`);
    this.agent_name = agentName;
  }
}

/** Transient backend failure. The original error is kept as `cause` and never sent to clients. */
export class StoreUnavailableError extends RegistryError {
  constructor(operation: string, cause?: unknown) {
    super('STORE_UNAVAILABLE', `Registry store unavailable during ${operation}`, { cause });
  }
}

export class DanglingRouteError extends RegistryError {
  readonly target: string | null;

  constructor(target: string | null, reason: string) {
    super('DANGLING_ROUTE', target ? `Route to '${target}' is dangling: ${reason}` : `Unusable routing decision: ${reason}`);
    this.target = target;
  }
}

export class NoRouteError extends RegistryError {
  constructor(contextId: string) {
    super('NO_ROUTE', `No agent matched request with context id ${contextId}`);
  }
}

export class PreconditionFailedError extends RegistryError {
  constructor(message: string) {
    super('PRECONDITION_FAILED', message);
  }
}

export class MissingCredentialError extends RegistryError {
  readonly env_name: string;

  constructor(envName: string) {
    super('MISSING_CREDENTIAL', `No API key found for LLM (env ${envName} is not set)`);
    this.env_name = envName;
  }
}

export class UnsupportedOperationError extends RegistryError {
  constructor(operation: string) {
    super('UNSUPPORTED_OPERATION', `${operation} is not implemented`);
  }
}

export class InvalidConfigError extends RegistryError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_CONFIG', message, { cause });
  }
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}
