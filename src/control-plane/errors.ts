import type { RunMode, StageName } from './types.js';

export type ErrorCode =
  | 'PARAMETER_ERROR'
  | 'MODE_ERROR'
  | 'STAGE_ERROR'
  | 'NOT_FOUND'
  | 'CACHE_IO_ERROR'
  | 'NARRATIVE_ERROR';

export interface RunContext {
  symbol?: string;
  mode?: RunMode;
  cacheKey?: string;
  stage?: StageName;
  [key: string]: unknown;
}

/**
 * Base class for every fatal pipeline error. Carries enough run context
 * (symbol, mode, cache key, stage) for the CLI to report without re-deriving it.
 */
export class SymflowError extends Error {
  public readonly code: ErrorCode;
  private runContext: RunContext;

  constructor(
    message: string,
    code: ErrorCode,
    options?: { cause?: unknown; context?: RunContext }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SymflowError';
    this.code = code;
    this.runContext = { ...options?.context };
    Error.captureStackTrace(this, this.constructor);
  }

  get context(): Readonly<RunContext> {
    return this.runContext;
  }

  /** Fills in run context the thrower did not know. Existing keys win. */
  withContext(context: RunContext): this {
    this.runContext = { ...context, ...this.runContext };
    return this;
  }

  describe(): string {
    const { symbol, mode, stage, cacheKey } = this.runContext;
    const tags = [
      symbol ? `symbol=${symbol}` : null,
      mode ? `mode=${mode}` : null,
      stage ? `stage=${stage}` : null,
      cacheKey ? `cache=${cacheKey}` : null,
    ].filter((t): t is string => t !== null);
    return tags.length > 0 ? `[${tags.join(' ')}] ${this.message}` : this.message;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.runContext,
    };
  }
}

export class ParameterError extends SymflowError {
  public readonly path: string;

  constructor(path: string, message: string, context?: RunContext) {
    super(message, 'PARAMETER_ERROR', { context });
    this.name = 'ParameterError';
    this.path = path;
  }
}

export class ModeError extends SymflowError {
  constructor(message: string, context?: RunContext) {
    super(message, 'MODE_ERROR', { context });
    this.name = 'ModeError';
  }
}

export class StageError extends SymflowError {
  public readonly stage: StageName;

  constructor(stage: StageName, message: string, options?: { cause?: unknown; context?: RunContext }) {
    super(message, 'STAGE_ERROR', {
      cause: options?.cause,
      context: { ...options?.context, stage },
    });
    this.name = 'StageError';
    this.stage = stage;
  }
}

export class NotFoundError extends SymflowError {
  constructor(message: string, context?: RunContext) {
    super(message, 'NOT_FOUND', { context });
    this.name = 'NotFoundError';
  }
}

export class CacheIOError extends SymflowError {
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown; context?: RunContext }) {
    super(message, 'CACHE_IO_ERROR', options);
    this.name = 'CacheIOError';
    this.path = path;
  }
}

export function isSymflowError(err: unknown): err is SymflowError {
  return err instanceof SymflowError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
