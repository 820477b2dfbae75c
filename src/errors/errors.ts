/**
 * Engine error taxonomy.
 *
 * Every error carries a stable `code` (used in structured events) and the
 * HTTP status the API layer answers with.
 */

export type ErrorCode =
  | 'DuplicatePending'
  | 'RetrievalUnavailable'
  | 'RetrievalTimeout'
  | 'StaleReviewAction'
  | 'NoTemplateAvailable'
  | 'DeliveryFailed'
  | 'DeliveryTimeout'
  | 'StoreUnavailable'
  | 'QueryNotFound'
  | 'ConversationNotFound'
  | 'InvalidDecision'
  | 'ConfigError';

export abstract class EngineError extends Error {
  abstract readonly code: ErrorCode;
  readonly statusCode: number = 500;
  /** Operational errors are expected per-conversation failures, not bugs */
  readonly isOperational: boolean = true;
}

export class DuplicatePendingError extends EngineError {
  readonly code = 'DuplicatePending';
  readonly statusCode = 409;
  constructor(readonly conversationId: string, readonly pendingQueryId: string) {
    super(`Conversation ${conversationId} already has an open query (${pendingQueryId})`);
    this.name = 'DuplicatePendingError';
  }
}

export class RetrievalUnavailableError extends EngineError {
  readonly code: ErrorCode = 'RetrievalUnavailable';
  readonly statusCode: number = 503;
  constructor(message = 'Knowledge retrieval unavailable', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RetrievalUnavailableError';
  }
}

export class RetrievalTimeoutError extends RetrievalUnavailableError {
  readonly code = 'RetrievalTimeout';
  readonly statusCode = 504;
  constructor(readonly timeoutMs: number) {
    super(`Knowledge retrieval timed out after ${timeoutMs}ms`);
    this.name = 'RetrievalTimeoutError';
  }
}

export class StaleReviewActionError extends EngineError {
  readonly code = 'StaleReviewAction';
  readonly statusCode = 409;
  constructor(readonly queryId: string, readonly action: string, readonly observedState: string) {
    super(`Review action "${action}" on query ${queryId} is stale (state ${observedState})`);
    this.name = 'StaleReviewActionError';
  }
}

export class NoTemplateAvailableError extends EngineError {
  readonly code = 'NoTemplateAvailable';
  constructor(readonly category: string, readonly locale: string) {
    super(`No template for category "${category}" (${locale})`);
    this.name = 'NoTemplateAvailableError';
  }
}

export class DeliveryFailedError extends EngineError {
  readonly code: ErrorCode = 'DeliveryFailed';
  readonly statusCode: number = 502;
  constructor(message: string, readonly conversationId: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeliveryFailedError';
  }
}

export class DeliveryTimeoutError extends DeliveryFailedError {
  readonly code = 'DeliveryTimeout';
  readonly statusCode = 504;
  constructor(conversationId: string, readonly timeoutMs: number) {
    super(`Delivery to ${conversationId} timed out after ${timeoutMs}ms`, conversationId);
    this.name = 'DeliveryTimeoutError';
  }
}

/** The conversation store itself is unreachable. Fatal to the whole engine. */
export class StoreUnavailableError extends EngineError {
  readonly code = 'StoreUnavailable';
  readonly statusCode = 503;
  readonly isOperational = false;
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Conversation store unavailable during ${operation}`, options);
    this.name = 'StoreUnavailableError';
  }
}

export class QueryNotFoundError extends EngineError {
  readonly code = 'QueryNotFound';
  readonly statusCode = 404;
  constructor(readonly queryId: string) {
    super(`Query ${queryId} not found`);
    this.name = 'QueryNotFoundError';
  }
}

export class ConversationNotFoundError extends EngineError {
  readonly code = 'ConversationNotFound';
  readonly statusCode = 404;
  constructor(readonly conversationId: string) {
    super(`Conversation ${conversationId} not found`);
    this.name = 'ConversationNotFoundError';
  }
}

export class InvalidDecisionError extends EngineError {
  readonly code = 'InvalidDecision';
  readonly statusCode = 400;
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDecisionError';
  }
}

export class ConfigError extends EngineError {
  readonly code = 'ConfigError';
  readonly isOperational = false;
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return 'Unknown error';
}
