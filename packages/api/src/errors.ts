/**
 * Typed failures surfaced by the query pipeline.
 *
 * Routes map these to HTTP responses; the orchestrator never swaps
 * a failure for a degraded answer without marking it.
 */

export type SmartRagErrorCode =
  | 'RETRIEVAL_FAILURE'
  | 'GENERATION_FAILURE'
  | 'STORE_FAILURE'
  | 'CONFIGURATION_ERROR';

export abstract class SmartRagError extends Error {
  abstract readonly code: SmartRagErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Evidence source unreachable or errored (not "zero results"). */
export class RetrievalFailure extends SmartRagError {
  readonly code = 'RETRIEVAL_FAILURE';
}

/** Answer-producing capability unreachable, errored, or returned empty text. */
export class GenerationFailure extends SmartRagError {
  readonly code = 'GENERATION_FAILURE';
}

export class StoreFailure extends SmartRagError {
  readonly code = 'STORE_FAILURE';
}

/** Fatal at startup, never raised at query time. */
export class ConfigurationError extends SmartRagError {
  readonly code = 'CONFIGURATION_ERROR';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
