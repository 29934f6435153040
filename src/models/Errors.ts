export type PitchSimilarityErrorCode =
  | 'EMPTY_INPUT'
  | 'TARGET_NOT_FOUND'
  | 'INCOMPLETE_TARGET'
  | 'NO_CANDIDATES'
  | 'INVALID_QUERY'
  | 'UPSTREAM';

export abstract class PitchSimilarityError extends Error {
  abstract readonly code: PitchSimilarityErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends PitchSimilarityError {
  readonly code = 'EMPTY_INPUT';

  constructor(message = 'No pitch events to aggregate') {
    super(message);
  }
}

export class TargetNotFoundError extends PitchSimilarityError {
  readonly code = 'TARGET_NOT_FOUND';

  constructor(readonly targetId: number) {
    super(`Pitcher ${targetId} is not in the feature table`);
  }
}

export class IncompleteTargetError extends PitchSimilarityError {
  readonly code = 'INCOMPLETE_TARGET';

  constructor(readonly targetId: number, readonly missingFeatures: readonly string[]) {
    super(`Pitcher ${targetId} has no value for: ${missingFeatures.join(', ')}`);
  }
}

export class NoCandidatesError extends PitchSimilarityError {
  readonly code = 'NO_CANDIDATES';

  constructor(readonly targetId: number, readonly excluded: number) {
    super(
      `No pitchers comparable to ${targetId}` +
        (excluded > 0 ? ` (${excluded} excluded for missing features)` : '')
    );
  }
}

export class InvalidQueryError extends PitchSimilarityError {
  readonly code = 'INVALID_QUERY';
}

export type UpstreamOperation = 'fetch-events' | 'resolve-names';

export type UpstreamContext = Record<string, string | number | undefined>;

/**
 * Failure of the event source or name resolver, tagged with the query that
 * triggered it.
 */
export class UpstreamError extends PitchSimilarityError {
  readonly code = 'UPSTREAM';

  constructor(
    readonly operation: UpstreamOperation,
    readonly context: UpstreamContext,
    cause: unknown
  ) {
    super(`${operation} failed (${formatContext(context)}): ${describeCause(cause)}`, { cause });
  }
}

function formatContext(context: UpstreamContext): string {
  return Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function isPitchSimilarityError(error: unknown): error is PitchSimilarityError {
  return error instanceof PitchSimilarityError;
}
