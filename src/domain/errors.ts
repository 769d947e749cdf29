/**
 * Failure taxonomy shared by the store, the import pipeline and the HTTP layer.
 */

export type FailureKind = 'validation' | 'not_found' | 'conflict' | 'batch';

export abstract class LedgerFailure extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid field or row; recoverable */
export class ValidationFailure extends LedgerFailure {
  readonly kind = 'validation';
}

/** Referenced entity id does not exist */
export class NotFoundFailure extends LedgerFailure {
  readonly kind = 'not_found';

  static of(entity: string, id: string): NotFoundFailure {
    return new NotFoundFailure(`${entity} with id ${id} not found`);
  }
}

/** Duplicate category name */
export class ConflictFailure extends LedgerFailure {
  readonly kind = 'conflict';
}

/** Decoding, parsing or commit failure that aborts a whole import */
export class BatchFailure extends LedgerFailure {
  readonly kind = 'batch';
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
