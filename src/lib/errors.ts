export type CardwiseErrorCode =
  | 'INVALID_ANSWER_SET'
  | 'INVALID_DIFFICULTY'
  | 'INVALID_EASE'
  | 'INVALID_QUALITY'
  | 'INVALID_CONFIDENCE'
  | 'INVALID_ITEM'
  | 'EMPTY_CANDIDATE_SET'
  | 'SESSION_STATE'
  | 'CONFIGURATION';

export class CardwiseError extends Error {
  readonly code: CardwiseErrorCode;

  constructor(code: CardwiseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidAnswerSetError extends CardwiseError {
  constructor(message = 'An item needs at least one non-empty accepted answer.') {
    super('INVALID_ANSWER_SET', message);
  }
}

export class InvalidDifficultyError extends CardwiseError {
  constructor(value: number) {
    super('INVALID_DIFFICULTY', `Difficulty must be a number between 0 and 1, received ${value}.`);
  }
}

export class InvalidEaseError extends CardwiseError {
  constructor(value: number) {
    super('INVALID_EASE', `Ease must be a number of at least 1.3, received ${value}.`);
  }
}

export class InvalidQualityError extends CardwiseError {
  constructor(value: number) {
    super('INVALID_QUALITY', `Quality must be an integer from 0 to 5, received ${value}.`);
  }
}

export class InvalidConfidenceError extends CardwiseError {
  constructor(value: number) {
    super('INVALID_CONFIDENCE', `Confidence must be an integer from 1 to 5, received ${value}.`);
  }
}

export class InvalidItemError extends CardwiseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_ITEM', message, options);
  }
}

export class EmptyCandidateSetError extends CardwiseError {
  constructor() {
    super('EMPTY_CANDIDATE_SET', 'Cannot match an answer against an empty candidate set.');
  }
}

export class SessionStateError extends CardwiseError {
  constructor(message: string) {
    super('SESSION_STATE', message);
  }
}

export class ConfigurationError extends CardwiseError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export function isCardwiseError(error: unknown): error is CardwiseError {
  return error instanceof CardwiseError;
}

export function extractErrorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }

  if (error instanceof CardwiseError) {
    return error.code;
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  if ('cause' in error) {
    return extractErrorCode(error.cause);
  }

  return undefined;
}
