// Raised by the validation gate. The parser's own diagnostic is not kept.
export class InvalidInputError extends Error {
  override readonly name = 'InvalidInputError';

  constructor() {
    super('Invalid input');
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MalformedRecordError extends Error {
  override readonly name = 'MalformedRecordError';

  constructor(
    readonly path: string,
    readonly line: number,
    message: string,
    override readonly cause?: unknown,
  ) {
    super(`Malformed record at ${path}:${line}: ${message}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The statement handed to the evaluator does not have the select shape.
 * This is an integration bug between the grammar and the evaluator, not
 * something the user can fix by retyping the query.
 */
export class StatementShapeError extends Error {
  override readonly name = 'StatementShapeError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
