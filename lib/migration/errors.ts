/**
 * Custom error classes for staging operations
 */

/**
 * Error thrown when hand-edited dataset JSON cannot be accepted
 */
export class ValidationError extends Error {
  constructor(
    public readonly identifier: string,
    public readonly detail: string,
    public readonly line?: number,
    public readonly column?: number
  ) {
    super(
      line !== undefined && column !== undefined
        ? `Invalid JSON for dataset '${identifier}' at line ${line}, column ${column}: ${detail}`
        : `Invalid JSON for dataset '${identifier}': ${detail}`
    );
    this.name = 'ValidationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when an operation needs a local copy that was never staged
 */
export class NotStagedError extends Error {
  constructor(public readonly identifier: string) {
    super(`No local copy of dataset '${identifier}'; fetch it first`);
    this.name = 'NotStagedError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Line and column (1-based) of a character offset in `text`
 */
export function locateOffset(text: string, offset: number): { line: number; column: number } {
  const before = text.slice(0, offset).split('\n');
  return { line: before.length, column: before[before.length - 1].length + 1 };
}

/**
 * Parse JSON or raise a ValidationError carrying the parser's location
 */
export function parseEditedJson(identifier: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    const position = /position (\d+)/.exec(detail);
    if (position) {
      const { line, column } = locateOffset(text, Number(position[1]));
      throw new ValidationError(identifier, detail, line, column);
    }
    throw new ValidationError(identifier, detail);
  }
}
