/** Anything lines can be written to: `process.stdout`, a file stream, a test buffer. */
export interface WritableTarget {
  write(chunk: string): unknown;
}

const LINE_TERMINATOR = '\n';

/**
 * One-line description of a thrown value, as used in configuration error messages.
 *
 * @param error - Anything caught from a `catch` clause.
 * @returns `Name: message` for errors, the string form otherwise.
 */
export function formatUnknownError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Shapes a thrown value for the `data` field of a structured log entry.
 * Non-errors are reported under the name `UnknownError`.
 */
export function serialiseError(error: unknown): {
  readonly name: string;
  readonly message: string;
  readonly stack?: string;
} {
  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: String(error) };
  }
  const { name, message, stack } = error;
  return stack ? { name, message, stack } : { name, message };
}

/**
 * Writes `line` and a newline to the target. The target's return value is ignored.
 */
export function writeLine(target: WritableTarget, line: string): void {
  target.write(`${line}${LINE_TERMINATOR}`);
}
