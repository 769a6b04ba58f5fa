import { formatUnknownError } from '@evtlog/core';

/**
 * Raised when a settings object does not describe a valid logging setup.
 */
export class ConfigurationRejectedError extends Error {
  override readonly name = 'ConfigurationRejectedError';
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Logging settings rejected: ${issues.join('; ')}`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.issues = issues;
  }
}

/**
 * Raised for any failure while loading settings from a file. The original failure is the `cause`.
 */
export class ConfigurationLoadError extends Error {
  override readonly name = 'ConfigurationLoadError';

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Error configuring from file "${path}": ${formatUnknownError(cause)}`, { cause });
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
