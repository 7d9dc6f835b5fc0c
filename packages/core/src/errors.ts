/**
 * Layout error types.
 *
 * Only programmer errors throw. Width overflow is the signal that drives the
 * fallback path and never surfaces as an error.
 */

export class LayoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutError';
  }
}

export class NegativeIndentError extends LayoutError {
  public readonly level: number;

  constructor(level: number) {
    super(`The indent level cannot be negative (got ${level})`);
    this.name = 'NegativeIndentError';
    this.level = level;
  }
}

export class LeakedTrialError extends LayoutError {
  /** Number of trial budgets still on the stack */
  public readonly depth: number;

  constructor(depth: number) {
    super(`Document finalized with ${depth} outstanding trial budget${depth === 1 ? '' : 's'}`);
    this.name = 'LeakedTrialError';
    this.depth = depth;
  }
}

export class ConfigError extends LayoutError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid format config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
