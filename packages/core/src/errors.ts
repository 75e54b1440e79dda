/**
 * @warden/core - Error types
 *
 * Errors are reserved for configuration-time problems. The inspection
 * pipeline itself never throws on user text; it reports outcomes as data.
 */

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * A configuration file or policy could not be loaded or is invalid.
 */
export class ShieldConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(message);
    this.name = 'ShieldConfigError';
    this.issues = issues;
  }
}

/**
 * A detection pattern failed to compile. Raised when a pattern table is
 * first built, so a bad table fails at startup instead of being skipped.
 */
export class PatternCompileError extends Error {
  readonly label: string;

  constructor(label: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Pattern "${label}" failed to compile: ${detail}`, { cause });
    this.name = 'PatternCompileError';
    this.label = label;
  }
}

/**
 * Compile a regular expression, turning a syntax error into a
 * PatternCompileError that names the offending pattern.
 */
export function compilePattern(source: string, flags: string, label: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    throw new PatternCompileError(label, err);
  }
}
