/**
 * Target string cannot be turned into an http(s) URL.
 * The one user-facing fatal condition; raised before any network activity.
 */
export class MalformedTargetError extends Error {
  public readonly input: string;

  constructor(input: string, reason: string) {
    super(`Malformed target "${input}": ${reason}`);
    this.name = 'MalformedTargetError';
    this.input = input;
  }
}

/**
 * Configuration failed validation
 */
export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join(', ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A probe was requested with arguments that break its contract
 * (non-positive timeout, relative URL). Programming error, not a probe outcome.
 */
export class ProbeConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProbeConfigurationError';
  }
}
