import { TargetScheme } from './probe';

/**
 * Audit target, frozen once parsed
 */
export interface Target {
  /** Raw user input */
  readonly input: string;
  /** Normalized absolute URL */
  readonly url: string;
  readonly origin: string;
  readonly scheme: TargetScheme;
  readonly host: string;
}
