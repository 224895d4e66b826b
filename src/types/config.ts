import { LogLevel, ReportFormat } from './enums';

export interface RateLimitConfig {
  requestsPerSecond: number;
  burstSize?: number;
  /** Backoff applied after a 429 answer */
  initialBackoffMs?: number;
  enabled?: boolean;
}

/**
 * Security header checked by HeaderSecurityDetector
 */
export interface SecurityHeaderRule {
  name: string;
  purpose: string;
}

/**
 * Complete audit configuration. Lists are injected into the detectors so
 * tests can substitute shorter ones.
 */
export interface AuditConfiguration {
  /** Timeout for the primary page fetch (ms) */
  timeoutMs: number;
  /** Timeout for each file-exposure probe (ms) */
  probeTimeoutMs: number;
  /** Simultaneous probes against the target */
  maxConcurrency: number;
  /** Redirect hops followed by the primary fetch */
  maxRedirects: number;
  userAgent: string;
  rateLimit: RateLimitConfig;
  securityHeaders: SecurityHeaderRule[];
  sensitivePaths: string[];
  disclosureHeaders: string[];
  commentKeywords: string[];
  csrfKeywords: string[];
  inlineScriptThreshold: number;
  maxEmailAddresses: number;
  logLevel: LogLevel;
  reporting: {
    format: ReportFormat;
    outputFile?: string;
  };
}

export type AuditConfigurationOverrides = Partial<Omit<AuditConfiguration, 'rateLimit' | 'reporting'>> & {
  rateLimit?: Partial<RateLimitConfig>;
  reporting?: Partial<AuditConfiguration['reporting']>;
};
