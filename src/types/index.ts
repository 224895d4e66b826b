/**
 * Central export point for all type definitions
 */

// Enums
export * from './enums';

export type { Target } from './target';
export type { ProbeResult, ProbeSuccess, ProbeFailure, ProbeOptions, TargetScheme } from './probe';
export type { Finding } from './finding';
export type {
  AuditReport,
  AuditObservations,
  ExternalScript,
  FileExposureSummary,
  PresentHeader,
  PrimaryProbeObservation,
  SeveritySummary,
} from './report';
export type {
  AuditConfiguration,
  AuditConfigurationOverrides,
  RateLimitConfig,
  SecurityHeaderRule,
} from './config';
