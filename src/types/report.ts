import { AuditState, FindingSeverity, ProbeFailureKind } from './enums';
import { Finding } from './finding';
import { Target } from './target';

export interface FileExposureSummary {
  checked: number;
  exposed: number;
}

export type SeveritySummary = Record<FindingSeverity, number>;

export interface PresentHeader {
  name: string;
  /** Truncated header value */
  value: string;
}

export interface ExternalScript {
  /** Script host, or "relative path" */
  host: string;
  src: string;
}

export interface PrimaryProbeObservation {
  ok: boolean;
  status?: number;
  finalUrl?: string;
  failureKind?: ProbeFailureKind;
  message?: string;
}

/**
 * Non-scored narrative gathered during analysis
 */
export interface AuditObservations {
  primaryProbe: PrimaryProbeObservation;
  presentHeaders: PresentHeader[];
  commentCount: number;
  inlineScriptCount: number;
  externalScripts: ExternalScript[];
  formCount: number;
  emailAddresses: string[];
}

export interface AuditReport {
  readonly scanId: string;
  readonly target: Target;
  /** ISO-8601 start time */
  readonly timestamp: string;
  readonly durationMs: number;
  readonly state: AuditState;
  /** True when the audit was cancelled before every probe finished */
  readonly partial: boolean;
  readonly findings: readonly Finding[];
  readonly summary: SeveritySummary;
  readonly fileExposureSummary: FileExposureSummary;
  readonly observations: AuditObservations;
  readonly recommendations: readonly string[];
  readonly actionItems: readonly string[];
}
