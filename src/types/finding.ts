import { AuditPhase, FindingCategory, FindingSeverity } from './enums';

/**
 * One detected condition. Evidence never exceeds MAX_EVIDENCE_LENGTH.
 */
export interface Finding {
  readonly id: string;
  readonly phase: AuditPhase;
  readonly category: FindingCategory;
  readonly severity: FindingSeverity;
  /** What the finding is about: a header name, a path, a form action */
  readonly targetDetail: string;
  readonly evidence: string;
}
