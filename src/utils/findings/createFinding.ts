import { v4 as uuidv4 } from 'uuid';
import { AuditPhase, FindingCategory, FindingSeverity } from '../../types/enums';
import { Finding } from '../../types/finding';
import { SeveritySummary } from '../../types/report';
import { DetectionThresholds } from '../../config/constants';

/**
 * Cuts `text` to at most `maxLength` characters
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}

/**
 * Builds a frozen Finding. Evidence is capped here, so no detector can
 * put a longer excerpt into a report.
 */
export function createFinding(
  phase: AuditPhase,
  category: FindingCategory,
  severity: FindingSeverity,
  targetDetail: string,
  evidence: string
): Finding {
  return Object.freeze({
    id: uuidv4(),
    phase,
    category,
    severity,
    targetDetail,
    evidence: truncate(evidence, DetectionThresholds.MAX_EVIDENCE_LENGTH),
  });
}

export function summarizeFindings(findings: readonly Finding[]): SeveritySummary {
  const summary: SeveritySummary = {
    [FindingSeverity.INFO]: 0,
    [FindingSeverity.WARNING]: 0,
    [FindingSeverity.CRITICAL]: 0,
  };

  for (const finding of findings) {
    summary[finding.severity] += 1;
  }

  return summary;
}
