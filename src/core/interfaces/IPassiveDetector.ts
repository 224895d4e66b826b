import { AuditPhase } from '../../types/enums';
import { Finding } from '../../types/finding';
import { ProbeSuccess } from '../../types/probe';

/**
 * Passive detector over the primary page response.
 * Pure: no network, no shared state, same input gives the same findings
 * (ids aside).
 */
export interface IPassiveDetector {
  readonly name: string;
  /** Report phase the findings belong to */
  readonly phase: AuditPhase;

  detect(response: ProbeSuccess): Finding[];
}
