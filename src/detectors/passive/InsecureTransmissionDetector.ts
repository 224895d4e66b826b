import { AuditPhase, FindingCategory, FindingSeverity, LogLevel, ProbeFailureKind } from '../../types/enums';
import { Finding } from '../../types/finding';
import { ProbeResult } from '../../types/probe';
import { Target } from '../../types/target';
import { createFinding } from '../../utils/findings/createFinding';
import { Logger } from '../../utils/logger/Logger';

/**
 * InsecureTransmissionDetector - TLS posture of the target.
 *
 * - plain http target: one critical WeakTls, decided from the scheme alone
 * - https target whose primary fetch failed the handshake: one critical WeakTls
 *   carrying the failure message
 * - primary fetch failed for another reason: one TargetUnreachable warning
 *
 * Certificate chains are not validated beyond what the handshake does.
 */
export class InsecureTransmissionDetector {
  public readonly name = 'tls-posture';
  public readonly phase = AuditPhase.TLS;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? new Logger(LogLevel.INFO, 'InsecureTransmissionDetector');
  }

  /**
   * @param primary - outcome of the primary fetch; null when it never ran
   */
  public detect(target: Target, primary: ProbeResult | null): Finding[] {
    const findings: Finding[] = [];

    if (target.scheme === 'http') {
      findings.push(
        createFinding(
          this.phase,
          FindingCategory.WEAK_TLS,
          FindingSeverity.CRITICAL,
          target.origin,
          'no transport encryption'
        )
      );
    }

    if (primary && !primary.ok) {
      if (primary.kind === ProbeFailureKind.TLS_ERROR) {
        findings.push(
          createFinding(this.phase, FindingCategory.WEAK_TLS, FindingSeverity.CRITICAL, target.origin, primary.message)
        );
      } else if (primary.kind !== ProbeFailureKind.CANCELLED) {
        findings.push(
          createFinding(
            this.phase,
            FindingCategory.TARGET_UNREACHABLE,
            FindingSeverity.WARNING,
            primary.url,
            `${primary.kind}: ${primary.message}`
          )
        );
      }
    }

    this.logger.debug(`TLS posture for ${target.origin}: ${findings.length} findings`);
    return findings;
  }
}
