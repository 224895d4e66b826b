import { IPassiveDetector } from '../../core/interfaces/IPassiveDetector';
import { AuditPhase, FindingCategory, FindingSeverity, LogLevel } from '../../types/enums';
import { Finding } from '../../types/finding';
import { ProbeSuccess } from '../../types/probe';
import { PresentHeader } from '../../types/report';
import { SecurityHeaderRule } from '../../types/config';
import { DetectionThresholds, SECURITY_HEADERS } from '../../config/constants';
import { createFinding, truncate } from '../../utils/findings/createFinding';
import { Logger } from '../../utils/logger/Logger';

/**
 * HeaderSecurityDetector - Flags missing security response headers.
 * One HeaderMissing warning per absent header; present headers are only
 * reported as observations.
 */
export class HeaderSecurityDetector implements IPassiveDetector {
  public readonly name = 'security-headers';
  public readonly phase = AuditPhase.HEADERS;
  private readonly securityHeaders: readonly SecurityHeaderRule[];
  private readonly logger: Logger;

  constructor(securityHeaders: readonly SecurityHeaderRule[] = SECURITY_HEADERS, logger?: Logger) {
    this.securityHeaders = securityHeaders;
    this.logger = logger ?? new Logger(LogLevel.INFO, 'HeaderSecurityDetector');
  }

  public detect(response: ProbeSuccess): Finding[] {
    const findings = this.securityHeaders
      .filter((rule) => !response.headers.has(rule.name))
      .map((rule) =>
        createFinding(this.phase, FindingCategory.HEADER_MISSING, FindingSeverity.WARNING, rule.name, rule.purpose)
      );

    this.logger.debug(`${findings.length}/${this.securityHeaders.length} security headers missing`);
    return findings;
  }

  /**
   * Checked headers that are present, with truncated values
   */
  public presentHeaders(response: ProbeSuccess): PresentHeader[] {
    const present: PresentHeader[] = [];

    for (const rule of this.securityHeaders) {
      const value = response.headers.get(rule.name);
      if (value !== undefined) {
        present.push({ name: rule.name, value: truncate(value, DetectionThresholds.HEADER_PREVIEW_LENGTH) });
      }
    }

    return present;
  }
}
