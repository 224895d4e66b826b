import { IPassiveDetector } from '../../core/interfaces/IPassiveDetector';
import { AuditPhase, FindingCategory, FindingSeverity, LogLevel } from '../../types/enums';
import { Finding } from '../../types/finding';
import { ProbeSuccess } from '../../types/probe';
import { DISCLOSURE_HEADERS } from '../../config/constants';
import { createFinding } from '../../utils/findings/createFinding';
import { VERSION_STRING_PATTERN } from '../../utils/patterns/html-patterns';
import { Logger } from '../../utils/logger/Logger';

/**
 * InformationDisclosureDetector - Software names and versions leaked by
 * Server / X-Powered-By style headers and by version strings in the body.
 *
 * The body heuristic is loose and reports unrelated "version: x.y.z" fields
 * too; that is accepted as a known limitation.
 */
export class InformationDisclosureDetector implements IPassiveDetector {
  public readonly name = 'information-disclosure';
  public readonly phase = AuditPhase.DISCLOSURE;
  private readonly headerNames: readonly string[];
  private readonly logger: Logger;

  constructor(headerNames: readonly string[] = DISCLOSURE_HEADERS, logger?: Logger) {
    this.headerNames = headerNames;
    this.logger = logger ?? new Logger(LogLevel.INFO, 'InformationDisclosureDetector');
  }

  public detect(response: ProbeSuccess): Finding[] {
    const findings: Finding[] = [];

    for (const name of this.headerNames) {
      const value = response.headers.get(name);
      if (value !== undefined) {
        findings.push(createFinding(this.phase, FindingCategory.INFO_DISCLOSURE, FindingSeverity.INFO, name, value));
      }
    }

    for (const version of this.findVersionStrings(response.body)) {
      findings.push(
        createFinding(this.phase, FindingCategory.INFO_DISCLOSURE, FindingSeverity.INFO, 'response body', version)
      );
    }

    this.logger.debug(`Information disclosure: ${findings.length} findings`);
    return findings;
  }

  /**
   * Distinct version strings, first-seen order
   */
  public findVersionStrings(body: string): string[] {
    const versions = new Set<string>();
    for (const match of body.matchAll(VERSION_STRING_PATTERN)) {
      if (match[1]) versions.add(match[1]);
    }
    return [...versions];
  }
}
