import { IPassiveDetector } from '../../core/interfaces/IPassiveDetector';
import { AuditPhase, FindingCategory, FindingSeverity, LogLevel } from '../../types/enums';
import { Finding } from '../../types/finding';
import { ProbeSuccess } from '../../types/probe';
import { createFinding } from '../../utils/findings/createFinding';
import { Logger } from '../../utils/logger/Logger';

/**
 * Cookie attribute tokens. Matched case-sensitively: they are fixed protocol
 * tokens.
 */
const COOKIE_FLAGS = ['Secure', 'HttpOnly', 'SameSite'] as const;

export type CookieFlag = (typeof COOKIE_FLAGS)[number];

/**
 * CookieSecurityDetector - Checks Set-Cookie for the Secure, HttpOnly and
 * SameSite attributes.
 *
 * All Set-Cookie values are joined into the single combined value an HTTP
 * client exposes, so each flag is reported at most once per response. A
 * response without Set-Cookie yields nothing.
 */
export class CookieSecurityDetector implements IPassiveDetector {
  public readonly name = 'cookie-flags';
  public readonly phase = AuditPhase.HEADERS;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? new Logger(LogLevel.INFO, 'CookieSecurityDetector');
  }

  public detect(response: ProbeSuccess): Finding[] {
    const cookies = response.headers.getAll('Set-Cookie');
    if (cookies.length === 0) {
      return [];
    }

    const combined = cookies.join(', ');
    const names = cookies.map(extractCookieName).join(', ');
    const missing = this.missingFlags(combined);

    this.logger.debug(`Set-Cookie (${cookies.length} cookies) missing: ${missing.join(', ') || 'none'}`);

    return missing.map((flag) =>
      createFinding(
        this.phase,
        FindingCategory.COOKIE_FLAG,
        FindingSeverity.WARNING,
        flag,
        `Missing '${flag}' attribute on cookies: ${names}`
      )
    );
  }

  public missingFlags(cookieHeader: string): CookieFlag[] {
    return COOKIE_FLAGS.filter((flag) => !cookieHeader.includes(flag));
  }
}

/**
 * Cookie name only; values may be session tokens and stay out of reports
 */
function extractCookieName(cookieHeader: string): string {
  const match = cookieHeader.match(/^\s*([^=;]+)=/);
  return match && match[1] ? match[1].trim() : 'unknown';
}
