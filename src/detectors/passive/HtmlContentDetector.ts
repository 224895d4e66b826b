import { IPassiveDetector } from '../../core/interfaces/IPassiveDetector';
import { AuditPhase, FindingCategory, FindingSeverity, LogLevel } from '../../types/enums';
import { Finding } from '../../types/finding';
import { ProbeSuccess } from '../../types/probe';
import { ExternalScript } from '../../types/report';
import { COMMENT_KEYWORDS, CSRF_KEYWORDS, DetectionThresholds } from '../../config/constants';
import { createFinding, truncate } from '../../utils/findings/createFinding';
import { Logger } from '../../utils/logger/Logger';
import {
  EMAIL_PATTERN,
  EXTERNAL_SCRIPT_PATTERN,
  FORM_ACTION_PATTERN,
  FORM_BLOCK_PATTERN,
  HTML_COMMENT_PATTERN,
  SCRIPT_BLOCK_PATTERN,
  SECRET_ASSIGNMENT_PATTERN,
  SRC_ATTRIBUTE_PATTERN,
} from '../../utils/patterns/html-patterns';

export const RELATIVE_SCRIPT_HOST = 'relative path';

const MAX_EXTERNAL_SCRIPTS = 10;

export interface HtmlContentOptions {
  commentKeywords?: readonly string[];
  csrfKeywords?: readonly string[];
  /** Inline scripts tolerated before the CSP advisory */
  inlineScriptThreshold?: number;
  maxEmailAddresses?: number;
  logger?: Logger;
}

/**
 * Everything one pass over the body produced
 */
export interface HtmlAnalysis {
  findings: Finding[];
  commentCount: number;
  inlineScriptCount: number;
  externalScripts: ExternalScript[];
  formCount: number;
  /** Distinct addresses, first-seen order, capped */
  emailAddresses: string[];
}

function emptyAnalysis(): HtmlAnalysis {
  return {
    findings: [],
    commentCount: 0,
    inlineScriptCount: 0,
    externalScripts: [],
    formCount: 0,
    emailAddresses: [],
  };
}

/**
 * HtmlContentDetector - Pattern extraction over the raw page body.
 *
 * Runs, in order: sensitive comments, inline script count, external script
 * hosts, forms without CSRF tokens, email addresses, secret-shaped
 * assignments. The body is plain text here; no DOM is built.
 */
export class HtmlContentDetector implements IPassiveDetector {
  public readonly name = 'html-content';
  public readonly phase = AuditPhase.HTML;
  private readonly commentKeywords: readonly string[];
  private readonly csrfKeywords: readonly string[];
  private readonly inlineScriptThreshold: number;
  private readonly maxEmailAddresses: number;
  private readonly logger: Logger;

  constructor(options: HtmlContentOptions = {}) {
    this.commentKeywords = (options.commentKeywords ?? COMMENT_KEYWORDS).map((k) => k.toLowerCase());
    this.csrfKeywords = (options.csrfKeywords ?? CSRF_KEYWORDS).map((k) => k.toLowerCase());
    this.inlineScriptThreshold = options.inlineScriptThreshold ?? DetectionThresholds.INLINE_SCRIPT_THRESHOLD;
    this.maxEmailAddresses = options.maxEmailAddresses ?? DetectionThresholds.MAX_EMAIL_ADDRESSES;
    this.logger = options.logger ?? new Logger(LogLevel.INFO, 'HtmlContentDetector');
  }

  public detect(response: ProbeSuccess): Finding[] {
    return this.analyze(response.body).findings;
  }

  public analyze(body: string): HtmlAnalysis {
    if (body.length === 0) {
      return emptyAnalysis();
    }

    const analysis = emptyAnalysis();

    const comments = this.checkComments(body);
    analysis.commentCount = comments.count;
    analysis.findings.push(...comments.findings);

    analysis.inlineScriptCount = this.countInlineScripts(body);
    if (analysis.inlineScriptCount > this.inlineScriptThreshold) {
      analysis.findings.push(
        createFinding(
          this.phase,
          FindingCategory.INLINE_SCRIPT_OVERUSE,
          FindingSeverity.WARNING,
          'inline <script>',
          `${analysis.inlineScriptCount} inline scripts - consider a Content-Security-Policy`
        )
      );
    }

    analysis.externalScripts = this.collectExternalScripts(body);

    const forms = this.checkForms(body);
    analysis.formCount = forms.count;
    analysis.findings.push(...forms.findings);

    analysis.emailAddresses = this.collectEmails(body);

    analysis.findings.push(...this.checkSecrets(body));

    this.logger.debug(
      `HTML analysis: ${analysis.commentCount} comments, ${analysis.inlineScriptCount} inline scripts, ` +
        `${analysis.formCount} forms, ${analysis.findings.length} findings`
    );

    return analysis;
  }

  private checkComments(body: string): { count: number; findings: Finding[] } {
    const findings: Finding[] = [];
    let count = 0;

    for (const match of body.matchAll(HTML_COMMENT_PATTERN)) {
      count++;
      const excerpt = truncate((match[1] ?? '').trim(), DetectionThresholds.COMMENT_EXCERPT_LENGTH);
      const lowered = excerpt.toLowerCase();

      if (this.commentKeywords.some((keyword) => lowered.includes(keyword))) {
        findings.push(
          createFinding(
            this.phase,
            FindingCategory.SENSITIVE_COMMENT,
            FindingSeverity.WARNING,
            `HTML comment #${count}`,
            excerpt
          )
        );
      }
    }

    return { count, findings };
  }

  /**
   * Only blocks without a `src` attribute count. An external script tag,
   * empty or not, is left out, so the CSP advisory needs more than ten
   * scripts that a policy would actually have to allow inline.
   */
  private countInlineScripts(body: string): number {
    let count = 0;
    for (const match of body.matchAll(SCRIPT_BLOCK_PATTERN)) {
      if (!SRC_ATTRIBUTE_PATTERN.test(match[1] ?? '')) {
        count++;
      }
    }
    return count;
  }

  private collectExternalScripts(body: string): ExternalScript[] {
    const scripts: ExternalScript[] = [];

    for (const match of body.matchAll(EXTERNAL_SCRIPT_PATTERN)) {
      const src = match[1];
      if (!src) continue;
      scripts.push({ host: scriptHost(src), src });
      if (scripts.length >= MAX_EXTERNAL_SCRIPTS) break;
    }

    return scripts;
  }

  private checkForms(body: string): { count: number; findings: Finding[] } {
    const findings: Finding[] = [];
    let count = 0;

    for (const match of body.matchAll(FORM_BLOCK_PATTERN)) {
      count++;
      const formBody = (match[2] ?? '').toLowerCase();
      if (this.csrfKeywords.some((keyword) => formBody.includes(keyword))) {
        continue;
      }

      const action = FORM_ACTION_PATTERN.exec(match[1] ?? '')?.[1] ?? '';
      findings.push(
        createFinding(this.phase, FindingCategory.NO_CSRF_TOKEN, FindingSeverity.WARNING, `form #${count}`, action)
      );
    }

    return { count, findings };
  }

  private collectEmails(body: string): string[] {
    const distinct = new Set<string>();

    for (const match of body.matchAll(EMAIL_PATTERN)) {
      if (distinct.size >= this.maxEmailAddresses) break;
      distinct.add(match[0]);
    }

    return [...distinct];
  }

  /**
   * Evidence keeps the key name and a short prefix of the value, never the
   * whole value
   */
  private checkSecrets(body: string): Finding[] {
    const findings: Finding[] = [];

    for (const match of body.matchAll(SECRET_ASSIGNMENT_PATTERN)) {
      const keyName = match[1] ?? '';
      const value = match[2] ?? '';
      findings.push(
        createFinding(
          this.phase,
          FindingCategory.EXPOSED_SECRET,
          FindingSeverity.CRITICAL,
          keyName,
          `${keyName}: ${truncate(value, DetectionThresholds.SECRET_PREVIEW_LENGTH)}`
        )
      );
    }

    return findings;
  }
}

function scriptHost(src: string): string {
  if (!/^([a-z][a-z0-9+.-]*:)?\/\//i.test(src)) {
    return RELATIVE_SCRIPT_HOST;
  }
  try {
    return new URL(src, 'https://relative.invalid').host || RELATIVE_SCRIPT_HOST;
  } catch {
    return RELATIVE_SCRIPT_HOST;
  }
}
