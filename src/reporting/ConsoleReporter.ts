import { IReporter } from '../core/interfaces/IReporter';
import { AuditPhase, AUDIT_PHASE_ORDER, FindingSeverity, ReportFormat } from '../types/enums';
import { Finding } from '../types/finding';
import { AuditReport } from '../types/report';

const RULE = '='.repeat(60);

const PHASE_TITLES: Record<AuditPhase, string> = {
  [AuditPhase.TLS]: 'SSL/TLS ANALYSIS',
  [AuditPhase.HEADERS]: 'SECURITY HEADERS ANALYSIS',
  [AuditPhase.FILE_EXPOSURE]: 'EXPOSED FILES CHECK',
  [AuditPhase.HTML]: 'HTML CONTENT ANALYSIS',
  [AuditPhase.DISCLOSURE]: 'INFORMATION DISCLOSURE',
};

const SEVERITY_MARKERS: Record<FindingSeverity, string> = {
  [FindingSeverity.CRITICAL]: '[CRITICAL]',
  [FindingSeverity.WARNING]: '[WARNING] ',
  [FindingSeverity.INFO]: '[INFO]    ',
};

/**
 * Human-readable terminal rendering, one section per audit phase
 */
export class ConsoleReporter implements IReporter {
  public readonly format = ReportFormat.CONSOLE;

  public render(report: AuditReport): string {
    const lines: string[] = [];

    lines.push(RULE, `Security audit for: ${report.target.url}`, `Started: ${report.timestamp}`);
    lines.push(`State: ${report.state}${report.partial ? ' (partial report)' : ''}`, RULE);

    const primary = report.observations.primaryProbe;
    lines.push(
      primary.ok
        ? `Primary page: HTTP ${primary.status ?? '?'} (${primary.finalUrl ?? report.target.url})`
        : `Primary page: unreachable (${primary.failureKind ?? 'unknown'}: ${primary.message ?? ''})`
    );

    for (const phase of AUDIT_PHASE_ORDER) {
      lines.push('', RULE, PHASE_TITLES[phase], RULE);
      lines.push(...this.renderPhase(report, phase));
    }

    lines.push('', RULE, 'SECURITY RECOMMENDATIONS', RULE);
    const actionItems = new Set(report.actionItems);
    report.recommendations.forEach((text, index) => {
      lines.push(`  ${actionItems.has(text) ? '*' : ' '} ${index + 1}. ${text}`);
    });
    if (actionItems.size > 0) {
      lines.push('', '  * = related to a finding in this report');
    }

    const { summary } = report;
    lines.push(
      '',
      RULE,
      `Findings: ${report.findings.length} (critical ${summary[FindingSeverity.CRITICAL]}, ` +
        `warning ${summary[FindingSeverity.WARNING]}, info ${summary[FindingSeverity.INFO]})`,
      RULE
    );

    return lines.join('\n');
  }

  private renderPhase(report: AuditReport, phase: AuditPhase): string[] {
    const findings = report.findings.filter((finding) => finding.phase === phase);
    const lines = findings.map(formatFinding);
    const { observations } = report;

    switch (phase) {
      case AuditPhase.TLS:
        if (findings.length === 0 && report.target.scheme === 'https' && observations.primaryProbe.ok) {
          lines.push('  Site uses HTTPS, handshake succeeded');
        }
        break;
      case AuditPhase.HEADERS:
        for (const header of observations.presentHeaders) {
          lines.push(`  present: ${header.name}: ${header.value}`);
        }
        break;
      case AuditPhase.FILE_EXPOSURE: {
        const { checked, exposed } = report.fileExposureSummary;
        lines.push(`  Summary: ${checked - exposed}/${checked} files properly protected`);
        break;
      }
      case AuditPhase.HTML:
        lines.push(
          `  Comments: ${observations.commentCount}, inline scripts: ${observations.inlineScriptCount}, ` +
            `forms: ${observations.formCount}`
        );
        for (const script of observations.externalScripts) {
          lines.push(`  external script: ${script.host}: ${script.src.slice(0, 60)}`);
        }
        for (const email of observations.emailAddresses) {
          lines.push(`  email address exposed: ${email}`);
        }
        break;
      case AuditPhase.DISCLOSURE:
        break;
    }

    return lines.length > 0 ? lines : ['  nothing to report'];
  }
}

function formatFinding(finding: Finding): string {
  const evidence = finding.evidence ? ` - ${finding.evidence}` : '';
  return `  ${SEVERITY_MARKERS[finding.severity]} ${finding.category}: ${finding.targetDetail}${evidence}`;
}
