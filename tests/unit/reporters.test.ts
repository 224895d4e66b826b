/**
 * Unit tests for the console and JSON reporters
 */

import { AuditEngine } from '../../src/core/engine/AuditEngine';
import { parseTarget } from '../../src/core/target/parseTarget';
import { ConsoleReporter, JsonReporter, createReporter } from '../../src/reporting';
import { LogLevel, ReportFormat } from '../../src/types/enums';
import { AuditReport } from '../../src/types/report';
import { Logger } from '../../src/utils/logger/Logger';
import { FakeProbeClient } from '../helpers/FakeProbeClient';

describe('reporters', () => {
  let report: AuditReport;

  beforeAll(async () => {
    const client = new FakeProbeClient({
      'https://example.test/': {
        status: 200,
        headers: { 'Content-Type': 'text/html', 'X-Frame-Options': 'DENY' },
        body: '<form action="/login"><input name="user"></form> contact: admin@example.test',
      },
    });
    report = await new AuditEngine({ client, logger: new Logger(LogLevel.SILENT) }).run(
      parseTarget('https://example.test')
    );
  });

  describe('JsonReporter', () => {
    it('should serialise the report data schema', () => {
      const parsed: unknown = JSON.parse(new JsonReporter().render(report));

      expect(parsed).toMatchObject({
        scanId: report.scanId,
        target: { url: 'https://example.test/', scheme: 'https' },
        state: 'done',
        partial: false,
        summary: { Info: 0, Warning: 7, Critical: 0 },
        fileExposureSummary: { checked: 20, exposed: 0 },
        actionItems: report.actionItems,
      });
      expect(Object.keys(parsed ?? {})).toEqual([
        'scanId',
        'target',
        'timestamp',
        'durationMs',
        'state',
        'partial',
        'findings',
        'summary',
        'fileExposureSummary',
        'observations',
        'recommendations',
        'actionItems',
      ]);
    });

    it('should keep finding fields', () => {
      const parsed: unknown = JSON.parse(new JsonReporter(0).render(report));

      expect(parsed).toMatchObject({ findings: report.findings.map((finding) => ({ ...finding })) });
    });
  });

  describe('ConsoleReporter', () => {
    const lines = () => new ConsoleReporter().render(report).split('\n');

    it('should open with the target and state', () => {
      expect(lines().slice(1, 4)).toEqual([
        'Security audit for: https://example.test/',
        `Started: ${report.timestamp}`,
        'State: done',
      ]);
      expect(lines()).toContain('Primary page: HTTP 200 (https://example.test/)');
    });

    it('should print findings and observations per phase', () => {
      const output = lines();

      expect(output).toContain('  Site uses HTTPS, handshake succeeded');
      expect(output).toContain('  [WARNING]  HeaderMissing: Strict-Transport-Security - HSTS - Forces HTTPS');
      expect(output).toContain('  present: X-Frame-Options: DENY');
      expect(output).toContain('  Summary: 20/20 files properly protected');
      expect(output).toContain('  Comments: 0, inline scripts: 0, forms: 1');
      expect(output).toContain('  [WARNING]  NoCsrfToken: form #1 - /login');
      expect(output).toContain('  email address exposed: admin@example.test');
      expect(output).toContain('  nothing to report');
    });

    it('should mark recommendations that match findings', () => {
      const output = lines();

      expect(output).toContain('  * 1. Enable all missing security headers (HSTS, CSP, X-Frame-Options)');
      expect(output).toContain('  * 3. Add CSRF tokens to all forms');
      expect(output).toContain('    8. Implement rate limiting on forms and API endpoints');
    });

    it('should close with the severity totals', () => {
      expect(lines()).toContain('Findings: 7 (critical 0, warning 7, info 0)');
    });
  });

  it('should create a reporter per format', () => {
    expect(createReporter(ReportFormat.JSON)).toBeInstanceOf(JsonReporter);
    expect(createReporter(ReportFormat.CONSOLE)).toBeInstanceOf(ConsoleReporter);
  });
});
