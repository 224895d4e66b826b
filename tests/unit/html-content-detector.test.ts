/**
 * Unit tests for HtmlContentDetector
 */

import { HtmlContentDetector, RELATIVE_SCRIPT_HOST } from '../../src/detectors/passive';
import { FindingCategory, FindingSeverity, LogLevel } from '../../src/types/enums';
import { Logger } from '../../src/utils/logger/Logger';
import { success } from '../helpers/FakeProbeClient';

describe('HtmlContentDetector', () => {
  const detector = new HtmlContentDetector({ logger: new Logger(LogLevel.SILENT) });

  it('should return an empty analysis for an empty body', () => {
    expect(detector.analyze('')).toEqual({
      findings: [],
      commentCount: 0,
      inlineScriptCount: 0,
      externalScripts: [],
      formCount: 0,
      emailAddresses: [],
    });
  });

  describe('comments', () => {
    it('should flag a comment mentioning a keyword', () => {
      const analysis = detector.analyze('<p>hi</p><!-- api_key leaked -->');

      expect(analysis.commentCount).toBe(1);
      expect(analysis.findings).toHaveLength(1);
      expect(analysis.findings[0]).toMatchObject({
        category: FindingCategory.SENSITIVE_COMMENT,
        severity: FindingSeverity.WARNING,
        targetDetail: 'HTML comment #1',
        evidence: 'api_key leaked',
      });
    });

    it('should ignore harmless comments', () => {
      const analysis = detector.analyze('<!-- layout fix -->');

      expect(analysis.commentCount).toBe(1);
      expect(analysis.findings).toEqual([]);
    });

    it('should match keywords case-insensitively across lines', () => {
      const analysis = detector.analyze('<!-- a -->\n<!--\n  Admin PASSWORD is in the wiki\n-->');

      expect(analysis.commentCount).toBe(2);
      expect(analysis.findings[0]?.targetDetail).toBe('HTML comment #2');
      expect(analysis.findings[0]?.evidence).toBe('Admin PASSWORD is in the wiki');
    });

    it('should cut the excerpt to 100 characters', () => {
      const analysis = detector.analyze(`<!-- secret ${'x'.repeat(200)} -->`);

      expect(analysis.findings[0]?.evidence).toHaveLength(100);
    });
  });

  describe('scripts', () => {
    const inline = (count: number) => '<script>var a = 1;</script>'.repeat(count);

    it('should count inline scripts without an advisory up to the threshold', () => {
      const analysis = detector.analyze(inline(10) + '<script src="/app.js"></script>');

      expect(analysis.inlineScriptCount).toBe(10);
      expect(analysis.findings).toEqual([]);
    });

    it('should advise a CSP above the threshold', () => {
      const analysis = detector.analyze(inline(11));

      expect(analysis.findings).toHaveLength(1);
      expect(analysis.findings[0]).toMatchObject({
        category: FindingCategory.INLINE_SCRIPT_OVERUSE,
        severity: FindingSeverity.WARNING,
        targetDetail: 'inline <script>',
      });
    });

    it('should honour an injected threshold', () => {
      const strict = new HtmlContentDetector({ inlineScriptThreshold: 1, logger: new Logger(LogLevel.SILENT) });

      expect(strict.analyze(inline(2)).findings).toHaveLength(1);
    });

    it('should record external script hosts', () => {
      const analysis = detector.analyze(
        '<script src="https://cdn.example.com/lib.js"></script>' +
          '<script src="/static/local.js"></script>' +
          "<script async src='//cdn.example.org/x.js'></script>"
      );

      expect(analysis.externalScripts).toEqual([
        { host: 'cdn.example.com', src: 'https://cdn.example.com/lib.js' },
        { host: RELATIVE_SCRIPT_HOST, src: '/static/local.js' },
        { host: 'cdn.example.org', src: '//cdn.example.org/x.js' },
      ]);
      expect(analysis.inlineScriptCount).toBe(0);
      expect(analysis.findings).toEqual([]);
    });
  });

  describe('forms', () => {
    it('should flag a form without a CSRF token', () => {
      const analysis = detector.analyze('<form><input name="x"></form>');

      expect(analysis.formCount).toBe(1);
      expect(analysis.findings).toHaveLength(1);
      expect(analysis.findings[0]).toMatchObject({
        category: FindingCategory.NO_CSRF_TOKEN,
        severity: FindingSeverity.WARNING,
        targetDetail: 'form #1',
        evidence: '',
      });
    });

    it('should use the action as evidence', () => {
      const analysis = detector.analyze(
        '<form action="/login" method="post"><input name="csrf_token"></form>' +
          '<FORM method="get" action="/search"><input name="q"></FORM>'
      );

      expect(analysis.formCount).toBe(2);
      expect(analysis.findings).toHaveLength(1);
      expect(analysis.findings[0]?.targetDetail).toBe('form #2');
      expect(analysis.findings[0]?.evidence).toBe('/search');
    });

    it('should accept any token field', () => {
      expect(detector.analyze('<form><input type="hidden" name="_Token"></form>').findings).toEqual([]);
    });
  });

  describe('email addresses', () => {
    it('should keep the first five distinct addresses', () => {
      const analysis = detector.analyze(
        'a@example.com b@example.com a@example.com c@example.org d@example.io e@example.io f@example.io'
      );

      expect(analysis.emailAddresses).toEqual([
        'a@example.com',
        'b@example.com',
        'c@example.org',
        'd@example.io',
        'e@example.io',
      ]);
      expect(analysis.findings).toEqual([]);
    });

    it('should keep none when the cap is zero', () => {
      const capped = new HtmlContentDetector({ maxEmailAddresses: 0, logger: new Logger(LogLevel.SILENT) });

      expect(capped.analyze('a@example.com b@example.com').emailAddresses).toEqual([]);
    });
  });

  describe('secrets', () => {
    it('should report a secret with a 20 character preview', () => {
      const analysis = detector.analyze('<script src="/x.js"></script> var config = { token: "abcdefghijklmnopqrstuvwxyz" };');

      expect(analysis.findings).toHaveLength(1);
      expect(analysis.findings[0]).toMatchObject({
        category: FindingCategory.EXPOSED_SECRET,
        severity: FindingSeverity.CRITICAL,
        targetDetail: 'token',
        evidence: 'token: abcdefghijklmnopqrst',
      });
    });

    it('should never keep the whole value', () => {
      const analysis = detector.analyze('<script>token="abcdefghijklmnopqrstuvwxyz"</script>');
      const secrets = analysis.findings.filter((f) => f.category === FindingCategory.EXPOSED_SECRET);

      expect(secrets).toHaveLength(1);
      expect(secrets[0]?.evidence).toBe('token: abcdefghijklmnopqrst');
      expect(secrets[0]?.evidence).not.toContain('abcdefghijklmnopqrstuvwxyz');
    });

    it('should match quoted keys and equals signs', () => {
      const analysis = detector.analyze(`{"API-Key": "test-secret-test-secret-1234"} password='test-secret-placeholder-value'`);

      expect(analysis.findings.map((f) => f.evidence)).toEqual([
        'API-Key: test-secret-test-sec',
        'password: test-secret-placehol',
      ]);
    });

    it('should ignore values shorter than 20 characters', () => {
      expect(detector.analyze('password = "short"').findings).toEqual([]);
    });
  });

  it('should implement detect() over the response body', () => {
    const findings = detector.detect(success('https://example.test/', { body: '<form></form>' }));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.category).toBe(FindingCategory.NO_CSRF_TOKEN);
  });
});
