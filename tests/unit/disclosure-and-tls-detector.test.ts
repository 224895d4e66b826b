/**
 * Unit tests for InformationDisclosureDetector and InsecureTransmissionDetector
 */

import { InformationDisclosureDetector, InsecureTransmissionDetector } from '../../src/detectors/passive';
import { parseTarget } from '../../src/core/target/parseTarget';
import { cancelledProbe } from '../../src/core/network/probe-results';
import { FindingCategory, FindingSeverity, LogLevel, ProbeFailureKind } from '../../src/types/enums';
import { Logger } from '../../src/utils/logger/Logger';
import { failure, success } from '../helpers/FakeProbeClient';

const silent = new Logger(LogLevel.SILENT);

describe('InformationDisclosureDetector', () => {
  const detector = new InformationDisclosureDetector(undefined, silent);

  it('should report Server and X-Powered-By values', () => {
    const findings = detector.detect(
      success('https://example.test/', { headers: { server: 'nginx/1.18.0', 'X-Powered-By': 'PHP/7.4.3' } })
    );

    expect(findings.map((f) => [f.targetDetail, f.evidence])).toEqual([
      ['Server', 'nginx/1.18.0'],
      ['X-Powered-By', 'PHP/7.4.3'],
    ]);
    expect(findings.every((f) => f.severity === FindingSeverity.INFO)).toBe(true);
    expect(findings.every((f) => f.category === FindingCategory.INFO_DISCLOSURE)).toBe(true);
  });

  it('should report nothing for a quiet response', () => {
    expect(detector.detect(success('https://example.test/', { headers: { 'content-type': 'text/html' } }))).toEqual(
      []
    );
  });

  it('should report each distinct version string in the body once', () => {
    const body = '<script>var app = { version: "2.4.1" }; var VERSION="2.4.1"; lib.version = \'10.0.12\';</script>';

    const findings = detector.detect(success('https://example.test/', { body }));

    expect(findings.map((f) => f.evidence)).toEqual(['2.4.1', '10.0.12']);
    expect(findings[0]?.targetDetail).toBe('response body');
  });

  it('should extract version strings directly', () => {
    expect(detector.findVersionStrings('"version": "1.0.0", version=3.2.1')).toEqual(['1.0.0', '3.2.1']);
    expect(detector.findVersionStrings('version 1.0')).toEqual([]);
  });
});

describe('InsecureTransmissionDetector', () => {
  const detector = new InsecureTransmissionDetector(silent);

  it('should flag a plain http target exactly once', () => {
    const target = parseTarget('http://example.test');

    const findings = detector.detect(target, success(target.url, { finalUrl: 'http://example.test/' }));

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      category: FindingCategory.WEAK_TLS,
      severity: FindingSeverity.CRITICAL,
      targetDetail: 'http://example.test',
      evidence: 'no transport encryption',
    });
  });

  it('should report nothing for a healthy https target', () => {
    const target = parseTarget('https://example.test');

    expect(detector.detect(target, success(target.url))).toEqual([]);
  });

  it('should turn a handshake failure into WeakTls', () => {
    const target = parseTarget('https://example.test');

    const findings = detector.detect(
      target,
      failure(target.url, ProbeFailureKind.TLS_ERROR, 'CERT_HAS_EXPIRED: certificate has expired')
    );

    expect(findings).toHaveLength(1);
    expect(findings[0]?.category).toBe(FindingCategory.WEAK_TLS);
    expect(findings[0]?.evidence).toBe('CERT_HAS_EXPIRED: certificate has expired');
  });

  it('should report other failures as an unreachable target', () => {
    const target = parseTarget('https://example.test');

    const findings = detector.detect(target, failure(target.url, ProbeFailureKind.TIMEOUT, 'timeout of 10ms exceeded'));

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      category: FindingCategory.TARGET_UNREACHABLE,
      severity: FindingSeverity.WARNING,
      targetDetail: 'https://example.test/',
      evidence: 'Timeout: timeout of 10ms exceeded',
    });
  });

  it('should stay quiet about cancelled probes and missing results', () => {
    const target = parseTarget('https://example.test');

    expect(detector.detect(target, cancelledProbe(target.url))).toEqual([]);
    expect(detector.detect(target, null)).toEqual([]);
  });
});
