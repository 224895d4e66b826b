/**
 * Unit tests for FileExposureDetector
 */

import { FileExposureDetector, isExposed } from '../../src/detectors/passive';
import { parseTarget } from '../../src/core/target/parseTarget';
import { SENSITIVE_PATHS } from '../../src/config/constants';
import { FindingCategory, FindingSeverity, LogLevel, ProbeFailureKind } from '../../src/types/enums';
import { Logger } from '../../src/utils/logger/Logger';
import { FakeProbeClient, failure, success } from '../helpers/FakeProbeClient';

const silent = new Logger(LogLevel.SILENT);

describe('FileExposureDetector', () => {
  it('should ship twenty default paths', () => {
    expect(SENSITIVE_PATHS).toHaveLength(20);
    expect(new FileExposureDetector(new FakeProbeClient(), { logger: silent }).getPaths()).toBe(SENSITIVE_PATHS);
  });

  it('should count every probed path as checked when nothing is exposed', async () => {
    const client = new FakeProbeClient();
    const detector = new FileExposureDetector(client, { logger: silent });

    const result = await detector.probe(parseTarget('https://example.test'));

    expect(result.findings).toEqual([]);
    expect(result.summary).toEqual({ checked: 20, exposed: 0 });
    expect(client.calls).toHaveLength(20);
    expect(client.calls.every((call) => call.options.followRedirects === false)).toBe(true);
    expect(client.calls.every((call) => call.options.timeoutMs === 5000)).toBe(true);
    expect(client.calls.every((call) => call.options.readBody === false)).toBe(true);
  });

  it('should resolve paths relative to the target URL', async () => {
    const client = new FakeProbeClient();
    const detector = new FileExposureDetector(client, { paths: ['.env', 'admin'], logger: silent });

    await detector.probe(parseTarget('https://example.test/app/'));

    expect(client.urls().sort()).toEqual(['https://example.test/app/.env', 'https://example.test/app/admin']);
  });

  it('should report exposed files in path-list order', async () => {
    const client = new FakeProbeClient({
      'https://example.test/.git/config': { status: 200, body: '[core]' },
      'https://example.test/.env': { status: 200, body: 'KEY=test-secret' },
      'https://example.test/admin': { status: 403 },
    });
    const detector = new FileExposureDetector(client, {
      paths: ['.env', 'admin', '.git/config'],
      concurrency: 3,
      logger: silent,
    });

    const result = await detector.probe(parseTarget('https://example.test'));

    expect(result.summary).toEqual({ checked: 3, exposed: 2 });
    expect(result.findings.map((f) => f.evidence)).toEqual(['.env', '.git/config']);
    expect(result.findings[0]).toMatchObject({
      category: FindingCategory.EXPOSED_FILE,
      severity: FindingSeverity.CRITICAL,
      targetDetail: 'https://example.test/.env',
    });
    expect(result.outcomes.map((o) => o.exposed)).toEqual([true, false, true]);
  });

  it('should count probe failures as safe', async () => {
    const client = new FakeProbeClient({
      'https://example.test/.env': { fail: ProbeFailureKind.TIMEOUT },
      'https://example.test/admin': { fail: ProbeFailureKind.CONNECTION_ERROR },
    });
    const detector = new FileExposureDetector(client, { paths: ['.env', 'admin'], logger: silent });

    const result = await detector.probe(parseTarget('https://example.test'));

    expect(result.summary).toEqual({ checked: 2, exposed: 0 });
  });

  it('should leave cancelled probes out of the summary', async () => {
    const client = new FakeProbeClient({ 'https://example.test/a': { status: 200 } }).hang(
      'https://example.test/b'
    );
    const detector = new FileExposureDetector(client, { paths: ['a', 'b', 'c'], concurrency: 2, logger: silent });
    const controller = new AbortController();

    const pending = detector.probe(parseTarget('https://example.test'), controller.signal);
    setTimeout(() => controller.abort(), 20);
    const result = await pending;

    // 'a' and 'c' answered; 'b' was cut short
    expect(result.summary).toEqual({ checked: 2, exposed: 1 });
    expect(result.outcomes.map((o) => o.path)).toEqual(['a', 'b', 'c']);
    expect(result.outcomes[1]?.result.ok).toBe(false);
  });
});

describe('isExposed', () => {
  it('should require a direct 200', () => {
    expect(isExposed(success('https://example.test/.env', { status: 200 }))).toBe(true);
    expect(isExposed(success('https://example.test/.env', { status: 404 }))).toBe(false);
    expect(isExposed(success('https://example.test/.env', { status: 301 }))).toBe(false);
    expect(
      isExposed(success('https://example.test/admin', { status: 200, finalUrl: 'https://example.test/login' }))
    ).toBe(false);
    expect(isExposed(failure('https://example.test/.env', ProbeFailureKind.TIMEOUT, 'timeout'))).toBe(false);
  });
});
