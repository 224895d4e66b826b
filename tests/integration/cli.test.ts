/**
 * Integration tests - command line
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runCli, CliContext, EXIT_CRITICAL_FINDINGS, EXIT_OK, EXIT_USAGE } from '../../src/cli/run';
import { FakeProbeClient } from '../helpers/FakeProbeClient';

describe('webposture CLI', () => {
  let tmpDir: string;
  let out: string[];
  let err: string[];
  let client: FakeProbeClient;

  const context = (): CliContext => ({
    env: {},
    cwd: tmpDir,
    stdout: (text) => out.push(text),
    stderr: (line) => err.push(line),
    client,
  });

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'webposture-cli-'));
    out = [];
    err = [];
    client = new FakeProbeClient({
      'https://example.test/': { status: 200, headers: { 'content-type': 'text/html' } },
      'http://example.test/': { status: 200 },
    });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should print a JSON report and exit 0 without critical findings', async () => {
    const code = await runCli(['example.test', '--format', 'json', '--log-level', 'silent'], context());

    expect(code).toBe(EXIT_OK);
    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0] ?? '')).toMatchObject({ target: { url: 'https://example.test/' }, state: 'done' });
    expect(err).toEqual([]);
  });

  it('should exit 1 when critical findings are present', async () => {
    const code = await runCli(['http://example.test', '--log-level', 'silent'], context());

    expect(code).toBe(EXIT_CRITICAL_FINDINGS);
    expect(out[0]).toContain('[CRITICAL] WeakTls: http://example.test - no transport encryption');
  });

  it('should exit 2 on a malformed target', async () => {
    const code = await runCli(['ftp://example.test'], context());

    expect(code).toBe(EXIT_USAGE);
    expect(err).toContain('Malformed target "ftp://example.test": unsupported scheme "ftp"');
    expect(out).toEqual([]);
    expect(client.calls).toHaveLength(0);
  });

  it('should exit 2 on invalid options', async () => {
    await expect(runCli(['example.test', '--concurrency', '0'], context())).resolves.toBe(EXIT_USAGE);
    expect(err).toContain(
      'Configuration error: --concurrency must be a positive number: --concurrency=0'
    );

    await expect(runCli(['example.test', '--format', 'html'], context())).resolves.toBe(EXIT_USAGE);
    await expect(runCli(['example.test', '--bogus'], context())).resolves.toBe(EXIT_USAGE);
    await expect(runCli([], context())).resolves.toBe(EXIT_USAGE);
    expect(client.calls).toHaveLength(0);
  });

  it('should print usage on --help', async () => {
    await expect(runCli(['--help'], context())).resolves.toBe(EXIT_OK);
    expect(out[0]).toMatch(/^Usage: webposture <target> \[options\]/);
  });

  it('should write the report to --output', async () => {
    const code = await runCli(
      ['example.test', '--format', 'json', '--output', 'report.json', '--log-level', 'silent'],
      context()
    );

    expect(code).toBe(EXIT_OK);
    expect(out).toEqual([]);
    const written: unknown = JSON.parse(fs.readFileSync(path.join(tmpDir, 'report.json'), 'utf-8'));
    expect(written).toMatchObject({ fileExposureSummary: { checked: 20, exposed: 0 } });
  });

  it('should layer .env, config file and flags', async () => {
    fs.writeFileSync(path.join(tmpDir, '.env'), 'WEBPOSTURE_PROBE_TIMEOUT_MS=777\nLOG_LEVEL=silent\n');
    fs.writeFileSync(path.join(tmpDir, 'audit.json'), JSON.stringify({ sensitivePaths: ['.env', 'admin'] }));

    const code = await runCli(['example.test', '--config', 'audit.json', '--timeout', '4321'], context());

    expect(code).toBe(EXIT_OK);
    expect(client.calls).toHaveLength(3);
    const primary = client.calls.find((call) => call.url === 'https://example.test/');
    const probe = client.calls.find((call) => call.url === 'https://example.test/.env');
    expect(primary?.options.timeoutMs).toBe(4321);
    expect(probe?.options.timeoutMs).toBe(777);
    expect(err).toEqual([]);
  });

  it('should print a partial report when --max-duration runs out', async () => {
    client.hang('https://example.test/');

    const code = await runCli(
      ['example.test', '--format', 'json', '--max-duration', '20', '--log-level', 'silent'],
      context()
    );

    expect(code).toBe(EXIT_OK);
    expect(JSON.parse(out[0] ?? '')).toMatchObject({ state: 'cancelled', partial: true });
  });

  it('should stop on an external abort signal', async () => {
    client.hang('https://example.test/');
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const code = await runCli(['example.test', '--format', 'json', '--log-level', 'silent'], {
      ...context(),
      signal: controller.signal,
    });

    expect(code).toBe(EXIT_OK);
    expect(JSON.parse(out[0] ?? '')).toMatchObject({ state: 'cancelled' });
  });
});
