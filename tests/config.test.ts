import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadConfig, parseConfig } from '../src/config/load-config';
import { ConfigError } from '../src/domain/errors';
import { makeTempDir } from './helpers';

const minimal = {
  targets: ['/usr/local/bin/server', { path: '/usr/local/bin/worker', name: 'worker' }],
  commit_on_delivery_failure: false,
  auditor: { path: '/usr/bin/cargo-audit' },
  mail: { host: 'smtp.example.com', from: 'audit@example.com', to: ['ops@example.com'] },
};

describe('parseConfig', () => {
  it('fills in defaults', () => {
    const config = parseConfig(minimal, '/etc');

    expect(config.targets).toEqual([
      { path: '/usr/local/bin/server' },
      { path: '/usr/local/bin/worker', name: 'worker' },
    ]);
    expect(config.stateFile).toBe('/var/lib/periodic-audit/state.json');
    expect(config.lockFile).toBe('/var/lib/periodic-audit/state.json.lock');
    expect(config.reportOnCleanRun).toBe(true);
    expect(config.commitOnDeliveryFailure).toBe(false);
    expect(config.auditor).toEqual({
      path: '/usr/bin/cargo-audit',
      db: undefined,
      denyWarnings: true,
      timeoutMs: 600_000,
      parallelism: 1,
      cleanExitCodes: [0],
      vulnerableExitCodes: [1],
      notAuditablePatterns: ['No dependency information found', 'not built with cargo auditable'],
      tries: 1,
      retryDelayMs: 2_000,
    });
    expect(config.mail).toMatchObject({
      disabled: false,
      host: 'smtp.example.com',
      port: 587,
      useTls: true,
      implicitTls: false,
      subject: 'Periodic audit report',
      retryAttempts: 3,
      retryBaseDelayMs: 5_000,
      retryMaxDelayMs: 300_000,
      timeoutMs: 60_000,
    });
    expect(config.reportFile).toBeUndefined();
  });

  it('requires commit_on_delivery_failure to be stated explicitly', () => {
    const { commit_on_delivery_failure: _omitted, ...rest } = minimal;

    expect(() => parseConfig(rest, '/etc')).toThrow(
      'Invalid configuration:\n  commit_on_delivery_failure: Must be set explicitly to true or false',
    );
  });

  it('lists every offending key', () => {
    const broken = {
      ...minimal,
      targets: [],
      auditor: { path: '/usr/bin/cargo-audit', parallelism: 0, timeout: 'forever' },
    };

    let message = '';
    try {
      parseConfig(broken, '/etc');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      message = error instanceof Error ? error.message : '';
    }

    expect(message).toContain('  targets: Array must contain at least 1 element(s)');
    expect(message).toContain('  auditor.parallelism: Number must be greater than or equal to 1');
    expect(message).toContain('  auditor.timeout: Invalid duration "forever" (expected e.g. "30s", "5m", "1h")');
  });

  it('rejects durations longer than a timer can wait', () => {
    const withTimeout = (timeout: string) =>
      parseConfig({ ...minimal, auditor: { path: '/usr/bin/cargo-audit', timeout } }, '/etc');

    expect(() => withTimeout('1000h')).toThrow(
      'Invalid configuration:\n  auditor.timeout: Duration "1000h" is longer than the supported maximum of 2147483647ms',
    );
    expect(withTimeout('596h').auditor.timeoutMs).toBe(2_145_600_000);
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ ...minimal, recipients: ['x@example.com'] }, '/etc')).toThrow(ConfigError);
  });

  it('requires mail settings unless mail is disabled', () => {
    expect(() => parseConfig({ ...minimal, mail: { to: [] } }, '/etc')).toThrow(/mail\.host: Required unless mail is disabled/);

    const config = parseConfig({ ...minimal, mail: { disabled: true } }, '/etc');
    expect(config.mail.disabled).toBe(true);
  });

  it('rejects overlapping exit code sets', () => {
    expect(() =>
      parseConfig(
        { ...minimal, auditor: { path: '/usr/bin/cargo-audit', clean_exit_codes: [0, 1], vulnerable_exit_codes: [1] } },
        '/etc',
      ),
    ).toThrow(/must not overlap/);
  });

  it('uses implicit TLS on port 465 unless told otherwise', () => {
    const config = parseConfig({ ...minimal, mail: { ...minimal.mail, port: 465 } }, '/etc');
    expect(config.mail.implicitTls).toBe(true);
  });

  it('resolves relative paths against the configuration directory', () => {
    const config = parseConfig(
      { ...minimal, targets: ['bin/server'], state_file: 'state.json', auditor: { path: './cargo-audit' } },
      '/opt/audit',
    );

    expect(config.targets).toEqual([{ path: '/opt/audit/bin/server' }]);
    expect(config.stateFile).toBe('/opt/audit/state.json');
    expect(config.lockFile).toBe('/opt/audit/state.json.lock');
    expect(config.auditor.path).toBe('/opt/audit/cargo-audit');
  });
});

describe('loadConfig', () => {
  it('reads a TOML file and the mail password file', async () => {
    const directory = await makeTempDir();
    const passwordFile = path.join(directory, 'smtp-password');
    const configPath = path.join(directory, 'periodic-audit.conf');
    await writeFile(passwordFile, 'test-secret\n');
    await writeFile(
      configPath,
      [
        'targets = ["/usr/local/bin/server"]',
        'commit_on_delivery_failure = true',
        'report_on_clean_run = false',
        '',
        '[auditor]',
        'path = "/usr/bin/cargo-audit"',
        'timeout = "90s"',
        'parallelism = 4',
        '',
        '[mail]',
        'host = "smtp.example.com"',
        'port = 465',
        'username = "audit"',
        `password_file = "${passwordFile}"`,
        'from = "audit@example.com"',
        'to = ["ops@example.com", "sec@example.com"]',
        'retry_attempts = 5',
        '',
        '[report_file]',
        'path = "reports/latest.txt"',
        'append = true',
        '',
      ].join('\n'),
    );

    const config = await loadConfig(configPath);

    expect(config.commitOnDeliveryFailure).toBe(true);
    expect(config.reportOnCleanRun).toBe(false);
    expect(config.auditor.timeoutMs).toBe(90_000);
    expect(config.auditor.parallelism).toBe(4);
    expect(config.mail.password).toBe('test-secret');
    expect(config.mail.implicitTls).toBe(true);
    expect(config.mail.to).toEqual(['ops@example.com', 'sec@example.com']);
    expect(config.mail.retryAttempts).toBe(5);
    expect(config.reportFile).toEqual({ path: path.join(directory, 'reports', 'latest.txt'), append: true, disabled: false });
  });

  it('wraps unreadable and malformed files in ConfigError', async () => {
    const directory = await makeTempDir();
    const configPath = path.join(directory, 'broken.conf');
    await writeFile(configPath, 'targets = [\n');

    await expect(loadConfig(path.join(directory, 'missing.conf'))).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfig(configPath)).rejects.toThrow(/Cannot parse configuration file/);
  });
});
