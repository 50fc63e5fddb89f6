import { chmod, mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { MailMessage, MailSendInfo, MailTransportPort } from '../src/application/ports/mail-transport.port';
import type { ProcessResult, ProcessRunOptions, ProcessRunnerPort } from '../src/application/ports/process-runner.port';
import type { AuditorConfig } from '../src/config/config-schema';

export const makeTempDir = (prefix = 'periodic-audit-'): Promise<string> =>
  mkdtemp(path.join(os.tmpdir(), prefix));

/** Writes a stand-in auditor executable; it is never run, only checked for existence. */
export const makeAuditorStub = async (directory: string): Promise<string> => {
  const auditorPath = path.join(directory, 'cargo-audit');
  await writeFile(auditorPath, '#!/bin/sh\nexit 0\n', 'utf8');
  await chmod(auditorPath, 0o755);
  return auditorPath;
};

export const makeBinary = async (directory: string, name: string): Promise<string> => {
  const binaryPath = path.join(directory, name);
  await writeFile(binaryPath, 'not really an ELF file', 'utf8');
  return binaryPath;
};

export const auditorConfig = (overrides: Partial<AuditorConfig> = {}): AuditorConfig => ({
  path: '/usr/bin/cargo-audit',
  db: undefined,
  denyWarnings: true,
  timeoutMs: 60_000,
  parallelism: 1,
  cleanExitCodes: [0],
  vulnerableExitCodes: [1],
  notAuditablePatterns: ['No dependency information found'],
  tries: 1,
  retryDelayMs: 10,
  ...overrides,
});

export type AdvisoryFixture = {
  id: string;
  package?: string;
  version?: string;
  title?: string;
  cvss?: string | null;
  patched?: string[];
};

export const auditJson = (
  vulnerabilities: AdvisoryFixture[],
  warnings: Record<string, unknown[]> = {},
): string =>
  JSON.stringify({
    database: { 'advisory-count': 600 },
    lockfile: { 'dependency-count': 42 },
    vulnerabilities: {
      found: vulnerabilities.length > 0,
      count: vulnerabilities.length,
      list: vulnerabilities.map((fixture) => ({
        advisory: {
          id: fixture.id,
          package: fixture.package ?? 'time',
          title: fixture.title ?? `Advisory ${fixture.id}`,
          description: 'Details of the issue.',
          date: '2024-01-01',
          aliases: [],
          cvss: fixture.cvss ?? null,
          url: null,
        },
        versions: { patched: fixture.patched ?? [], unaffected: [] },
        package: { name: fixture.package ?? 'time', version: fixture.version ?? '0.1.0' },
      })),
    },
    warnings,
  });

export const exited = (exitCode: number, stdout = '', stderr = ''): ProcessResult => ({
  status: 'exited',
  exitCode,
  signal: null,
  stdout,
  stderr,
});

export type RecordedRun = { command: string; args: string[]; options: ProcessRunOptions };

type Responder = ProcessResult | ((call: RecordedRun) => ProcessResult);

/**
 * Answers by the last argument (the target path); each entry is a queue so
 * consecutive runs of the same target can differ.
 */
export class FakeProcessRunner implements ProcessRunnerPort {
  public readonly calls: RecordedRun[] = [];
  private readonly responses = new Map<string, Responder[]>();
  private readonly fallback: ProcessResult;

  public constructor(fallback: ProcessResult = exited(0, auditJson([]))) {
    this.fallback = fallback;
  }

  public respond(targetPath: string, ...responses: Responder[]): this {
    this.responses.set(targetPath, responses);
    return this;
  }

  public run(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessResult> {
    const call = { command, args, options };
    this.calls.push(call);
    const key = args[args.length - 1] ?? '';
    const queue = this.responses.get(key);
    const responder = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (!responder) {
      return Promise.resolve(this.fallback);
    }
    return Promise.resolve(typeof responder === 'function' ? responder(call) : responder);
  }
}

export class TransportError extends Error {
  public constructor(
    message: string,
    public readonly code?: string,
    public readonly responseCode?: number,
  ) {
    super(message);
  }
}

/** Mail transport that replays scripted outcomes, then accepts everything. */
export class FakeMailTransport implements MailTransportPort {
  public readonly sent: MailMessage[] = [];
  public closed = false;

  public constructor(private readonly script: Array<Error | MailSendInfo> = []) {}

  public send(message: MailMessage): Promise<MailSendInfo> {
    this.sent.push(message);
    const next = this.script.shift();
    if (next instanceof Error) {
      return Promise.reject(next);
    }
    return Promise.resolve(next ?? { accepted: [...message.to], rejected: [] });
  }

  public close(): void {
    this.closed = true;
  }
}

export const noWait = (): Promise<void> => Promise.resolve();
