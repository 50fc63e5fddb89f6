import type { AuditorConfig } from '../../config/config-schema';
import { FAILURE_KIND, isTransientFailure } from '../../domain/audit-outcome';
import type { AuditFailure, AuditOutcome } from '../../domain/audit-outcome';
import { errorMessage } from '../../domain/errors';
import type { Finding } from '../../domain/finding';
import type { Target } from '../../domain/target';
import { getLogger } from '../../utils/get-logger';
import { formatDuration } from '../../utils/parse-duration';
import { backoffDelay, sleep } from '../../utils/run-with-concurrency';
import type { FileSystemPort } from '../ports/file-system.port';
import type { ProcessResult, ProcessRunnerPort } from '../ports/process-runner.port';
import { parseAuditOutput } from './result-parser';

const MAX_RETRY_DELAY_MS = 2 * 60 * 1000;
const STDERR_TAIL_CHARS = 2000;
// Shell conventions for "not executable" and "command not found"
const UNAVAILABLE_EXIT_CODES = [126, 127];
const UNAVAILABLE_SPAWN_ERRORS = ['ENOENT', 'EACCES', 'ENOTDIR'];

const stderrTail = (stderr: string): string => {
  const trimmed = stderr.trim();
  return trimmed.length > STDERR_TAIL_CHARS ? `...${trimmed.slice(-STDERR_TAIL_CHARS)}` : trimmed;
};

type ScanAttempt = { ok: true; findings: Finding[] } | { ok: false; failure: AuditFailure };

export class AuditorInvoker {
  private readonly logger = getLogger();

  public constructor(
    private readonly processRunner: ProcessRunnerPort,
    private readonly fileSystem: FileSystemPort,
    private readonly config: AuditorConfig,
    private readonly wait: (milliseconds: number) => Promise<void> = sleep,
  ) {}

  /** The auditor is shared by every target, so check it once up front. */
  public async isAvailable(): Promise<boolean> {
    return this.fileSystem.isExecutable(this.config.path);
  }

  public buildArgs(target: Target): string[] {
    return [
      'audit',
      '--format',
      'json',
      ...(this.config.denyWarnings ? ['--deny', 'warnings'] : []),
      ...(this.config.db ? ['--db', this.config.db] : []),
      'bin',
      target.path,
    ];
  }

  public async scan(target: Target): Promise<AuditOutcome> {
    let attempt = 0;
    for (;;) {
      attempt += 1;
      const result = await this.scanOnce(target);
      if (result.ok) {
        return { status: 'ok', target, findings: result.findings, attempts: attempt };
      }

      const { failure } = result;
      if (!isTransientFailure(failure) || attempt >= this.config.tries) {
        if (failure.kind !== FAILURE_KIND.AUDITOR_UNAVAILABLE) {
          this.logger.warn({ target: target.path, kind: failure.kind, attempts: attempt }, failure.detail);
        }
        return { status: 'failed', target, failure, attempts: attempt };
      }

      const delay = backoffDelay(attempt, this.config.retryDelayMs, MAX_RETRY_DELAY_MS);
      this.logger.info(
        { target: target.path, kind: failure.kind, attempt, delayMs: delay },
        'Audit failed, retrying',
      );
      await this.wait(delay);
    }
  }

  private async scanOnce(target: Target): Promise<ScanAttempt> {
    const notAuditable = await this.checkTarget(target);
    if (notAuditable) {
      return { ok: false, failure: notAuditable };
    }

    this.logger.debug(`Auditing target: path=${target.path}`);
    const result = await this.processRunner.run(this.config.path, this.buildArgs(target), {
      timeoutMs: this.config.timeoutMs,
      unsetEnv: ['TERM', 'COLORTERM'],
    });
    return this.classify(target, result);
  }

  private async checkTarget(target: Target): Promise<AuditFailure | null> {
    try {
      const stats = await this.fileSystem.stat(target.path);
      if (stats.isDirectory) {
        // Only directories without files reach this point; the others were expanded
        return { kind: FAILURE_KIND.NOT_AUDITABLE, detail: 'directory contains no files to audit' };
      }
      return null;
    } catch (error) {
      if (!(await this.fileSystem.exists(target.path))) {
        return { kind: FAILURE_KIND.NOT_AUDITABLE, detail: 'target does not exist' };
      }
      return { kind: FAILURE_KIND.NOT_AUDITABLE, detail: `cannot stat target: ${errorMessage(error)}` };
    }
  }

  private classify(target: Target, result: ProcessResult): ScanAttempt {
    if (result.status === 'spawn-failed') {
      const kind = UNAVAILABLE_SPAWN_ERRORS.includes(result.errorCode ?? '')
        ? FAILURE_KIND.AUDITOR_UNAVAILABLE
        : FAILURE_KIND.EXECUTION_ERROR;
      return {
        ok: false,
        failure: { kind, detail: `cannot run auditor '${this.config.path}': ${result.message}` },
      };
    }

    if (result.status === 'timed-out') {
      return {
        ok: false,
        failure: {
          kind: FAILURE_KIND.TIMEOUT,
          detail: `audit did not finish within ${formatDuration(this.config.timeoutMs)}`,
        },
      };
    }

    const { exitCode } = result;
    if (exitCode !== null && UNAVAILABLE_EXIT_CODES.includes(exitCode)) {
      return {
        ok: false,
        failure: {
          kind: FAILURE_KIND.AUDITOR_UNAVAILABLE,
          detail: `auditor '${this.config.path}' could not be executed (exit code ${exitCode})`,
        },
      };
    }

    const matchesNotAuditable = this.config.notAuditablePatterns.some((pattern) =>
      result.stderr.includes(pattern),
    );
    const completedCodes = [...this.config.cleanExitCodes, ...this.config.vulnerableExitCodes];

    if (exitCode === null || !completedCodes.includes(exitCode)) {
      if (matchesNotAuditable) {
        return this.notAuditable(result.stderr);
      }
      const status = exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `exit code ${exitCode}`;
      const stderr = stderrTail(result.stderr);
      return {
        ok: false,
        failure: {
          kind: FAILURE_KIND.EXECUTION_ERROR,
          detail: stderr ? `auditor failed with ${status}: ${stderr}` : `auditor failed with ${status}`,
        },
      };
    }

    const parsed = parseAuditOutput(result.stdout, { includeWarnings: this.config.denyWarnings });
    if (!parsed.ok) {
      if (matchesNotAuditable) {
        return this.notAuditable(result.stderr);
      }
      return {
        ok: false,
        failure: { kind: FAILURE_KIND.PARSE_FAILURE, detail: `cannot parse auditor output: ${parsed.error}` },
      };
    }

    if (this.config.vulnerableExitCodes.includes(exitCode) && parsed.findings.length === 0) {
      this.logger.warn(
        { target: target.path, exitCode },
        'Auditor signalled vulnerabilities but reported none',
      );
    }

    return { ok: true, findings: parsed.findings };
  }

  private notAuditable(stderr: string): ScanAttempt {
    return { ok: false, failure: { kind: FAILURE_KIND.NOT_AUDITABLE, detail: stderrTail(stderr) } };
  }
}
