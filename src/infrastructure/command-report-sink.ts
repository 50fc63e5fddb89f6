import type { ProcessRunnerPort } from '../application/ports/process-runner.port';
import type { ReportSinkPort } from '../application/ports/report-sink.port';
import type { ReportCommandConfig } from '../config/config-schema';
import type { DeliveryResult, Report } from '../domain/report';

/**
 * Pipes the report to a command's stdin, with the subject as a
 * `Subject:` header line. A non-zero exit counts as a failed delivery.
 */
export class CommandReportSink implements ReportSinkPort {
  public readonly name = 'command';

  public constructor(
    private readonly processRunner: ProcessRunnerPort,
    private readonly config: ReportCommandConfig,
  ) {}

  public async deliver(report: Report): Promise<DeliveryResult> {
    const result = await this.processRunner.run(this.config.path, this.config.args, {
      timeoutMs: this.config.timeoutMs,
      input: `Subject: ${report.subject}\n\n${report.body}`,
    });

    const failed = (reason: string): DeliveryResult => ({
      status: 'failed',
      sink: this.name,
      attempts: 1,
      permanent: true,
      reason,
    });

    if (result.status === 'spawn-failed') {
      return failed(`Cannot run report command '${this.config.path}': ${result.message}`);
    }
    if (result.status === 'timed-out') {
      return failed(`Report command '${this.config.path}' timed out`);
    }
    if (result.exitCode !== 0) {
      const status = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `code ${result.exitCode}`;
      return failed(`Report command '${this.config.path}' exited with ${status}`);
    }
    return { status: 'delivered', sink: this.name, attempts: 1 };
  }
}
