import type { ReportSinkPort } from '../application/ports/report-sink.port';
import type { DeliveryResult, Report } from '../domain/report';

export class StdoutReportSink implements ReportSinkPort {
  public readonly name = 'stdout';

  public constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  public deliver(report: Report): Promise<DeliveryResult> {
    this.stream.write(`Subject: ${report.subject}\n\n${report.body}`);
    return Promise.resolve({ status: 'delivered', sink: this.name, attempts: 1 });
  }
}
