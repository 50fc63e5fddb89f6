import path from 'node:path';

import type { FileSystemPort } from '../application/ports/file-system.port';
import type { ReportSinkPort } from '../application/ports/report-sink.port';
import type { ReportFileConfig } from '../config/config-schema';
import { errorMessage } from '../domain/errors';
import type { DeliveryResult, Report } from '../domain/report';

const SEPARATOR = '\n\n\n==========================================================\n\n';

export class FileReportSink implements ReportSinkPort {
  public readonly name = 'file';

  public constructor(
    private readonly fileSystem: FileSystemPort,
    private readonly config: ReportFileConfig,
  ) {}

  public async deliver(report: Report): Promise<DeliveryResult> {
    const contents = `Subject: ${report.subject}\n\n${report.body}${SEPARATOR}`;
    try {
      await this.fileSystem.ensureDirectory(path.dirname(this.config.path));
      if (this.config.append) {
        await this.fileSystem.appendFile(this.config.path, contents);
      } else {
        await this.fileSystem.writeFileAtomic(this.config.path, contents);
      }
      return { status: 'delivered', sink: this.name, attempts: 1 };
    } catch (error) {
      return {
        status: 'failed',
        sink: this.name,
        attempts: 1,
        permanent: true,
        reason: `Cannot write report file '${this.config.path}': ${errorMessage(error)}`,
      };
    }
  }
}
