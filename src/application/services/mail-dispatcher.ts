import { errorMessage } from '../../domain/errors';
import type { DeliveryResult, Report } from '../../domain/report';
import { getLogger } from '../../utils/get-logger';
import { backoffDelay, sleep } from '../../utils/run-with-concurrency';
import type { MailTransportPort } from '../ports/mail-transport.port';
import type { ReportSinkPort } from '../ports/report-sink.port';

export type MailDispatchSettings = {
  from: string;
  retryAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
};

export type MailErrorClass = 'transient' | 'permanent';

const PERMANENT_CODES = new Set(['EAUTH', 'ENOAUTH', 'ETLS', 'EENVELOPE', 'EMESSAGE']);
const TRANSIENT_CODES = new Set([
  'ECONNECTION',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ESOCKET',
  'EDNS',
  'EAI_AGAIN',
  'EPROTOCOL',
]);

const readProperty = (error: unknown, key: string): unknown =>
  typeof error === 'object' && error !== null ? Reflect.get(error, key) : undefined;

/**
 * 4xx replies and connection-level trouble are worth retrying; 5xx replies
 * and rejected credentials are not. Unrecognised errors count as transient,
 * the attempt limit still bounds them.
 */
export const classifyMailError = (error: unknown): MailErrorClass => {
  const responseCode = readProperty(error, 'responseCode');
  if (typeof responseCode === 'number') {
    if (responseCode >= 500) {
      return 'permanent';
    }
    if (responseCode >= 400) {
      return 'transient';
    }
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string') {
    if (PERMANENT_CODES.has(code)) {
      return 'permanent';
    }
    if (TRANSIENT_CODES.has(code)) {
      return 'transient';
    }
  }
  return 'transient';
};

export class MailDispatcher implements ReportSinkPort {
  public readonly name = 'mail';
  private readonly logger = getLogger();

  public constructor(
    private readonly transport: MailTransportPort,
    private readonly settings: MailDispatchSettings,
    private readonly wait: (milliseconds: number) => Promise<void> = sleep,
  ) {}

  public async deliver(report: Report): Promise<DeliveryResult> {
    const maxAttempts = this.settings.retryAttempts + 1;

    for (let attempt = 1; ; attempt += 1) {
      try {
        const info = await this.transport.send({
          from: this.settings.from,
          to: report.recipients,
          subject: report.subject,
          text: report.body,
        });

        // Resending would duplicate mail for the accepted ones
        if (info.rejected.length > 0) {
          return {
            status: 'failed',
            sink: this.name,
            attempts: attempt,
            permanent: true,
            reason: `relay rejected recipients: ${info.rejected.join(', ')}`,
          };
        }

        this.logger.info({ recipients: report.recipients.length, attempts: attempt }, 'Report mailed');
        return { status: 'delivered', sink: this.name, attempts: attempt };
      } catch (error) {
        const errorClass = classifyMailError(error);
        const reason = errorMessage(error);

        if (errorClass === 'permanent' || attempt >= maxAttempts) {
          return {
            status: 'failed',
            sink: this.name,
            attempts: attempt,
            permanent: errorClass === 'permanent',
            reason,
          };
        }

        const delay = backoffDelay(attempt, this.settings.retryBaseDelayMs, this.settings.retryMaxDelayMs);
        this.logger.warn({ attempt, maxAttempts, delayMs: delay, error: reason }, 'Sending report failed, retrying');
        await this.wait(delay);
      }
    }
  }
}
