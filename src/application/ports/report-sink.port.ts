import type { DeliveryResult, Report } from '../../domain/report';

export interface ReportSinkPort {
  readonly name: string;
  deliver(report: Report): Promise<DeliveryResult>;
}
