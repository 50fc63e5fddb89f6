import type { RunSnapshot } from './run-snapshot';

export type Report = Readonly<{
  recipients: readonly string[];
  subject: string;
  body: string;
  snapshot: RunSnapshot;
}>;

export type DeliveryResult =
  | {
      status: 'delivered';
      sink: string;
      attempts: number;
    }
  | {
      status: 'failed';
      sink: string;
      attempts: number;
      permanent: boolean;
      reason: string;
    };
