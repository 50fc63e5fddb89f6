export type MailMessage = {
  from: string;
  to: readonly string[];
  subject: string;
  text: string;
};

export type MailSendInfo = {
  accepted: string[];
  rejected: string[];
  response?: string;
};

export interface MailTransportPort {
  /** Send one message to all of its recipients in a single transaction. */
  send(message: MailMessage): Promise<MailSendInfo>;
  close(): void;
}
