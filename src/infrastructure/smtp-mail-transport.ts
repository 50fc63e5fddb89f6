import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';

import type { MailMessage, MailSendInfo, MailTransportPort } from '../application/ports/mail-transport.port';
import type { MailConfig } from '../config/config-schema';

const addressList = (addresses: Array<string | { address: string }>): string[] =>
  addresses.map((entry) => (typeof entry === 'string' ? entry : entry.address));

export class SmtpMailTransport implements MailTransportPort {
  private readonly transporter: Transporter<SMTPTransport.SentMessageInfo>;

  public constructor(config: MailConfig) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.useTls && config.implicitTls,
      requireTLS: config.useTls && !config.implicitTls,
      ignoreTLS: !config.useTls,
      auth: config.username ? { user: config.username, pass: config.password ?? '' } : undefined,
      connectionTimeout: config.timeoutMs,
      greetingTimeout: config.timeoutMs,
      socketTimeout: config.timeoutMs,
    });
  }

  public async send(message: MailMessage): Promise<MailSendInfo> {
    const info = await this.transporter.sendMail({
      from: message.from,
      to: [...message.to],
      subject: message.subject,
      text: message.text,
      headers: { 'User-Agent': 'periodic-audit' },
    });

    return {
      accepted: addressList(info.accepted),
      rejected: addressList(info.rejected),
      response: info.response,
    };
  }

  public close(): void {
    this.transporter.close();
  }
}
