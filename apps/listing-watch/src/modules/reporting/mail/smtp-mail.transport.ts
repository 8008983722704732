import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { createTransport, Transporter } from 'nodemailer';
import { ListingWatchError } from '@libs/common';
import { mailConfig } from '../../../config';
import { MailMessage, MailTransport } from './mail-transport.interface';

/** "Listing Watch <listings@example.test>" -> "listings@example.test" */
export function senderAddress(sender: string): string {
  const match = /<([^>]+)>/.exec(sender);
  return (match ? match[1] : sender).trim();
}

/**
 * SMTP over implicit TLS. The connection is opened on first send, so a
 * process that never reports needs no mail settings.
 */
@Injectable()
export class SmtpMailTransport implements MailTransport {
  private readonly logger = new Logger(SmtpMailTransport.name);
  private transporter?: Transporter;

  public constructor(
    @Inject(mailConfig.KEY)
    private readonly config: ConfigType<typeof mailConfig>,
  ) {}

  public async send(message: MailMessage): Promise<void> {
    if (!this.config.host || !this.config.sender) {
      throw new ListingWatchError('SMTP_HOST and MAIL_SENDER are required to send mail');
    }
    if (this.config.recipients.length === 0) {
      throw new ListingWatchError('MAIL_RECIPIENTS is empty');
    }

    await this.getTransporter().sendMail({
      from: this.config.sender,
      to: this.config.recipients,
      subject: message.subject,
      html: message.html,
    });
    this.logger.log(`Sent "${message.subject}" to ${this.config.recipients.length} recipient(s)`);
  }

  private getTransporter(): Transporter {
    if (!this.transporter) {
      this.transporter = createTransport({
        host: this.config.host,
        port: this.config.port,
        secure: true,
        auth: {
          user: this.config.user || senderAddress(this.config.sender),
          pass: this.config.password,
        },
      });
    }
    return this.transporter;
  }
}
