import { registerAs } from '@nestjs/config';

export interface MailConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  // "Listing Watch <listings@example.test>"
  sender: string;
  recipients: string[];
}

export const mailConfig = registerAs(
  'mail',
  (): MailConfig => ({
    host: process.env.SMTP_HOST || '',
    port: parseInt(process.env.SMTP_PORT || '465', 10),
    user: process.env.SMTP_USER || '',
    password: process.env.SMTP_PASSWORD || '',
    sender: process.env.MAIL_SENDER || '',
    recipients: (process.env.MAIL_RECIPIENTS || '')
      .split(',')
      .map((recipient) => recipient.trim())
      .filter((recipient) => recipient !== ''),
  }),
);
