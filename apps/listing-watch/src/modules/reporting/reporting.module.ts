import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '@libs/database';
import { mailConfig, reportingConfig } from '../../config';
import { AddressMatcher } from './address-matcher';
import { DigestRenderer } from './digest.renderer';
import { MAIL_TRANSPORT } from './mail/mail-transport.interface';
import { SmtpMailTransport } from './mail/smtp-mail.transport';
import { ReportCriteriaLoader } from './report-criteria.loader';
import { ReportingService } from './reporting.service';

@Module({
  imports: [ConfigModule.forFeature(reportingConfig), ConfigModule.forFeature(mailConfig), DatabaseModule],
  providers: [
    ReportCriteriaLoader,
    AddressMatcher,
    DigestRenderer,
    { provide: MAIL_TRANSPORT, useClass: SmtpMailTransport },
    ReportingService,
  ],
  exports: [ReportingService],
})
export class ReportingModule {}
