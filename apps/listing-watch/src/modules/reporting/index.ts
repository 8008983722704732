export * from './address-matcher';
export * from './digest.renderer';
export * from './filters/condition';
export * from './mail/mail-transport.interface';
export * from './mail/smtp-mail.transport';
export * from './report-criteria.loader';
export * from './reporting.module';
export * from './reporting.service';
