export * from './env.validation';
export * from './intake.config';
export * from './mail.config';
export * from './reporting.config';
