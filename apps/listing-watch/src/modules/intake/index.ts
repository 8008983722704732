export * from './archive.service';
export * from './intake.module';
export * from './intake.service';
