import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { intakeConfig } from '../../config';
import { PortalsModule } from '../portals';
import { ReconciliationModule } from '../reconciliation';
import { ArchiveService } from './archive.service';
import { IntakeService } from './intake.service';

@Module({
  imports: [ConfigModule.forFeature(intakeConfig), PortalsModule, ReconciliationModule],
  providers: [ArchiveService, IntakeService],
  exports: [IntakeService],
})
export class IntakeModule {}
