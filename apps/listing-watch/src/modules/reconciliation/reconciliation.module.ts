import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '@libs/database';
import { intakeConfig } from '../../config';
import { BatchValidator } from './batch-validator.service';
import { ReconciliationService } from './reconciliation.service';

@Module({
  imports: [ConfigModule.forFeature(intakeConfig), DatabaseModule],
  providers: [BatchValidator, ReconciliationService],
  exports: [ReconciliationService],
})
export class ReconciliationModule {}
