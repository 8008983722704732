import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '@libs/database';
import { validateEnvironment } from './config';
import { IntakeModule } from './modules/intake';
import { ReportingModule } from './modules/reporting';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnvironment,
    }),
    DatabaseModule,
    IntakeModule,
    ReportingModule,
  ],
})
export class AppModule {}
