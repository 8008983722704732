import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { IntakeService } from './modules/intake';
import { ReportingService } from './modules/reporting';

const logger = new Logger('ListingWatch');

const COMMANDS = ['intake', 'report', 'run'] as const;

type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

async function intake(app: INestApplicationContext): Promise<void> {
  const results = await app.get(IntakeService).processPending();
  const failed = results.filter((result) => result.status === 'failed');

  logger.log(`Processed ${results.length} captured page(s), ${failed.length} failed`);
  if (failed.length > 0) {
    process.exitCode = 1;
  }
}

async function report(app: INestApplicationContext): Promise<void> {
  const summary = await app.get(ReportingService).report();
  if (summary.emailsFailed > 0) {
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const command = process.argv[2] ?? 'run';
  if (!isCommand(command)) {
    logger.error(`Unknown command "${command}", expected one of: ${COMMANDS.join(', ')}`);
    process.exitCode = 2;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    if (command === 'intake' || command === 'run') {
      await intake(app);
    }
    if (command === 'report' || command === 'run') {
      await report(app);
    }
  } finally {
    await app.close();
  }
}

main().catch((error) => {
  logger.error(
    `Listing watch failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exit(1);
});
