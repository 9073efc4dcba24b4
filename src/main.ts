#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliService } from './cli/cli.service';
import { parseCommand } from './cli/cli.commands';
import { ImportScriptService } from './schema/import-script.service';
import { WinstonLogger } from './common/winston.logger';

const logger = new WinstonLogger('Bootstrap');

async function bootstrap(): Promise<number> {
  const command = parseCommand(process.argv.slice(2));

  if (command === 'script') {
    process.stdout.write(new ImportScriptService().render());
    return 0;
  }

  // Nest's own logger only for warnings and errors, the services log through winston
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['warn', 'error'],
  });
  try {
    return await app.get(CliService).run(command);
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(
      `❌ ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    process.exitCode = 1;
  });
