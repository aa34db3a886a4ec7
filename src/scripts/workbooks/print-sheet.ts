import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from '@/app.module';
import { WorkbookLoaderService } from '@/modules/workbooks/application/services/workbook-loader.service';

const logger = new Logger('PrintSheet');

async function run() {
  const [path, sheetName] = process.argv.slice(2);
  if (!path) {
    logger.error('Usage: print-sheet <workbook> [sheetName]');
    process.exitCode = 1;
    return;
  }

  const ctx = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  try {
    const loader = ctx.get(WorkbookLoaderService);
    const view = sheetName ? loader.fromPathWithSheetName(path, sheetName) : loader.fromPath(path);

    for (const row of view) {
      if (row.isEmpty()) continue;
      process.stdout.write(`${JSON.stringify(row)}\n`);
    }
  } finally {
    await ctx.close();
  }
}

run().catch((error) => {
  logger.error(`Could not print sheet: ${(error as Error).message}`);
  process.exit(1);
});
