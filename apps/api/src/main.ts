import 'reflect-metadata';
import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module.js';
import { ConfigService } from './config/config.service.js';
import { FileLogger } from './logging/file-logger.js';

async function bootstrap() {
  // Load env from the repo root when present
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const rootEnv = path.resolve(__dirname, '../../../.env');
  if (existsSync(rootEnv)) dotenvConfig({ path: rootEnv });
  else dotenvConfig();

  const config = new ConfigService(process.env);
  const fileLogger = new FileLogger('NestApplication', {
    logFilePath: config.logFile,
    levels: config.logLevels,
    mirrorToConsole: config.logToConsole,
  });

  const app = await NestFactory.create(AppModule, { logger: fileLogger });
  app.enableShutdownHooks();

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Timekeeper API')
    .setDescription('Chat endpoint for the calendar assistant')
    .setVersion('1.0')
    .build();
  const swaggerDoc = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, swaggerDoc);

  await app.listen(config.port);
  fileLogger.log(`🚀 Timekeeper listening on :${config.port} (tz ${config.timeZone})`);
}

bootstrap().catch((error: unknown) => {
  console.error('❌ Failed to start Timekeeper API', error);
  process.exit(1);
});
