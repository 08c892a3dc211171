import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConsoleLogger } from '@nestjs/common';
import cookieParser from 'cookie-parser';
import { AppModule } from './app.module';
import { AppConfigService } from './config/app.config';
import { UnauthorizedFilter } from './infrastructure/http/filters/unauthorized.filter';
import { NotFoundFilter } from './infrastructure/http/filters/not-found.filter';

async function bootstrap() {
  const logger = new ConsoleLogger();
  logger.log('Starting application initialization...');

  const app = await NestFactory.create(AppModule, { logger });
  app.use(cookieParser());
  app.useGlobalFilters(new UnauthorizedFilter(), new NotFoundFilter());

  let isShuttingDown = false;
  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      return;
    }
    isShuttingDown = true;

    logger.log(`Shutting down (${signal})...`);

    try {
      await app.close();
      logger.log('HTTP server closed successfully');
    } catch (error) {
      logger.error('Error closing HTTP server:', error);
    }

    logger.log('Shutdown complete');
    process.exit(0);
  };

  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  const port = app.get(AppConfigService).getPort();
  await app.listen(port);
  logger.log(`Application listening on port ${port}`);
}

bootstrap().catch((error) => {
  console.error('[ERROR] Error starting application:', error);
  process.exit(1);
});
