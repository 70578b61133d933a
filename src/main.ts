import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { PORT } from './quadrant/config/quadrant.constants';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  await app.listen(PORT);
  new Logger('Bootstrap').log(`listening on port ${PORT}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `startup failed: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exitCode = 1;
});
