import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { BufferLogger } from './common/buffer-logger';

async function bootstrap() {
  try {
    const app = await NestFactory.create(AppModule, { logger: new BufferLogger() });
    const config = app.get(ConfigService);
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    );
    app.enableShutdownHooks();

    const port = config.get<number>('PORT', 3000);
    await app.listen(port);
    Logger.log(`Panel engine listening on http://localhost:${port}`, 'Bootstrap');
  } catch (error) {
    console.error('Failed to start application:', error);
    process.exit(1);
  }
}

void bootstrap();
