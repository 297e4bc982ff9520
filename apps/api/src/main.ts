import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { resolveLogLevels } from '@libs/core';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  app.enableShutdownHooks();
  const configService = app.get(ConfigService);
  const parsedPort = Number(configService.get<number>('PORT', 3000));
  const port = Number.isFinite(parsedPort) && parsedPort > 0 ? parsedPort : 3000;
  await app.listen(port, '0.0.0.0');
}

void bootstrap();
