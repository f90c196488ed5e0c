import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigurationService, configureDwfMockApp } from './modules';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bodyParser: false });
  app.enableShutdownHooks();

  const configuration = app.get(ConfigurationService);
  const config = configuration.getConfig();
  configureDwfMockApp(app, config);

  const { port, host } = configuration.getServerConfig();
  await app.listen(port, host);

  logger.log(`DWF webhook mock is listening on http://${host}:${port}`);
  if (config.api.enableSwagger) {
    logger.log(
      `OpenAPI documentation available at http://${host}:${port}/${config.api.docsPath}`,
    );
  }
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start DWF webhook mock', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
