import { DynamicModule, INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import {
  ConfigurationService,
  DwfMockModule,
  DwfMockModuleAsyncConfig,
  DwfMockModuleConfig,
  configureDwfMockApp,
} from '../../src';

/**
 * Boot the module the way main.ts does, without Swagger or logging
 */
export async function createTestApp(
  config: DwfMockModuleConfig,
): Promise<INestApplication> {
  return initialize(
    DwfMockModule.forRoot({
      ...config,
      api: { enableSwagger: false, ...config.api },
    }),
  );
}

export async function createAsyncTestApp(
  options: DwfMockModuleAsyncConfig,
): Promise<INestApplication> {
  return initialize(DwfMockModule.forRootAsync(options));
}

async function initialize(module: DynamicModule): Promise<INestApplication> {
  const moduleRef = await Test.createTestingModule({
    imports: [module],
  }).compile();

  const app = moduleRef.createNestApplication({
    bodyParser: false,
    logger: false,
  });
  configureDwfMockApp(app, app.get(ConfigurationService).getConfig());
  await app.init();

  return app;
}
