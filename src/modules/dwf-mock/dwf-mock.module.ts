import {
  DynamicModule,
  Inject,
  Module,
  OnModuleDestroy,
  Provider,
} from '@nestjs/common';
import type { PayloadStore } from '../../core';
import {
  DwfMockModuleConfig,
  DwfMockModuleAsyncConfig,
  ResolvedDwfMockConfig,
  resolveDwfMockConfig,
} from './dwf-mock.config';
import { DWF_MOCK_CONFIG, PAYLOAD_STORE } from './constants';
import {
  WebhookController,
  RecordController,
  HealthController,
} from './controllers';
import { ConfigurationService } from './services/configuration.service';
import { IngestService } from './services/ingest.service';
import { createPayloadStore } from './services/payload-store.factory';
import { WebhookSignatureGuard } from './middleware';

const CONTROLLERS = [WebhookController, RecordController, HealthController];

const EXPORTS = [
  DWF_MOCK_CONFIG,
  PAYLOAD_STORE,
  ConfigurationService,
  IngestService,
];

/**
 * DWF Mock Module - Main NestJS Module
 *
 * Wires the payload store selected by configuration behind the webhook,
 * record and health controllers
 */
@Module({})
export class DwfMockModule implements OnModuleDestroy {
  constructor(
    @Inject(PAYLOAD_STORE)
    private readonly store: PayloadStore,
    @Inject(DWF_MOCK_CONFIG)
    private readonly config: ResolvedDwfMockConfig,
  ) {}

  /**
   * Configure synchronously
   */
  static forRoot(config: DwfMockModuleConfig): DynamicModule {
    return {
      module: DwfMockModule,
      providers: [
        {
          provide: DWF_MOCK_CONFIG,
          useValue: resolveDwfMockConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTS,
    };
  }

  /**
   * Configure asynchronously
   */
  static forRootAsync(options: DwfMockModuleAsyncConfig): DynamicModule {
    return {
      module: DwfMockModule,
      imports: options.imports || [],
      providers: [
        {
          provide: DWF_MOCK_CONFIG,
          useFactory: async (...args: unknown[]) =>
            resolveDwfMockConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTS,
    };
  }

  /**
   * Providers shared by both configuration styles
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: PAYLOAD_STORE,
        useFactory: (config: ResolvedDwfMockConfig) => createPayloadStore(config),
        inject: [DWF_MOCK_CONFIG],
      },
      ConfigurationService,
      IngestService,
      WebhookSignatureGuard,
    ];
  }

  /**
   * Close stores this module created; a custom store belongs to its caller
   */
  async onModuleDestroy(): Promise<void> {
    if (this.config.storage.type !== 'custom') {
      await this.store.close();
    }
  }
}
