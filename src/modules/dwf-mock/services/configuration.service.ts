import { Injectable, Inject } from '@nestjs/common';
import type { ResolvedDwfMockConfig, StorageType } from '../dwf-mock.config';
import { DWF_MOCK_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to the resolved module configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(DWF_MOCK_CONFIG)
    private readonly config: ResolvedDwfMockConfig,
  ) {}

  getConfig(): ResolvedDwfMockConfig {
    return this.config;
  }

  getStorageType(): StorageType {
    return this.config.storage.type;
  }

  getWebhookSecret(): string | undefined {
    return this.config.webhooks.secret;
  }

  isRawPayloadStorageEnabled(): boolean {
    return this.config.webhooks.storeRawPayload;
  }

  getServerConfig(): { port: number; host: string } {
    return this.config.server;
  }
}
