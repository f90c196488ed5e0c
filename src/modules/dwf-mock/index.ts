/**
 * DWF Mock NestJS Module
 */

// Main module
export { DwfMockModule } from './dwf-mock.module';
export { configureDwfMockApp } from './dwf-mock.setup';

// Configuration
export {
  defaultDwfMockConfig,
  loadDwfMockConfig,
  resolveDwfMockConfig,
} from './dwf-mock.config';
export type {
  DwfMockModuleConfig,
  DwfMockModuleAsyncConfig,
  ResolvedDwfMockConfig,
  StorageType,
} from './dwf-mock.config';
export { DWF_MOCK_CONFIG, PAYLOAD_STORE } from './constants';

// Controllers
export {
  WebhookController,
  RecordController,
  HealthController,
} from './controllers';

// Services
export { IngestService } from './services/ingest.service';
export { ConfigurationService } from './services/configuration.service';
export { createPayloadStore } from './services/payload-store.factory';

// Guards and interceptors
export { WebhookSignatureGuard } from './middleware';
export { RawBodyInterceptor } from './interceptors/raw-body.interceptor';
