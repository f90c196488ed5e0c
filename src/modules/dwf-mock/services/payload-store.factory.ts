import { Logger } from '@nestjs/common';
import type { PayloadStore } from '../../../core';
import { FileSystemPayloadStore } from '../../../adapters/storage/filesystem';
import { MemoryPayloadStore } from '../../../adapters/storage/memory';
import {
  TypeORMPayloadStore,
  createDataSource,
} from '../../../adapters/storage/typeorm';
import type { ResolvedDwfMockConfig } from '../dwf-mock.config';

const logger = new Logger('PayloadStoreFactory');

/**
 * Create the payload store selected by configuration
 */
export async function createPayloadStore(
  config: ResolvedDwfMockConfig,
): Promise<PayloadStore> {
  const { storage } = config;

  switch (storage.type) {
    case 'filesystem': {
      const store = new FileSystemPayloadStore({
        dataDir: storage.dataDir,
      });
      logger.log(`Storing payloads in ${store.getDataDir()}`);
      return store;
    }

    case 'memory':
      logger.log('Storing payloads in memory');
      return new MemoryPayloadStore();

    case 'typeorm': {
      const dataSource =
        storage.dataSource ?? createDataSource({ url: storage.databaseUrl });
      if (!dataSource.isInitialized) {
        await dataSource.initialize();
      }
      logger.log('Storing payloads in the stored_records table');
      return new TypeORMPayloadStore(dataSource);
    }

    case 'custom':
      if (!storage.store) {
        throw new Error('Custom payload store not provided');
      }
      return storage.store;

    default: {
      const unknownType: never = storage.type;
      throw new Error(`Unknown storage type: ${String(unknownType)}`);
    }
  }
}
