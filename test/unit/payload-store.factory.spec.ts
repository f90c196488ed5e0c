import * as os from 'os';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import {
  FileSystemPayloadStore,
  MemoryPayloadStore,
  TypeORMPayloadStore,
  createPayloadStore,
  resolveDwfMockConfig,
} from '../../src';
import { createMemoryDataSource } from '../helpers/memory-data-source';

describe('createPayloadStore', () => {
  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  it('should create a filesystem store in the configured directory', async () => {
    const dataDir = path.join(os.tmpdir(), 'dwf-mock-factory');
    const store = await createPayloadStore(
      resolveDwfMockConfig({ storage: { type: 'filesystem', dataDir } }),
    );

    expect(store).toBeInstanceOf(FileSystemPayloadStore);
    expect(store instanceof FileSystemPayloadStore && store.getDataDir()).toBe(
      dataDir,
    );
  });

  it('should create a memory store', async () => {
    const store = await createPayloadStore(
      resolveDwfMockConfig({ storage: { type: 'memory' } }),
    );

    expect(store).toBeInstanceOf(MemoryPayloadStore);
  });

  it('should initialize the data source of a typeorm store', async () => {
    const dataSource = createMemoryDataSource();
    const store = await createPayloadStore(
      resolveDwfMockConfig({ storage: { type: 'typeorm', dataSource } }),
    );

    try {
      expect(store).toBeInstanceOf(TypeORMPayloadStore);
      expect(dataSource.isInitialized).toBe(true);
      expect(await store.isHealthy()).toBe(true);
    } finally {
      await store.close();
    }
  });

  it('should hand back a custom store as given', async () => {
    const custom = new MemoryPayloadStore();
    const store = await createPayloadStore(
      resolveDwfMockConfig({ storage: { type: 'custom', store: custom } }),
    );

    expect(store).toBe(custom);
  });

  it('should reject a custom type without a store', async () => {
    await expect(
      createPayloadStore(resolveDwfMockConfig({ storage: { type: 'custom' } })),
    ).rejects.toThrow('Custom payload store not provided');
  });
});
