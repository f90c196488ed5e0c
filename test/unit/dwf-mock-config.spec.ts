import { loadDwfMockConfig, resolveDwfMockConfig } from '../../src';

const fromEnv = (env: Record<string, string>) => (key: string) => env[key];

describe('DWF mock configuration', () => {
  describe('resolveDwfMockConfig', () => {
    it('should apply defaults to a minimal configuration', () => {
      expect(resolveDwfMockConfig({ storage: { type: 'filesystem' } })).toEqual({
        storage: {
          type: 'filesystem',
          dataDir: '/data',
          databaseUrl: 'postgres://localhost:5432/dwf_mock',
        },
        webhooks: { secret: undefined, storeRawPayload: true },
        api: { bodyLimit: '10mb', enableSwagger: true, docsPath: 'docs' },
        server: { port: 5000, host: '0.0.0.0' },
      });
    });

    it('should keep explicit values over defaults', () => {
      const resolved = resolveDwfMockConfig({
        storage: { type: 'memory' },
        webhooks: { secret: 'test-secret', storeRawPayload: false },
        api: { bodyLimit: '1kb' },
        server: { port: 8080 },
      });

      expect(resolved.storage.type).toBe('memory');
      expect(resolved.webhooks).toEqual({
        secret: 'test-secret',
        storeRawPayload: false,
      });
      expect(resolved.api.bodyLimit).toBe('1kb');
      expect(resolved.api.enableSwagger).toBe(true);
      expect(resolved.server).toEqual({ port: 8080, host: '0.0.0.0' });
    });

    it('should treat an empty secret as no secret', () => {
      expect(
        resolveDwfMockConfig({
          storage: { type: 'memory' },
          webhooks: { secret: '' },
        }).webhooks.secret,
      ).toBeUndefined();
    });
  });

  describe('loadDwfMockConfig', () => {
    it('should default to filesystem storage without environment', () => {
      const resolved = resolveDwfMockConfig(loadDwfMockConfig(fromEnv({})));

      expect(resolved.storage.type).toBe('filesystem');
      expect(resolved.storage.dataDir).toBe('/data');
      expect(resolved.server.port).toBe(5000);
      expect(resolved.webhooks.secret).toBeUndefined();
    });

    it('should read every supported variable', () => {
      const config = loadDwfMockConfig(
        fromEnv({
          PORT: '5050',
          HOST: '127.0.0.1',
          STORAGE_TYPE: 'typeorm',
          DATA_DIR: '/tmp/dwf',
          DATABASE_URL: 'postgres://db:5432/dwf',
          DWF_API_SECRET: 'test-secret',
          STORE_RAW_PAYLOAD: 'false',
          BODY_LIMIT: '2mb',
          ENABLE_SWAGGER: 'no',
        }),
      );

      expect(config).toEqual({
        storage: {
          type: 'typeorm',
          dataDir: '/tmp/dwf',
          databaseUrl: 'postgres://db:5432/dwf',
        },
        webhooks: { secret: 'test-secret', storeRawPayload: false },
        api: { bodyLimit: '2mb', enableSwagger: false },
        server: { port: 5050, host: '127.0.0.1' },
      });
    });

    it('should ignore blank variables', () => {
      const resolved = resolveDwfMockConfig(
        loadDwfMockConfig(fromEnv({ PORT: '  ', DWF_API_SECRET: '' })),
      );

      expect(resolved.server.port).toBe(5000);
      expect(resolved.webhooks.secret).toBeUndefined();
    });

    it('should reject a malformed port', () => {
      expect(() => loadDwfMockConfig(fromEnv({ PORT: 'abc' }))).toThrow(
        'PORT must be an integer between 0 and 65535, got "abc"',
      );
      expect(() => loadDwfMockConfig(fromEnv({ PORT: '70000' }))).toThrow(
        'PORT must be an integer',
      );
    });

    it('should reject an unknown storage type', () => {
      expect(() => loadDwfMockConfig(fromEnv({ STORAGE_TYPE: 'custom' }))).toThrow(
        'STORAGE_TYPE must be one of filesystem, memory, typeorm, got "custom"',
      );
    });

    it('should reject a malformed boolean', () => {
      expect(() =>
        loadDwfMockConfig(fromEnv({ STORE_RAW_PAYLOAD: 'maybe' })),
      ).toThrow('STORE_RAW_PAYLOAD must be true or false, got "maybe"');
    });
  });
});
