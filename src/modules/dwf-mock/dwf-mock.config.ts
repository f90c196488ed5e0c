import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { DataSource } from 'typeorm';
import type { PayloadStore } from '../../core';

export type StorageType = 'filesystem' | 'memory' | 'typeorm' | 'custom';

const ENV_STORAGE_TYPES: StorageType[] = ['filesystem', 'memory', 'typeorm'];

/**
 * DWF Mock Module Configuration
 */
export interface DwfMockModuleConfig {
  /**
   * Payload store configuration
   */
  storage: {
    type: StorageType;

    /**
     * Directory for the filesystem store
     */
    dataDir?: string;

    /**
     * PostgreSQL connection string for the typeorm store
     */
    databaseUrl?: string;

    /**
     * Existing data source for the typeorm store, used instead of
     * databaseUrl. Initialized on demand and closed with the module.
     */
    dataSource?: DataSource;

    /**
     * Store instance for the custom type. Its lifecycle stays with the caller.
     */
    store?: PayloadStore;
  };

  /**
   * Webhook ingestion configuration
   */
  webhooks?: {
    /**
     * Shared HMAC secret. Requests must be signed when set.
     */
    secret?: string;

    /**
     * Store the body text as received instead of re-serialized JSON
     */
    storeRawPayload?: boolean;
  };

  /**
   * HTTP API configuration
   */
  api?: {
    /**
     * Largest accepted request body, in body-parser notation
     */
    bodyLimit?: string;
    enableSwagger?: boolean;
    docsPath?: string;
  };

  server?: {
    port?: number;
    host?: string;
  };
}

/**
 * Configuration with every default applied
 */
export interface ResolvedDwfMockConfig {
  storage: DwfMockModuleConfig['storage'] & {
    dataDir: string;
    databaseUrl: string;
  };
  webhooks: {
    secret?: string;
    storeRawPayload: boolean;
  };
  api: {
    bodyLimit: string;
    enableSwagger: boolean;
    docsPath: string;
  };
  server: {
    port: number;
    host: string;
  };
}

/**
 * Async configuration factory
 */
export interface DwfMockModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<
    Promise<DwfMockModuleConfig> | DwfMockModuleConfig
  >['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultDwfMockConfig: ResolvedDwfMockConfig = {
  storage: {
    type: 'filesystem',
    dataDir: '/data',
    databaseUrl: 'postgres://localhost:5432/dwf_mock',
  },
  webhooks: {
    storeRawPayload: true,
  },
  api: {
    bodyLimit: '10mb',
    enableSwagger: true,
    docsPath: 'docs',
  },
  server: {
    port: 5000,
    host: '0.0.0.0',
  },
};

export function resolveDwfMockConfig(
  config: DwfMockModuleConfig,
): ResolvedDwfMockConfig {
  const defaults = defaultDwfMockConfig;

  return {
    storage: {
      ...config.storage,
      dataDir: config.storage.dataDir ?? defaults.storage.dataDir,
      databaseUrl: config.storage.databaseUrl ?? defaults.storage.databaseUrl,
    },
    webhooks: {
      secret: config.webhooks?.secret || undefined,
      storeRawPayload:
        config.webhooks?.storeRawPayload ?? defaults.webhooks.storeRawPayload,
    },
    api: {
      bodyLimit: config.api?.bodyLimit ?? defaults.api.bodyLimit,
      enableSwagger: config.api?.enableSwagger ?? defaults.api.enableSwagger,
      docsPath: config.api?.docsPath ?? defaults.api.docsPath,
    },
    server: {
      port: config.server?.port ?? defaults.server.port,
      host: config.server?.host ?? defaults.server.host,
    },
  };
}

/**
 * Build module configuration from environment variables.
 * Unset variables fall back to the defaults; malformed ones throw.
 */
export function loadDwfMockConfig(
  read: (key: string) => string | undefined,
): DwfMockModuleConfig {
  const value = (key: string): string | undefined => {
    const raw = read(key)?.trim();
    return raw ? raw : undefined;
  };

  const storageType = value('STORAGE_TYPE');
  const port = value('PORT');
  const storeRaw = value('STORE_RAW_PAYLOAD');
  const enableSwagger = value('ENABLE_SWAGGER');

  return {
    storage: {
      type: storageType
        ? parseStorageType(storageType)
        : defaultDwfMockConfig.storage.type,
      dataDir: value('DATA_DIR'),
      databaseUrl: value('DATABASE_URL'),
    },
    webhooks: {
      secret: value('DWF_API_SECRET'),
      storeRawPayload: storeRaw
        ? parseBoolean('STORE_RAW_PAYLOAD', storeRaw)
        : undefined,
    },
    api: {
      bodyLimit: value('BODY_LIMIT'),
      enableSwagger: enableSwagger
        ? parseBoolean('ENABLE_SWAGGER', enableSwagger)
        : undefined,
    },
    server: {
      port: port ? parsePort(port) : undefined,
      host: value('HOST'),
    },
  };
}

function parseStorageType(raw: string): StorageType {
  const type = ENV_STORAGE_TYPES.find((candidate) => candidate === raw);
  if (!type) {
    throw new Error(
      `STORAGE_TYPE must be one of ${ENV_STORAGE_TYPES.join(', ')}, got "${raw}"`,
    );
  }
  return type;
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${raw}"`);
  }
  return port;
}

function parseBoolean(key: string, raw: string): boolean {
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`${key} must be true or false, got "${raw}"`);
  }
}
