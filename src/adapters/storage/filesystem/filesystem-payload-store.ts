import { promises as fs, constants as fsConstants } from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import {
  PayloadStore,
  PayloadDocument,
  Pagination,
  RecordFilter,
  StoredRecord,
  WebhookEndpoint,
  WEBHOOK_ENDPOINTS,
  PayloadStoreError,
  formatRecordId,
  parseRecordId,
  readPayloadDocument,
} from '../../../core';

const RECORD_FILE_PATTERN = /^((?:ian|pps|ups)_[1-9]\d*)\.json$/;

/**
 * Upper bound on exclusive-create retries when other writers keep
 * taking the next sequence first
 */
const MAX_CREATE_ATTEMPTS = 100;

export interface FileSystemPayloadStoreOptions {
  /**
   * Directory records are written to, created on first write
   */
  dataDir: string;
}

interface RecordFile {
  id: string;
  endpoint: WebhookEndpoint;
  sequence: number;
}

/**
 * Directory-backed payload store
 *
 * Writes one `<prefix>_<sequence>.json` file per record. The sequence is one
 * past the highest found in the directory. Saves in this process run one at
 * a time; files are opened with an exclusive create and given up when
 * another prefix holds the same sequence, so a record never replaces or
 * shares a sequence with another even when a second process writes into
 * the same directory.
 */
export class FileSystemPayloadStore implements PayloadStore {
  private readonly dataDir: string;

  /**
   * Tail of the in-process save queue. Settles, never rejects.
   */
  private pendingSave: Promise<void> = Promise.resolve();

  constructor(options: FileSystemPayloadStoreOptions) {
    this.dataDir = path.resolve(options.dataDir);
  }

  getDataDir(): string {
    return this.dataDir;
  }

  save(
    endpoint: WebhookEndpoint,
    document: PayloadDocument,
  ): Promise<StoredRecord> {
    const saved = this.pendingSave.then(() => this.write(endpoint, document));
    // The caller gets the failure through `saved`
    this.pendingSave = saved.then(
      () => undefined,
      () => undefined,
    );
    return saved;
  }

  private async write(
    endpoint: WebhookEndpoint,
    document: PayloadDocument,
  ): Promise<StoredRecord> {
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
    } catch (error) {
      throw new PayloadStoreError(
        `Cannot create data directory ${this.dataDir}`,
        { cause: error },
      );
    }

    const files = await this.readRecordFiles();
    let sequence =
      files.reduce((highest, file) => Math.max(highest, file.sequence), 0) + 1;

    for (let attempt = 0; attempt < MAX_CREATE_ATTEMPTS; attempt++) {
      const id = formatRecordId(endpoint, sequence);
      const location = this.locationOf(id);

      if (
        (await this.createExclusive(location, document.content)) &&
        !(await this.releaseIfSequenceShared(endpoint, sequence, location))
      ) {
        return new StoredRecord(
          id,
          endpoint,
          sequence,
          location,
          new Date(),
          document.payload,
        );
      }

      sequence++;
    }

    throw new PayloadStoreError(
      `No free record file in ${this.dataDir} after ${MAX_CREATE_ATTEMPTS} attempts`,
    );
  }

  async get(id: string): Promise<StoredRecord | null> {
    const parsed = parseRecordId(id);
    if (!parsed) {
      return null;
    }

    try {
      return await this.readRecord({ id, ...parsed });
    } catch (error) {
      if (error instanceof PayloadStoreError && hasCode(error.cause, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  async list(
    filter: RecordFilter = {},
    pagination?: Pagination,
  ): Promise<StoredRecord[]> {
    let files = this.applyFilter(await this.readRecordFiles(), filter);
    if (pagination) {
      files = files.slice(
        pagination.offset,
        pagination.offset + pagination.limit,
      );
    }

    const records: StoredRecord[] = [];
    for (const file of files) {
      records.push(await this.readRecord(file));
    }
    return records;
  }

  async count(filter: RecordFilter = {}): Promise<number> {
    return this.applyFilter(await this.readRecordFiles(), filter).length;
  }

  /**
   * Whether a save could write here: the data directory, or the nearest
   * existing ancestor it would be created under, is a writable directory
   */
  async isHealthy(): Promise<boolean> {
    let target = this.dataDir;

    for (;;) {
      try {
        if (!(await fs.stat(target)).isDirectory()) {
          return false;
        }
        await fs.access(target, fsConstants.W_OK);
        return true;
      } catch (error) {
        const parent = path.dirname(target);
        if (!hasCode(error, 'ENOENT') || parent === target) {
          return false;
        }
        target = parent;
      }
    }
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }

  private locationOf(id: string): string {
    return path.join(this.dataDir, `${id}.json`);
  }

  /**
   * Create and fsync the file. Resolves false when the name is taken.
   */
  private async createExclusive(
    location: string,
    content: string,
  ): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await fs.open(location, 'wx');
    } catch (error) {
      if (hasCode(error, 'EEXIST')) {
        return false;
      }
      throw new PayloadStoreError(`Failed to create ${location}`, {
        cause: error,
      });
    }

    try {
      await handle.writeFile(content, 'utf8');
      await handle.sync();
    } catch (error) {
      await handle.close();
      await fs.rm(location, { force: true });
      throw new PayloadStoreError(`Failed to write ${location}`, {
        cause: error,
      });
    }

    await handle.close();
    return true;
  }

  /**
   * Remove a just-created file when another writer already holds its
   * sequence under a different prefix. Resolves true when removed.
   */
  private async releaseIfSequenceShared(
    endpoint: WebhookEndpoint,
    sequence: number,
    location: string,
  ): Promise<boolean> {
    for (const other of WEBHOOK_ENDPOINTS) {
      if (other === endpoint) {
        continue;
      }

      try {
        await fs.access(this.locationOf(formatRecordId(other, sequence)));
      } catch (error) {
        if (hasCode(error, 'ENOENT')) {
          continue;
        }
        throw new PayloadStoreError(`Cannot check sequence ${sequence}`, {
          cause: error,
        });
      }

      try {
        await fs.rm(location, { force: true });
      } catch (error) {
        throw new PayloadStoreError(`Failed to release ${location}`, {
          cause: error,
        });
      }
      return true;
    }
    return false;
  }

  /**
   * Record files in the directory ordered by sequence. Other files are ignored.
   */
  private async readRecordFiles(): Promise<RecordFile[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dataDir);
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return [];
      }
      throw new PayloadStoreError(`Cannot read data directory ${this.dataDir}`, {
        cause: error,
      });
    }

    const files: RecordFile[] = [];
    for (const name of names) {
      const match = RECORD_FILE_PATTERN.exec(name);
      const parsed = match ? parseRecordId(match[1]) : null;
      if (match && parsed) {
        files.push({ id: match[1], ...parsed });
      }
    }

    return files.sort((a, b) => a.sequence - b.sequence);
  }

  private applyFilter(files: RecordFile[], filter: RecordFilter): RecordFile[] {
    return filter.endpoint
      ? files.filter((file) => file.endpoint === filter.endpoint)
      : files;
  }

  private async readRecord(file: RecordFile): Promise<StoredRecord> {
    const location = this.locationOf(file.id);

    let content: string;
    let modifiedAt: Date;
    try {
      content = await fs.readFile(location, 'utf8');
      modifiedAt = (await fs.stat(location)).mtime;
    } catch (error) {
      throw new PayloadStoreError(`Failed to read ${location}`, {
        cause: error,
      });
    }

    try {
      return new StoredRecord(
        file.id,
        file.endpoint,
        file.sequence,
        location,
        modifiedAt,
        readPayloadDocument(content),
      );
    } catch (error) {
      throw new PayloadStoreError(`Record file ${location} is corrupt`, {
        cause: error,
      });
    }
  }
}

function hasCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}
