/**
 * Storage Module
 *
 * Responsibilities:
 * - Define the LedgerStore interface
 * - Implement S3LedgerStore using AWS SDK v3 conditional writes
 * - Implement FileLedgerStore for single-host deployments, with lock files
 *   that serialize writers and scan cycles across processes
 * - Implement MemoryLedgerStore for testing and dry runs
 *
 * Every store hands out an opaque `version` with each record and rejects a
 * `put` whose expected version no longer matches (LedgerConflictError).
 *
 * Storage paths:
 * - S3: {prefix}/{subject_id}/{kind}/{year}.json
 * - File: one JSON document holding every record
 */

import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
  ListObjectsV2Command,
  HeadBucketCommand,
  NoSuchKey,
  S3ServiceException,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { randomUUID } from 'crypto';
import { mkdir, open, readFile, rename, rm, stat, writeFile, type FileHandle } from 'fs/promises';
import { hostname } from 'os';
import { dirname } from 'path';
import { z } from 'zod';
import {
  CycleInProgressError,
  LedgerConflictError,
  LedgerUnavailableError,
  hasErrorCode,
  toErrorMessage,
} from '../errors/index.js';
import type { DeliveryKey, DeliveryRecord } from '../types/index.js';
import { sleep } from '../utils/index.js';

/**
 * Persistence contract for the delivery ledger
 */
export interface LedgerStore {
  readonly name: string;
  /** Record for `key` with its current version, or null */
  get(key: DeliveryKey): Promise<DeliveryRecord | null>;
  /**
   * Write `record` if the stored version still equals `expectedVersion`
   * (null: only if no record exists). Returns the record with its new version.
   *
   * @throws LedgerConflictError when the version check fails
   */
  put(record: DeliveryRecord, expectedVersion: string | null): Promise<DeliveryRecord>;
  list(): Promise<DeliveryRecord[]>;
  /** Throws LedgerUnavailableError when the store cannot be reached */
  ping(): Promise<void>;
}

/**
 * Serialized delivery key, e.g. `emp-7:birthday:2026`
 */
export function formatDeliveryKey(key: DeliveryKey): string {
  return `${key.subjectId}:${key.kind}:${key.year}`;
}

const StoredRecordSchema = z.object({
  key: z.object({
    subjectId: z.string().min(1),
    kind: z.enum(['birthday', 'anniversary']),
    year: z.number().int(),
  }),
  status: z.enum(['pending', 'delivered', 'failed']),
  updatedAt: z.string(),
  retryCount: z.number().int().nonnegative(),
  lastError: z.string().nullable(),
  deliveredAt: z.string().nullable(),
  messageId: z.string().nullable(),
});

type StoredRecord = z.infer<typeof StoredRecordSchema>;

function toStored(record: DeliveryRecord): StoredRecord {
  return {
    key: { ...record.key },
    status: record.status,
    updatedAt: record.updatedAt,
    retryCount: record.retryCount,
    lastError: record.lastError,
    deliveredAt: record.deliveredAt,
    messageId: record.messageId,
  };
}

/**
 * Validate a stored document and attach its version
 *
 * @throws LedgerUnavailableError for documents that do not match the schema
 */
export function parseStoredRecord(raw: unknown, version: string | null): DeliveryRecord {
  const result = StoredRecordSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new LedgerUnavailableError(`Corrupt ledger record: ${issues.join('; ')}`);
  }
  return { ...result.data, version };
}

// ============================================================================
// S3 Store
// ============================================================================

/**
 * S3 configuration for the ledger store
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'ledger') */
  prefix?: string;
  /** Custom S3 endpoint for local development or S3-compatible services */
  endpoint?: string;
  /** AWS credentials (optional if using IAM roles or environment variables) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
}

function httpStatusOf(error: unknown): number | undefined {
  return error instanceof S3ServiceException ? error.$metadata.httpStatusCode : undefined;
}

/**
 * S3 implementation of LedgerStore
 *
 * Uses the object ETag as the record version, `IfNoneMatch: '*'` for
 * creates and `IfMatch` for updates.
 */
export class S3LedgerStore implements LedgerStore {
  readonly name = 's3';
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3Config, client?: S3Client) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'ledger';

    if (client) {
      this.client = client;
      return;
    }

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };
    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }
    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }
    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }
    this.client = new S3Client(clientConfig);
  }

  /**
   * S3 object key for a delivery key
   */
  objectKey(key: DeliveryKey): string {
    return `${this.prefix}/${encodeURIComponent(key.subjectId)}/${key.kind}/${key.year}.json`;
  }

  async get(key: DeliveryKey): Promise<DeliveryRecord | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key) })
      );
      if (!response.Body) {
        return null;
      }
      const content = await response.Body.transformToString();
      return parseStoredRecord(JSON.parse(content), response.ETag ?? null);
    } catch (error) {
      if (error instanceof NoSuchKey || httpStatusOf(error) === 404) {
        return null;
      }
      if (error instanceof LedgerUnavailableError) {
        throw error;
      }
      throw new LedgerUnavailableError(
        `Failed to read ledger record ${formatDeliveryKey(key)}: ${toErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async put(record: DeliveryRecord, expectedVersion: string | null): Promise<DeliveryRecord> {
    const keyLabel = formatDeliveryKey(record.key);
    try {
      const response = await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.objectKey(record.key),
          Body: JSON.stringify(toStored(record), null, 2),
          ContentType: 'application/json',
          Metadata: {
            'delivery-key': keyLabel,
            status: record.status,
          },
          ...(expectedVersion === null ? { IfNoneMatch: '*' } : { IfMatch: expectedVersion }),
        })
      );
      return { ...record, version: response.ETag ?? null };
    } catch (error) {
      const status = httpStatusOf(error);
      // 412: precondition failed, 409: concurrent conditional request
      if (status === 412 || status === 409) {
        throw new LedgerConflictError(keyLabel, { cause: error });
      }
      throw new LedgerUnavailableError(
        `Failed to write ledger record ${keyLabel}: ${toErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async list(): Promise<DeliveryRecord[]> {
    const records: DeliveryRecord[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: `${this.prefix}/`,
            ContinuationToken: continuationToken,
          })
        );
        for (const object of response.Contents ?? []) {
          if (!object.Key) continue;
          const result = await this.client.send(
            new GetObjectCommand({ Bucket: this.bucket, Key: object.Key })
          );
          if (!result.Body) continue;
          const content = await result.Body.transformToString();
          records.push(parseStoredRecord(JSON.parse(content), result.ETag ?? null));
        }
        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      if (error instanceof LedgerUnavailableError) {
        throw error;
      }
      throw new LedgerUnavailableError(`Failed to list ledger records: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    return records;
  }

  async ping(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (error) {
      throw new LedgerUnavailableError(
        `Ledger bucket ${this.bucket} is not reachable: ${toErrorMessage(error)}`,
        { cause: error }
      );
    }
  }
}

// ============================================================================
// Lock Files
// ============================================================================

interface LockOwner {
  pid: number;
  hostname: string;
  acquiredAt: string;
}

const LockOwnerSchema = z.object({
  pid: z.number().int(),
  hostname: z.string(),
  acquiredAt: z.string(),
});

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return hasErrorCode(error, 'EPERM');
  }
}

function describeOwner(owner: LockOwner): string {
  return `pid ${owner.pid} on ${owner.hostname} since ${owner.acquiredAt}`;
}

/**
 * Exclusive lock file created with O_EXCL
 *
 * A lock is stale when its owner is a dead process on this host, or when it
 * is older than `staleMs` (or unreadable and older than that).
 */
export class LockFile {
  readonly path: string;
  private readonly staleMs: number;

  constructor(path: string, options: { staleMs?: number } = {}) {
    this.path = path;
    this.staleMs = options.staleMs ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Create the lock file; false when another owner holds it
   */
  async tryAcquire(): Promise<boolean> {
    await mkdir(dirname(this.path), { recursive: true });
    if (await this.create()) {
      return true;
    }
    if (!(await this.isStale())) {
      return false;
    }
    await rm(this.path, { force: true });
    return this.create();
  }

  async release(): Promise<void> {
    await rm(this.path, { force: true });
  }

  /**
   * Current owner, or null when the file is missing or unreadable
   */
  async owner(): Promise<LockOwner | null> {
    try {
      const parsed = LockOwnerSchema.safeParse(JSON.parse(await readFile(this.path, 'utf-8')));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT') || error instanceof SyntaxError) {
        return null;
      }
      throw error;
    }
  }

  private async create(): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await open(this.path, 'wx');
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        return false;
      }
      throw error;
    }
    try {
      const owner: LockOwner = { pid: process.pid, hostname: hostname(), acquiredAt: new Date().toISOString() };
      await handle.writeFile(JSON.stringify(owner), 'utf-8');
    } finally {
      await handle.close();
    }
    return true;
  }

  private async isStale(): Promise<boolean> {
    let modifiedAt: number;
    try {
      modifiedAt = (await stat(this.path)).mtimeMs;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return true;
      }
      throw error;
    }
    if (Date.now() - modifiedAt > this.staleMs) {
      return true;
    }
    const owner = await this.owner();
    return owner !== null && owner.hostname === hostname() && !isProcessAlive(owner.pid);
  }
}

export interface CycleLockLease {
  release(): Promise<void>;
}

/**
 * Cross-process guard that lets one scan cycle at a time write to a ledger
 */
export interface CycleLock {
  /** @throws CycleInProgressError when another process holds the lock */
  acquire(): Promise<CycleLockLease>;
}

/**
 * Cycle lock kept as `{ledger}.cycle.lock` beside a file ledger
 */
export class FileCycleLock implements CycleLock {
  private readonly lock: LockFile;

  constructor(ledgerPath: string) {
    this.lock = new LockFile(`${ledgerPath}.cycle.lock`);
  }

  async acquire(): Promise<CycleLockLease> {
    let acquired: boolean;
    try {
      acquired = await this.lock.tryAcquire();
    } catch (error) {
      throw new LedgerUnavailableError(`Failed to take cycle lock ${this.lock.path}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
    if (!acquired) {
      const owner = await this.lock.owner();
      throw new CycleInProgressError(owner ? describeOwner(owner) : null);
    }
    return { release: () => this.lock.release() };
  }
}

// ============================================================================
// File Store
// ============================================================================

interface LedgerDocument {
  records: Record<string, StoredRecord & { version: number }>;
}

export interface FileLedgerStoreOptions {
  /** How long a write waits for another writer's lock */
  lockTimeoutMs?: number;
  /** Age after which a write lock is presumed abandoned */
  lockStaleMs?: number;
  lockRetryMs?: number;
}

/**
 * Single JSON file store
 *
 * Writes go through one promise chain per instance and, across instances and
 * processes, through a `{ledger}.lock` file held for the read-check-write.
 * Each write lands via its own temp file and a rename, so a crash never
 * leaves a half-written document.
 */
export class FileLedgerStore implements LedgerStore {
  readonly name = 'file';
  private readonly path: string;
  private readonly writeLock: LockFile;
  private readonly lockTimeoutMs: number;
  private readonly lockRetryMs: number;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(path: string, options: FileLedgerStoreOptions = {}) {
    this.path = path;
    this.writeLock = new LockFile(`${path}.lock`, { staleMs: options.lockStaleMs ?? 30_000 });
    this.lockTimeoutMs = options.lockTimeoutMs ?? 10_000;
    this.lockRetryMs = options.lockRetryMs ?? 15;
  }

  private async readDocument(): Promise<LedgerDocument> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return { records: {} };
      }
      throw new LedgerUnavailableError(`Failed to read ledger file ${this.path}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new LedgerUnavailableError(`Ledger file ${this.path} is not valid JSON`, { cause: error });
    }
    const result = z
      .object({
        records: z.record(StoredRecordSchema.extend({ version: z.number().int().nonnegative() })),
      })
      .safeParse(parsed);
    if (!result.success) {
      throw new LedgerUnavailableError(`Ledger file ${this.path} does not match the ledger schema`);
    }
    return result.data;
  }

  private async writeDocument(document: LedgerDocument): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8');
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new LedgerUnavailableError(`Failed to write ledger file ${this.path}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async withWriteLock<T>(operation: () => Promise<T>): Promise<T> {
    const deadline = Date.now() + this.lockTimeoutMs;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      while (!(await this.writeLock.tryAcquire())) {
        if (Date.now() >= deadline) {
          throw new LedgerUnavailableError(
            `Timed out after ${this.lockTimeoutMs}ms waiting for ledger lock ${this.writeLock.path}`
          );
        }
        await sleep(this.lockRetryMs);
      }
    } catch (error) {
      if (error instanceof LedgerUnavailableError) {
        throw error;
      }
      throw new LedgerUnavailableError(`Failed to lock ledger file ${this.path}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      return await operation();
    } finally {
      await this.writeLock.release();
    }
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const locked = () => this.withWriteLock(operation);
    const result = this.queue.then(locked, locked);
    this.queue = result.catch(() => undefined);
    return result;
  }

  async get(key: DeliveryKey): Promise<DeliveryRecord | null> {
    const document = await this.readDocument();
    const stored = document.records[formatDeliveryKey(key)];
    if (!stored) {
      return null;
    }
    const { version, ...record } = stored;
    return { ...record, version: String(version) };
  }

  put(record: DeliveryRecord, expectedVersion: string | null): Promise<DeliveryRecord> {
    return this.serialize(async () => {
      const keyLabel = formatDeliveryKey(record.key);
      const document = await this.readDocument();
      const current = document.records[keyLabel];
      const currentVersion = current ? String(current.version) : null;
      if (currentVersion !== expectedVersion) {
        throw new LedgerConflictError(keyLabel);
      }
      const nextVersion = (current?.version ?? 0) + 1;
      document.records[keyLabel] = { ...toStored(record), version: nextVersion };
      await this.writeDocument(document);
      return { ...record, version: String(nextVersion) };
    });
  }

  async list(): Promise<DeliveryRecord[]> {
    const document = await this.readDocument();
    return Object.values(document.records).map(({ version, ...record }) => ({
      ...record,
      version: String(version),
    }));
  }

  async ping(): Promise<void> {
    await this.readDocument();
  }
}

// ============================================================================
// Memory Store
// ============================================================================

/**
 * In-memory ledger store for testing and dry runs
 */
export class MemoryLedgerStore implements LedgerStore {
  readonly name = 'memory';
  private store: Map<string, DeliveryRecord> = new Map();
  private versionCounter = 0;

  async get(key: DeliveryKey): Promise<DeliveryRecord | null> {
    const record = this.store.get(formatDeliveryKey(key));
    return record ? structuredClone(record) : null;
  }

  async put(record: DeliveryRecord, expectedVersion: string | null): Promise<DeliveryRecord> {
    const keyLabel = formatDeliveryKey(record.key);
    const current = this.store.get(keyLabel);
    if ((current?.version ?? null) !== expectedVersion) {
      throw new LedgerConflictError(keyLabel);
    }
    this.versionCounter += 1;
    const saved: DeliveryRecord = { ...structuredClone(record), version: String(this.versionCounter) };
    this.store.set(keyLabel, saved);
    return structuredClone(saved);
  }

  async list(): Promise<DeliveryRecord[]> {
    return Array.from(this.store.values(), (record) => structuredClone(record));
  }

  async ping(): Promise<void> {
    // always reachable
  }

  /**
   * Clear all stored records (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Number of stored records
   */
  size(): number {
    return this.store.size;
  }

  /**
   * All stored keys (useful for debugging)
   */
  keys(): string[] {
    return Array.from(this.store.keys());
  }
}

export type LedgerStoreConfig =
  | { type: 'memory' }
  | { type: 'file'; path: string }
  | ({ type: 's3' } & S3Config);

/**
 * Factory function to create the configured ledger store
 */
export function createLedgerStore(config: LedgerStoreConfig): LedgerStore {
  switch (config.type) {
    case 'memory':
      return new MemoryLedgerStore();
    case 'file':
      return new FileLedgerStore(config.path);
    case 's3': {
      const { type: _type, ...s3Config } = config;
      return new S3LedgerStore(s3Config);
    }
  }
}

/**
 * Cycle lock for stores that need one; S3 claims rely on conditional writes
 * and the memory store never leaves its process
 */
export function createCycleLock(config: LedgerStoreConfig): CycleLock | null {
  return config.type === 'file' ? new FileCycleLock(config.path) : null;
}
