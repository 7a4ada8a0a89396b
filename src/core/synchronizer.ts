import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ObjectStore } from "../providers/types.js";
import {
  ContentTooLargeError,
  DecodeError,
  LocalWriteError,
  MetadataCodecError,
  MissingRemoteResourceError,
  NetworkError,
  NotCachedError,
  SyncError,
  SyncPassError,
  toError,
  type SyncReport,
} from "./errors.js";
import {
  atomicWrite,
  metadataPath,
  MetadataStore,
  tagOf,
  type MetadataRecord,
} from "./metadata.js";
import {
  buildLookup,
  fileNameOf,
  objectKey,
  type ResourceGroup,
  type ResourceId,
} from "./registry.js";

export type StalenessStrategy = "list" | "head";
export type CorruptMetadataPolicy = "reset" | "fail";
export type SyncLogger = Pick<Console, "info" | "warn">;
export type Decoder<T> = (value: unknown) => T;

export interface SynchronizerOptions {
  cacheDir: string;
  strategy?: StalenessStrategy;
  /** Upper bound on simultaneous content fetches and HEAD requests. */
  concurrency?: number;
  /** Per-object byte cap; larger objects fail with ContentTooLargeError. */
  maxObjectBytes?: number;
  onCorruptMetadata?: CorruptMetadataPolicy;
  /** Fail the pass when a declared resource has no remote tag. */
  strict?: boolean;
  logger?: SyncLogger;
}

export interface CacheEntry {
  fileName: string;
  folder: string;
  path: string;
  tag: string;
}

export const DEFAULT_MAX_OBJECT_BYTES = 1024 * 1024;
export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 16;

interface PendingFetch {
  id: ResourceId;
  tag: string;
}

/**
 * Keeps the resources of one or more groups mirrored in a local directory,
 * downloading only what changed since the last recorded tag.
 *
 * Passes run one at a time. Reads use whichever index was last published and
 * never see a pass half-way through.
 */
export class CacheSynchronizer {
  readonly cacheDir: string;
  private store: ObjectStore;
  private metadata: MetadataStore;
  private strategy: StalenessStrategy;
  private concurrency: number;
  private maxObjectBytes: number;
  private onCorruptMetadata: CorruptMetadataPolicy;
  private strict: boolean;
  private logger: SyncLogger;
  private index: ReadonlyMap<string, CacheEntry> = new Map();
  private passChain: Promise<unknown> = Promise.resolve();

  constructor(store: ObjectStore, options: SynchronizerOptions) {
    this.store = store;
    this.cacheDir = path.resolve(options.cacheDir);
    this.metadata = new MetadataStore(metadataPath(this.cacheDir));
    this.strategy = options.strategy ?? "list";
    this.concurrency = clampConcurrency(options.concurrency ?? DEFAULT_CONCURRENCY);
    this.maxObjectBytes = options.maxObjectBytes ?? DEFAULT_MAX_OBJECT_BYTES;
    this.onCorruptMetadata = options.onCorruptMetadata ?? "reset";
    this.strict = options.strict ?? false;
    this.logger = options.logger ?? console;
  }

  // --- Synchronization ---

  /**
   * Reconcile the group against the remote store. Waits for any pass already
   * in flight on this instance before starting.
   */
  synchronize(group: ResourceGroup): Promise<SyncReport> {
    const run = this.passChain.then(() => this.runPass(group));
    this.passChain = run.catch(() => undefined);
    return run;
  }

  private async runPass(group: ResourceGroup): Promise<SyncReport> {
    const lookup = buildLookup(group);

    try {
      await fs.mkdir(this.cacheDir, { recursive: true });
    } catch (err) {
      const error = toError(err);
      throw new LocalWriteError(
        `Cannot create cache directory ${this.cacheDir}: ${error.message}`,
        this.cacheDir,
        error,
      );
    }

    const record = await this.loadMetadata();
    const remoteTags = await this.resolveRemoteTags(group.folder, lookup);

    const report: SyncReport = {
      group: group.name,
      fetched: [],
      reused: [],
      skipped: [],
      failed: [],
    };
    const next = new Map(this.index);
    const pending: PendingFetch[] = [];

    for (const [fileName, id] of lookup) {
      const tag = remoteTags.get(fileName);
      if (tag === undefined) {
        report.skipped.push(fileName);
        continue;
      }

      const localPath = this.localPath(fileName);
      const known = tagOf(record, fileName);
      if (known !== undefined && known === tag && (await fileExists(localPath))) {
        next.set(fileName, { fileName, folder: id.folder, path: localPath, tag: known });
        report.reused.push(fileName);
      } else {
        pending.push({ id, tag });
      }
    }

    if (report.skipped.length > 0) {
      this.logger.info(
        `${group.name}: no remote object for ${report.skipped.join(", ")}`,
      );
    }

    const errors: Error[] = [];
    const fetched = new Set<string>();
    const outcomes = await mapWithConcurrency(pending, this.concurrency, (item) =>
      this.fetchResource(item),
    );
    outcomes.forEach((outcome, i) => {
      const { id, tag } = pending[i];
      if (outcome.status === "fulfilled") {
        record[id.fileName] = tag;
        next.set(id.fileName, {
          fileName: id.fileName,
          folder: id.folder,
          path: outcome.value,
          tag,
        });
        fetched.add(id.fileName);
      } else {
        errors.push(toError(outcome.reason));
        report.failed.push(id.fileName);
      }
    });
    // keep declaration order regardless of completion order
    report.fetched = [...lookup.keys()].filter((name) => fetched.has(name));

    await this.metadata.save(record);
    this.index = next;

    if (errors.length > 0) {
      throw new SyncPassError(errors, report);
    }
    if (this.strict && report.skipped.length > 0) {
      throw new MissingRemoteResourceError(report.skipped);
    }
    return report;
  }

  /**
   * The record as persisted on disk, read under the same corrupt-metadata
   * policy as a pass. Makes no network calls.
   */
  persistedTags(): Promise<MetadataRecord> {
    return this.loadMetadata();
  }

  private async loadMetadata(): Promise<MetadataRecord> {
    try {
      return await this.metadata.load();
    } catch (err) {
      if (err instanceof MetadataCodecError && this.onCorruptMetadata === "reset") {
        this.logger.warn(`${err.message}; starting from an empty record`);
        return {};
      }
      throw err;
    }
  }

  private async resolveRemoteTags(
    folder: string,
    lookup: Map<string, ResourceId>,
  ): Promise<Map<string, string>> {
    const tags = new Map<string, string>();

    if (this.strategy === "list") {
      const objects = await wrapNetwork(`list ${folder || "/"}`, () =>
        this.store.listObjects(folder),
      );
      for (const object of objects) {
        const fileName = fileNameOf(object.key);
        if (lookup.has(fileName) && object.tag) {
          tags.set(fileName, object.tag);
        }
      }
      return tags;
    }

    const ids = [...lookup.values()];
    const outcomes = await mapWithConcurrency(ids, this.concurrency, (id) => {
      const key = objectKey(id.folder, id.fileName);
      return wrapNetwork(`head ${key}`, () => this.store.headObject(key));
    });
    for (let i = 0; i < ids.length; i++) {
      const outcome = outcomes[i];
      if (outcome.status === "rejected") throw outcome.reason;
      if (outcome.value) tags.set(ids[i].fileName, outcome.value);
    }
    return tags;
  }

  private async fetchResource({ id }: PendingFetch): Promise<string> {
    const key = objectKey(id.folder, id.fileName);
    const data = await this.download(key);
    const localPath = this.localPath(id.fileName);
    await atomicWrite(localPath, data);
    return localPath;
  }

  private async download(key: string): Promise<Buffer> {
    const chunks: Uint8Array[] = [];
    let total = 0;
    await wrapNetwork(`get ${key}`, async () => {
      const body = await this.store.getObject(key, { maxBytes: this.maxObjectBytes });
      for await (const chunk of body) {
        total += chunk.byteLength;
        if (total > this.maxObjectBytes) {
          throw new ContentTooLargeError(key, this.maxObjectBytes);
        }
        chunks.push(chunk);
      }
    });
    return Buffer.concat(chunks, total);
  }

  private localPath(fileName: string): string {
    return path.join(this.cacheDir, fileName);
  }

  // --- Reads ---

  has(id: ResourceId): boolean {
    return this.lookupEntry(id) !== null;
  }

  entries(): CacheEntry[] {
    return [...this.index.values()]
      .map((entry) => ({ ...entry }))
      .sort((a, b) => a.fileName.localeCompare(b.fileName));
  }

  async getRaw(id: ResourceId): Promise<Buffer> {
    const entry = this.lookupEntry(id);
    if (!entry) throw new NotCachedError(id.fileName);
    try {
      return await fs.readFile(entry.path);
    } catch (err) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === "ENOENT") throw new NotCachedError(id.fileName);
      throw err;
    }
  }

  /**
   * Read a cached resource as JSON and hand it to `decode` for shaping.
   * A failure here leaves the cached file untouched.
   */
  async getDecoded<T>(id: ResourceId, decode: Decoder<T>): Promise<T> {
    const data = await this.getRaw(id);
    let value: unknown;
    try {
      value = JSON.parse(data.toString("utf-8"));
    } catch (err) {
      throw new DecodeError(id.fileName, toError(err));
    }
    try {
      return decode(value);
    } catch (err) {
      throw new DecodeError(id.fileName, toError(err));
    }
  }

  private lookupEntry(id: ResourceId): CacheEntry | null {
    const entry = this.index.get(id.fileName);
    if (!entry || entry.folder !== id.folder) return null;
    return entry;
  }
}

function clampConcurrency(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_CONCURRENCY;
  return Math.min(Math.max(Math.floor(value), 1), MAX_CONCURRENCY);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/** Let SyncErrors through, wrap anything else as a retryable NetworkError. */
async function wrapNetwork<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof SyncError) throw err;
    const error = toError(err);
    throw new NetworkError(`Failed to ${what}: ${error.message}`, error);
  }
}

/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 * Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++;
      try {
        results[i] = { status: "fulfilled", value: await fn(items[i]) };
      } catch (reason) {
        results[i] = { status: "rejected", reason };
      }
    }
  };

  const workers = Array.from(
    { length: Math.min(limit, items.length) },
    () => worker(),
  );
  await Promise.all(workers);
  return results;
}
