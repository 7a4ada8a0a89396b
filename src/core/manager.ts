import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  DEFAULT_BASE_DIR,
  ensureConfig,
  getGitHubToken,
  resolveCacheDir,
  type GlobalConfig,
} from "./config.js";
import { loadManifest, type Manifest } from "./manifest.js";
import { tagOf } from "./metadata.js";
import type { ResourceGroup } from "./registry.js";
import {
  CacheSynchronizer,
  type SynchronizerOptions,
} from "./synchronizer.js";
import { isRetryable, SyncError, toError, type SyncReport } from "./errors.js";
import type { ObjectStore } from "../providers/types.js";
import { GitHubObjectStore, parseGitHubRemote } from "../providers/github.js";
import { S3ObjectStore, parseS3Remote } from "../providers/s3.js";

export interface FileStatus {
  fileName: string;
  tag: string | null;
  present: boolean;
}

export interface GroupStatus {
  group: string;
  folder: string;
  files: FileStatus[];
}

export type ManagerOptions = Partial<
  Pick<
    SynchronizerOptions,
    "strategy" | "concurrency" | "maxObjectBytes" | "onCorruptMetadata" | "strict" | "logger"
  >
>;

/**
 * Ties a manifest to its object store and a single synchronizer.
 */
export class CacheManager {
  private manifest: Manifest;
  private config: GlobalConfig;
  private synchronizer: CacheSynchronizer;

  constructor(
    manifest: Manifest,
    config: GlobalConfig,
    synchronizer: CacheSynchronizer,
  ) {
    this.manifest = manifest;
    this.config = config;
    this.synchronizer = synchronizer;
  }

  static async load(
    manifestPath: string,
    baseDir: string = DEFAULT_BASE_DIR,
    options: ManagerOptions = {},
    store?: ObjectStore,
  ): Promise<CacheManager> {
    const config = await ensureConfig(baseDir);
    const manifest = await loadManifest(manifestPath);
    const objectStore = store ?? (await createObjectStore(manifest.remote, config, baseDir));

    const synchronizer = new CacheSynchronizer(objectStore, {
      cacheDir: resolveCacheDir(manifest, config, baseDir),
      strategy: options.strategy ?? manifest.strategy ?? config.defaults?.strategy,
      concurrency: options.concurrency ?? config.defaults?.concurrency,
      maxObjectBytes: options.maxObjectBytes ?? config.defaults?.maxObjectBytes,
      onCorruptMetadata: options.onCorruptMetadata,
      strict: options.strict,
      logger: options.logger,
    });

    return new CacheManager(manifest, config, synchronizer);
  }

  get name(): string {
    return this.manifest.name;
  }

  get remote(): string {
    return this.manifest.remote;
  }

  groups(): ResourceGroup[] {
    return [...this.manifest.groups];
  }

  group(name: string): ResourceGroup | undefined {
    return this.manifest.groups.find((g) => g.name === name);
  }

  getSynchronizer(): CacheSynchronizer {
    return this.synchronizer;
  }

  getConfig(): GlobalConfig {
    return this.config;
  }

  async syncGroup(name: string): Promise<SyncReport> {
    const group = this.group(name);
    if (!group) throw new Error(`Group not found: ${name}`);
    return this.synchronizer.synchronize(group);
  }

  /** Sync every group, collecting failures instead of stopping at the first. */
  async sync(): Promise<SyncReport[]> {
    const reports: SyncReport[] = [];
    const errors: Error[] = [];
    for (const group of this.manifest.groups) {
      try {
        reports.push(await this.synchronizer.synchronize(group));
      } catch (err) {
        const error = toError(err);
        errors.push(
          new SyncError(
            `Failed to sync ${group.name}: ${error.message}`,
            isRetryable(error),
            error,
          ),
        );
      }
    }
    if (errors.length > 0) {
      throw new AggregateError(errors, "Some groups failed to sync");
    }
    return reports;
  }

  /** What is on disk, from the persisted record only; no network. */
  async status(): Promise<GroupStatus[]> {
    const cacheDir = this.synchronizer.cacheDir;
    const record = await this.synchronizer.persistedTags();

    const result: GroupStatus[] = [];
    for (const group of this.manifest.groups) {
      const files: FileStatus[] = [];
      for (const fileName of group.fileNames) {
        files.push({
          fileName,
          tag: tagOf(record, fileName) ?? null,
          present: await isFile(path.join(cacheDir, fileName)),
        });
      }
      result.push({ group: group.name, folder: group.folder, files });
    }
    return result;
  }
}

export async function createObjectStore(
  remote: string,
  config: GlobalConfig,
  baseDir: string = DEFAULT_BASE_DIR,
): Promise<ObjectStore> {
  const github = parseGitHubRemote(remote);
  if (github) {
    const token = await getGitHubToken(baseDir);
    if (!token) {
      throw new Error("No GitHub token. Run: revcache auth github");
    }
    return new GitHubObjectStore(
      token,
      github.owner,
      github.repo,
      github.pathPrefix,
      github.branch,
    );
  }

  const s3 = parseS3Remote(remote);
  if (s3) {
    return new S3ObjectStore({
      bucket: s3.bucket,
      prefix: s3.prefix,
      ...config.providers?.s3,
    });
  }

  throw new Error(`Unsupported remote: ${remote}`);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
