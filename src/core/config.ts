import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { StalenessStrategy } from "./synchronizer.js";

export interface S3ProviderConfig {
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
}

export interface SyncDefaults {
  strategy?: StalenessStrategy;
  concurrency?: number;
  maxObjectBytes?: number;
}

export interface GlobalConfig {
  /** Directory holding one cache directory per manifest */
  cacheRoot?: string;
  providers?: {
    github?: { token: string };
    s3?: S3ProviderConfig;
  };
  defaults?: SyncDefaults;
}

export const DEFAULT_BASE_DIR = path.join(
  process.env.HOME ?? "~",
  ".revcache",
);

export function configPath(baseDir: string = DEFAULT_BASE_DIR): string {
  return path.join(baseDir, "config.json");
}

export async function ensureConfig(
  baseDir: string = DEFAULT_BASE_DIR,
): Promise<GlobalConfig> {
  // Create directory with restrictive permissions (owner only)
  await fs.mkdir(baseDir, { recursive: true, mode: 0o700 });

  const cfgPath = configPath(baseDir);
  let raw: string | null = null;
  try {
    raw = await fs.readFile(cfgPath, "utf-8");
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code !== "ENOENT") throw err;
  }

  if (raw === null) {
    const config: GlobalConfig = {};
    await writeConfig(config, baseDir);
    return config;
  }

  return parseConfig(raw, cfgPath);
}

/** Each field falls back to undefined when malformed instead of failing the whole file. */
export const ConfigSchema = z.object({
  cacheRoot: z.string().optional().catch(undefined),
  providers: z
    .object({
      github: z.object({ token: z.string() }).optional().catch(undefined),
      s3: z
        .object({
          region: z.string().optional().catch(undefined),
          endpoint: z.string().optional().catch(undefined),
          forcePathStyle: z.boolean().optional().catch(undefined),
        })
        .optional()
        .catch(undefined),
    })
    .optional()
    .catch(undefined),
  defaults: z
    .object({
      strategy: z.enum(["list", "head"]).optional().catch(undefined),
      concurrency: z.number().optional().catch(undefined),
      maxObjectBytes: z.number().optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
});

export function parseConfig(raw: string, source: string): GlobalConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid config ${source}: ${(err as Error).message}`);
  }
  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid config ${source}: expected an object`);
  }
  return result.data;
}

export async function readConfig(
  baseDir: string = DEFAULT_BASE_DIR,
): Promise<GlobalConfig> {
  return ensureConfig(baseDir);
}

export async function writeConfig(
  config: GlobalConfig,
  baseDir: string = DEFAULT_BASE_DIR,
): Promise<void> {
  const filePath = configPath(baseDir);
  await fs.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
  // Write config with restrictive permissions (contains tokens)
  await fs.writeFile(filePath, JSON.stringify(config, null, 2) + "\n", { mode: 0o600 });
}

export async function getGitHubToken(
  baseDir: string = DEFAULT_BASE_DIR,
): Promise<string | undefined> {
  const config = await readConfig(baseDir);
  return config.providers?.github?.token ?? (process.env.GITHUB_TOKEN || undefined);
}

export async function setGitHubToken(
  token: string,
  baseDir: string = DEFAULT_BASE_DIR,
): Promise<void> {
  const config = await readConfig(baseDir);
  if (!config.providers) config.providers = {};
  config.providers.github = { token };
  await writeConfig(config, baseDir);
}

/**
 * Where a manifest's files are cached: its own `cacheDir` (relative to the
 * manifest file) when set, else `<cacheRoot>/<manifest name>`.
 */
export function resolveCacheDir(
  manifest: { name: string; cacheDir?: string; sourcePath: string },
  config: GlobalConfig,
  baseDir: string = DEFAULT_BASE_DIR,
): string {
  if (manifest.cacheDir) {
    return path.resolve(path.dirname(manifest.sourcePath), manifest.cacheDir);
  }
  const root = config.cacheRoot ?? path.join(baseDir, "cache");
  return path.join(root, manifest.name);
}
