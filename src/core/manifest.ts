import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { defineGroup, type ResourceGroup } from "./registry.js";
import type { StalenessStrategy } from "./synchronizer.js";

/**
 * Declares which resources to cache and where they live remotely.
 *
 *   {
 *     "name": "fares",
 *     "remote": "github:acme/data/json",
 *     "groups": { "zones": { "folder": "zones", "files": ["a.json"] } }
 *   }
 */
export interface Manifest {
  name: string;
  remote: string;
  cacheDir?: string;
  strategy?: StalenessStrategy;
  groups: ResourceGroup[];
  /** Absolute path the manifest was read from */
  sourcePath: string;
}

export class ManifestError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = "ManifestError";
  }
}

export async function loadManifest(manifestPath: string): Promise<Manifest> {
  const sourcePath = path.resolve(manifestPath);
  const raw = await fs.readFile(sourcePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ManifestError(
      `Invalid manifest ${sourcePath}: ${(err as Error).message}`,
      "",
    );
  }
  return parseManifest(parsed, sourcePath);
}

const GroupSchema = z.object({
  folder: z.string().optional(),
  files: z.array(z.string()).min(1),
});

export const ManifestSchema = z.object({
  name: z.string().min(1).optional(),
  remote: z.string().min(1),
  cacheDir: z.string().min(1).optional(),
  strategy: z.enum(["list", "head"]).optional(),
  groups: z.record(z.string(), GroupSchema),
});

export function parseManifest(value: unknown, sourcePath: string): Manifest {
  const result = ManifestSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    // array indexes are dropped: "groups.a.files", not "groups.a.files.0"
    const field = issue
      ? issue.path.filter((part) => typeof part === "string").join(".")
      : "";
    const detail = issue?.message ?? "invalid manifest";
    throw new ManifestError(
      field ? `${field}: ${detail}` : `Manifest: ${detail}`,
      field,
    );
  }

  const data = result.data;
  return {
    name: data.name ?? path.basename(sourcePath, path.extname(sourcePath)),
    remote: data.remote,
    cacheDir: data.cacheDir,
    strategy: data.strategy,
    groups: Object.entries(data.groups).map(([groupName, group]) =>
      defineGroup(groupName, group.folder ?? "", group.files),
    ),
    sourcePath,
  };
}
