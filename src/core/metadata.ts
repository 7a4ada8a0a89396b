import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { LocalWriteError, MetadataCodecError, toError } from "./errors.js";
import { METADATA_FILE_NAME } from "./registry.js";

/** file name → revision tag of the copy last written to disk */
export const MetadataRecordSchema = z.record(z.string(), z.string());

export type MetadataRecord = z.infer<typeof MetadataRecordSchema>;

/** Own tag of `fileName`, ignoring anything inherited from Object.prototype. */
export function tagOf(record: MetadataRecord, fileName: string): string | undefined {
  return Object.hasOwn(record, fileName) ? record[fileName] : undefined;
}

export function metadataPath(cacheDir: string): string {
  return path.join(cacheDir, METADATA_FILE_NAME);
}

export class MetadataStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<MetadataRecord> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      const error = err as NodeJS.ErrnoException;
      if (error.code === "ENOENT") return {};
      throw err;
    }
    return decodeMetadata(raw, this.filePath);
  }

  async save(record: MetadataRecord): Promise<void> {
    await atomicWrite(this.filePath, encodeMetadata(record));
  }
}

export function encodeMetadata(record: MetadataRecord): string {
  const sorted: MetadataRecord = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return JSON.stringify(sorted, null, 2) + "\n";
}

export function decodeMetadata(raw: string, source: string): MetadataRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new MetadataCodecError(
      `Corrupt metadata ${source}: ${toError(err).message}`,
      toError(err),
    );
  }

  const result = MetadataRecordSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail =
      issue && issue.path.length > 0
        ? `tag for ${issue.path.join(".")} is not a string`
        : "expected an object";
    throw new MetadataCodecError(`Corrupt metadata ${source}: ${detail}`, result.error);
  }
  return result.data;
}

/** Write to a temporary sibling, then rename over the target. */
export async function atomicWrite(
  filePath: string,
  data: string | Uint8Array,
): Promise<void> {
  const suffix = Math.random().toString(36).slice(2, 10);
  const tmpPath = `${filePath}.${suffix}.tmp`;
  try {
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    const error = toError(err);
    // the write error is the one to report
    await fs.rm(tmpPath, { force: true }).catch(() => undefined);
    throw new LocalWriteError(
      `Failed to write ${filePath}: ${error.message}`,
      filePath,
      error,
    );
  }
}
