import {
  DuplicateResourceNameError,
  InvalidResourceNameError,
} from "./errors.js";

/** Name of the tag record kept beside the cached files. */
export const METADATA_FILE_NAME = ".revcache-metadata.json";

/**
 * A fixed set of resources sharing one remote folder.
 * Every file name must be unique within the group.
 */
export interface ResourceGroup {
  readonly name: string;
  readonly folder: string;
  readonly fileNames: readonly string[];
}

export interface ResourceId {
  readonly folder: string;
  readonly fileName: string;
}

export function normalizeFolder(folder: string): string {
  return folder.replace(/^\/+/, "").replace(/\/+$/, "");
}

export function defineGroup(
  name: string,
  folder: string,
  fileNames: readonly string[],
): ResourceGroup {
  return Object.freeze({
    name,
    folder: normalizeFolder(folder),
    fileNames: Object.freeze([...fileNames]),
  });
}

export function resourceId(group: ResourceGroup, fileName: string): ResourceId {
  return { folder: group.folder, fileName };
}

export function resourcesOf(group: ResourceGroup): ResourceId[] {
  return group.fileNames.map((fileName) => resourceId(group, fileName));
}

export function objectKey(folder: string, fileName: string): string {
  const normalized = normalizeFolder(folder);
  return normalized ? `${normalized}/${fileName}` : fileName;
}

/** Last path segment of an object key. */
export function fileNameOf(key: string): string {
  const idx = key.lastIndexOf("/");
  return idx === -1 ? key : key.slice(idx + 1);
}

export function isValidFileName(fileName: string): boolean {
  if (!fileName || fileName === "." || fileName === "..") return false;
  if (fileName.includes("/") || fileName.includes("\\")) return false;
  // cannot be kept as a key of the JSON metadata record
  if (fileName === "__proto__") return false;
  return fileName !== METADATA_FILE_NAME;
}

/**
 * Map each file name of the group to its identifier.
 * Throws on names that cannot be stored flat in the cache directory
 * and on names declared twice.
 */
export function buildLookup(group: ResourceGroup): Map<string, ResourceId> {
  const lookup = new Map<string, ResourceId>();
  for (const id of resourcesOf(group)) {
    if (!isValidFileName(id.fileName)) {
      throw new InvalidResourceNameError(id.fileName);
    }
    if (lookup.has(id.fileName)) {
      throw new DuplicateResourceNameError(id.fileName);
    }
    lookup.set(id.fileName, id);
  }
  return lookup;
}
