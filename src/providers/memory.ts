import * as crypto from "node:crypto";
import type { ObjectStore, RemoteObject } from "./types.js";
import { NetworkError } from "../core/errors.js";
import { normalizeFolder } from "../core/registry.js";

interface StoredObject {
  data: Uint8Array;
  tag: string | null;
}

/**
 * In-process ObjectStore. Content is served in `chunkSize` slices so that
 * consumers read it the way they would read a network body.
 */
export class MemoryObjectStore implements ObjectStore {
  private objects = new Map<string, StoredObject>();
  private chunkSize: number;

  constructor(chunkSize = 64 * 1024) {
    this.chunkSize = chunkSize;
  }

  /** Store an object. The tag defaults to a quoted sha256 of the content. */
  put(key: string, content: string | Uint8Array, tag?: string | null): void {
    const data =
      typeof content === "string"
        ? new Uint8Array(Buffer.from(content, "utf-8"))
        : content;
    this.objects.set(key, {
      data,
      tag: tag === undefined ? contentTag(data) : tag,
    });
  }

  delete(key: string): void {
    this.objects.delete(key);
  }

  async listObjects(folder: string): Promise<RemoteObject[]> {
    const prefix = normalizeFolder(folder);
    const result: RemoteObject[] = [];
    for (const [key, object] of this.objects) {
      const parent = key.includes("/") ? key.slice(0, key.lastIndexOf("/")) : "";
      if (parent !== prefix || object.tag === null) continue;
      result.push({ key, tag: object.tag });
    }
    return result.sort((a, b) => a.key.localeCompare(b.key));
  }

  async headObject(key: string): Promise<string | null> {
    return this.objects.get(key)?.tag ?? null;
  }

  async getObject(key: string): Promise<AsyncIterable<Uint8Array>> {
    const object = this.objects.get(key);
    if (!object) {
      throw new NetworkError(`Object not found: ${key}`, undefined, false);
    }
    return chunked(object.data, this.chunkSize);
  }

  describe(): string {
    return "memory:";
  }
}

function contentTag(data: Uint8Array): string {
  return `"${crypto.createHash("sha256").update(data).digest("hex")}"`;
}

async function* chunked(
  data: Uint8Array,
  size: number,
): AsyncGenerator<Uint8Array> {
  for (let offset = 0; offset < data.length; offset += size) {
    yield data.subarray(offset, offset + size);
  }
}
