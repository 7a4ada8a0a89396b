import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  atomicWrite,
  decodeMetadata,
  encodeMetadata,
  MetadataStore,
} from "../../src/core/metadata.js";
import { LocalWriteError, MetadataCodecError } from "../../src/core/errors.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, rm: vi.fn(actual.rm) };
});

describe("MetadataStore", () => {
  let tmpDir: string;
  let filePath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "revcache-test-"));
    filePath = path.join(tmpDir, "meta.json");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("should load an empty record when the file is missing", async () => {
    const store = new MetadataStore(filePath);
    expect(await store.load()).toEqual({});
  });

  it("should save and load a record", async () => {
    const store = new MetadataStore(filePath);
    await store.save({ "b.json": '"tag-b"', "a.json": '"tag-a"' });
    expect(await store.load()).toEqual({ "a.json": '"tag-a"', "b.json": '"tag-b"' });
  });

  it("should write sorted, indented JSON", async () => {
    const store = new MetadataStore(filePath);
    await store.save({ "b.json": "2", "a.json": "1" });
    expect(await fs.readFile(filePath, "utf-8")).toBe(
      '{\n  "a.json": "1",\n  "b.json": "2"\n}\n',
    );
  });

  it("should leave no temporary files behind", async () => {
    const store = new MetadataStore(filePath);
    await store.save({ "a.json": "1" });
    await store.save({ "a.json": "2" });
    expect(await fs.readdir(tmpDir)).toEqual(["meta.json"]);
  });

  it("should reject unparseable content", async () => {
    await fs.writeFile(filePath, "][");
    await expect(new MetadataStore(filePath).load()).rejects.toBeInstanceOf(
      MetadataCodecError,
    );
  });

  it("should surface read failures other than a missing file", async () => {
    await fs.mkdir(filePath);
    const err = await new MetadataStore(filePath).load().catch((e: unknown) => e);
    expect(err).not.toBeInstanceOf(MetadataCodecError);
    expect(err).toMatchObject({ code: "EISDIR" });
  });

  it("should raise LocalWriteError when the directory is missing", async () => {
    const store = new MetadataStore(path.join(tmpDir, "absent", "meta.json"));
    await expect(store.save({})).rejects.toBeInstanceOf(LocalWriteError);
  });
});

describe("decodeMetadata", () => {
  it("should accept a flat string map", () => {
    expect(decodeMetadata('{"a.json":"x"}', "test")).toEqual({ "a.json": "x" });
  });

  it.each(['["a"]', "null", '"text"', '{"a.json":1}', '{"a.json":{"tag":"x"}}'])(
    "should reject %s",
    (raw) => {
      expect(() => decodeMetadata(raw, "test")).toThrow(MetadataCodecError);
    },
  );

  it("should name the offending file", () => {
    expect(() => decodeMetadata('{"a.json":false}', "meta.json")).toThrow(
      "Corrupt metadata meta.json: tag for a.json is not a string",
    );
  });
});

describe("encodeMetadata", () => {
  it("should encode an empty record", () => {
    expect(encodeMetadata({})).toBe("{}\n");
  });
});

describe("atomicWrite", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "revcache-test-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("should replace existing content", async () => {
    const target = path.join(tmpDir, "a.json");
    await fs.writeFile(target, "old");
    await atomicWrite(target, new Uint8Array([110, 101, 119]));
    expect(await fs.readFile(target, "utf-8")).toBe("new");
  });

  it("should report the write error when cleanup also fails", async () => {
    vi.mocked(fs.rm).mockRejectedValueOnce(new Error("EBUSY"));
    const target = path.join(tmpDir, "missing", "a.json");

    const err = await atomicWrite(target, "x").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(LocalWriteError);
    expect(err).toMatchObject({ cause: { code: "ENOENT" } });
  });

  it("should carry the target path on failure", async () => {
    const target = path.join(tmpDir, "missing", "a.json");
    const err = await atomicWrite(target, "x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LocalWriteError);
    expect((err as LocalWriteError).path).toBe(target);
    expect((err as LocalWriteError).retryable).toBe(false);
  });
});
