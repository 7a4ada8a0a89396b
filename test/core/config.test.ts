import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  ensureConfig,
  readConfig,
  writeConfig,
  getGitHubToken,
  setGitHubToken,
  parseConfig,
  resolveCacheDir,
} from "../../src/core/config.js";

describe("Config", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "revcache-test-"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("ensureConfig", () => {
    it("should create config on first run", async () => {
      const config = await ensureConfig(tmpDir);
      expect(config).toEqual({});
      expect(await fs.readFile(path.join(tmpDir, "config.json"), "utf-8")).toBe("{}\n");
    });

    it("should preserve existing config", async () => {
      await writeConfig({ cacheRoot: "/srv/cache" }, tmpDir);
      const config = await ensureConfig(tmpDir);
      expect(config.cacheRoot).toBe("/srv/cache");
    });

    it("should create config directory if needed", async () => {
      const nestedDir = path.join(tmpDir, "nested", "dir");
      await ensureConfig(nestedDir);
      const stat = await fs.stat(path.join(nestedDir, "config.json"));
      expect(stat.isFile()).toBe(true);
    });

    it("should reject a config that is not JSON", async () => {
      await fs.writeFile(path.join(tmpDir, "config.json"), "{oops");
      await expect(ensureConfig(tmpDir)).rejects.toThrow("Invalid config");
    });
  });

  describe("parseConfig", () => {
    it("should keep known fields and drop malformed ones", () => {
      const config = parseConfig(
        JSON.stringify({
          cacheRoot: 42,
          providers: {
            github: { token: "test-token" },
            s3: { region: "eu-west-1", forcePathStyle: "yes" },
          },
          defaults: { strategy: "head", concurrency: 8, maxObjectBytes: "big" },
        }),
        "config.json",
      );
      expect(config).toEqual({
        providers: {
          github: { token: "test-token" },
          s3: { region: "eu-west-1", endpoint: undefined, forcePathStyle: undefined },
        },
        defaults: { strategy: "head", concurrency: 8, maxObjectBytes: undefined },
      });
    });

    it("should reject non-object configs", () => {
      expect(() => parseConfig("[]", "config.json")).toThrow(
        "Invalid config config.json: expected an object",
      );
    });
  });

  describe("GitHub token", () => {
    it("should get GitHub token", async () => {
      await writeConfig({ providers: { github: { token: "test-token" } } }, tmpDir);
      const token = await getGitHubToken(tmpDir);
      expect(token).toBe("test-token");
    });

    it("should fall back to GITHUB_TOKEN", async () => {
      vi.stubEnv("GITHUB_TOKEN", "env-token");
      await ensureConfig(tmpDir);
      expect(await getGitHubToken(tmpDir)).toBe("env-token");
    });

    it("should return undefined when no GitHub token", async () => {
      vi.stubEnv("GITHUB_TOKEN", "");
      await ensureConfig(tmpDir);
      const token = await getGitHubToken(tmpDir);
      expect(token).toBeUndefined();
    });

    it("should overwrite GitHub token", async () => {
      await setGitHubToken("old-token", tmpDir);
      await setGitHubToken("new-token", tmpDir);
      const config = await readConfig(tmpDir);
      expect(config.providers?.github?.token).toBe("new-token");
    });
  });

  describe("resolveCacheDir", () => {
    it("should resolve a manifest cacheDir against the manifest location", () => {
      const dir = resolveCacheDir(
        { name: "fares", cacheDir: "./cache", sourcePath: "/work/fares.json" },
        {},
        tmpDir,
      );
      expect(dir).toBe(path.resolve("/work/cache"));
    });

    it("should default to a per-manifest directory under the base dir", () => {
      const dir = resolveCacheDir({ name: "fares", sourcePath: "/work/fares.json" }, {}, tmpDir);
      expect(dir).toBe(path.join(tmpDir, "cache", "fares"));
    });

    it("should honour cacheRoot from the config", () => {
      const dir = resolveCacheDir(
        { name: "fares", sourcePath: "/work/fares.json" },
        { cacheRoot: "/srv/revcache" },
        tmpDir,
      );
      expect(dir).toBe(path.join("/srv/revcache", "fares"));
    });
  });
});
