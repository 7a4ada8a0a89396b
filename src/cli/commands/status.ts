import { CacheManager } from "../../core/manager.js";

export async function showStatus(
  manifestPath: string,
  opts: { home?: string } = {},
): Promise<void> {
  const manager = await CacheManager.load(manifestPath, opts.home);
  const groups = await manager.status();

  console.log(`Manifest: ${manager.name} → ${manager.remote}`);
  console.log(`Cache: ${manager.getSynchronizer().cacheDir}`);
  console.log();

  for (const group of groups) {
    console.log(`${group.group} (${group.folder || "/"})`);
    for (const file of group.files) {
      const state = !file.present
        ? "missing"
        : file.tag
          ? file.tag
          : "untracked";
      console.log(`  ${file.fileName}  ${state}`);
    }
  }
}
