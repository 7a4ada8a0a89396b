import { CacheManager } from "../../core/manager.js";
import { resourceId } from "../../core/registry.js";
import type { ObjectStore } from "../../providers/types.js";

export interface GetOptions {
  pretty?: boolean;
  home?: string;
}

/** Revalidate one group, then print a single resource from the cache. */
export async function getCommand(
  manifestPath: string,
  groupName: string,
  fileName: string,
  opts: GetOptions = {},
  store?: ObjectStore,
): Promise<void> {
  const manager = await CacheManager.load(manifestPath, opts.home, {}, store);
  const group = manager.group(groupName);
  if (!group) {
    console.error(`Group not found: ${groupName}`);
    process.exit(1);
  }
  if (!group.fileNames.includes(fileName)) {
    console.error(`File ${fileName} is not declared in group ${groupName}`);
    process.exit(1);
  }

  const synchronizer = manager.getSynchronizer();
  const id = resourceId(group, fileName);
  try {
    await manager.syncGroup(groupName);
  } catch (err) {
    // Other files of the group may have failed; only this one matters here
    if (!synchronizer.has(id)) {
      console.error(`Failed to sync ${groupName}: ${(err as Error).message}`);
      process.exit(1);
    }
  }

  try {
    if (opts.pretty) {
      const value = await synchronizer.getDecoded(id, (v) => v);
      process.stdout.write(JSON.stringify(value, null, 2) + "\n");
    } else {
      process.stdout.write(await synchronizer.getRaw(id));
    }
  } catch (err) {
    console.error((err as Error).message);
    process.exit(1);
  }
}
