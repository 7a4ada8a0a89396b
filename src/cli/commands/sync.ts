import { CacheManager } from "../../core/manager.js";
import { withRetry, type SyncReport } from "../../core/errors.js";
import type { StalenessStrategy } from "../../core/synchronizer.js";
import type { ObjectStore } from "../../providers/types.js";

export interface SyncOptions {
  strategy?: StalenessStrategy;
  concurrency?: number;
  strict?: boolean;
  retry?: boolean;
  home?: string;
}

export function formatReport(report: SyncReport): string {
  const parts = [
    `fetched ${report.fetched.length}`,
    `reused ${report.reused.length}`,
    `skipped ${report.skipped.length}`,
  ];
  if (report.failed.length > 0) parts.push(`failed ${report.failed.length}`);
  return `${report.group}: ${parts.join(", ")}`;
}

export async function syncCommand(
  manifestPath: string,
  groupName: string | undefined,
  opts: SyncOptions = {},
  store?: ObjectStore,
): Promise<void> {
  const manager = await CacheManager.load(
    manifestPath,
    opts.home,
    {
      strategy: opts.strategy,
      concurrency: opts.concurrency,
      strict: opts.strict,
    },
    store,
  );
  const run = <T>(fn: () => Promise<T>): Promise<T> =>
    opts.retry ? withRetry(fn) : fn();

  if (groupName) {
    if (!manager.group(groupName)) {
      console.error(`Group not found: ${groupName}`);
      process.exit(1);
    }
    try {
      const report = await run(() => manager.syncGroup(groupName));
      console.log(formatReport(report));
    } catch (err) {
      console.error(`Failed to sync ${groupName}: ${(err as Error).message}`);
      process.exit(1);
    }
    return;
  }

  try {
    const reports = await run(() => manager.sync());
    for (const report of reports) {
      console.log(formatReport(report));
    }
  } catch (err) {
    if (err instanceof AggregateError) {
      for (const e of err.errors) {
        console.error((e as Error).message);
      }
    } else {
      console.error((err as Error).message);
    }
    process.exit(1);
  }
}
