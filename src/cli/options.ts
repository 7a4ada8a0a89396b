import { Option } from "commander";

export const strategyOption = new Option(
  "--strategy <strategy>",
  "how remote tags are read: one listing per group, or one HEAD per file",
).choices(["list", "head"]);

export const concurrencyOption = new Option(
  "--concurrency <n>",
  "max simultaneous downloads (1-16)",
).argParser(parsePositiveInt);

export const strictOption = new Option(
  "--strict",
  "fail when a declared file is missing remotely",
);

export const retryOption = new Option(
  "--retry",
  "retry the sync on transient network errors",
);

export const baseDirOption = new Option(
  "--home <dir>",
  "config directory (default: ~/.revcache)",
);

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Expected a positive integer, got ${value}`);
  }
  return n;
}
