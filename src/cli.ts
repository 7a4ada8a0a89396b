#!/usr/bin/env node

import { Command } from "commander";
import { authGitHub } from "./cli/commands/auth.js";
import { syncCommand } from "./cli/commands/sync.js";
import { getCommand } from "./cli/commands/get.js";
import { showStatus } from "./cli/commands/status.js";
import {
  baseDirOption,
  concurrencyOption,
  retryOption,
  strategyOption,
  strictOption,
} from "./cli/options.js";

const program = new Command();

program
  .name("revcache")
  .description(
    "Keep a local, tag-revalidated copy of remote JSON resources",
  )
  .version("0.1.0");

// Auth
const auth = program.command("auth").description("Authentication commands");
auth
  .command("github")
  .description("Set GitHub personal access token")
  .addOption(baseDirOption)
  .action((opts) => authGitHub(opts.home));

program
  .command("sync <manifest> [group]")
  .description("Download changed resources (all groups if none given)")
  .addOption(strategyOption)
  .addOption(concurrencyOption)
  .addOption(strictOption)
  .addOption(retryOption)
  .addOption(baseDirOption)
  .action((manifest, group, opts) => syncCommand(manifest, group, opts));

program
  .command("get <manifest> <group> <file>")
  .description("Sync a group and print one of its files")
  .option("--pretty", "re-indent the JSON")
  .addOption(baseDirOption)
  .action((manifest, group, file, opts) =>
    getCommand(manifest, group, file, opts),
  );

program
  .command("status <manifest>")
  .description("Show cached files and their tags (no network)")
  .addOption(baseDirOption)
  .action((manifest, opts) => showStatus(manifest, opts));

program.parseAsync().catch((err: Error) => {
  console.error(err.message);
  process.exit(1);
});
