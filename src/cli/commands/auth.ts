import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";
import { setGitHubToken } from "../../core/config.js";

/** Read a line from stdin without echoing it. */
async function readHidden(label: string): Promise<string> {
  process.stdout.write(label);
  const muted = new Writable({ write: (_chunk, _enc, cb) => cb() });
  const rl = createInterface({ input: process.stdin, output: muted, terminal: true });
  try {
    return (await rl.question("")).trim();
  } finally {
    rl.close();
    process.stdout.write("\n");
  }
}

export async function authGitHub(baseDir?: string): Promise<void> {
  const token = await readHidden("GitHub personal access token: ");
  if (!token) {
    console.error("Token cannot be empty");
    process.exit(1);
  }
  await setGitHubToken(token, baseDir);
  console.log("GitHub token saved.");
}
