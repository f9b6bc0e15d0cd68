import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { simpleGit } from "simple-git";
import { createLogger, type Logger } from "../src/logging/logger.js";

export interface LogEntry {
  level: string;
  msg: string;
  [key: string]: unknown;
}

export function createMemoryLogger(): { logger: Logger; entries: () => LogEntry[] } {
  const lines: string[] = [];
  const logger = createLogger({
    level: "debug",
    destination: { write: (line: string) => void lines.push(line) },
  });
  return {
    logger,
    entries: () => lines.map((line): LogEntry => JSON.parse(line)),
  };
}

export interface SourceRepoOptions {
  branches?: string[];
  tags?: string[];
}

/**
 * Creates a bare repository at `<root>/<name>.git` with a `main` branch,
 * the extra branches and the tags (on main) requested.
 */
export async function createSourceRepo(
  root: string,
  name: string,
  options: SourceRepoOptions = {}
): Promise<string> {
  const seed = join(root, `${name}-seed`);
  await mkdir(seed, { recursive: true });

  const git = simpleGit(seed);
  await git.init();
  await git.addConfig("user.name", "Test User");
  await git.addConfig("user.email", "test@example.com");
  await git.addConfig("commit.gpgsign", "false");

  await writeFile(join(seed, "README.md"), `# ${name}\n`);
  await git.add("README.md");
  await git.commit("initial commit");
  await git.raw(["branch", "-M", "main"]);

  for (const tag of options.tags ?? []) {
    await git.addTag(tag);
  }

  for (const branch of options.branches ?? []) {
    const file = `${branch.replace(/\//g, "-")}.txt`;
    await git.checkoutLocalBranch(branch);
    await writeFile(join(seed, file), `${branch}\n`);
    await git.add(file);
    await git.commit(`work on ${branch}`);
    await git.checkout("main");
  }

  const bare = join(root, `${name}.git`);
  await simpleGit().clone(seed, bare, ["--bare"]);
  return bare;
}

export async function createBareRepo(path: string): Promise<string> {
  await mkdir(path, { recursive: true });
  await simpleGit(path).init(true);
  return path;
}

export async function listAllRefs(repoPath: string): Promise<string[]> {
  const output = await simpleGit(repoPath).raw(["for-each-ref", "--format=%(refname)"]);
  return output.split("\n").filter(Boolean).sort();
}
