import { simpleGit, type SimpleGit, type SimpleGitOptions } from "simple-git";

export interface GitOptions {
  baseDir?: string;
  /** Kills a git process that produces no output for this long. */
  timeoutMs?: number;
  /** Extra `-c key=value` settings for every git command. */
  config?: string[];
}

// simple-git refuses to run with editor, pager, askpass or ssh overrides in
// its environment, so git only sees these.
const PASSED_VARIABLES = [
  "PATH",
  "HOME",
  "USERPROFILE",
  "SYSTEMROOT",
  "TMPDIR",
  "TEMP",
  "TMP",
  "LANG",
  "LC_ALL",
  "XDG_CONFIG_HOME",
  "HTTP_PROXY",
  "HTTPS_PROXY",
  "NO_PROXY",
  "http_proxy",
  "https_proxy",
  "no_proxy",
  "GIT_SSL_NO_VERIFY",
  "GIT_SSL_CAINFO",
  "GIT_SSL_CAPATH",
  "SSL_CERT_FILE",
  "SSL_CERT_DIR",
];

export function gitEnvironment(
  env: Record<string, string | undefined> = process.env
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const name of PASSED_VARIABLES) {
    const value = env[name];
    if (value !== undefined) {
      result[name] = value;
    }
  }
  result.GIT_TERMINAL_PROMPT = "0";
  return result;
}

/** A git client that never prompts for credentials. */
export function createGit(options: GitOptions = {}): SimpleGit {
  const gitOptions: Partial<SimpleGitOptions> = {};
  if (options.baseDir) {
    gitOptions.baseDir = options.baseDir;
  }
  if (options.timeoutMs) {
    gitOptions.timeout = { block: options.timeoutMs };
  }
  if (options.config && options.config.length > 0) {
    gitOptions.config = options.config;
  }
  return simpleGit(gitOptions).env(gitEnvironment());
}

/** Lists ref names under `prefix`, with the prefix removed. */
export async function listRefs(git: SimpleGit, prefix: string): Promise<string[]> {
  const output = await git.raw(["for-each-ref", "--format=%(refname)", prefix]);
  const base = prefix.endsWith("/") ? prefix : `${prefix}/`;
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((ref) => ref.startsWith(base))
    .map((ref) => ref.slice(base.length));
}
