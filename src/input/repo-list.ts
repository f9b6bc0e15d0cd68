import { readFile } from "fs/promises";
import { InputReadError } from "../errors.js";
import type { Logger } from "../logging/logger.js";

export interface MigrationJob {
  sourceUrl: string;
  desiredName: string;
}

/**
 * Reads one repository URL per line. Blank lines are skipped; there is no
 * comment syntax.
 */
export async function readRepoList(path: string, logger: Logger): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new InputReadError(path, error);
  }

  const urls = parseRepoList(content);
  logger.info({ path, count: urls.length }, `Read ${urls.length} repositories from ${path}`);
  return urls;
}

export function parseRepoList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Last path segment of a repository URL, without query, fragment, trailing
 * slashes or a trailing `.git`.
 */
export function deriveRepoName(sourceUrl: string): string {
  const withoutQuery = sourceUrl.trim().split(/[?#]/)[0] ?? "";
  const path = withoutQuery.replace(/\/+$/, "");
  const lastSegment = path.split(/[/:]/).at(-1) ?? "";
  return lastSegment.replace(/\.git$/, "");
}

export function toMigrationJobs(sourceUrls: string[]): MigrationJob[] {
  return sourceUrls.map((sourceUrl) => ({
    sourceUrl,
    desiredName: deriveRepoName(sourceUrl),
  }));
}
