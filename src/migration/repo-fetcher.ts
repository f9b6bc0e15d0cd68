import { mkdir, rm } from "fs/promises";
import { existsSync } from "fs";
import { join, resolve } from "path";
import type { Credentials } from "../config/config.js";
import { FetchError, errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { SimpleGit } from "simple-git";
import { createGit, listRefs } from "./git.js";
import { parseRepoUrl, stripCredentials, withCredentials } from "./remote-url.js";

export interface WorkingCopy {
  localPath: string;
  branches: ReadonlySet<string>;
  tags: ReadonlySet<string>;
}

export interface RepoFetcherOptions {
  /** Root for all working copies; each job owns `<workDir>/<localName>`. */
  workDir: string;
  credentials: Pick<Credentials, "sourceUser" | "sourceSecret">;
  timeoutMs?: number;
  /** Extra `-c key=value` git settings, e.g. `http.sslVerify=false`. */
  gitConfig?: string[];
  logger: Logger;
}

/**
 * Clones a source repository with every branch and tag.
 *
 * Branches are read from the remote-tracking refs; the publisher pushes
 * those directly, so no local branch is checked out per remote branch.
 */
export class RepoFetcher {
  private workDir: string;
  private credentials: RepoFetcherOptions["credentials"];
  private timeoutMs: number | undefined;
  private gitConfig: string[] | undefined;
  private logger: Logger;

  constructor(options: RepoFetcherOptions) {
    this.workDir = resolve(options.workDir);
    this.credentials = options.credentials;
    this.timeoutMs = options.timeoutMs;
    this.gitConfig = options.gitConfig;
    this.logger = options.logger;
  }

  pathFor(localName: string): string {
    return join(this.workDir, localName);
  }

  async fetch(sourceUrl: string, localName: string): Promise<WorkingCopy> {
    let url: URL;
    try {
      url = parseRepoUrl(sourceUrl);
    } catch (error) {
      throw new FetchError(`Malformed repository URL '${sourceUrl}'`, error);
    }

    const localPath = this.pathFor(localName);
    await this.prepareDirectory(localPath);

    const { sourceUser, sourceSecret } = this.credentials;
    const authenticatedUrl = withCredentials(url, sourceUser, sourceSecret);

    try {
      const cleanUrl = stripCredentials(url).href;
      this.logger.info({ sourceUrl: cleanUrl, localPath }, "Cloning source repository");
      await this.git().clone(authenticatedUrl.href, localPath, ["--no-single-branch"]);

      const git = this.git(localPath);
      // the clone recorded the authenticated URL in .git/config
      await git.remote(["set-url", "origin", cleanUrl]);
      await this.fetchTags(git, authenticatedUrl);

      const branches = (await listRefs(git, "refs/remotes/origin")).filter(
        (branch) => branch !== "HEAD"
      );
      const tags = await listRefs(git, "refs/tags");

      this.logger.info(
        { localPath, branches: branches.length, tags: tags.length },
        `Cloned ${localName} with ${branches.length} branches and ${tags.length} tags`
      );

      return {
        localPath,
        branches: new Set(branches),
        tags: new Set(tags),
      };
    } catch (error) {
      throw new FetchError(`Failed to clone ${sourceUrl}: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Fetches every tag from `url`. Some servers leave tags out of a clone;
   * the URL is passed explicitly so origin never needs credentials.
   */
  async fetchTags(git: SimpleGit, url: URL): Promise<void> {
    await git.raw(["fetch", url.href, "+refs/tags/*:refs/tags/*"]);
  }

  private git(baseDir?: string): SimpleGit {
    return createGit({ baseDir, timeoutMs: this.timeoutMs, config: this.gitConfig });
  }

  private async prepareDirectory(localPath: string): Promise<void> {
    try {
      if (existsSync(localPath)) {
        this.logger.info({ localPath }, "Removing previous working copy before cloning");
        await rm(localPath, { recursive: true, force: true });
      }
      await mkdir(this.workDir, { recursive: true });
    } catch (error) {
      throw new FetchError(`Failed to prepare ${localPath}: ${errorMessage(error)}`, error);
    }
  }
}
