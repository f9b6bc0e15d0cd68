import type { Credentials } from "../config/config.js";
import { PublishError, errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createGit } from "./git.js";
import type { WorkingCopy } from "./repo-fetcher.js";
import { withCredentials } from "./remote-url.js";

export const DESTINATION_REMOTE = "destination";

export interface RepoPublisherOptions {
  /** Git base URL of the destination host, e.g. https://github.com */
  gitBaseUrl: string;
  /** Account or organisation owning the destination repositories. */
  owner: string;
  credentials: Pick<Credentials, "destUser" | "destToken">;
  timeoutMs?: number;
  logger: Logger;
}

export interface PublishSummary {
  repoName: string;
  branches: string[];
  tags: string[];
}

export class RepoPublisher {
  private options: RepoPublisherOptions;

  constructor(options: RepoPublisherOptions) {
    this.options = options;
  }

  destinationUrl(repoName: string): URL {
    const base = this.options.gitBaseUrl.replace(/\/+$/, "");
    const url = new URL(`${base}/${this.options.owner}/${repoName}.git`);
    const { destUser, destToken } = this.options.credentials;
    return withCredentials(url, destUser, destToken);
  }

  /**
   * Pushes every remote-tracking branch of the working copy to the branch of
   * the same name on the destination, then all tags when there are any.
   */
  async publish(workingCopy: WorkingCopy, repoName: string): Promise<PublishSummary> {
    const { logger, timeoutMs } = this.options;
    const branches = [...workingCopy.branches].sort();
    const tags = [...workingCopy.tags].sort();

    try {
      const git = createGit({ baseDir: workingCopy.localPath, timeoutMs });
      const remotes = await git.getRemotes();
      if (remotes.some((remote) => remote.name === DESTINATION_REMOTE)) {
        await git.removeRemote(DESTINATION_REMOTE);
      }
      await git.addRemote(DESTINATION_REMOTE, this.destinationUrl(repoName).href);

      if (branches.length === 0) {
        logger.warn({ repoName }, "Source repository has no branches, nothing to push");
      } else {
        logger.info({ repoName, branches }, `Pushing ${branches.length} branches to ${repoName}`);
        await git.push([
          DESTINATION_REMOTE,
          ...branches.map((branch) => `refs/remotes/origin/${branch}:refs/heads/${branch}`),
        ]);
      }

      if (tags.length > 0) {
        logger.info({ repoName, tags: tags.length }, `Pushing ${tags.length} tags to ${repoName}`);
        await git.pushTags(DESTINATION_REMOTE);
      }
    } catch (error) {
      throw new PublishError(`Failed to push to ${repoName}: ${errorMessage(error)}`, error);
    } finally {
      await this.dropRemote(workingCopy.localPath);
    }

    return { repoName, branches, tags };
  }

  /** Removes the credential-bearing remote from the working copy's config. */
  private async dropRemote(localPath: string): Promise<void> {
    try {
      const git = createGit({ baseDir: localPath });
      const remotes = await git.getRemotes();
      if (remotes.some((remote) => remote.name === DESTINATION_REMOTE)) {
        await git.removeRemote(DESTINATION_REMOTE);
      }
    } catch (error) {
      this.options.logger.warn(
        { localPath, error: errorMessage(error) },
        "Failed to remove destination remote"
      );
    }
  }
}
