import { Octokit } from "@octokit/rest";
import type { Logger } from "../logging/logger.js";

/** `name` is the repository name as the host stored it, which may be normalised. */
export type CreateRepoOutcome = { status: "created"; name: string } | { status: "name_taken" };

/** The destination host as the name negotiator sees it. */
export interface RepoRegistry {
  createRepo(name: string): Promise<CreateRepoOutcome>;
}

export interface GitHubClientOptions {
  token: string;
  /** Organisation to create repositories in; the authenticated user when unset. */
  org?: string;
  isPrivate?: boolean;
  baseUrl?: string;
  logger?: Logger;
  /** Replaces the global fetch, mainly for tests. */
  fetch?: typeof fetch;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

// GitHub also answers 422 for invalid names or a visibility the account
// cannot use; only a name collision says "already exists".
function isNameTaken(error: unknown): boolean {
  return statusOf(error) === 422 && error instanceof Error && /already exists/i.test(error.message);
}

export class GitHubClient implements RepoRegistry {
  private octokit: Octokit;
  private org: string | undefined;
  private isPrivate: boolean;

  constructor(options: GitHubClientOptions) {
    const logger = options.logger?.child({ component: "github" });
    this.octokit = new Octokit({
      auth: options.token,
      baseUrl: options.baseUrl ?? "https://api.github.com",
      userAgent: "repo-migrate",
      request: options.fetch ? { fetch: options.fetch } : undefined,
      log: logger && {
        debug: (message: string) => logger.debug(message),
        info: (message: string) => logger.debug(message),
        warn: (message: string) => logger.warn(message),
        // the job boundary owns error-level lines
        error: (message: string) => logger.warn(message),
      },
    });
    this.org = options.org;
    this.isPrivate = options.isPrivate ?? false;
  }

  /**
   * Creates an empty repository. A 422 whose detail says the name already
   * exists is reported as `name_taken`; every other failure is thrown as
   * Octokit's RequestError, whose message carries the response detail.
   */
  async createRepo(name: string): Promise<CreateRepoOutcome> {
    try {
      const { data } = this.org
        ? await this.octokit.repos.createInOrg({
            org: this.org,
            name,
            private: this.isPrivate,
          })
        : await this.octokit.repos.createForAuthenticatedUser({
            name,
            private: this.isPrivate,
          });
      return { status: "created", name: data.name };
    } catch (error) {
      if (isNameTaken(error)) {
        return { status: "name_taken" };
      }
      throw error;
    }
  }
}
