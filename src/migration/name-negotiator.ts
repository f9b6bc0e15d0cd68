import pRetry, { AbortError } from "p-retry";
import type { CreateRepoOutcome, RepoRegistry } from "../api/github-client.js";
import { NameConflictExhaustedError, NegotiationError, errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";

export interface NameNegotiatorOptions {
  /** Total attempts, the unsuffixed name included. */
  maxAttempts: number;
  logger: Logger;
}

class NameTakenError extends Error {
  constructor(public readonly candidate: string) {
    super(`Repository name '${candidate}' is already taken`);
    this.name = "NameTakenError";
  }
}

export function candidateName(desiredName: string, suffix: number): string {
  return suffix === 0 ? desiredName : `${desiredName}-${suffix}`;
}

/**
 * Creates the destination repository under the first free name among
 * `name`, `name-1`, `name-2`, ...
 *
 * Not idempotent: on success the repository exists on the destination host.
 */
export class NameNegotiator {
  private registry: RepoRegistry;
  private maxAttempts: number;
  private logger: Logger;

  constructor(registry: RepoRegistry, options: NameNegotiatorOptions) {
    this.registry = registry;
    this.maxAttempts = options.maxAttempts;
    this.logger = options.logger;
  }

  async negotiate(desiredName: string): Promise<string> {
    if (!desiredName) {
      throw new NegotiationError("Cannot create a repository with an empty name");
    }

    try {
      return await pRetry(
        async (attemptNumber) => {
          const candidate = candidateName(desiredName, attemptNumber - 1);
          let outcome: CreateRepoOutcome;
          try {
            outcome = await this.registry.createRepo(candidate);
          } catch (error) {
            throw new AbortError(
              new NegotiationError(
                `Failed to create repository '${candidate}': ${errorMessage(error)}`,
                error
              )
            );
          }

          if (outcome.status === "name_taken") {
            throw new NameTakenError(candidate);
          }
          this.logger.info(
            { requested: candidate, name: outcome.name },
            `Repository '${outcome.name}' created`
          );
          return outcome.name;
        },
        {
          retries: this.maxAttempts - 1,
          minTimeout: 0,
          maxTimeout: 0,
          factor: 1,
          onFailedAttempt: (error) => {
            this.logger.info(
              { attempt: error.attemptNumber, retriesLeft: error.retriesLeft },
              `${error.message}, trying a new name`
            );
          },
        }
      );
    } catch (error) {
      if (error instanceof NameTakenError) {
        throw new NameConflictExhaustedError(desiredName, this.maxAttempts);
      }
      throw error;
    }
  }
}
