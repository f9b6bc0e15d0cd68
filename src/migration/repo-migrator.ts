import {
  FetchError,
  MigrationError,
  NegotiationError,
  PublishError,
  errorMessage,
} from "../errors.js";
import type { MigrationJob } from "../input/repo-list.js";
import type { Logger } from "../logging/logger.js";
import type { PublishSummary } from "./repo-publisher.js";
import type { WorkingCopy } from "./repo-fetcher.js";
import { redactCredentials } from "./remote-url.js";

export type MigrationStage = "negotiate" | "fetch" | "publish";

/** The three external steps of a migration, in order. */
export interface MigrationStages {
  negotiator: { negotiate(desiredName: string): Promise<string> };
  fetcher: { fetch(sourceUrl: string, localName: string): Promise<WorkingCopy> };
  publisher: { publish(workingCopy: WorkingCopy, repoName: string): Promise<PublishSummary> };
}

export type MigrationResult =
  | {
      success: true;
      sourceUrl: string;
      desiredName: string;
      repoName: string;
      branches: string[];
      tags: string[];
    }
  | {
      success: false;
      sourceUrl: string;
      desiredName: string;
      /** Set once the destination repository has been created. */
      repoName?: string;
      stage: MigrationStage;
      error: MigrationError;
    };

function asStageError(stage: MigrationStage, error: unknown): MigrationError {
  if (error instanceof MigrationError) {
    return error;
  }
  const message = errorMessage(error);
  switch (stage) {
    case "negotiate":
      return new NegotiationError(message, error);
    case "fetch":
      return new FetchError(message, error);
    case "publish":
      return new PublishError(message, error);
  }
}

/**
 * Runs one job through name negotiation, fetch and publish. Never throws:
 * the first failing stage ends the job and is returned in the result.
 */
export async function migrateRepo(
  job: MigrationJob,
  stages: MigrationStages,
  logger: Logger
): Promise<MigrationResult> {
  const { sourceUrl, desiredName } = job;
  const displayUrl = redactCredentials(sourceUrl);
  const log = logger.child({ sourceUrl: displayUrl });
  let stage: MigrationStage = "negotiate";
  let repoName: string | undefined;

  log.info({ desiredName }, `Starting migration for ${desiredName}`);

  try {
    const createdName = await stages.negotiator.negotiate(desiredName);
    repoName = createdName;
    log.info({ stage, repoName: createdName }, `Destination repository ${createdName} ready`);

    stage = "fetch";
    const workingCopy = await stages.fetcher.fetch(sourceUrl, createdName);
    log.info({ stage, localPath: workingCopy.localPath }, `Fetched ${displayUrl}`);

    stage = "publish";
    const summary = await stages.publisher.publish(workingCopy, createdName);
    log.info(
      { stage, repoName: createdName, branches: summary.branches.length, tags: summary.tags.length },
      `Migration completed for ${createdName}`
    );

    return {
      success: true,
      sourceUrl,
      desiredName,
      repoName: createdName,
      branches: summary.branches,
      tags: summary.tags,
    };
  } catch (caught) {
    const error = asStageError(stage, caught);
    log.error(
      { stage, repoName, code: error.code, error: error.message },
      `Migration failed at ${stage} for ${displayUrl}: ${error.message}`
    );
    return { success: false, sourceUrl, desiredName, repoName, stage, error };
  }
}
