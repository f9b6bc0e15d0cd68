import type { MigrationJob } from "../input/repo-list.js";
import type { Logger } from "../logging/logger.js";
import {
  migrateRepo,
  type MigrationResult,
  type MigrationStages,
} from "../migration/repo-migrator.js";
import { buildBatchReport, type BatchReport } from "../state/batch-report.js";

/** Console progress callbacks; the log file does not depend on them. */
export interface BatchHooks {
  onJobStart?: (job: MigrationJob, index: number, total: number) => void;
  onJobDone?: (result: MigrationResult, index: number, total: number) => void;
}

export interface BatchOutcome {
  results: MigrationResult[];
  report: BatchReport;
}

/**
 * Migrates every job in list order, one at a time. A failed job is
 * recorded and the batch moves on; nothing is retried.
 */
export async function runBatch(
  jobs: MigrationJob[],
  stages: MigrationStages,
  logger: Logger,
  hooks: BatchHooks = {}
): Promise<BatchOutcome> {
  const startedAt = new Date();
  const results: MigrationResult[] = [];

  logger.info({ total: jobs.length }, `Starting migration of ${jobs.length} repositories`);

  for (const [index, job] of jobs.entries()) {
    hooks.onJobStart?.(job, index, jobs.length);
    const result = await migrateRepo(job, stages, logger);
    results.push(result);
    hooks.onJobDone?.(result, index, jobs.length);
  }

  const report = buildBatchReport(results, startedAt, new Date());
  logger.info(
    { total: report.total, succeeded: report.succeeded, failed: report.failed },
    `Batch complete: ${report.succeeded} succeeded, ${report.failed} failed`
  );

  return { results, report };
}
