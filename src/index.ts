#!/usr/bin/env node
// Repository migration tool
// Main entry point

export { GitHubClient } from "./api/github-client.js";
export { NameNegotiator } from "./migration/name-negotiator.js";
export { RepoFetcher } from "./migration/repo-fetcher.js";
export { RepoPublisher } from "./migration/repo-publisher.js";
export { migrateRepo } from "./migration/repo-migrator.js";
export { runBatch } from "./orchestration/run-batch.js";
export { loadConfig } from "./config/config.js";
export * from "./errors.js";

import dotenv from "dotenv";
import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { GitHubClient } from "./api/github-client.js";
import { loadConfig, loadLoggingOptions } from "./config/config.js";
import { errorMessage } from "./errors.js";
import { readRepoList, toMigrationJobs } from "./input/repo-list.js";
import { createLogger } from "./logging/logger.js";
import { NameNegotiator } from "./migration/name-negotiator.js";
import { RepoFetcher } from "./migration/repo-fetcher.js";
import { RepoPublisher } from "./migration/repo-publisher.js";
import { redactCredentials } from "./migration/remote-url.js";
import { runBatch } from "./orchestration/run-batch.js";
import { saveBatchReport } from "./state/batch-report.js";

async function main(): Promise<number> {
  dotenv.config();

  const logger = createLogger(loadLoggingOptions(process.env));

  try {
    const config = loadConfig(process.env);
    const { credentials } = config;
    const owner = config.destOwner ?? credentials.destUser;

    const sourceUrls = await readRepoList(config.repoListPath, logger);
    const jobs = toMigrationJobs(sourceUrls);

    if (jobs.length === 0) {
      console.log("No repositories to migrate!");
    }

    const githubClient = new GitHubClient({
      token: credentials.destToken,
      org: config.destOwner,
      isPrivate: config.destPrivate,
      baseUrl: config.destApiUrl,
      logger,
    });

    const stages = {
      negotiator: new NameNegotiator(githubClient, {
        maxAttempts: config.maxNameAttempts,
        logger,
      }),
      fetcher: new RepoFetcher({
        workDir: config.cloneDir,
        credentials,
        timeoutMs: config.gitTimeoutMs,
        logger,
      }),
      publisher: new RepoPublisher({
        gitBaseUrl: config.destGitUrl,
        owner,
        credentials,
        timeoutMs: config.gitTimeoutMs,
        logger,
      }),
    };

    const { results, report } = await runBatch(jobs, stages, logger, {
      onJobStart: (job, index, total) => {
        console.log(`\n[${index + 1}/${total}] Migrating ${job.desiredName}`);
      },
      onJobDone: (result) => {
        if (result.success) {
          console.log(
            `  ✓ ${result.repoName}: ${result.branches.length} branches, ${result.tags.length} tags`
          );
        } else {
          console.log(`  ✗ failed at ${result.stage}: ${result.error.message}`);
        }
      },
    });

    console.log("\n" + "=".repeat(60));
    console.log("Migration Summary");
    console.log("=".repeat(60));
    console.log(`Total processed: ${report.total}`);
    console.log(`Successful: ${report.succeeded}`);
    console.log(`Failed: ${report.failed}`);

    if (report.failed > 0) {
      console.log("\nFailed repos:");
      for (const result of results) {
        if (!result.success) {
          console.log(`  - ${redactCredentials(result.sourceUrl)} (${result.stage}): ${result.error.message}`);
        }
      }
    }

    if (config.reportPath) {
      await saveBatchReport(config.reportPath, report);
      console.log(`\nReport written to ${config.reportPath}`);
    }

    return report.failed > 0 ? 1 : 0;
  } catch (error) {
    logger.fatal({ error: errorMessage(error) }, "Migration aborted before completion");
    throw error;
  }
}

// Run if called directly (also through the npm bin symlink)
const entryPoint = process.argv[1];
const isMainModule =
  entryPoint !== undefined && import.meta.url === pathToFileURL(realpathSync(entryPoint)).href;
if (isMainModule) {
  main()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error("Fatal error:", errorMessage(error));
      process.exit(1);
    });
}
