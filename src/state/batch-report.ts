import { writeFile, mkdir } from "fs/promises";
import { existsSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import type { MigrationResult } from "../migration/repo-migrator.js";

export const JobStatusSchema = z.enum(["completed", "failed"]);

export const JobReportSchema = z.object({
  sourceUrl: z.string(),
  desiredName: z.string(),
  repoName: z.string().optional(),
  status: JobStatusSchema,
  stage: z.enum(["negotiate", "fetch", "publish"]).optional(),
  errorCode: z.string().optional(),
  error: z.string().optional(),
  branches: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
});

export const BatchReportSchema = z.object({
  version: z.number().default(1),
  startedAt: z.string(),
  finishedAt: z.string(),
  total: z.number(),
  succeeded: z.number(),
  failed: z.number(),
  jobs: z.array(JobReportSchema),
});

export type JobReport = z.infer<typeof JobReportSchema>;
export type BatchReport = z.infer<typeof BatchReportSchema>;

export function toJobReport(result: MigrationResult): JobReport {
  if (result.success) {
    return {
      sourceUrl: result.sourceUrl,
      desiredName: result.desiredName,
      repoName: result.repoName,
      status: "completed",
      branches: result.branches,
      tags: result.tags,
    };
  }
  return {
    sourceUrl: result.sourceUrl,
    desiredName: result.desiredName,
    repoName: result.repoName,
    status: "failed",
    stage: result.stage,
    errorCode: result.error.code,
    error: result.error.message,
    branches: [],
    tags: [],
  };
}

export function buildBatchReport(
  results: MigrationResult[],
  startedAt: Date,
  finishedAt: Date
): BatchReport {
  const succeeded = results.filter((r) => r.success).length;
  return BatchReportSchema.parse({
    version: 1,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    jobs: results.map(toJobReport),
  });
}

export async function saveBatchReport(path: string, report: BatchReport): Promise<void> {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }
  await writeFile(path, JSON.stringify(report, null, 2));
}
