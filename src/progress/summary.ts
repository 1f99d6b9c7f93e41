import type { JobCollectionView, JobRecord } from "../jobs/types.js";

export interface SummaryBucket {
  batch: number;
  local: number;
  all: number;
}

export interface JobSummary {
  processed: SummaryBucket;
  success: SummaryBucket;
  failed: SummaryBucket;
  failedJobs: string[];
  elapsedSeconds: number | null;
}

export interface StatusCounts {
  success: number;
  failed: number;
}

function emptyBucket(): SummaryBucket {
  return { batch: 0, local: 0, all: 0 };
}

function count(bucket: SummaryBucket, job: JobRecord): void {
  if (job.type === "local") bucket.local += 1;
  else bucket.batch += 1;
  bucket.all += 1;
}

export function isFailedStatus(job: JobRecord): boolean {
  return job.status === "failed" || job.status === "cancelled";
}

export function summarizeJobs(jobs: JobCollectionView, elapsedSeconds: number | null = null): JobSummary {
  const summary: JobSummary = {
    processed: emptyBucket(),
    success: emptyBucket(),
    failed: emptyBucket(),
    failedJobs: [],
    elapsedSeconds
  };

  for (const job of jobs.values()) {
    count(summary.processed, job);
    if (job.status === "success") {
      count(summary.success, job);
    } else if (isFailedStatus(job)) {
      count(summary.failed, job);
      summary.failedJobs.push(job.name);
    }
  }
  return summary;
}

function bucketLine(label: string, b: SummaryBucket): string {
  return `${label}(batch/local/all): (${b.batch}/${b.local}/${b.all})`;
}

export function formatSummary(summary: JobSummary, verbosity: number): string {
  const lines = [bucketLine("Jobs processed ", summary.processed), bucketLine("     successful ", summary.success)];
  if (summary.failedJobs.length > 0) {
    lines.push(bucketLine("     failed ", summary.failed));
    if (verbosity > 1) lines.push(`Failed jobs: ${summary.failedJobs.join(" ")}`);
  }
  if (summary.elapsedSeconds !== null) {
    lines.push(`Time spent: ${summary.elapsedSeconds.toFixed(1)} s`);
  }
  return lines.join("\n");
}

/** Success/failed counts for every job, or for the jobs carrying `tag`. */
export function statusCounts(jobs: JobCollectionView, tag?: string): StatusCounts {
  if (tag === undefined) {
    return { success: jobs.byStatus("success").size, failed: jobs.byStatus("failed").size };
  }
  return {
    success: jobs.filter({ tags: [tag], states: ["success"] }).length,
    failed: jobs.filter({ tags: [tag], states: ["failed"] }).length
  };
}

export function formatStatusLine(jobs: JobCollectionView, verbosity: number): string {
  let line = "Jobs ";
  if (verbosity > 1) {
    const running = jobs.byStatus("running").size;
    const local = jobs.filter({ states: ["running"], types: ["local"] }).length;
    line += `running (batch/local/all): (${running - local}/${local}/${running}); `;
  }
  const { success, failed } = statusCounts(jobs);
  line += `(success/fail/all): (${success}/${failed}/${jobs.size})`;
  return line;
}
