export type JobStatus = "configured" | "running" | "finished" | "success" | "failed" | "cancelled";

export type JobType = "batch" | "local";

export interface JobRecord {
  readonly name: string;
  readonly type: JobType;
  readonly tags: ReadonlySet<string>;
  readonly status: JobStatus;
}

export interface JobQuery {
  tags?: Iterable<string>;
  states?: Iterable<JobStatus>;
  types?: Iterable<JobType>;
}

/** Read side of a job collection, as consumed by the progress reporter. */
export interface JobCollectionView {
  readonly size: number;
  values(): IterableIterator<JobRecord>;
  byStatus(status: JobStatus): ReadonlySet<JobRecord>;
  byTag(tag: string): ReadonlySet<JobRecord>;
  byType(type: JobType): ReadonlySet<JobRecord>;
  tags(): string[];
  filter(query: JobQuery): JobRecord[];
}
