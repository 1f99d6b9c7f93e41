import type { JobCollectionView, JobQuery, JobRecord, JobStatus, JobType } from "./types.js";

export interface NewJob {
  name: string;
  type?: JobType;
  tags?: Iterable<string>;
  status?: JobStatus;
}

interface MutableJob {
  name: string;
  type: JobType;
  tags: ReadonlySet<string>;
  status: JobStatus;
}

const EMPTY: ReadonlySet<JobRecord> = new Set();

function addToIndex<K>(index: Map<K, Set<JobRecord>>, key: K, job: JobRecord): void {
  const bucket = index.get(key);
  if (bucket) {
    bucket.add(job);
  } else {
    index.set(key, new Set([job]));
  }
}

function removeFromIndex<K>(index: Map<K, Set<JobRecord>>, key: K, job: JobRecord): void {
  index.get(key)?.delete(job);
}

/**
 * Ordered name -> job mapping with status, tag and type indices kept in step with
 * every mutation.
 */
export class JobCollection implements JobCollectionView {
  private readonly jobs = new Map<string, MutableJob>();
  private readonly states = new Map<JobStatus, Set<JobRecord>>();
  private readonly tagIndex = new Map<string, Set<JobRecord>>();
  private readonly types = new Map<JobType, Set<JobRecord>>();

  get size(): number {
    return this.jobs.size;
  }

  add(input: NewJob): JobRecord {
    if (!input.name) throw new Error("job name must be non-empty");
    if (this.jobs.has(input.name)) throw new Error(`duplicate job name: ${input.name}`);

    const job: MutableJob = {
      name: input.name,
      type: input.type ?? "batch",
      tags: new Set(input.tags ?? []),
      status: input.status ?? "configured"
    };
    this.jobs.set(job.name, job);
    addToIndex(this.states, job.status, job);
    addToIndex(this.types, job.type, job);
    for (const tag of job.tags) addToIndex(this.tagIndex, tag, job);
    return job;
  }

  get(name: string): JobRecord | undefined {
    return this.jobs.get(name);
  }

  setStatus(name: string, status: JobStatus): void {
    const job = this.jobs.get(name);
    if (!job) throw new Error(`unknown job: ${name}`);
    if (job.status === status) return;
    removeFromIndex(this.states, job.status, job);
    job.status = status;
    addToIndex(this.states, status, job);
  }

  values(): IterableIterator<JobRecord> {
    return this.jobs.values();
  }

  byStatus(status: JobStatus): ReadonlySet<JobRecord> {
    return this.states.get(status) ?? EMPTY;
  }

  byTag(tag: string): ReadonlySet<JobRecord> {
    return this.tagIndex.get(tag) ?? EMPTY;
  }

  byType(type: JobType): ReadonlySet<JobRecord> {
    return this.types.get(type) ?? EMPTY;
  }

  tags(): string[] {
    return [...this.tagIndex.keys()];
  }

  // A job matches when it has any of the tags, and its status and type are listed.
  filter(query: JobQuery): JobRecord[] {
    const tags = query.tags ? new Set(query.tags) : null;
    const states = query.states ? new Set(query.states) : null;
    const types = query.types ? new Set(query.types) : null;

    const out: JobRecord[] = [];
    for (const job of this.jobs.values()) {
      if (states && !states.has(job.status)) continue;
      if (types && !types.has(job.type)) continue;
      if (tags && ![...tags].some((t) => job.tags.has(t))) continue;
      out.push(job);
    }
    return out;
  }
}
