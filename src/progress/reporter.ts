import type { JobCollectionView } from "../jobs/types.js";
import { createOraBarDisplay, type BarDisplay, type BarDisplayFactory } from "./barDisplay.js";
import { ProgressBar } from "./progressBar.js";
import { formatStatusLine, formatSummary, statusCounts, summarizeJobs, type JobSummary } from "./summary.js";

export type RenderStrategy = "bars" | "line" | "interactive_line";

export const BASE_VERBOSITY = 1;

const ALL_BUCKET = "all";
const INTERACTIVE_HINT = " - press enter to update status";

export interface ProgressReporterOptions {
  strategy?: RenderStrategy;
  verbosity?: number;
  output?: NodeJS.WritableStream;
  display?: BarDisplayFactory;
  now?: () => number;
}

type Phase = "idle" | "running" | "stopped";

export class ProgressReporter {
  readonly strategy: RenderStrategy;
  readonly verbosity: number;
  private readonly output: NodeJS.WritableStream;
  private readonly displayFactory: BarDisplayFactory;
  private readonly now: () => number;

  private phase: Phase = "idle";
  private startedAt = 0;
  private elapsedSeconds: number | null = null;
  // Insertion order is display order: "all" first, then one bar per tag.
  private bars = new Map<string, ProgressBar>();
  private display: BarDisplay | null = null;

  constructor(
    private readonly jobs: JobCollectionView,
    options: ProgressReporterOptions = {}
  ) {
    this.strategy = options.strategy ?? "line";
    this.verbosity = options.verbosity ?? BASE_VERBOSITY;
    this.output = options.output ?? process.stdout;
    this.displayFactory = options.display ?? createOraBarDisplay;
    this.now = options.now ?? Date.now;
  }

  /** Positions currently shown per bucket; empty outside bars mode. */
  positions(): Map<string, number> {
    return new Map([...this.bars].map(([key, bar]): [string, number] => [key, bar.n]));
  }

  start(): void {
    this.startedAt = this.now();
    this.elapsedSeconds = null;
    this.phase = "running";

    if (this.strategy !== "bars") {
      this.writeStatusLine();
      return;
    }

    this.bars = new Map([[ALL_BUCKET, new ProgressBar(ALL_BUCKET, this.jobs.size)]]);
    for (const tag of this.jobs.tags()) {
      if (tag === ALL_BUCKET) continue;
      this.bars.set(tag, new ProgressBar(tag, this.jobs.byTag(tag).size));
    }
    // Jobs that finished before the reporter started.
    for (const [key, bar] of this.bars) {
      bar.update(statusCounts(this.jobs, key === ALL_BUCKET ? undefined : key).success);
    }
    this.display = this.displayFactory(this.output);
    this.display.render(this.renderBars());
  }

  update(): void {
    if (this.phase !== "running") return;
    if (this.strategy === "bars") {
      this.updateBars();
    } else {
      this.writeStatusLine();
    }
  }

  stop(): JobSummary {
    if (this.phase === "running") {
      this.update();
      this.elapsedSeconds = (this.now() - this.startedAt) / 1000;
      if (this.display) {
        for (const bar of this.bars.values()) bar.close();
        this.display.close(this.renderBars());
        this.display = null;
      }
      this.phase = "stopped";
    }
    this.output.write("\n");

    const summary = summarizeJobs(this.jobs, this.elapsedSeconds);
    this.output.write(`\r${formatSummary(summary, this.verbosity)}\n`);
    return summary;
  }

  // Retried jobs can lower the counts; bars only ever move forward.
  private updateBars(): void {
    for (const [key, bar] of this.bars) {
      const counts = statusCounts(this.jobs, key === ALL_BUCKET ? undefined : key);
      const delta = counts.success + counts.failed - bar.n;
      if (delta > 0) bar.update(delta);
      bar.setPostfix({ success: counts.success, failed: counts.failed });
    }
    this.display?.render(this.renderBars());
  }

  private renderBars(): string[] {
    return [...this.bars.values()].map((bar) => bar.render());
  }

  private writeStatusLine(): void {
    let line = formatStatusLine(this.jobs, this.verbosity);
    if (this.strategy === "interactive_line") line += INTERACTIVE_HINT;
    this.output.write(`\r${line}`);
  }
}
