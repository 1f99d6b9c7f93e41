import { describe, it, expect, beforeEach } from "vitest";
import { JobCollection } from "../src/jobs/jobCollection.js";
import type { JobStatus } from "../src/jobs/types.js";
import { OraBarDisplay, type BarDisplay } from "../src/progress/barDisplay.js";
import { ProgressBar } from "../src/progress/progressBar.js";
import { ProgressReporter } from "../src/progress/reporter.js";
import { formatSummary, summarizeJobs } from "../src/progress/summary.js";
import { MemoryStream } from "./helpers/memoryStream.js";

class RecordingDisplay implements BarDisplay {
  readonly frames: string[][] = [];
  closed: string[] | null = null;

  render(lines: string[]): void {
    this.frames.push(lines);
  }

  close(lines: string[]): void {
    this.closed = lines;
  }
}

function buildJobs(): JobCollection {
  const jobs = new JobCollection();
  jobs.add({ name: "a1", tags: ["align"] });
  jobs.add({ name: "a2", tags: ["align"] });
  jobs.add({ name: "a3", type: "local", tags: ["align"] });
  jobs.add({ name: "q1", tags: ["qc"] });
  jobs.add({ name: "q2", type: "local", tags: ["qc"] });
  return jobs;
}

describe("ProgressBar", () => {
  it("renders percentage, bar, counts and postfix", () => {
    const bar = new ProgressBar("all", 5);
    bar.update(3);
    bar.setPostfix({ success: 1, failed: 1 });
    expect(bar.render()).toBe("all:  60%|############        | 3/5 [success=1, failed=1]");
  });

  it("renders an empty total as zero percent", () => {
    expect(new ProgressBar("all", 0).render()).toBe("all:   0%|                    | 0/0 []");
  });
});

describe("ProgressReporter (line)", () => {
  let jobs: JobCollection;
  let out: MemoryStream;
  let clock: number;

  beforeEach(() => {
    jobs = buildJobs();
    out = new MemoryStream();
    clock = 10_000;
  });

  it("rewrites the status line in place", () => {
    const reporter = new ProgressReporter(jobs, { output: out, now: () => clock });
    reporter.start();
    jobs.setStatus("a1", "success");
    jobs.setStatus("q2", "failed");
    jobs.setStatus("q1", "cancelled");
    reporter.update();

    expect(out.chunks).toEqual(["\rJobs (success/fail/all): (0/0/5)", "\rJobs (success/fail/all): (1/1/5)"]);
  });

  it("adds the running breakdown at higher verbosity", () => {
    jobs.setStatus("a2", "running");
    jobs.setStatus("a3", "running");
    const reporter = new ProgressReporter(jobs, { output: out, verbosity: 2 });
    reporter.start();

    expect(out.text).toBe("\rJobs running (batch/local/all): (1/1/2); (success/fail/all): (0/0/5)");
  });

  it("appends the interactive hint", () => {
    const reporter = new ProgressReporter(jobs, { output: out, strategy: "interactive_line" });
    reporter.start();

    expect(out.text).toBe("\rJobs (success/fail/all): (0/0/5) - press enter to update status");
  });

  it("ignores updates before start", () => {
    new ProgressReporter(jobs, { output: out }).update();
    expect(out.text).toBe("");
  });

  it("prints the final summary on stop", () => {
    const reporter = new ProgressReporter(jobs, { output: out, verbosity: 2, now: () => clock });
    reporter.start();
    jobs.setStatus("a1", "success");
    jobs.setStatus("q1", "cancelled");
    jobs.setStatus("q2", "failed");
    clock += 2_500;

    const summary = reporter.stop();

    expect(summary).toEqual({
      processed: { batch: 3, local: 2, all: 5 },
      success: { batch: 1, local: 0, all: 1 },
      failed: { batch: 1, local: 1, all: 2 },
      failedJobs: ["q1", "q2"],
      elapsedSeconds: 2.5
    });
    expect(out.chunks.slice(1)).toEqual([
      "\rJobs running (batch/local/all): (0/0/0); (success/fail/all): (1/1/5)",
      "\n",
      [
        "\rJobs processed (batch/local/all): (3/2/5)",
        "     successful (batch/local/all): (1/0/1)",
        "     failed (batch/local/all): (1/1/2)",
        "Failed jobs: q1 q2",
        "Time spent: 2.5 s",
        ""
      ].join("\n")
    ]);
  });

  it("handles an empty collection", () => {
    const reporter = new ProgressReporter(new JobCollection(), { output: out, now: () => clock });
    reporter.start();
    reporter.stop();

    expect(out.text).toBe(
      [
        "\rJobs (success/fail/all): (0/0/0)\rJobs (success/fail/all): (0/0/0)",
        "\rJobs processed (batch/local/all): (0/0/0)",
        "     successful (batch/local/all): (0/0/0)",
        "Time spent: 0.0 s",
        ""
      ].join("\n")
    );
  });
});

describe("ProgressReporter (bars)", () => {
  let jobs: JobCollection;
  let out: MemoryStream;
  let display: RecordingDisplay;

  beforeEach(() => {
    jobs = buildJobs();
    out = new MemoryStream();
    display = new RecordingDisplay();
  });

  function reporter(): ProgressReporter {
    return new ProgressReporter(jobs, { strategy: "bars", output: out, display: () => display, now: () => 0 });
  }

  it("creates one bar per tag and fast-forwards finished jobs", () => {
    jobs.setStatus("a1", "success");
    const r = reporter();
    r.start();

    expect([...r.positions()]).toEqual([
      ["all", 1],
      ["align", 1],
      ["qc", 0]
    ]);
    expect(display.frames[0]).toEqual([
      "all:  20%|####                | 1/5 []",
      "align:  33%|######              | 1/3 []",
      "qc:   0%|                    | 0/2 []"
    ]);
  });

  it("never moves a bar backwards", () => {
    const r = reporter();
    r.start();

    jobs.setStatus("a1", "success");
    jobs.setStatus("a2", "success");
    jobs.setStatus("q1", "failed");
    r.update();
    expect([...r.positions()]).toEqual([
      ["all", 3],
      ["align", 2],
      ["qc", 1]
    ]);

    jobs.setStatus("a2", "running");
    r.update();
    expect([...r.positions()]).toEqual([
      ["all", 3],
      ["align", 2],
      ["qc", 1]
    ]);
    expect(display.frames.at(-1)?.[0]).toBe("all:  60%|############        | 3/5 [success=1, failed=1]");
  });

  it("closes the bars and prints the summary on stop", () => {
    const r = reporter();
    r.start();
    jobs.setStatus("a1", "success");
    jobs.setStatus("q1", "failed");

    const summary = r.stop();

    expect(display.closed).toEqual([
      "all:  40%|########            | 2/5 [success=1, failed=1]",
      "align:  33%|######              | 1/3 [success=1, failed=0]",
      "qc:  50%|##########          | 1/2 [success=0, failed=1]"
    ]);
    expect(summary.failedJobs).toEqual(["q1"]);
    expect(out.text).toBe(
      [
        "",
        "\rJobs processed (batch/local/all): (3/2/5)",
        "     successful (batch/local/all): (1/0/1)",
        "     failed (batch/local/all): (1/0/1)",
        "Time spent: 0.0 s",
        ""
      ].join("\n")
    );
  });
});

describe("OraBarDisplay on redirected output", () => {
  it("writes one newline-terminated block per changed frame", () => {
    const jobs = new JobCollection();
    jobs.add({ name: "x1", tags: ["x"] });
    jobs.add({ name: "x2", tags: ["x"] });
    const out = new MemoryStream();
    const reporter = new ProgressReporter(jobs, {
      strategy: "bars",
      output: out,
      display: (stream) => new OraBarDisplay(stream),
      now: () => 0
    });

    reporter.start();
    jobs.setStatus("x1", "success");
    reporter.update();
    reporter.update();
    reporter.stop();

    expect(out.chunks).toEqual([
      "all:   0%|                    | 0/2 []\nx:   0%|                    | 0/2 []\n",
      "all:  50%|##########          | 1/2 [success=1, failed=0]\nx:  50%|##########          | 1/2 [success=1, failed=0]\n",
      "\n",
      "\rJobs processed (batch/local/all): (2/0/2)\n     successful (batch/local/all): (1/0/1)\nTime spent: 0.0 s\n"
    ]);
  });
});

describe("summarizeJobs", () => {
  it("keeps bucket totals consistent for every status mix", () => {
    const statuses: JobStatus[] = ["configured", "running", "finished", "success", "failed", "cancelled"];
    const jobs = new JobCollection();
    statuses.forEach((status, i) => {
      jobs.add({ name: `b${i}`, status });
      jobs.add({ name: `l${i}`, type: "local", status });
    });

    const summary = summarizeJobs(jobs);
    for (const bucket of [summary.processed, summary.success, summary.failed]) {
      expect(bucket.batch + bucket.local).toBe(bucket.all);
    }
    expect(summary.success.all + summary.failed.all).toBeLessThanOrEqual(summary.processed.all);
    expect(summary.failed.all).toBe(4);
    expect(formatSummary(summary, 1).split("\n")).toEqual([
      "Jobs processed (batch/local/all): (6/6/12)",
      "     successful (batch/local/all): (1/1/2)",
      "     failed (batch/local/all): (2/2/4)"
    ]);
  });
});
