import { BASE_SYNC_KEYS, Backend } from "./base.js";
import type { BatchBackend, SlurmConfig } from "./types.js";

export class SlurmBackend extends Backend<SlurmConfig> {
  readonly kind = "slurm" as const;
  readonly optionsIdentifier = "SBATCH";
  readonly requiredCommands = ["sbatch", "scancel", "squeue", "sacct"] as const;
  protected readonly syncKeys = [
    ...BASE_SYNC_KEYS,
    "partition",
    "clusters",
    "qos",
    "exclude",
    "mem",
    "time",
    "exportEnv"
  ] as const;

  protected adopt(other: BatchBackend): SlurmConfig | null {
    return other instanceof SlurmBackend ? other.config : null;
  }

  /** sbatch argv for the prepared script; nothing is executed here. */
  submitCommand(): string[] {
    if (!this.prepared || !this.runScript) {
      throw new Error(`(${this.name}) prepare the script before building the submit command`);
    }
    const c = this.config;
    const argv = ["sbatch", "--parsable", `--job-name=${this.name}`];
    if (c.partition) argv.push(`--partition=${c.partition}`);
    if (c.clusters) argv.push(`--clusters=${c.clusters}`);
    if (c.qos) argv.push(`--qos=${c.qos}`);
    if (c.exclude) argv.push(`--exclude=${c.exclude}`);
    if (c.mem) argv.push(`--mem=${c.mem}`);
    if (c.time) argv.push(`--time=${c.time}`);
    if (c.exportEnv) argv.push(`--export=${c.exportEnv}`);
    argv.push(this.runScript, ...this.runArgs);
    return argv;
  }
}
