import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { createBackend, type AnyBackend } from "../backends/index.js";
import type { ContainerGuardOptions } from "../backends/scriptGuard.js";
import type { BackendKind } from "../backends/types.js";

export const DEFAULT_SCRIPT_DIR = "var/scripts";

const zBaseBackend = z.object({
  name: z.string().optional(),
  run_script: z.string().optional(),
  run_args: z.array(z.string()).optional()
});

const zSlurmBackend = zBaseBackend.extend({
  partition: z.string().optional(),
  clusters: z.string().optional(),
  qos: z.string().optional(),
  exclude: z.string().optional(),
  mem: z.string().optional(),
  time: z.string().optional(),
  export: z.string().optional()
});

export const zProjectConfig = z.object({
  version: z.literal(1),
  script_dir: z.string().optional(),
  container: z
    .object({
      engine: z.enum(["singularity", "apptainer"]).optional(),
      sentinel: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/).optional()
    })
    .optional(),
  backends: z
    .object({
      slurm: zSlurmBackend.optional(),
      local: zBaseBackend.optional()
    })
    .optional()
});

type RawProjectConfig = z.infer<typeof zProjectConfig>;

export interface ProjectConfig {
  scriptDir: string;
  container: ContainerGuardOptions;
  backends: RawProjectConfig["backends"];
}

function expandEnvToken(value: string): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = process.env[varName]?.trim();
  return v ? v : null;
}

export function resolveProjectConfig(raw: RawProjectConfig): ProjectConfig {
  const envDir = process.env.BATCHWRIGHT_SCRIPT_DIR?.trim();
  const fileDir = raw.script_dir ? expandEnvToken(raw.script_dir) : null;
  return {
    scriptDir: envDir || fileDir || DEFAULT_SCRIPT_DIR,
    container: { ...raw.container },
    backends: raw.backends
  };
}

export function parseProjectConfig(text: string, source = "<inline>"): ProjectConfig {
  const parsed = zProjectConfig.safeParse(YAML.parse(text) as unknown);
  if (!parsed.success) {
    throw new Error(`invalid config at ${source}: ${z.prettifyError(parsed.error)}`);
  }
  return resolveProjectConfig(parsed.data);
}

export async function loadProjectConfig(filePath: string): Promise<ProjectConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  return parseProjectConfig(raw, filePath);
}

/** Template backends, one per configured kind, to `sync` user backends against. */
export function defaultBackends(config: ProjectConfig): Map<BackendKind, AnyBackend> {
  const out = new Map<BackendKind, AnyBackend>();
  const slurm = config.backends?.slurm;
  if (slurm) {
    out.set(
      "slurm",
      createBackend(
        "slurm",
        {
          name: slurm.name,
          runScript: slurm.run_script,
          runArgs: slurm.run_args,
          partition: slurm.partition,
          clusters: slurm.clusters,
          qos: slurm.qos,
          exclude: slurm.exclude,
          mem: slurm.mem,
          time: slurm.time,
          exportEnv: slurm.export
        },
        config.container
      )
    );
  }
  const local = config.backends?.local;
  if (local) {
    out.set(
      "local",
      createBackend("local", { name: local.name, runScript: local.run_script, runArgs: local.run_args }, config.container)
    );
  }
  return out;
}
