import type { JobStatus } from "../jobs/types.js";

export type BackendKind = "slurm" | "local";

export type ExecutionMode = "submit" | "test";

export type SyncOutcome = "skipped" | "mismatch" | "merged";

export interface BackendConfigBase {
  name?: string;
  runScript?: string;
  runArgs?: string[];
}

export interface SlurmConfig extends BackendConfigBase {
  partition?: string;
  clusters?: string;
  qos?: string;
  exclude?: string;
  mem?: string;
  time?: string;
  exportEnv?: string;
}

export type LocalConfig = BackendConfigBase;

export interface BackendConfigByKind {
  slurm: SlurmConfig;
  local: LocalConfig;
}

export interface DecisionPrompt {
  confirm(question: string): Promise<boolean>;
}

export type CommandResolver = (command: string) => boolean;

export interface ExecutionContext {
  mode: ExecutionMode;
  prompt: DecisionPrompt;
  resolveCommand?: CommandResolver;
}

export interface PrepareScriptOptions {
  containerImage?: string;
}

export interface BackendCapabilities {
  submit(): Promise<number>;
  cancel(): Promise<number>;
  status(): Promise<JobStatus | null>;
  exitcode(): Promise<number>;
}

export interface BatchBackend extends BackendCapabilities {
  readonly kind: BackendKind;
  readonly name: string;
  readonly optionsIdentifier: string;
  readonly requiredCommands: readonly string[];
  readonly prepared: boolean;
  readonly runScript: string | undefined;
}
