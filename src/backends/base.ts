import { promises as fs } from "fs";
import path from "path";
import { BackendError } from "../core/errors.js";
import { safeJoin } from "../execution/workspace.js";
import type { JobStatus } from "../jobs/types.js";
import { isCommandAvailable } from "./commands.js";
import { ensureInterpreter, injectContainerGuard, type ContainerGuardOptions } from "./scriptGuard.js";
import type {
  BackendConfigBase,
  BackendKind,
  BatchBackend,
  ExecutionContext,
  ExecutionMode,
  PrepareScriptOptions,
  SyncOutcome
} from "./types.js";

export const TEST_MODE_QUESTION = "Switch to test mode (batch submission will not work)";

const LITERAL_SCRIPT_ERRNOS = new Set(["ENOENT", "ENOTDIR", "ENAMETOOLONG", "ERR_INVALID_ARG_VALUE"]);

export const BASE_SYNC_KEYS = ["name", "runScript", "runArgs"] as const;

function hasValue(value: unknown): boolean {
  if (!value) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length > 0;
  }
  return true;
}

export function preferSet<T>(mine: T, theirs: T): T {
  return hasValue(mine) ? mine : theirs;
}

function mergeKey<C, K extends keyof C>(target: C, source: C, key: K): void {
  const merged = preferSet(target[key], source[key]);
  if (merged !== target[key]) target[key] = merged;
}

async function isTemplateFile(candidate: string): Promise<boolean> {
  try {
    const st = await fs.stat(candidate);
    return st.isFile();
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code && LITERAL_SCRIPT_ERRNOS.has(code)) return false;
    throw err;
  }
}

export abstract class Backend<C extends BackendConfigBase> implements BatchBackend {
  abstract readonly kind: BackendKind;
  abstract readonly optionsIdentifier: string;
  abstract readonly requiredCommands: readonly string[];
  protected abstract readonly syncKeys: readonly (keyof C)[];

  protected readonly config: C;
  private isPrepared = false;

  constructor(
    config: C,
    protected readonly guardOptions: ContainerGuardOptions = {}
  ) {
    this.config = { ...config };
  }

  /** Returns the other backend's configuration when it is the same concrete kind. */
  protected abstract adopt(other: BatchBackend): C | null;

  get name(): string {
    return this.config.name ?? "";
  }

  get runScript(): string | undefined {
    return this.config.runScript;
  }

  get runArgs(): readonly string[] {
    return this.config.runArgs ?? [];
  }

  get prepared(): boolean {
    return this.isPrepared;
  }

  snapshot(): C {
    return structuredClone(this.config);
  }

  setRunScript(script: string): void {
    this.config.runScript = script;
    this.isPrepared = false;
  }

  sync(other: BatchBackend | null | undefined): SyncOutcome {
    if (!other) return "skipped";
    const theirs = this.adopt(other);
    if (!theirs) {
      console.error(`(${this.name}) backend kind "${this.kind}" does not match kind "${other.kind}" of sync object`);
      return "mismatch";
    }
    for (const key of this.syncKeys) mergeKey(this.config, theirs, key);
    return "merged";
  }

  async prepareScript(outputDir: string, options: PrepareScriptOptions = {}): Promise<string> {
    if (this.isPrepared) {
      throw new BackendError(
        "script_already_prepared",
        `(${this.name}) script already written to ${this.config.runScript ?? "?"}; supply new script text first`
      );
    }
    let script = this.config.runScript;
    if (!script) throw new BackendError("missing_script", `(${this.name}) no run script configured`);

    let outPath: string;
    try {
      outPath = safeJoin(path.resolve(outputDir), this.name);
    } catch (err) {
      throw new BackendError("invalid_name", `invalid backend name for script output: "${this.name}"`, { cause: err });
    }

    if (await isTemplateFile(script)) {
      try {
        script = await fs.readFile(script, "utf8");
      } catch (err) {
        throw new BackendError("template_unreadable", `(${this.name}) unable to read script template ${script}`, {
          cause: err
        });
      }
    }

    script = ensureInterpreter(script);
    if (options.containerImage !== undefined) {
      script = injectContainerGuard(script, options.containerImage, this.optionsIdentifier, this.guardOptions);
    }

    await fs.mkdir(path.dirname(outPath), { recursive: true });
    await fs.writeFile(outPath, script, { encoding: "utf8", mode: 0o755 });
    await fs.chmod(outPath, 0o755);

    this.config.runScript = outPath;
    this.isPrepared = true;
    return outPath;
  }

  async checkRequiredCommands(ctx: ExecutionContext): Promise<ExecutionMode> {
    if (ctx.mode === "test") return "test";
    const resolve = ctx.resolveCommand ?? isCommandAvailable;

    for (const command of this.requiredCommands) {
      if (resolve(command)) continue;
      console.error(`${this.kind} command not found: "${command}"`);
      if (await ctx.prompt.confirm(TEST_MODE_QUESTION)) return "test";
      throw new BackendError("missing_command", `${this.kind} command not found: "${command}"`);
    }
    return ctx.mode;
  }

  async submit(): Promise<number> {
    return 0;
  }

  async cancel(): Promise<number> {
    return 0;
  }

  async status(): Promise<JobStatus | null> {
    return null;
  }

  async exitcode(): Promise<number> {
    return 0;
  }
}
