import { BASE_SYNC_KEYS, Backend } from "./base.js";
import type { BatchBackend, LocalConfig } from "./types.js";

export class LocalBackend extends Backend<LocalConfig> {
  readonly kind = "local" as const;
  readonly optionsIdentifier = "";
  readonly requiredCommands = [] as const;
  protected readonly syncKeys = BASE_SYNC_KEYS;

  protected adopt(other: BatchBackend): LocalConfig | null {
    return other instanceof LocalBackend ? other.config : null;
  }

  submitCommand(): string[] {
    if (!this.prepared || !this.runScript) {
      throw new Error(`(${this.name}) prepare the script before building the submit command`);
    }
    return ["/bin/bash", this.runScript, ...this.runArgs];
  }
}
