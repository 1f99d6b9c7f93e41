import type { ContainerGuardOptions } from "./scriptGuard.js";
import { LocalBackend } from "./local.js";
import { SlurmBackend } from "./slurm.js";
import type { BackendConfigByKind, BackendKind } from "./types.js";

export type AnyBackend = SlurmBackend | LocalBackend;

export function createBackend<K extends BackendKind>(
  kind: K,
  config: BackendConfigByKind[K],
  guardOptions?: ContainerGuardOptions
): AnyBackend {
  switch (kind) {
    case "slurm":
      return new SlurmBackend({ ...config }, guardOptions);
    case "local":
      return new LocalBackend({ ...config }, guardOptions);
    default:
      throw new Error(`unsupported backend kind: ${String(kind)}`);
  }
}
