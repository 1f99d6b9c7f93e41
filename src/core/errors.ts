export type BackendErrorCode =
  | "script_already_prepared"
  | "missing_script"
  | "template_unreadable"
  | "invalid_name"
  | "missing_command";

const FATAL_CODES: ReadonlySet<BackendErrorCode> = new Set(["missing_command"]);

export class BackendError extends Error {
  readonly fatal: boolean;

  constructor(
    readonly code: BackendErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "BackendError";
    this.fatal = FATAL_CODES.has(code);
  }
}

export function isBackendError(err: unknown, code?: BackendErrorCode): err is BackendError {
  if (!(err instanceof BackendError)) return false;
  return code === undefined || err.code === code;
}
