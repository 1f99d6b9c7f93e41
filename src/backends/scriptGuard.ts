import { bashSingleQuote } from "../core/shell.js";

export const DEFAULT_INTERPRETER = "#!/bin/bash";

export type ContainerEngine = "singularity" | "apptainer";

export interface ContainerGuardOptions {
  engine?: ContainerEngine;
  sentinel?: string;
}

type ScanState = { phase: "scanning_directives" } | { phase: "found_insertion_point"; index: number };

export function ensureInterpreter(script: string): string {
  if (script.startsWith("#!")) return script;
  return `${DEFAULT_INTERPRETER}\n${script}`;
}

function assertSentinel(name: string): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
    throw new Error(`invalid sentinel variable name: ${name}`);
  }
}

/**
 * Guard block that re-runs the script inside `image` unless the sentinel variable
 * shows it is already running in the container. Always ends with a newline.
 */
export function renderContainerGuard(image: string, options: ContainerGuardOptions = {}): string {
  if (!image) throw new Error("container image must be non-empty");
  const engine = options.engine ?? "singularity";
  const sentinel = options.sentinel ?? "SINGULARITY_INIT";
  assertSentinel(sentinel);

  const lines = [
    `if [[ -z "$${sentinel}" ]]`,
    "then",
    `  ${engine} exec ${bashSingleQuote(image)} "$0" "$@"`,
    "  exit $?",
    "fi"
  ];
  return lines.join("\n") + "\n";
}

export function isDirectiveLine(line: string, identifier: string): boolean {
  if (!identifier) return false;
  const trimmed = line.trim();
  return trimmed.startsWith("#") && trimmed.includes(`#${identifier}`);
}

function lastDirectiveIndex(lines: readonly string[], identifier: string): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    if (isDirectiveLine(lines[i] ?? "", identifier)) return i;
  }
  return -1;
}

/**
 * Index of the line the guard goes in front of. Blank and comment lines are kept in
 * place while another directive line follows, so the directive block stays contiguous
 * for the scheduler's parser; the first real statement always stays behind the guard.
 * Without a directive marker the scan runs through every leading comment.
 */
export function findGuardInsertionIndex(lines: readonly string[], identifier: string): number {
  const lastDirective = lastDirectiveIndex(lines, identifier);
  let state: ScanState = { phase: "scanning_directives" };

  for (let i = 0; i < lines.length && state.phase === "scanning_directives"; i++) {
    const trimmed = (lines[i] ?? "").trim();
    if (trimmed && !trimmed.startsWith("#")) {
      state = { phase: "found_insertion_point", index: i };
    } else if (identifier && i >= lastDirective) {
      state = { phase: "found_insertion_point", index: i + 1 };
    }
  }

  return state.phase === "found_insertion_point" ? state.index : lines.length;
}

export function injectContainerGuard(
  script: string,
  image: string,
  identifier: string,
  options: ContainerGuardOptions = {}
): string {
  const guardLines = renderContainerGuard(image, options).slice(0, -1).split("\n");
  const lines = script.split("\n");
  const index = findGuardInsertionIndex(lines, identifier);

  if (index >= lines.length) {
    return [...lines, ...guardLines, ""].join("\n");
  }
  return [...lines.slice(0, index), ...guardLines, ...lines.slice(index)].join("\n");
}
