import path from "path";
import { createBackend } from "../src/backends/index.js";
import { ReadlinePrompt } from "../src/backends/commands.js";
import type { BackendKind } from "../src/backends/types.js";
import { defaultBackends, loadProjectConfig } from "../src/config/config.js";
import { createScriptWorkspace } from "../src/execution/workspace.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/prepare_script.ts --name <job> --script <file|text> [--backend slurm|local] [--image <ref>]",
    "                                [--config config/batchwright.yaml] [--test-mode]",
    "",
    "notes:",
    "  - The script is written to <script_dir>/<run_id>/scripts/<job>",
    ""
  ].join("\n");
}

const FLAGS = new Set(["help", "test-mode"]);

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (FLAGS.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

function parseKind(value: string | boolean | undefined): BackendKind {
  if (value === undefined) return "slurm";
  if (value === "slurm" || value === "local") return value;
  throw new Error(`unsupported --backend: ${String(value)}`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const name = args.name;
  const script = args.script;
  if (typeof name !== "string" || typeof script !== "string") {
    throw new Error(`--name and --script are required\n\n${usage()}`);
  }
  const kind = parseKind(args.backend);
  const configPath = typeof args.config === "string" ? args.config : "config/batchwright.yaml";
  const config = await loadProjectConfig(path.resolve(configPath));

  const backend = createBackend(kind, { name, runScript: script }, config.container);
  backend.sync(defaultBackends(config).get(kind));

  const ws = await createScriptWorkspace(config.scriptDir);
  const image = typeof args.image === "string" ? args.image : undefined;
  const scriptPath = await backend.prepareScript(ws.scriptDir, { containerImage: image });

  const mode = await backend.checkRequiredCommands({
    mode: args["test-mode"] ? "test" : "submit",
    prompt: new ReadlinePrompt()
  });

  process.stdout.write(`${scriptPath}\n`);
  process.stdout.write(`mode: ${mode}\n`);
  process.stdout.write(`submit: ${backend.submitCommand().join(" ")}\n`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
