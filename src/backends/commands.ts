import { spawnSync } from "child_process";
import { createInterface } from "readline/promises";
import type { DecisionPrompt } from "./types.js";

export function isCommandAvailable(command: string): boolean {
  if (!command.trim()) return false;
  const res = spawnSync("which", [command], { stdio: ["ignore", "ignore", "ignore"] });
  if (res.error) return false;
  return res.status === 0;
}

export function parseDecision(answer: string): boolean | null {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "y" || normalized === "yes") return true;
  if (normalized === "n" || normalized === "no") return false;
  return null;
}

export class ReadlinePrompt implements DecisionPrompt {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async confirm(question: string): Promise<boolean> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      for (;;) {
        const decision = parseDecision(await rl.question(`${question} (y/n)? `));
        if (decision !== null) return decision;
      }
    } finally {
      rl.close();
    }
  }
}
