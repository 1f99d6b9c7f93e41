import ora, { type Ora } from "ora";

export interface BarDisplay {
  render(lines: string[]): void;
  close(lines: string[]): void;
}

export type BarDisplayFactory = (stream: NodeJS.WritableStream) => BarDisplay;

function isInteractive(stream: NodeJS.WritableStream): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}

/**
 * On a terminal every bar is redrawn in place as one multi-line ora frame, only when
 * the reporter polls, so no spinner timer is ever started. Redirected output gets one
 * newline-terminated block per changed frame instead.
 */
export class OraBarDisplay implements BarDisplay {
  private readonly spinner: Ora | null;
  private lastFrame: string | null = null;

  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {
    this.spinner = isInteractive(stream)
      ? ora({ stream, spinner: { interval: 100, frames: [""] }, discardStdin: false })
      : null;
  }

  render(lines: string[]): void {
    const frame = lines.join("\n");
    if (this.spinner) {
      this.spinner.text = frame;
      this.spinner.render();
      return;
    }
    if (frame === this.lastFrame) return;
    this.stream.write(`${frame}\n`);
    this.lastFrame = frame;
  }

  close(lines: string[]): void {
    const frame = lines.join("\n");
    if (this.spinner) {
      this.spinner.stopAndPersist({ symbol: "", text: frame });
      return;
    }
    if (frame !== this.lastFrame) this.stream.write(`${frame}\n`);
    this.lastFrame = frame;
  }
}

export const createOraBarDisplay: BarDisplayFactory = (stream) => new OraBarDisplay(stream);
