const BAR_WIDTH = 20;

export type Postfix = Record<string, number>;

/** Counter state behind one live indicator; position only moves through `update`. */
export class ProgressBar {
  private position = 0;
  private postfix: Postfix = {};
  private closed = false;

  constructor(
    readonly desc: string,
    readonly total: number
  ) {}

  get n(): number {
    return this.position;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  update(delta: number): void {
    if (this.closed || !Number.isFinite(delta)) return;
    this.position += delta;
  }

  setPostfix(postfix: Postfix): void {
    this.postfix = { ...postfix };
  }

  close(): void {
    this.closed = true;
  }

  render(): string {
    const ratio = this.total > 0 ? Math.min(1, Math.max(0, this.position / this.total)) : 0;
    const percentage = String(Math.round(ratio * 100)).padStart(3, " ");
    const filled = Math.floor(ratio * BAR_WIDTH);
    const bar = "#".repeat(filled) + " ".repeat(BAR_WIDTH - filled);
    const postfix = Object.entries(this.postfix)
      .map(([k, v]) => `${k}=${v}`)
      .join(", ");
    return `${this.desc}: ${percentage}%|${bar}| ${this.position}/${this.total} [${postfix}]`;
  }
}
