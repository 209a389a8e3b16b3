/**
 * Reservoir of size one: after N offers, each offered line is the
 * selected one with probability 1/N.
 */
export class LineReservoir {
  private seen = 0;
  private chosen: string | null = null;

  constructor(private readonly random: () => number = Math.random) {}

  offer(line: string): void {
    this.seen += 1;
    if (this.seen === 1 || Math.floor(this.random() * this.seen) === 0) {
      this.chosen = line;
    }
  }

  /** Number of lines offered so far. */
  get count(): number {
    return this.seen;
  }

  /** Selected line, or null when nothing was offered. */
  get selected(): string | null {
    return this.chosen;
  }
}
