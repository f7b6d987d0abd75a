/**
 * Progress notification for streaming operations
 */

/**
 * Receives progress of a long-running copy, encode or decode
 */
export interface ProgressListener {
  /** Called once before the first byte, with the expected total (or -1) */
  start?(predictedTotal: number): void;
  /** Called after each chunk */
  progress(current: number, currentTotal: number): void;
  /** Called once after the last byte */
  stop?(total: number): void;
}

/**
 * Tracks a byte count and reports it to an optional listener
 */
export class ProgressTracker {
  private current = 0;

  constructor(
    private readonly listener: ProgressListener | undefined,
    private readonly predictedTotal: number = -1
  ) {}

  begin(): void {
    this.listener?.start?.(this.predictedTotal);
  }

  advance(bytes: number): void {
    this.current += bytes;
    this.listener?.progress(this.current, Math.max(this.current, this.predictedTotal));
  }

  end(): number {
    this.listener?.stop?.(this.current);
    return this.current;
  }
}
