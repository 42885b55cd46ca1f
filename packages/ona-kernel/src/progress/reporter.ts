// packages/ona-kernel/src/progress/reporter.ts
//
// Progress contract toward the job-tracking collaborator.
//
// Contract:
// - The reporter is a single-parameter callback; the pipeline never awaits it.
// - A reporter that throws, or returns a promise that rejects, is handed to `onError`
//   and processing continues.
// - Percent is clamped to [0, 100] and never decreases within one channel.
// - Exactly one terminal event per channel; later reports are dropped.

import type { ProgressEventV1 } from "@bcona/contracts";

export type ProgressReporter = (event: ProgressEventV1) => void;

export type ProgressErrorHandler = (err: unknown, event: ProgressEventV1) => void;

export class ProgressChannel {
  private last = 0;
  private closed = false;

  constructor(
    private readonly reporter: ProgressReporter | null,
    private readonly onError: ProgressErrorHandler
  ) {}

  /** Channel with no receiver; every report is a no-op. */
  static silent(): ProgressChannel {
    return new ProgressChannel(null, () => undefined);
  }

  get percent(): number {
    return this.last;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  report(percent: number, message: string): void {
    this.emit({ percent: this.advance(percent), message, terminal: false });
  }

  succeed(message: string): void {
    this.emit({ percent: this.advance(100), message, terminal: true, outcome: "succeeded" });
    this.closed = true;
  }

  fail(message: string): void {
    this.emit({ percent: this.last, message, terminal: true, outcome: "failed" });
    this.closed = true;
  }

  private advance(percent: number): number {
    if (Number.isFinite(percent)) {
      this.last = Math.max(this.last, Math.min(100, Math.max(0, percent)));
    }
    return this.last;
  }

  private emit(event: ProgressEventV1): void {
    if (this.closed || !this.reporter) return;
    try {
      const ret: unknown = this.reporter(event);
      if (ret instanceof Promise) {
        ret.catch((err: unknown) => this.onError(err, event));
      }
    } catch (err) {
      this.onError(err, event);
    }
  }
}

export function createProgressChannel(
  reporter: ProgressReporter | null | undefined,
  onError: ProgressErrorHandler
): ProgressChannel {
  return new ProgressChannel(reporter ?? null, onError);
}

/** Linear map of a [0, 1] fraction onto the [from, to] percent band of a stage. */
export function bandPercent(fraction: number, from: number, to: number): number {
  const f = Number.isFinite(fraction) ? Math.min(1, Math.max(0, fraction)) : 0;
  return from + (to - from) * f;
}
