// packages/ona-kernel/src/ona/engine.ts
//
// ONA (Optimized Noise-reduction Averaging).
//
// State machine:
//   empty --first reading--> accumulating
//   accumulating --reading, below threshold--> accumulating
//   accumulating --reading, reachesThreshold--> closed             (emits a record)
//   closed --next reading seeds a new window--> accumulating
//   accumulating --end of input--> closed                          (emits trailing record)
//
// The closing reading belongs to the window it closes; it never seeds the next one.
// A window keeps running aggregates rather than its readings, so a long stable period
// costs O(1) memory.

import type { ProcessedRecordV1, ReadingV1 } from "@bcona/contracts";

import { ConfigurationError, DataQualityError } from "../errors";
import { ProgressChannel } from "../progress/reporter";

// Rounding allowance on |atn - startAtn|, in units of the largest operand.
// 0.030 - 0.020 evaluates to 0.009999999999999998 in binary64.
export const ATN_REL_TOLERANCE = 4 * Number.EPSILON;

/**
 * |atn - startAtn| >= atnMin, up to the rounding error of the subtraction: the
 * allowance is ATN_REL_TOLERANCE times the largest of the three magnitudes, so it
 * never exceeds a few ulps of the inputs.
 */
export function reachesThreshold(atn: number, startAtn: number, atnMin: number): boolean {
  const slack = ATN_REL_TOLERANCE * Math.max(Math.abs(atn), Math.abs(startAtn), atnMin);
  return Math.abs(atn - startAtn) + slack >= atnMin;
}

type OnaWindow = {
  startAtn: number;
  size: number;
  bcSum: number;
  bcCount: number;
  last: ReadingV1;
};

type OnaState = { kind: "empty" } | { kind: "accumulating"; window: OnaWindow } | { kind: "closed" };

export function assertAtnMin(atnMin: number): number {
  if (!Number.isFinite(atnMin) || atnMin <= 0 || atnMin > 1) {
    throw new ConfigurationError(`atn_min must be in (0, 1], got ${String(atnMin)}`);
  }
  return atnMin;
}

function openWindow(r: ReadingV1): OnaWindow {
  return {
    startAtn: r.atn,
    size: 1,
    bcSum: r.rawBC ?? 0,
    bcCount: r.rawBC === null ? 0 : 1,
    last: r,
  };
}

function toRecord(w: OnaWindow, thresholdReached: boolean): ProcessedRecordV1 {
  return {
    ts: w.last.ts,
    rawBC: w.last.rawBC,
    processedBC: w.bcCount > 0 ? w.bcSum / w.bcCount : null,
    atn: w.last.atn,
    windowSize: w.size,
    thresholdReached,
  };
}

export class OnaEngine {
  private state: OnaState = { kind: "empty" };
  private readonly atnMin: number;
  private seen = 0;
  private emitted = 0;

  constructor(atnMin: number) {
    this.atnMin = assertAtnMin(atnMin);
  }

  get readingsSeen(): number {
    return this.seen;
  }

  get recordsEmitted(): number {
    return this.emitted;
  }

  get stateKind(): OnaState["kind"] {
    return this.state.kind;
  }

  /** Feeds one reading; returns the record of the window it closed, if any. */
  push(r: ReadingV1): ProcessedRecordV1 | null {
    this.seen++;
    if (this.state.kind !== "accumulating") {
      this.state = { kind: "accumulating", window: openWindow(r) };
      return null;
    }

    const w = this.state.window;
    w.size++;
    if (r.rawBC !== null) {
      w.bcSum += r.rawBC;
      w.bcCount++;
    }
    w.last = r;

    if (!reachesThreshold(r.atn, w.startAtn, this.atnMin)) return null;

    this.state = { kind: "closed" };
    this.emitted++;
    return toRecord(w, true);
  }

  /**
   * Ends the input. Flushes an open window as a trailing record.
   * Throws DataQualityError when no reading was ever pushed.
   */
  finish(): ProcessedRecordV1 | null {
    if (this.state.kind === "empty") {
      throw new DataQualityError("No valid readings remain for the selected channel");
    }
    if (this.state.kind === "closed") return null;

    const w = this.state.window;
    this.state = { kind: "closed" };
    this.emitted++;
    return toRecord(w, false);
  }
}

export type ApplyOnaOptions = {
  atnMin: number;
  progressEveryWindows?: number;
  progress?: ProgressChannel;
};

/**
 * Lazily applies ONA to a reading sequence. Pull-based: a reading is requested only when
 * the consumer asks for the next record.
 */
export async function* applyOna(
  readings: AsyncIterable<ReadingV1> | Iterable<ReadingV1>,
  options: ApplyOnaOptions
): AsyncGenerator<ProcessedRecordV1> {
  const engine = new OnaEngine(options.atnMin);
  const every = Math.max(1, options.progressEveryWindows ?? 1000);
  const progress = options.progress ?? ProgressChannel.silent();

  for await (const r of readings) {
    const rec = engine.push(r);
    if (!rec) continue;
    if (engine.recordsEmitted % every === 0) {
      progress.report(progress.percent, `Applying ONA algorithm: ${engine.recordsEmitted} windows closed...`);
    }
    yield rec;
  }

  const trailing = engine.finish();
  if (trailing) yield trailing;
}
