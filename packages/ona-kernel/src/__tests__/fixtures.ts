// Shared test fixtures for @bcona/ona-kernel.

import { Readable } from "node:stream";
import type { ProgressEventV1, ReadingV1 } from "@bcona/contracts";

export function csvStream(lines: string[]): Readable {
  return Readable.from([lines.join("\n") + "\n"]);
}

export const MINUTE = 60_000;
export const T0 = Date.UTC(2023, 0, 1);

export function readings(atn: number[], bc: Array<number | null>): ReadingV1[] {
  return atn.map((a, i) => ({ ts: T0 + i * MINUTE, atn: a, rawBC: bc[i] ?? null }));
}

// Attenuation random walk from a fixed-seed LCG; deterministic across runs.
export function randomWalk(n: number, seed: number): ReadingV1[] {
  let state = seed >>> 0;
  const next = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
  const out: ReadingV1[] = [];
  let atn = 0;
  for (let i = 0; i < n; i++) {
    atn += next() * 0.006 - 0.001;
    const bc = next() < 0.05 ? null : 1000 + next() * 500;
    out.push({ ts: T0 + i * MINUTE, atn, rawBC: bc });
  }
  return out;
}

export function collector(): { events: ProgressEventV1[]; report: (e: ProgressEventV1) => void } {
  const events: ProgressEventV1[] = [];
  return { events, report: (e) => events.push(e) };
}

export async function drain<T>(it: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const x of it) out.push(x);
  return out;
}
