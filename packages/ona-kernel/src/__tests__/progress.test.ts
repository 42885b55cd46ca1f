import assert from "node:assert";
import { test } from "node:test";
import { setImmediate as tick } from "node:timers/promises";
import type { ProgressEventV1 } from "@bcona/contracts";

import { ProgressChannel, bandPercent, createProgressChannel } from "../progress/reporter";
import { collector } from "./fixtures";

test("percent is clamped and never goes back", () => {
  const c = collector();
  const ch = new ProgressChannel(c.report, () => undefined);
  ch.report(10, "a");
  ch.report(5, "b");
  ch.report(150, "c");
  ch.report(Number.NaN, "d");
  assert.deepStrictEqual(
    c.events.map((e) => e.percent),
    [10, 10, 100, 100]
  );
});

test("exactly one terminal event", () => {
  const c = collector();
  const ch = createProgressChannel(c.report, () => undefined);
  ch.report(40, "working");
  ch.fail("boom");
  ch.succeed("late");
  ch.report(90, "later");
  assert.deepStrictEqual(c.events, [
    { percent: 40, message: "working", terminal: false },
    { percent: 40, message: "boom", terminal: true, outcome: "failed" },
  ]);
  assert.equal(ch.isClosed, true);
});

test("success always lands on 100", () => {
  const c = collector();
  const ch = new ProgressChannel(c.report, () => undefined);
  ch.report(20, "x");
  ch.succeed("done");
  assert.deepStrictEqual(c.events[1], { percent: 100, message: "done", terminal: true, outcome: "succeeded" });
});

test("a throwing reporter is handed to onError and does not stop reporting", () => {
  const failures: Array<[string, ProgressEventV1]> = [];
  let calls = 0;
  const ch = new ProgressChannel(
    () => {
      calls++;
      throw new Error("sink down");
    },
    (err, event) => failures.push([err instanceof Error ? err.message : String(err), event])
  );
  ch.report(1, "one");
  ch.report(2, "two");
  assert.equal(calls, 2);
  assert.deepStrictEqual(
    failures.map(([msg, e]) => `${msg}:${e.message}`),
    ["sink down:one", "sink down:two"]
  );
});

test("a rejecting async reporter is handed to onError", async () => {
  const seen: string[] = [];
  const ch = new ProgressChannel(
    async () => {
      throw new Error("async sink down");
    },
    (err) => seen.push(err instanceof Error ? err.message : String(err))
  );
  ch.report(3, "x");
  await tick();
  assert.deepStrictEqual(seen, ["async sink down"]);
});

test("silent channel tracks percent without a receiver", () => {
  const ch = ProgressChannel.silent();
  ch.report(30, "x");
  assert.equal(ch.percent, 30);
});

test("band mapping", () => {
  assert.equal(bandPercent(0.5, 5, 80), 42.5);
  assert.equal(bandPercent(2, 5, 80), 80);
  assert.equal(bandPercent(-1, 5, 80), 5);
  assert.equal(bandPercent(Number.NaN, 5, 80), 5);
});
