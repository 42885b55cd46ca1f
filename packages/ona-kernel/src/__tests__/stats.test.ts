import assert from "node:assert";
import { test } from "node:test";

import { ComputationError } from "../errors";
import {
  averageRanks,
  correlationPValue,
  logGamma,
  pearson,
  regularizedIncompleteBeta,
  spearman,
} from "../correlation/stats";

function near(actual: number, expected: number, tol = 1e-9): void {
  assert.ok(Math.abs(actual - expected) <= tol, `expected ${expected}, got ${actual}`);
}

test("logGamma matches factorials", () => {
  near(logGamma(5), Math.log(24), 1e-12);
  near(logGamma(0.5), 0.5 * Math.log(Math.PI), 1e-12);
});

test("regularized incomplete beta closed forms", () => {
  near(regularizedIncompleteBeta(0.5, 1, 1), 0.5);
  near(regularizedIncompleteBeta(0.3, 2, 1), 0.09);
  near(regularizedIncompleteBeta(0.36, 1, 0.5), 1 - Math.sqrt(0.64));
  assert.equal(regularizedIncompleteBeta(0, 2, 3), 0);
  assert.equal(regularizedIncompleteBeta(1, 2, 3), 1);
});

test("pearson r and p over four pairs", () => {
  const r = pearson([1, 2, 3, 4], [1, 3, 2, 4]);
  near(r, 0.8, 1e-12);
  // df = 2: p = 1 - |r|
  near(correlationPValue(r, 4), 0.2);
});

test("p-value with one degree of freedom", () => {
  const r = pearson([1, 2, 3], [1, 3, 2]);
  near(r, 0.5, 1e-12);
  // df = 1: p = 1 - 2 asin(|r|) / pi
  near(correlationPValue(r, 3), 2 / 3);
});

test("p-value edge cases", () => {
  assert.equal(correlationPValue(1, 2), 1);
  assert.equal(correlationPValue(-0.3, 2), 1);
  assert.equal(correlationPValue(1, 10), 0);
  assert.equal(correlationPValue(0, 10), 1);
  assert.throws(() => correlationPValue(0.5, 1), ComputationError);
});

test("average ranks share ties", () => {
  assert.deepStrictEqual(averageRanks([10, 20, 20, 30]), [1, 2.5, 2.5, 4]);
  assert.deepStrictEqual(averageRanks([3, 1, 2]), [3, 1, 2]);
  assert.deepStrictEqual(averageRanks([5, 5, 5]), [2, 2, 2]);
});

test("spearman is 1 for any increasing relation", () => {
  near(spearman([1, 2, 3, 4, 5], [1, 4, 9, 16, 25]), 1, 1e-12);
  near(spearman([1, 2, 3, 4, 5], [5, 4, 3, 2, 1]), -1, 1e-12);
});

test("constant or mismatched series cannot be correlated", () => {
  assert.throws(() => pearson([1, 2, 3], [4, 4, 4]), ComputationError);
  assert.throws(() => pearson([1, 2], [1, 2, 3]), ComputationError);
  assert.throws(() => pearson([1], [1]), ComputationError);
});
