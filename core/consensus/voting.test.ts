import { describe, test, expect } from "vitest";
import {
	agreementPercent,
	computeConsensus,
	computeNumericConsensus,
	computeSingleVerdictConsensus,
	crossModelDecision,
	majorityDecision,
} from "./voting.ts";

describe("majorityDecision", () => {
	test("passes on a strict majority", () => {
		expect(majorityDecision([true, true, false])).toBe(true);
		expect(majorityDecision([true])).toBe(true);
	});

	test("one pass out of two fails", () => {
		expect(majorityDecision([true, false])).toBe(false);
	});

	test("ignores failed iterations", () => {
		expect(majorityDecision([true, null, null])).toBe(true);
		expect(majorityDecision([true, false, null])).toBe(false);
	});

	test("returns null when no iteration succeeded", () => {
		expect(majorityDecision([null, null])).toBeNull();
		expect(majorityDecision([])).toBeNull();
	});
});

describe("crossModelDecision", () => {
	test("tie resolves to false", () => {
		expect(crossModelDecision([true, false])).toBe(false);
		expect(crossModelDecision([])).toBe(false);
	});

	test("majority wins", () => {
		expect(crossModelDecision([true, true, false])).toBe(true);
		expect(crossModelDecision([false, false, true])).toBe(false);
	});
});

describe("agreementPercent", () => {
	test("uses the larger side", () => {
		expect(agreementPercent(1, 4)).toBe(75);
		expect(agreementPercent(3, 4)).toBe(75);
	});

	test("is 100 with no voters", () => {
		expect(agreementPercent(0, 0)).toBe(100);
	});
});

describe("computeConsensus", () => {
	test("two-model tie is a disagreement at 50%", () => {
		const result = computeConsensus({ a: [true], b: [false] });
		expect(result.hasDisagreement).toBe(true);
		expect(result.agreementPercent).toBe(50);
		expect(result.decision).toBe(false);
		expect(result.successCount).toBe(1);
		expect(result.totalCount).toBe(2);
	});

	test("majority of majorities with strictness 3", () => {
		const result = computeConsensus({
			m1: [true, true, false],
			m2: [false, false, false],
		});
		expect(result.modelDecisions).toEqual({ m1: true, m2: false });
		expect(result.decision).toBe(false);
		expect(result.hasDisagreement).toBe(true);
	});

	test("a model with no successful iteration is excluded, not counted as no", () => {
		const result = computeConsensus({
			m1: [true, true],
			m2: [true],
			m3: [null, null],
		});
		expect(result.excludedModels).toEqual(["m3"]);
		expect(result.totalCount).toBe(2);
		expect(result.successCount).toBe(2);
		expect(result.hasDisagreement).toBe(false);
		expect(result.agreementPercent).toBe(100);
		expect(result.decision).toBe(true);
	});

	test("unanimous fail has no disagreement", () => {
		const result = computeConsensus({ a: [false], b: [false, false] });
		expect(result.hasDisagreement).toBe(false);
		expect(result.agreementPercent).toBe(100);
		expect(result.decision).toBe(false);
	});

	test("all models failed", () => {
		const result = computeConsensus({ a: [null], b: [] });
		expect(result).toEqual({
			decision: false,
			agreementPercent: 100,
			hasDisagreement: false,
			successCount: 0,
			totalCount: 0,
			modelDecisions: {},
			excludedModels: ["a", "b"],
		});
	});
});

describe("computeNumericConsensus", () => {
	test("thresholds each model's mean", () => {
		const result = computeNumericConsensus({ a: [0.4, 0.8], b: [0.2], c: [null] });
		// a: mean 0.6 passes, b: 0.2 fails, c excluded
		expect(result.modelDecisions).toEqual({ a: true, b: false });
		expect(result.excludedModels).toEqual(["c"]);
		expect(result.agreementPercent).toBe(50);
	});

	test("respects a custom threshold", () => {
		const result = computeNumericConsensus({ a: [0.6] }, 0.7);
		expect(result.decision).toBe(false);
	});
});

describe("computeSingleVerdictConsensus", () => {
	test("wraps single verdicts", () => {
		const result = computeSingleVerdictConsensus({ a: true, b: true, c: false });
		expect(result.decision).toBe(true);
		expect(result.agreementPercent).toBeCloseTo(66.667, 2);
	});
});
