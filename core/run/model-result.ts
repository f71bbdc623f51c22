/**
 * Constructors and queries for model and step results.
 */

import type {
	FailedModelResult,
	ModelResult,
	StepResult,
	StepType,
	SucceededModelResult,
} from "./types.ts";

export function succeeded(
	modelId: string,
	resultPayload?: string,
	durationMs?: number,
): SucceededModelResult {
	return { modelId, success: true, resultPayload, durationMs };
}

export function failed(modelId: string, errorMessage: string, durationMs?: number): FailedModelResult {
	return { modelId, success: false, errorMessage, durationMs };
}

/**
 * Build a frozen step record. The model results are copied so later
 * mutation of the caller's array cannot reach the run.
 */
export function createStep(
	stepName: string,
	stepType: StepType,
	modelResults: readonly ModelResult[],
	requestText?: string,
): StepResult {
	const results = Object.freeze(modelResults.map((r) => Object.freeze({ ...r })));
	return Object.freeze({ stepName, stepType, modelResults: results, requestText });
}

/**
 * Deeply frozen copy of a plain-data value. The caller's original stays
 * mutable and no longer reaches the copy.
 */
export function frozenCopy<T>(value: T): T {
	return deepFreeze(structuredClone(value));
}

function deepFreeze<T>(value: T): T {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
	}
	return value;
}

export function successfulResults(step: StepResult): SucceededModelResult[] {
	const out: SucceededModelResult[] = [];
	for (const result of step.modelResults) {
		if (result.success) out.push(result);
	}
	return out;
}

export function failedResults(step: StepResult): FailedModelResult[] {
	const out: FailedModelResult[] = [];
	for (const result of step.modelResults) {
		if (!result.success) out.push(result);
	}
	return out;
}

/**
 * Wall-clock duration of a step: models run in parallel, so the slowest
 * model bounds it.
 */
export function stepDurationMs(step: StepResult): number {
	let longest = 0;
	for (const result of step.modelResults) {
		if (result.durationMs !== undefined && result.durationMs > longest) {
			longest = result.durationMs;
		}
	}
	return longest;
}

/**
 * True when the steps carry at least one model result and none succeeded.
 */
export function allModelsFailed(steps: readonly StepResult[]): boolean {
	let seen = 0;
	for (const step of steps) {
		for (const result of step.modelResults) {
			if (result.success) return false;
			seen++;
		}
	}
	return seen > 0;
}
