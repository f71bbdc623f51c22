/**
 * Pieces shared by the family extractors.
 */

import { mean } from "../../analysis/statistics.ts";
import { crossModelDecision } from "../../consensus/voting.ts";
import type { DisplayConfig } from "../../config.ts";
import type { SampleContext, StepResult } from "../../run/types.ts";
import type { ExplainableFamily } from "../families.ts";
import { formatPercent } from "../interpretation.ts";
import { firstMessage, message, type MessageArg } from "../messages.ts";
import type { MetadataOf } from "../metadata.ts";
import {
	modelStatus,
	type DisplayedModelResult,
	type ExplanationItem,
	type ExplanationOf,
	type ModelStepResult,
	type StepExplanation,
} from "../model.ts";
import { collectValues, isSucceeded, type PayloadReader } from "../payload.ts";

export interface ExtractionInput {
	metricName: string;
	steps: readonly StepResult[];
	score: number | null;
	config: unknown;
	sample?: SampleContext;
	display: DisplayConfig;
}

/**
 * Both paths of a family end in the same builder, so the score breakdown
 * does not depend on where the evidence came from.
 */
export interface FamilyExtractor<F extends ExplainableFamily> {
	fromMetadata(metadata: MetadataOf<F>, input: ExtractionInput): ExplanationOf<F>;
	reconstruct(input: ExtractionInput): ExplanationOf<F> | null;
}

export interface StepDraft {
	name: string;
	titleArgs?: MessageArg[];
	inputData?: string;
	outputSummary?: string;
	items?: ExplanationItem[];
	modelResults?: ModelStepResult[];
	hasModelDisagreement?: boolean;
	agreementPercent?: number;
}

/**
 * Number the steps in order and look up their titles. `false` entries are
 * skipped, so optional steps can be written inline.
 */
export function buildSteps(family: ExplainableFamily, drafts: ReadonlyArray<StepDraft | false>): StepExplanation[] {
	const steps: StepExplanation[] = [];
	for (const draft of drafts) {
		if (draft === false) continue;
		steps.push({
			stepName: draft.name,
			stepNumber: steps.length + 1,
			title: firstMessage([`${family}.step.${draft.name}`, `step.${draft.name}`], ...(draft.titleArgs ?? [])),
			description: firstMessage([`${family}.step.${draft.name}.description`, `step.${draft.name}.description`]),
			inputData: draft.inputData,
			outputSummary: draft.outputSummary,
			items: draft.items ?? [],
			modelResults: withStatus(draft.modelResults ?? []),
			hasModelDisagreement: draft.hasModelDisagreement ?? false,
			agreementPercent: draft.agreementPercent ?? 100,
		});
	}
	return steps;
}

/**
 * Attach display statuses. Verdicts are compared against the majority of
 * the step's successful verdicts.
 */
function withStatus(results: readonly ModelStepResult[]): DisplayedModelResult[] {
	const verdicts: boolean[] = [];
	for (const result of results) {
		if (result.success && result.verdict !== undefined) verdicts.push(result.verdict);
	}
	const majority = verdicts.length > 0 ? crossModelDecision(verdicts) : undefined;
	return results.map((result) => ({ ...result, status: modelStatus(result, majority) }));
}

export function computeScoreStep(score: number | null, outputSummary = formatPercent(score)): StepDraft {
	return { name: "ComputeScore", outputSummary };
}

export function truncate(text: string, length: number): string {
	return text.length > length ? `${text.slice(0, length)}...` : text;
}

export interface ModelDetail {
	verdict?: boolean;
	numericResult?: number;
	reasoning?: string;
}

/**
 * Per-model outcome of a raw step, with optional detail read from each
 * successful payload.
 */
export function modelResultsOf(step: StepResult, detail?: PayloadReader<ModelDetail>): ModelStepResult[] {
	return step.modelResults.map((result) => {
		if (!isSucceeded(result)) {
			return { modelId: result.modelId, success: false, errorMessage: result.errorMessage };
		}
		const read = detail?.(result.resultPayload);
		return read?.ok ? { modelId: result.modelId, success: true, ...read.value } : { modelId: result.modelId, success: true };
	});
}

/** Detail reader that reports a scalar as the model's numeric result */
export function numericDetail(read: PayloadReader<number>): PayloadReader<ModelDetail> {
	return (payload) => {
		const value = read(payload);
		return value.ok ? { ok: true, value: { numericResult: value.value } } : value;
	};
}

export function modelResultsAcross(
	steps: readonly StepResult[],
	detail?: PayloadReader<ModelDetail>,
): ModelStepResult[] {
	return steps.flatMap((step) => modelResultsOf(step, detail));
}

/**
 * Values of every successful model across the steps, grouped by model.
 */
export function collectPerModel<T>(steps: readonly StepResult[], read: PayloadReader<T>): Record<string, T[]> {
	const perModel: Record<string, T[]> = {};
	for (const step of steps) {
		for (const { modelId, value } of collectValues(step, read)) {
			const values = perModel[modelId] ?? [];
			values.push(value);
			perModel[modelId] = values;
		}
	}
	return perModel;
}

export function meanPerModel(perModel: Readonly<Record<string, readonly number[]>>): Record<string, number> {
	const result: Record<string, number> = {};
	for (const [modelId, values] of Object.entries(perModel)) {
		const m = mean(values);
		if (m !== null) result[modelId] = m;
	}
	return result;
}

/**
 * Share of `part` in `whole`, or null when `whole` is empty.
 */
export function ratio(part: number, whole: number): number | null {
	return whole > 0 ? part / whole : null;
}

/** "k/n = 0.xx", or the score percentage when there is nothing to count */
export function countCalculation(part: number, whole: number, score: number | null): string {
	return whole > 0 ? `${part}/${whole} = ${(part / whole).toFixed(2)}` : formatPercent(score);
}

export function passFail(passed: boolean): string {
	return message(passed ? "verdict.pass" : "verdict.fail");
}

/** Harmonic mean of precision and recall; 0 when both are 0 */
export function f1Score(precision: number, recall: number): number {
	return precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
}

export function f1Calculation(precision: number, recall: number): string {
	const p = precision.toFixed(2);
	const r = recall.toFixed(2);
	return `2 × (${p} × ${r}) / (${p} + ${r}) = ${f1Score(precision, recall).toFixed(2)}`;
}
