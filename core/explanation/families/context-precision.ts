import { formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import { firstModelValue } from "../metadata.ts";
import type { ContextEvaluation, ContextPrecisionExplanation, ModelStepResult } from "../model.ts";
import { BinaryVerdictSchema, fieldReader, firstRequestText, firstValue, readReasoning } from "../payload.ts";
import { extractContext, extractContextChunk, extractUserInput } from "../prompt-sections.ts";
import {
	buildSteps,
	computeScoreStep,
	modelResultsOf,
	truncate,
	type ExtractionInput,
	type FamilyExtractor,
} from "./shared.ts";

interface PrecisionEvidence {
	userInput: string;
	contexts: ContextEvaluation[];
	models: ModelStepResult[];
}

const readRelevant = fieldReader("relevant", BinaryVerdictSchema);

/**
 * precision@k = relevant contexts among the first k / k
 */
export function precisionAtK(relevance: readonly boolean[]): number[] {
	let relevantSoFar = 0;
	return relevance.map((relevant, k) => {
		if (relevant) relevantSoFar++;
		return relevantSoFar / (k + 1);
	});
}

function contextLabel(position: number): string {
	return message("context-precision.contextLabel", position);
}

function build(evidence: PrecisionEvidence, input: ExtractionInput): ContextPrecisionExplanation {
	const { score, display } = input;
	const { contexts } = evidence;
	const precisions = precisionAtK(contexts.map((c) => c.relevant));
	const relevantTerms = precisions.filter((_, i) => contexts[i]?.relevant);
	const relevantCount = relevantTerms.length;
	const average = relevantTerms.reduce((sum, p) => sum + p, 0) / (relevantCount || 1);

	const calculation =
		relevantCount > 0
			? `(${relevantTerms.map((p) => p.toFixed(2)).join(" + ")}) / ${relevantCount} = ${average.toFixed(2)}`
			: formatPercent(score);

	return {
		metricType: "context-precision",
		score,
		description: message("context-precision.description"),
		userInput: evidence.userInput,
		contexts,
		precisionAtK: precisions,
		steps: buildSteps("context-precision", [
			{
				name: "EvaluateContexts",
				inputData: evidence.userInput ? truncate(evidence.userInput, display.truncateLength) : undefined,
				outputSummary: message("context-precision.relevantCount", relevantCount, contexts.length),
				items: contexts.map((c) => ({
					content: truncate(c.text, display.truncateLength),
					passed: c.relevant,
					verdict: message(c.relevant ? "verdict.relevant" : "verdict.notRelevant"),
					reason: c.reason ? truncate(c.reason, display.reasoningLength) : undefined,
					index: c.position,
				})),
				modelResults: evidence.models,
			},
			{
				name: "CalculatePrecision",
				items: precisions.map((p, i) => ({
					content: `P@${i + 1} = ${p.toFixed(3)}`,
					numericValue: p,
					passed: contexts[i]?.relevant,
					index: i + 1,
				})),
			},
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation(
			"context-precision",
			score,
			{
				formula: message("context-precision.formula"),
				calculation,
				numerator: relevantCount,
				denominator: contexts.length,
			},
			[relevantCount, contexts.length],
		),
	};
}

export const contextPrecision: FamilyExtractor<"context-precision"> = {
	fromMetadata(metadata, input) {
		const relevance = firstModelValue(metadata.modelRelevanceResults) ?? [];
		return build(
			{
				userInput: input.sample?.userInput ?? "",
				contexts: relevance.map((relevant, i) => ({
					position: i + 1,
					text: input.sample?.retrievedContexts?.[i] ?? contextLabel(i + 1),
					relevant,
					reason: "",
				})),
				models: Object.keys(metadata.modelRelevanceResults).map((modelId) => ({ modelId, success: true })),
			},
			input,
		);
	},

	reconstruct(input) {
		const contexts: ContextEvaluation[] = [];
		const models: ModelStepResult[] = [];

		// One judged context per step; the first model that answered decides it
		for (const step of input.steps) {
			const relevant = firstValue(step, readRelevant);
			if (relevant === undefined) continue;

			const position = contexts.length + 1;
			const text =
				extractContextChunk(step.requestText) ||
				extractContext(step.requestText) ||
				input.sample?.retrievedContexts?.[position - 1] ||
				contextLabel(position);
			contexts.push({ position, text, relevant, reason: firstValue(step, readReasoning) ?? "" });
			models.push(...modelResultsOf(step));
		}

		return build(
			{
				userInput: input.sample?.userInput ?? extractUserInput(firstRequestText(input.steps)),
				contexts,
				models,
			},
			input,
		);
	},
};
