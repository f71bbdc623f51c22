import { mean } from "../../analysis/statistics.ts";
import { formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import type { ContextRelevanceEvaluation, ContextRelevanceExplanation } from "../model.ts";
import { collectValues, firstRequestText, firstValue, readReasoning, scalarReader, stepsNamed } from "../payload.ts";
import { extractContext, extractUserInput } from "../prompt-sections.ts";
import { buildSteps, computeScoreStep, truncate, type ExtractionInput, type FamilyExtractor } from "./shared.ts";

/** Judges rate each context 0, 1 or 2 */
const MAX_RATING = 2;

interface RelevanceEvidence {
	userInput: string;
	evaluations: ContextRelevanceEvaluation[];
}

const readRating = scalarReader(["rating", "score"]);

function build(evidence: RelevanceEvidence, input: ExtractionInput): ContextRelevanceExplanation {
	const { score, display } = input;
	const { evaluations } = evidence;
	const normalized = evaluations.map((e) => e.normalizedScore);
	const average = mean(normalized);
	const calculation =
		average === null
			? formatPercent(score)
			: `(${normalized.map((s) => s.toFixed(2)).join(" + ")}) / ${normalized.length} = ${average.toFixed(2)}`;

	return {
		metricType: "context-relevance",
		score,
		description: message("context-relevance.description"),
		userInput: evidence.userInput,
		evaluations,
		steps: buildSteps("context-relevance", [
			{
				name: "EvaluateRelevance",
				inputData: evidence.userInput ? truncate(evidence.userInput, display.truncateLength) : undefined,
				outputSummary: message("context-relevance.evaluated", evaluations.length),
				items: evaluations.map((e, i) => ({
					content: truncate(e.context, display.truncateLength),
					verdict: `${e.rawScore.toFixed(1)}/${MAX_RATING} → ${e.normalizedScore.toFixed(2)}`,
					reason: truncate(e.reasoning, display.reasoningLength),
					numericValue: e.normalizedScore,
					index: i + 1,
				})),
			},
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation("context-relevance", score, {
			formula: message("context-relevance.formula"),
			calculation,
		}),
	};
}

function contextText(input: ExtractionInput, index: number, requestText: string | undefined): string {
	return (
		input.sample?.retrievedContexts?.[index] ||
		extractContext(requestText) ||
		message("context-precision.contextLabel", index + 1)
	);
}

export const contextRelevance: FamilyExtractor<"context-relevance"> = {
	fromMetadata(metadata, input) {
		return build(
			{
				userInput: input.sample?.userInput ?? "",
				evaluations: metadata.contextScores.map((normalizedScore, i) => ({
					context: contextText(input, i, undefined),
					rawScore: normalizedScore * MAX_RATING,
					normalizedScore,
					reasoning: metadata.contextReasonings?.[i] ?? "",
				})),
			},
			input,
		);
	},

	reconstruct(input) {
		const evaluations: ContextRelevanceEvaluation[] = [];
		for (const step of stepsNamed(input.steps, "EvaluateRelevance")) {
			const raw = mean(collectValues(step, readRating).map((v) => v.value));
			if (raw === null) continue;
			evaluations.push({
				context: contextText(input, evaluations.length, step.requestText),
				rawScore: raw,
				normalizedScore: raw / MAX_RATING,
				reasoning: firstValue(step, readReasoning) ?? "",
			});
		}

		return build(
			{
				userInput: input.sample?.userInput ?? extractUserInput(firstRequestText(input.steps)),
				evaluations,
			},
			input,
		);
	},
};
