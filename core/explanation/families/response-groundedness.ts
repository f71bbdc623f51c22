import { mean } from "../../analysis/statistics.ts";
import { formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import type { ModelStepResult, ResponseGroundednessExplanation } from "../model.ts";
import { collectValues, firstRequestText, firstValueIn, isSucceeded, readReasoning, scalarReader, stepsNamed } from "../payload.ts";
import { extractContext, extractResponse } from "../prompt-sections.ts";
import {
	buildSteps,
	computeScoreStep,
	modelResultsAcross,
	numericDetail,
	truncate,
	type ExtractionInput,
	type FamilyExtractor,
} from "./shared.ts";

const MAX_RATING = 2;

interface GroundednessEvidence {
	response: string;
	context: string;
	rawScore: number | null;
	reasoning: string;
	usedHeuristics: boolean;
	modelResults: ModelStepResult[];
}

const readRating = scalarReader(["rating", "score"]);

function build(evidence: GroundednessEvidence, input: ExtractionInput): ResponseGroundednessExplanation {
	const { score, display } = input;
	const { rawScore, usedHeuristics } = evidence;

	let calculation = formatPercent(score);
	if (usedHeuristics) {
		calculation = message("response-groundedness.heuristic");
	} else if (rawScore !== null) {
		calculation = `${rawScore.toFixed(1)} / ${MAX_RATING} = ${(rawScore / MAX_RATING).toFixed(2)}`;
	}

	return {
		metricType: "response-groundedness",
		score,
		description: message("response-groundedness.description"),
		response: evidence.response,
		context: evidence.context,
		rawScore,
		reasoning: evidence.reasoning,
		usedHeuristics,
		steps: buildSteps("response-groundedness", [
			usedHeuristics
				? {
						name: "ApplyHeuristics",
						inputData: evidence.response ? truncate(evidence.response, display.truncateLength) : undefined,
						outputSummary: message("response-groundedness.heuristic"),
					}
				: {
						name: "EvaluateGroundedness",
						inputData: evidence.context ? truncate(evidence.context, display.truncateLength) : undefined,
						outputSummary: rawScore === null ? undefined : `${rawScore.toFixed(1)}/${MAX_RATING}`,
						items: evidence.reasoning ? [{ content: truncate(evidence.reasoning, display.reasoningLength) }] : [],
						modelResults: evidence.modelResults,
					},
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation("response-groundedness", score, {
			formula: message("response-groundedness.formula"),
			calculation,
		}),
	};
}

export const responseGroundedness: FamilyExtractor<"response-groundedness"> = {
	fromMetadata(metadata, input) {
		const { score } = input;
		return build(
			{
				response: input.sample?.response ?? "",
				context: input.sample?.retrievedContexts?.join("\n") ?? "",
				rawScore: !metadata.usedHeuristics && score !== null ? score * MAX_RATING : null,
				reasoning: metadata.reasoning ?? "",
				usedHeuristics: metadata.usedHeuristics,
				modelResults: [],
			},
			input,
		);
	},

	reconstruct(input) {
		const heuristics = stepsNamed(input.steps, "ApplyHeuristics");
		const usedHeuristics = heuristics.some((step) => step.modelResults.some(isSucceeded));
		const judged = stepsNamed(input.steps, "EvaluateGroundedness");
		const prompt = firstRequestText(judged);

		return build(
			{
				response: input.sample?.response ?? extractResponse(prompt),
				context: input.sample?.retrievedContexts?.join("\n") ?? extractContext(prompt),
				rawScore: usedHeuristics
					? null
					: mean(judged.flatMap((step) => collectValues(step, readRating)).map((v) => v.value)),
				reasoning: firstValueIn(judged, readReasoning) ?? "",
				usedHeuristics,
				modelResults: modelResultsAcross(judged, numericDetail(readRating)),
			},
			input,
		);
	},
};
