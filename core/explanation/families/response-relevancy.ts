import { z } from "zod";
import { mean } from "../../analysis/statistics.ts";
import { formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import { firstModelValue } from "../metadata.ts";
import type { GeneratedQuestion, ModelSimilarity, ResponseRelevancyExplanation } from "../model.ts";
import {
	BinaryVerdictSchema,
	collectValues,
	fieldReader,
	firstRequestText,
	firstValueIn,
	scalarReader,
	stepsNamed,
} from "../payload.ts";
import { extractQuestion, extractResponse } from "../prompt-sections.ts";
import { buildSteps, computeScoreStep, truncate, type ExtractionInput, type FamilyExtractor } from "./shared.ts";

interface RelevancyEvidence {
	question: string;
	response: string;
	generatedQuestions: GeneratedQuestion[];
	modelSimilarities: ModelSimilarity[];
}

const readQuestions = fieldReader(
	"questions",
	z.array(
		z.union([
			z.string().transform((question) => ({ question, noncommittal: false })),
			z.object({ question: z.string(), noncommittal: BinaryVerdictSchema.default(false) }),
		]),
	),
);

const readSimilarity = scalarReader(["similarity", "score"]);

function build(evidence: RelevancyEvidence, input: ExtractionInput): ResponseRelevancyExplanation {
	const { score, display } = input;
	const similarities = evidence.modelSimilarities.map((m) => m.similarity);
	const average = mean(similarities);
	const noncommittal = evidence.generatedQuestions.some((q) => q.noncommittal);

	let calculation = formatPercent(score);
	if (average !== null) {
		calculation = `mean(${similarities.map((s) => s.toFixed(4)).join(", ")}) = ${average.toFixed(4)}`;
		if (noncommittal) calculation += ` × 0 (${message("response-relevancy.noncommittal")})`;
	}

	return {
		metricType: "response-relevancy",
		score,
		description: message("response-relevancy.description"),
		question: evidence.question,
		response: evidence.response,
		generatedQuestions: evidence.generatedQuestions,
		modelSimilarities: evidence.modelSimilarities,
		steps: buildSteps("response-relevancy", [
			{
				name: "OriginalQuestion",
				inputData: evidence.question ? truncate(evidence.question, display.truncateLength) : undefined,
				outputSummary: evidence.response ? truncate(evidence.response, display.truncateLength) : undefined,
			},
			{
				name: "GenerateQuestions",
				outputSummary: message("response-relevancy.generated", evidence.generatedQuestions.length),
				items: evidence.generatedQuestions.map((q, i) => ({
					content: q.question,
					verdict: q.noncommittal ? message("response-relevancy.noncommittal") : undefined,
					passed: !q.noncommittal,
					index: i + 1,
				})),
			},
			{
				name: "ComputeSimilarity",
				outputSummary: average === null ? undefined : average.toFixed(4),
				items: evidence.modelSimilarities.map((m) => ({
					content: m.similarity.toFixed(4),
					numericValue: m.similarity,
					source: m.modelId,
				})),
				modelResults: evidence.modelSimilarities.map((m) => ({
					modelId: m.modelId,
					success: true,
					numericResult: m.similarity,
				})),
			},
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation("response-relevancy", score, {
			formula: message("response-relevancy.formula"),
			calculation,
		}),
	};
}

export const responseRelevancy: FamilyExtractor<"response-relevancy"> = {
	fromMetadata(metadata, input) {
		const flags = firstModelValue(metadata.noncommittalFlags) ?? [];
		return build(
			{
				question: input.sample?.userInput ?? "",
				response: input.sample?.response ?? "",
				generatedQuestions: (firstModelValue(metadata.generatedQuestions) ?? []).map((question, i) => ({
					question,
					noncommittal: flags[i] ?? false,
				})),
				modelSimilarities: Object.entries(metadata.similarityScores).map(([modelId, similarity]) => ({
					modelId,
					similarity,
				})),
			},
			input,
		);
	},

	reconstruct(input) {
		const prompt = firstRequestText(input.steps);
		return build(
			{
				question: input.sample?.userInput ?? extractQuestion(prompt),
				response: input.sample?.response ?? extractResponse(prompt),
				generatedQuestions: firstValueIn(stepsNamed(input.steps, "GenerateQuestions"), readQuestions) ?? [],
				modelSimilarities: stepsNamed(input.steps, "ComputeCosineSimilarity").flatMap((step) =>
					collectValues(step, readSimilarity).map(({ modelId, value }) => ({ modelId, similarity: value })),
				),
			},
			input,
		);
	},
};
