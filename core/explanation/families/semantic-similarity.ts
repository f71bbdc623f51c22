import { mean } from "../../analysis/statistics.ts";
import { readMetricConfig, SemanticSimilarityConfigSchema } from "../../config.ts";
import { binaryInterpretation, formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import type { ModelSimilarity, ScoreInterpretation, SemanticSimilarityExplanation } from "../model.ts";
import { collectValues, scalarReader, stepsNamed } from "../payload.ts";
import { buildSteps, computeScoreStep, truncate, type ExtractionInput, type FamilyExtractor } from "./shared.ts";

interface SimilarityEvidence {
	response: string;
	reference: string;
	modelSimilarities: ModelSimilarity[];
	threshold: number | null;
}

const readSimilarity = scalarReader(["similarity", "score"]);

function build(evidence: SimilarityEvidence, input: ExtractionInput): SemanticSimilarityExplanation {
	const { score, display } = input;
	const { threshold } = evidence;
	const similarities = evidence.modelSimilarities.map((m) => m.similarity);
	const average = mean(similarities);
	const formula = message("semantic-similarity.formula");

	let calculation = formatPercent(score);
	if (average !== null && similarities.length > 1) {
		calculation = `mean(${similarities.map((s) => s.toFixed(4)).join(", ")}) = ${average.toFixed(4)}`;
	}

	let interpretation: ScoreInterpretation;
	if (threshold === null) {
		interpretation = standardInterpretation("semantic-similarity", score, { formula, calculation });
	} else {
		const passed = score !== null && score >= threshold;
		if (average !== null) {
			calculation = `${average.toFixed(4)} ${average >= threshold ? "≥" : "<"} ${threshold} → ${passed ? "1.0" : "0.0"}`;
		}
		interpretation = binaryInterpretation("semantic-similarity", score, passed, { formula, calculation }, [threshold]);
	}

	return {
		metricType: "semantic-similarity",
		score,
		description: message("semantic-similarity.description"),
		response: evidence.response,
		reference: evidence.reference,
		modelSimilarities: evidence.modelSimilarities,
		threshold,
		steps: buildSteps("semantic-similarity", [
			{
				name: "InputTexts",
				inputData: evidence.response ? truncate(evidence.response, display.truncateLength) : undefined,
				outputSummary: evidence.reference ? truncate(evidence.reference, display.truncateLength) : undefined,
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
			threshold !== null && {
				name: "ApplyThreshold",
				titleArgs: [threshold],
				outputSummary: calculation,
			},
			computeScoreStep(score),
		]),
		interpretation,
	};
}

export const semanticSimilarity: FamilyExtractor<"semantic-similarity"> = {
	fromMetadata(metadata, input) {
		return build(
			{
				response: input.sample?.response ?? "",
				reference: input.sample?.reference ?? "",
				modelSimilarities: Object.entries(metadata.embeddingModelScores).map(([modelId, similarity]) => ({
					modelId,
					similarity,
				})),
				threshold: metadata.threshold,
			},
			input,
		);
	},

	reconstruct(input) {
		const config = readMetricConfig(SemanticSimilarityConfigSchema, input.config);
		let steps = stepsNamed(input.steps, "ComputeSimilarity", "ComputeCosineSimilarity");
		if (steps.length === 0) {
			steps = input.steps.filter((step) => step.stepType === "EMBEDDING");
		}
		return build(
			{
				response: input.sample?.response ?? "",
				reference: input.sample?.reference ?? "",
				modelSimilarities: steps.flatMap((step) =>
					collectValues(step, readSimilarity).map(({ modelId, value }) => ({ modelId, similarity: value })),
				),
				threshold: config.threshold ?? null,
			},
			input,
		);
	},
};
