import { mean } from "../../analysis/statistics.ts";
import { AnswerCorrectnessConfigSchema, readMetricConfig } from "../../config.ts";
import { formatFixed, formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import type { AnswerCorrectnessExplanation, ModelStepResult } from "../model.ts";
import { collectValues, scalarReader, stepsNamed } from "../payload.ts";
import { buildSteps, computeScoreStep, type ExtractionInput, type FamilyExtractor } from "./shared.ts";

interface CorrectnessEvidence {
	factualScore: number | null;
	semanticScore: number | null;
	factualWeight: number;
	semanticWeight: number;
	factualModels: ModelStepResult[];
	semanticModels: ModelStepResult[];
}

const readFactual = scalarReader(["score", "f1", "factual"]);
const readSemantic = scalarReader(["score", "similarity", "semantic"]);

/** Scale the two weights to sum to 1; equal weights when both are 0. */
export function normalizeWeights(factual: number, semantic: number): [number, number] {
	const total = factual + semantic;
	return total > 0 ? [factual / total, semantic / total] : [0.5, 0.5];
}

function build(evidence: CorrectnessEvidence, input: ExtractionInput): AnswerCorrectnessExplanation {
	const { score } = input;
	const { factualScore, semanticScore } = evidence;
	const [wf, ws] = normalizeWeights(evidence.factualWeight, evidence.semanticWeight);

	const calculation =
		factualScore !== null && semanticScore !== null
			? `${wf.toFixed(2)} × ${factualScore.toFixed(4)} + ${ws.toFixed(2)} × ${semanticScore.toFixed(4)} = ${formatPercent(wf * factualScore + ws * semanticScore)}`
			: formatPercent(score);

	return {
		metricType: "answer-correctness",
		score,
		description: message("answer-correctness.description"),
		factualScore,
		semanticScore,
		factualWeight: wf,
		semanticWeight: ws,
		steps: buildSteps("answer-correctness", [
			{
				name: "ComputeFactual",
				titleArgs: [wf.toFixed(2)],
				outputSummary: formatFixed(factualScore, 4),
				modelResults: evidence.factualModels,
			},
			{
				name: "ComputeSemantic",
				titleArgs: [ws.toFixed(2)],
				outputSummary: formatFixed(semanticScore, 4),
				modelResults: evidence.semanticModels,
			},
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation("answer-correctness", score, {
			formula: message("answer-correctness.formula", wf.toFixed(2), ws.toFixed(2)),
			calculation,
		}),
	};
}

export const answerCorrectness: FamilyExtractor<"answer-correctness"> = {
	fromMetadata(metadata, input) {
		return build(
			{
				factualScore: metadata.factualScore,
				semanticScore: metadata.semanticScore,
				factualWeight: metadata.factualWeight,
				semanticWeight: metadata.semanticWeight,
				factualModels: [],
				semanticModels: [],
			},
			input,
		);
	},

	reconstruct(input) {
		const config = readMetricConfig(AnswerCorrectnessConfigSchema, input.config);
		const factual = stepsNamed(input.steps, "ComputeFactual").flatMap((step) => collectValues(step, readFactual));
		const semantic = stepsNamed(input.steps, "ComputeSemantic").flatMap((step) => collectValues(step, readSemantic));
		const toModels = (values: readonly { modelId: string; value: number }[]): ModelStepResult[] =>
			values.map(({ modelId, value }) => ({ modelId, success: true, numericResult: value }));

		return build(
			{
				factualScore: mean(factual.map((v) => v.value)),
				semanticScore: mean(semantic.map((v) => v.value)),
				factualWeight: config.factualWeight,
				semanticWeight: config.semanticWeight,
				factualModels: toModels(factual),
				semanticModels: toModels(semantic),
			},
			input,
		);
	},
};
