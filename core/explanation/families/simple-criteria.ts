import { mean } from "../../analysis/statistics.ts";
import { readMetricConfig, SimpleCriteriaConfigSchema } from "../../config.ts";
import { formatPercent, GOOD_THRESHOLD } from "../interpretation.ts";
import { message } from "../messages.ts";
import { firstModelValue } from "../metadata.ts";
import type { ScoreInterpretation, SimpleCriteriaExplanation } from "../model.ts";
import { firstValueIn, readReasoning, scalarReader } from "../payload.ts";
import {
	buildSteps,
	collectPerModel,
	computeScoreStep,
	meanPerModel,
	truncate,
	type ExtractionInput,
	type FamilyExtractor,
} from "./shared.ts";

const DEFAULT_RAW_SCORE = 3;

interface CriteriaEvidence {
	criteriaName: string;
	definition: string;
	reasoning: string;
	/** Mean raw score per model */
	modelScores: Record<string, number>;
	minScore: number;
	maxScore: number;
}

const readScore = scalarReader(["score"]);

function interpret(
	score: number | null,
	rawScore: number,
	evidence: CriteriaEvidence,
	calculation: string,
): ScoreInterpretation {
	const { minScore, maxScore } = evidence;
	return {
		formula: "(score - min) / (max - min)",
		calculation,
		numerator: rawScore - minScore,
		denominator: maxScore - minScore,
		score,
		scorePercent: formatPercent(score),
		level: score === null ? message("level.unknown") : `${rawScore}/${maxScore}`,
		isGood: score !== null && score >= GOOD_THRESHOLD,
		meaning:
			score === null
				? message("score.notCalculated")
				: message("simple-criteria.meaning", rawScore, maxScore, evidence.criteriaName),
		scaleLevels: [],
		currentLevelIndex: -1,
		minLevel: minScore,
		maxLevel: maxScore,
	};
}

function build(evidence: CriteriaEvidence, input: ExtractionInput): SimpleCriteriaExplanation {
	const { score, display } = input;
	const { minScore, maxScore } = evidence;
	const values = Object.values(evidence.modelScores);
	const average = mean(values);
	const rawScore = average === null ? DEFAULT_RAW_SCORE : Math.round(average);
	const normalized = maxScore > minScore ? (rawScore - minScore) / (maxScore - minScore) : 0;

	const normalization = `(${rawScore} - ${minScore}) / (${maxScore} - ${minScore}) = ${normalized.toFixed(4)}`;
	let calculation = formatPercent(score);
	if (score !== null) {
		calculation =
			average !== null && values.length > 1
				? `mean(${values.map((v) => v.toFixed(2)).join(", ")}) = ${average.toFixed(2)} → ${normalization}`
				: normalization;
	}

	return {
		metricType: "simple-criteria",
		score,
		description: message("simple-criteria.description"),
		criteriaName: evidence.criteriaName,
		definition: evidence.definition,
		reasoning: evidence.reasoning,
		modelScores: evidence.modelScores,
		rawScore,
		minScore,
		maxScore,
		steps: buildSteps("simple-criteria", [
			{
				name: "DefineCriteria",
				inputData: truncate(evidence.definition, display.truncateLength),
				outputSummary: message("simple-criteria.range", minScore, maxScore),
			},
			{
				name: "EvaluateCriteria",
				outputSummary: `${rawScore}/${maxScore}`,
				items: [
					...Object.entries(evidence.modelScores).map(([modelId, value]) => ({
						content: value.toFixed(2),
						numericValue: value,
						source: modelId,
					})),
					...(evidence.reasoning ? [{ content: truncate(evidence.reasoning, display.reasoningLength) }] : []),
				],
				modelResults: Object.entries(evidence.modelScores).map(([modelId, value]) => ({
					modelId,
					success: true,
					numericResult: value,
				})),
			},
			computeScoreStep(score, normalization),
		]),
		interpretation: interpret(score, rawScore, evidence, calculation),
	};
}

export const simpleCriteria: FamilyExtractor<"simple-criteria"> = {
	fromMetadata(metadata, input) {
		const config = readMetricConfig(SimpleCriteriaConfigSchema, input.config);
		return build(
			{
				criteriaName: config.name ?? metadata.definition,
				definition: metadata.definition,
				reasoning: firstModelValue(metadata.modelReasonings)?.[0] ?? "",
				modelScores: meanPerModel(metadata.modelRawScores),
				minScore: metadata.minScore,
				maxScore: metadata.maxScore,
			},
			input,
		);
	},

	reconstruct(input) {
		const config = readMetricConfig(SimpleCriteriaConfigSchema, input.config);
		const definition = config.definition ?? "";
		return build(
			{
				criteriaName: config.name ?? definition,
				definition,
				reasoning: firstValueIn(input.steps, readReasoning) ?? "",
				modelScores: meanPerModel(collectPerModel(input.steps, readScore)),
				minScore: config.minScore,
				maxScore: config.maxScore,
			},
			input,
		);
	},
};
