import { readMetricConfig, RubricsConfigSchema } from "../../config.ts";
import { formatPercent, GOOD_THRESHOLD } from "../interpretation.ts";
import { message } from "../messages.ts";
import type { RubricLevel, RubricsExplanation, ScoreInterpretation } from "../model.ts";
import { firstRequestText, firstValueIn, readReasoning, scalarReader } from "../payload.ts";
import { extractResponse } from "../prompt-sections.ts";
import {
	buildSteps,
	collectPerModel,
	meanPerModel,
	truncate,
	type ExtractionInput,
	type FamilyExtractor,
} from "./shared.ts";

const RUBRIC_KEY = /^score(\d+)_description$/;

const DEFAULT_LEVELS: readonly RubricLevel[] = [
	{ level: 5, description: "Excellent" },
	{ level: 4, description: "Good" },
	{ level: 3, description: "Adequate" },
	{ level: 2, description: "Poor" },
	{ level: 1, description: "Very Poor" },
];

interface RubricsEvidence {
	response: string;
	reasoning: string;
	levels: RubricLevel[];
	modelScores: Record<string, number>;
}

const readScore = scalarReader(["score"]);

/**
 * Levels from `scoreN_description` keys, highest first. Falls back to the
 * five default levels when none match.
 */
export function parseRubricLevels(rubrics: Readonly<Record<string, string>> | undefined): RubricLevel[] {
	const levels: RubricLevel[] = [];
	for (const [key, description] of Object.entries(rubrics ?? {})) {
		const match = RUBRIC_KEY.exec(key);
		if (match) levels.push({ level: Number(match[1]), description });
	}
	if (levels.length === 0) return DEFAULT_LEVELS.map((l) => ({ ...l }));
	return levels.sort((a, b) => b.level - a.level);
}

/**
 * Level nearest to the aggregated score; the middle level when there is none.
 */
export function selectLevel(score: number | null, minLevel: number, maxLevel: number): number {
	return score !== null ? Math.round(score) : Math.floor((minLevel + maxLevel) / 2);
}

function interpret(
	score: number | null,
	levels: readonly RubricLevel[],
	selectedLevel: number,
	minLevel: number,
	maxLevel: number,
): ScoreInterpretation {
	const normalized = score !== null && maxLevel > minLevel ? (score - minLevel) / (maxLevel - minLevel) : null;
	const selectedDescription = levels.find((l) => l.level === selectedLevel)?.description ?? "";
	return {
		formula: `(level - ${minLevel}) / (${maxLevel} - ${minLevel})`,
		calculation:
			score === null
				? formatPercent(null)
				: `(${score.toFixed(1)} - ${minLevel}) / (${maxLevel} - ${minLevel}) = ${formatPercent(normalized)}`,
		numerator: selectedLevel - minLevel,
		denominator: maxLevel - minLevel,
		score: normalized,
		scorePercent: formatPercent(normalized),
		level: score === null ? message("level.unknown") : message("rubrics.level", selectedLevel),
		isGood: normalized !== null && normalized >= GOOD_THRESHOLD,
		meaning:
			score === null
				? message("score.notCalculated")
				: message("rubrics.meaning", selectedLevel, selectedDescription),
		scaleLevels: levels.map((l) => ({
			range: String(l.level),
			label: message("rubrics.level", l.level),
			description: l.description,
			current: l.level === selectedLevel,
		})),
		currentLevelIndex: levels.findIndex((l) => l.level === selectedLevel),
		minLevel,
		maxLevel,
	};
}

function build(evidence: RubricsEvidence, input: ExtractionInput): RubricsExplanation {
	const { score, display } = input;
	const { levels } = evidence;
	const minLevel = Math.min(...levels.map((l) => l.level));
	const maxLevel = Math.max(...levels.map((l) => l.level));
	const selectedLevel = selectLevel(score, minLevel, maxLevel);
	const interpretation = interpret(score, levels, selectedLevel, minLevel, maxLevel);
	const selectedDescription = levels.find((l) => l.level === selectedLevel)?.description ?? "";

	return {
		metricType: "rubrics",
		score,
		description: message("rubrics.description"),
		response: evidence.response,
		reasoning: evidence.reasoning,
		modelScores: evidence.modelScores,
		levels,
		selectedLevel,
		minLevel,
		maxLevel,
		steps: buildSteps("rubrics", [
			{
				name: "ShowRubrics",
				inputData: evidence.response ? truncate(evidence.response, display.truncateLength) : undefined,
				items: levels.map((l) => ({
					content: l.description,
					passed: l.level === selectedLevel,
					verdict: message("rubrics.level", l.level),
					index: l.level,
				})),
			},
			{
				name: "EvaluateResponse",
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
			{
				name: "SelectLevel",
				outputSummary: message("rubrics.meaning", selectedLevel, selectedDescription),
			},
			{ name: "ComputeScore", outputSummary: interpretation.calculation },
		]),
		interpretation,
	};
}

export const rubrics: FamilyExtractor<"rubrics"> = {
	fromMetadata(metadata, input) {
		const reasonings = Object.values(metadata.modelReasonings);
		return build(
			{
				response: input.sample?.response ?? "",
				reasoning: reasonings.find((r) => r !== "") ?? "",
				levels: parseRubricLevels(metadata.rubrics),
				modelScores: { ...metadata.modelScores },
			},
			input,
		);
	},

	reconstruct(input) {
		const config = readMetricConfig(RubricsConfigSchema, input.config);
		return build(
			{
				response: input.sample?.response ?? extractResponse(firstRequestText(input.steps)),
				reasoning: firstValueIn(input.steps, readReasoning) ?? "",
				levels: parseRubricLevels(config.rubrics),
				modelScores: meanPerModel(collectPerModel(input.steps, readScore)),
			},
			input,
		);
	},
};
