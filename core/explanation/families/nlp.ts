/**
 * Families scored by string comparison of the response and the reference.
 * There is no model evidence: the explanation shows the two texts, the
 * settings the score was computed with, and the scale.
 */

import {
	BleuConfigSchema,
	ChrfConfigSchema,
	readMetricConfig,
	RougeConfigSchema,
	StringSimilarityConfigSchema,
} from "../../config.ts";
import type { ExplainableFamily } from "../families.ts";
import { formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import type { SampleTexts, ScoreInterpretation, StepExplanation } from "../model.ts";
import { buildSteps, computeScoreStep, truncate, type ExtractionInput, type FamilyExtractor } from "./shared.ts";

type Settings = Readonly<Record<string, string | number | boolean>>;

interface TextComparison extends SampleTexts {
	description: string;
	steps: StepExplanation[];
	interpretation: ScoreInterpretation;
}

function compareTexts(family: ExplainableFamily, settings: Settings, input: ExtractionInput): TextComparison {
	const { score, display } = input;
	const response = input.sample?.response ?? "";
	const reference = input.sample?.reference ?? "";
	return {
		description: message(`${family}.description`),
		response,
		reference,
		steps: buildSteps(family, [
			{
				name: "InputTexts",
				inputData: response ? truncate(response, display.truncateLength) : undefined,
				outputSummary: reference ? truncate(reference, display.truncateLength) : undefined,
			},
			{
				name: "Configuration",
				items: Object.entries(settings).map(([key, value]) => ({ content: `${key} = ${String(value)}` })),
			},
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation(family, score, {
			formula: message(`${family}.formula`),
			calculation: formatPercent(score),
		}),
	};
}

export const bleu: FamilyExtractor<"bleu"> = {
	fromMetadata({ maxNgram, smoothing }, input) {
		return {
			metricType: "bleu",
			score: input.score,
			maxNgram,
			smoothing,
			...compareTexts("bleu", { maxNgram, smoothing }, input),
		};
	},
	reconstruct(input) {
		const { maxNgram, smoothing } = readMetricConfig(BleuConfigSchema, input.config);
		return bleu.fromMetadata({ family: "bleu", maxNgram, smoothing }, input);
	},
};

export const rouge: FamilyExtractor<"rouge"> = {
	fromMetadata({ rougeType, mode }, input) {
		return {
			metricType: "rouge",
			score: input.score,
			rougeType,
			mode,
			...compareTexts("rouge", { rougeType, mode }, input),
		};
	},
	reconstruct(input) {
		const { rougeType, mode } = readMetricConfig(RougeConfigSchema, input.config);
		return rouge.fromMetadata({ family: "rouge", rougeType, mode }, input);
	},
};

export const chrf: FamilyExtractor<"chrf"> = {
	fromMetadata({ charNgramOrder, wordNgramOrder, beta }, input) {
		return {
			metricType: "chrf",
			score: input.score,
			charNgramOrder,
			wordNgramOrder,
			beta,
			...compareTexts("chrf", { charNgramOrder, wordNgramOrder, beta }, input),
		};
	},
	reconstruct(input) {
		const { charNgramOrder, wordNgramOrder, beta } = readMetricConfig(ChrfConfigSchema, input.config);
		return chrf.fromMetadata({ family: "chrf", charNgramOrder, wordNgramOrder, beta }, input);
	},
};

export const stringSimilarity: FamilyExtractor<"string-similarity"> = {
	fromMetadata({ distanceMeasure, caseSensitive }, input) {
		return {
			metricType: "string-similarity",
			score: input.score,
			distanceMeasure,
			caseSensitive,
			...compareTexts("string-similarity", { distanceMeasure, caseSensitive }, input),
		};
	},
	reconstruct(input) {
		const { distanceMeasure, caseSensitive } = readMetricConfig(StringSimilarityConfigSchema, input.config);
		return stringSimilarity.fromMetadata({ family: "string-similarity", distanceMeasure, caseSensitive }, input);
	},
};
