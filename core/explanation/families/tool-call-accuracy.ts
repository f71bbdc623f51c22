import { z } from "zod";
import { readMetricConfig, ToolCallConfigSchema } from "../../config.ts";
import { formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import type { ToolCallAccuracyExplanation, ToolCallMatch } from "../model.ts";
import { fieldReader, firstValueIn, stepsNamed } from "../payload.ts";
import { buildSteps, computeScoreStep, f1Calculation, type ExtractionInput, type FamilyExtractor } from "./shared.ts";

interface ToolCallCounts {
	truePositives: number;
	falsePositives: number;
	falseNegatives: number;
	precision: number;
	recall: number;
}

interface ToolCallEvidence extends ToolCallCounts {
	mode: ToolCallAccuracyExplanation["mode"];
	matches: ToolCallMatch[];
	approximated: boolean;
}

const Count = z.number().int().nonnegative().default(0);

const readMatches = fieldReader(
	"matches",
	z.array(
		z.object({
			actualCall: z.string(),
			referenceCall: z.string().nullable().default(null),
			matched: z.boolean(),
			matchScore: z.number().default(0),
		}),
	),
);

const readCounts = fieldReader(
	"$",
	z.object({
		truePositives: Count,
		falsePositives: Count,
		falseNegatives: Count,
		precision: z.number().default(0),
		recall: z.number().default(0),
	}),
);

const EMPTY_COUNTS: ToolCallCounts = { truePositives: 0, falsePositives: 0, falseNegatives: 0, precision: 0, recall: 0 };

function build(evidence: ToolCallEvidence, input: ExtractionInput): ToolCallAccuracyExplanation {
	const { score } = input;
	const { precision, recall, truePositives, falsePositives, falseNegatives } = evidence;
	const hasCounts = precision > 0 || recall > 0;

	return {
		metricType: "tool-call-accuracy",
		score,
		description: message("tool-call-accuracy.description"),
		mode: evidence.mode,
		precision,
		recall,
		truePositives,
		falsePositives,
		falseNegatives,
		matches: evidence.matches,
		approximated: evidence.approximated,
		steps: buildSteps("tool-call-accuracy", [
			{
				name: "AlignToolCalls",
				titleArgs: [evidence.mode],
				outputSummary: message("tool-call-accuracy.matched", truePositives, evidence.matches.length),
				items: evidence.matches.map((m, i) => ({
					content: m.referenceCall === null ? m.actualCall : `${m.actualCall} ↔ ${m.referenceCall}`,
					passed: m.matched,
					verdict: message(m.matched ? "verdict.matched" : "verdict.unmatched"),
					numericValue: m.matchScore,
					index: i + 1,
				})),
			},
			{
				name: "ComputePrecisionRecall",
				outputSummary: `TP=${truePositives}, FP=${falsePositives}, FN=${falseNegatives}`,
				items: [
					{ content: `P = ${precision.toFixed(2)}`, numericValue: precision },
					{ content: `R = ${recall.toFixed(2)}`, numericValue: recall },
					...(evidence.approximated ? [{ content: message("tool-call-accuracy.approximated") }] : []),
				],
			},
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation("tool-call-accuracy", score, {
			formula: message("tool-call-accuracy.formula"),
			calculation: hasCounts ? f1Calculation(precision, recall) : formatPercent(score),
			numerator: truePositives,
			denominator: truePositives + falsePositives + falseNegatives,
		}),
	};
}

export const toolCallAccuracy: FamilyExtractor<"tool-call-accuracy"> = {
	fromMetadata(metadata, input) {
		return build(
			{
				mode: metadata.mode,
				truePositives: metadata.truePositives,
				falsePositives: metadata.falsePositives,
				falseNegatives: metadata.falseNegatives,
				precision: metadata.precision,
				recall: metadata.recall,
				matches: metadata.matches.map((m) => ({ ...m })),
				approximated: false,
			},
			input,
		);
	},

	reconstruct(input) {
		const config = readMetricConfig(ToolCallConfigSchema, input.config);
		const { score } = input;
		const counts = firstValueIn(stepsNamed(input.steps, "ComputePrecisionRecall"), readCounts) ?? EMPTY_COUNTS;
		// Steps without precision/recall leave only the score, which is their F1
		const approximated = counts.precision === 0 && counts.recall === 0 && score !== null && score > 0;

		return build(
			{
				mode: config.mode,
				...counts,
				precision: approximated && score !== null ? score : counts.precision,
				recall: approximated && score !== null ? score : counts.recall,
				matches: firstValueIn(stepsNamed(input.steps, "AlignToolCalls"), readMatches) ?? [],
				approximated,
			},
			input,
		);
	},
};
