import { z } from "zod";
import { standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import { firstModelValue } from "../metadata.ts";
import type { ContextRecallExplanation, ModelStepResult, StatementAttribution } from "../model.ts";
import { BinaryVerdictSchema, fieldReader, firstRequestText, firstValueIn } from "../payload.ts";
import { extractContext, extractReference } from "../prompt-sections.ts";
import {
	buildSteps,
	computeScoreStep,
	countCalculation,
	modelResultsAcross,
	truncate,
	type ExtractionInput,
	type FamilyExtractor,
} from "./shared.ts";

interface RecallEvidence {
	reference: string;
	context: string;
	classifications: StatementAttribution[];
	attributedCount: number;
	totalCount: number;
	models: ModelStepResult[];
}

const readClassifications = fieldReader(
	"classifications",
	z.array(z.object({ statement: z.string(), attributed: BinaryVerdictSchema, reason: z.string().default("") })),
);

function build(evidence: RecallEvidence, input: ExtractionInput): ContextRecallExplanation {
	const { score, display } = input;
	const { attributedCount, totalCount } = evidence;

	return {
		metricType: "context-recall",
		score,
		description: message("context-recall.description"),
		reference: evidence.reference,
		context: evidence.context,
		classifications: evidence.classifications,
		attributedCount,
		totalCount,
		steps: buildSteps("context-recall", [
			{
				name: "ClassifyStatements",
				inputData: evidence.reference ? truncate(evidence.reference, display.truncateLength) : undefined,
				outputSummary: message("context-recall.attributed", attributedCount, totalCount),
				items: evidence.classifications.map((c, i) => ({
					content: c.statement,
					passed: c.attributed,
					verdict: message(c.attributed ? "verdict.attributed" : "verdict.notAttributed"),
					reason: truncate(c.reason, display.reasoningLength),
					index: i + 1,
				})),
				modelResults: evidence.models,
			},
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation(
			"context-recall",
			score,
			{
				formula: message("context-recall.formula"),
				calculation: countCalculation(attributedCount, totalCount, score),
				numerator: attributedCount,
				denominator: totalCount,
			},
			[attributedCount, totalCount],
		),
	};
}

export const contextRecall: FamilyExtractor<"context-recall"> = {
	fromMetadata(metadata, input) {
		const classifications = (firstModelValue(metadata.classifications) ?? []).map((c) => ({
			statement: c.statement,
			attributed: c.attributed === 1,
			reason: c.reason,
		}));
		return build(
			{
				reference: input.sample?.reference ?? "",
				context: input.sample?.retrievedContexts?.join("\n\n") ?? "",
				classifications,
				attributedCount: metadata.attributedCount,
				totalCount: metadata.totalCount,
				models: Object.keys(metadata.classifications).map((modelId) => ({ modelId, success: true })),
			},
			input,
		);
	},

	reconstruct(input) {
		const classifications = firstValueIn(input.steps, readClassifications) ?? [];
		const prompt = firstRequestText(input.steps);
		return build(
			{
				reference: input.sample?.reference ?? extractReference(prompt),
				context: input.sample?.retrievedContexts?.join("\n\n") ?? extractContext(prompt),
				classifications,
				attributedCount: classifications.filter((c) => c.attributed).length,
				totalCount: classifications.length,
				models: modelResultsAcross(input.steps),
			},
			input,
		);
	},
};
