import { standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import { firstModelValue } from "../metadata.ts";
import type { ContextEntityRecallExplanation } from "../model.ts";
import { fieldReader, firstValue, StringListSchema, stepNameContains } from "../payload.ts";
import { extractText } from "../prompt-sections.ts";
import {
	buildSteps,
	computeScoreStep,
	countCalculation,
	truncate,
	type ExtractionInput,
	type FamilyExtractor,
} from "./shared.ts";

interface EntityEvidence {
	reference: string;
	context: string;
	referenceEntities: string[];
	contextEntities: string[];
}

const readEntities = fieldReader("entities", StringListSchema);

/**
 * Split reference entities into those the context mentions (case-insensitive,
 * exact) and those it misses. Reference spelling is kept.
 */
export function matchEntities(
	referenceEntities: readonly string[],
	contextEntities: readonly string[],
): { found: string[]; missing: string[] } {
	const known = new Set(contextEntities.map((e) => e.toLowerCase()));
	const found: string[] = [];
	const missing: string[] = [];
	for (const entity of referenceEntities) {
		(known.has(entity.toLowerCase()) ? found : missing).push(entity);
	}
	return { found, missing };
}

function build(evidence: EntityEvidence, input: ExtractionInput): ContextEntityRecallExplanation {
	const { score, display } = input;
	const { found, missing } = matchEntities(evidence.referenceEntities, evidence.contextEntities);
	const total = evidence.referenceEntities.length;

	return {
		metricType: "context-entity-recall",
		score,
		description: message("context-entity-recall.description"),
		reference: evidence.reference,
		context: evidence.context,
		referenceEntities: evidence.referenceEntities,
		contextEntities: evidence.contextEntities,
		foundEntities: found,
		missingEntities: missing,
		steps: buildSteps("context-entity-recall", [
			{
				name: "ExtractReferenceEntities",
				inputData: evidence.reference ? truncate(evidence.reference, display.truncateLength) : undefined,
				outputSummary: message("context-entity-recall.entities", total),
				items: evidence.referenceEntities.map((content, i) => ({ content, index: i + 1 })),
			},
			{
				name: "ExtractContextEntities",
				inputData: evidence.context ? truncate(evidence.context, display.truncateLength) : undefined,
				outputSummary: message("context-entity-recall.entities", evidence.contextEntities.length),
				items: evidence.contextEntities.map((content, i) => ({ content, index: i + 1 })),
			},
			{
				name: "CompareEntities",
				outputSummary: message("context-entity-recall.found", found.length, total),
				items: [
					...found.map((content) => ({ content, passed: true, verdict: message("verdict.found") })),
					...missing.map((content) => ({ content, passed: false, verdict: message("verdict.missing") })),
				],
			},
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation(
			"context-entity-recall",
			score,
			{
				formula: message("context-entity-recall.formula"),
				calculation: countCalculation(found.length, total, score),
				numerator: found.length,
				denominator: total,
			},
			[found.length, total],
		),
	};
}

export const contextEntityRecall: FamilyExtractor<"context-entity-recall"> = {
	fromMetadata(metadata, input) {
		return build(
			{
				reference: input.sample?.reference ?? "",
				context: input.sample?.retrievedContexts?.join("\n\n") ?? "",
				referenceEntities: firstModelValue(metadata.referenceEntities) ?? [],
				contextEntities: firstModelValue(metadata.contextEntities) ?? [],
			},
			input,
		);
	},

	reconstruct(input) {
		let reference = "";
		let context = "";
		const referenceEntities: string[] = [];
		const contextEntities: string[] = [];

		for (const step of input.steps) {
			const isContextStep = stepNameContains(step, "Context");
			const text = extractText(step.requestText);
			if (isContextStep && !context) context = text;
			if (!isContextStep && !reference) reference = text;

			const entities = firstValue(step, readEntities);
			if (entities) (isContextStep ? contextEntities : referenceEntities).push(...entities);
		}

		return build(
			{
				reference: input.sample?.reference ?? reference,
				context: input.sample?.retrievedContexts?.join("\n\n") ?? context,
				referenceEntities,
				contextEntities,
			},
			input,
		);
	},
};
