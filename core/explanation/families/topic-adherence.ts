import { z } from "zod";
import { readMetricConfig, TopicAdherenceConfigSchema } from "../../config.ts";
import { formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import { firstModelValue } from "../metadata.ts";
import type { TopicAdherenceExplanation, TopicClassification } from "../model.ts";
import { BinaryVerdictSchema, fieldReader, firstValueIn, StringListSchema, stepsNamed } from "../payload.ts";
import {
	buildSteps,
	computeScoreStep,
	countCalculation,
	f1Calculation,
	f1Score,
	ratio,
	truncate,
	type ExtractionInput,
	type FamilyExtractor,
} from "./shared.ts";

interface TopicEvidence {
	mode: TopicAdherenceExplanation["mode"];
	referenceTopics: string[];
	extractedTopics: string[];
	classifications: TopicClassification[];
}

const readTopics = fieldReader("topics", StringListSchema);
const readClassifications = fieldReader(
	"classifications",
	z.array(
		z.object({
			topic: z.string(),
			onTopic: BinaryVerdictSchema,
			matchedReferenceTopic: z.string().nullable().default(null),
			reasoning: z.string().default(""),
		}),
	),
);

/**
 * Reference topics matched by at least one on-topic classification,
 * compared case-insensitively and counted once each.
 */
export function coveredReferenceTopics(
	referenceTopics: readonly string[],
	classifications: readonly TopicClassification[],
): string[] {
	const matched = new Set<string>();
	for (const c of classifications) {
		if (c.onTopic && c.matchedReferenceTopic !== null) matched.add(c.matchedReferenceTopic.toLowerCase());
	}
	return referenceTopics.filter((topic) => matched.has(topic.toLowerCase()));
}

function build(evidence: TopicEvidence, input: ExtractionInput): TopicAdherenceExplanation {
	const { score, display } = input;
	const { mode, referenceTopics, classifications } = evidence;
	const onTopic = classifications.filter((c) => c.onTopic).length;
	const covered = coveredReferenceTopics(referenceTopics, classifications);
	const precision = ratio(onTopic, classifications.length) ?? 0;
	const recall = ratio(covered.length, referenceTopics.length) ?? 0;
	const f1 = f1Score(precision, recall);

	let calculation: string;
	switch (mode) {
		case "PRECISION":
			calculation = countCalculation(onTopic, classifications.length, score);
			break;
		case "RECALL":
			calculation = countCalculation(covered.length, referenceTopics.length, score);
			break;
		case "F1":
			calculation = classifications.length > 0 ? f1Calculation(precision, recall) : formatPercent(score);
			break;
	}

	return {
		metricType: "topic-adherence",
		score,
		description: message("topic-adherence.description"),
		mode,
		referenceTopics,
		extractedTopics: evidence.extractedTopics,
		classifications,
		precision,
		recall,
		f1,
		steps: buildSteps("topic-adherence", [
			{
				name: "ExtractTopics",
				inputData: referenceTopics.length > 0 ? referenceTopics.join(", ") : undefined,
				outputSummary: message("topic-adherence.topics", evidence.extractedTopics.length),
				items: evidence.extractedTopics.map((content, i) => ({ content, index: i + 1 })),
			},
			{
				name: "ClassifyTopics",
				outputSummary: message("topic-adherence.onTopic", onTopic, classifications.length),
				items: classifications.map((c, i) => ({
					content: c.topic,
					passed: c.onTopic,
					verdict: message(c.onTopic ? "verdict.onTopic" : "verdict.offTopic"),
					reason: truncate(c.reasoning, display.reasoningLength),
					source: c.matchedReferenceTopic ?? undefined,
					index: i + 1,
				})),
			},
			computeScoreStep(score, `${formatPercent(score)} (${mode})`),
		]),
		interpretation: standardInterpretation("topic-adherence", score, {
			formula: message(`topic-adherence.formula.${mode}`),
			calculation,
		}),
	};
}

export const topicAdherence: FamilyExtractor<"topic-adherence"> = {
	fromMetadata(metadata, input) {
		return build(
			{
				mode: metadata.mode,
				referenceTopics: [...metadata.referenceTopics],
				extractedTopics: [...metadata.extractedTopics],
				classifications: (firstModelValue(metadata.modelClassifications) ?? []).map((c) => ({ ...c })),
			},
			input,
		);
	},

	reconstruct(input) {
		const config = readMetricConfig(TopicAdherenceConfigSchema, input.config);
		return build(
			{
				mode: config.mode,
				referenceTopics: config.referenceTopics,
				extractedTopics: firstValueIn(stepsNamed(input.steps, "ExtractTopics"), readTopics) ?? [],
				classifications: firstValueIn(stepsNamed(input.steps, "ClassifyTopics"), readClassifications) ?? [],
			},
			input,
		);
	},
};
