/**
 * Metric families known to the explanation engine, and the registry that
 * maps the many spellings of a metric name onto one family.
 */

import { BaseRegistry } from "../registry/index.ts";

export const METRIC_FAMILIES = [
	"faithfulness",
	"aspect-critic",
	"context-precision",
	"context-recall",
	"context-entity-recall",
	"response-relevancy",
	"simple-criteria",
	"rubrics",
	"semantic-similarity",
	"factual-correctness",
	"answer-correctness",
	"agent-goal-accuracy",
	"tool-call-accuracy",
	"topic-adherence",
	"context-relevance",
	"response-groundedness",
	"answer-accuracy",
	"noise-sensitivity",
	"bleu",
	"rouge",
	"chrf",
	"string-similarity",
	"hallucination",
] as const;

export type MetricFamily = (typeof METRIC_FAMILIES)[number];

/** Families that produce an explanation; hallucination is recognized but has none. */
export type ExplainableFamily = Exclude<MetricFamily, "hallucination">;

/**
 * Lower-case, drop "metric", turn underscores into hyphens.
 *
 * "FaithfulnessMetric" -> "faithfulness", "context_precision" -> "context-precision"
 */
export function normalizeMetricName(metricName: string): string {
	return metricName.toLowerCase().replace(/metric/g, "").replace(/_/g, "-").trim();
}

export interface FamilyDescriptor {
	readonly name: MetricFamily;
	readonly aliases: readonly string[];
	readonly description: string;
}

const EXTRA_ALIASES: Partial<Record<MetricFamily, readonly string[]>> = {
	"simple-criteria": ["simple-criteria-score", "simplecriteriascore"],
	rubrics: ["rubrics-score", "rubricsscore", "rubric-score"],
	"agent-goal-accuracy": ["agent-goal-accuracy-with-reference", "agent-goal-accuracy-without-reference"],
	"response-relevancy": ["answer-relevancy", "answerrelevancy"],
	bleu: ["bleu-score", "bleuscore"],
	rouge: ["rouge-score", "rougescore"],
	chrf: ["chrf-score", "chrfscore"],
	"string-similarity": ["non-llm-string-similarity", "nonllmstringsimilarity"],
};

const DESCRIPTIONS: Record<MetricFamily, string> = {
	faithfulness: "Share of response statements supported by the retrieved context",
	"aspect-critic": "Binary judgment of the response against a user-defined aspect",
	"context-precision": "Average precision of relevant contexts in retrieval order",
	"context-recall": "Share of reference statements attributable to the retrieved context",
	"context-entity-recall": "Share of reference entities present in the retrieved context",
	"response-relevancy": "Similarity between the question and questions generated from the response",
	"simple-criteria": "Integer judgment on a user-defined criterion, normalized to 0..1",
	rubrics: "Rubric level selected by the judge, normalized to 0..1",
	"semantic-similarity": "Embedding cosine similarity between response and reference",
	"factual-correctness": "Claim-level precision, recall or F1 against the reference",
	"answer-correctness": "Weighted mix of factual and semantic correctness",
	"agent-goal-accuracy": "Whether the agent achieved the user's goal",
	"tool-call-accuracy": "F1 of the agent's tool calls against the reference calls",
	"topic-adherence": "Whether the agent stayed within the allowed topics",
	"context-relevance": "Judge rating of each retrieved context, 0..2 normalized",
	"response-groundedness": "Judge rating of how well the response is grounded, 0..2 normalized",
	"answer-accuracy": "Judge rating of the response against the reference, 0..2 normalized",
	"noise-sensitivity": "Share of incorrect response statements caused by noisy context; lower is better",
	bleu: "BLEU n-gram overlap with the reference",
	rouge: "ROUGE overlap with the reference",
	chrf: "chrF character n-gram F-score against the reference",
	"string-similarity": "Edit-distance based string similarity",
	hallucination: "Share of unsupported claims",
};

export class FamilyRegistry extends BaseRegistry<FamilyDescriptor> {
	constructor() {
		super({ name: "FamilyRegistry", throwOnConflict: true, normalizeKey: normalizeMetricName });
	}

	register(descriptor: FamilyDescriptor): void {
		this.registerItem(descriptor.name, descriptor, descriptor.aliases);
	}

	/**
	 * Resolve a metric name to its family, or undefined for unknown metrics.
	 */
	resolve(metricName: string): MetricFamily | undefined {
		return this.get(metricName)?.name;
	}
}

function createDefaultRegistry(): FamilyRegistry {
	const registry = new FamilyRegistry();
	for (const name of METRIC_FAMILIES) {
		const compact = name.replace(/-/g, "");
		registry.register({
			name,
			aliases: [compact, ...(EXTRA_ALIASES[name] ?? [])],
			description: DESCRIPTIONS[name],
		});
	}
	return registry;
}

let familyRegistry: FamilyRegistry | null = null;

export function getFamilyRegistry(): FamilyRegistry {
	if (!familyRegistry) {
		familyRegistry = createDefaultRegistry();
	}
	return familyRegistry;
}

/**
 * Drop the cached registry (tests register extra aliases).
 */
export function resetFamilyRegistry(): void {
	familyRegistry = null;
}

export function resolveFamily(metricName: string): MetricFamily | undefined {
	return getFamilyRegistry().resolve(metricName);
}

export function isExplainable(family: MetricFamily): family is ExplainableFamily {
	return family !== "hallucination";
}
