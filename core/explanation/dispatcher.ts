/**
 * Routes a finished metric run to its family extractor.
 *
 * A typed metadata record of the metric's family is authoritative when the
 * metric attached one; otherwise the explanation is reconstructed from raw
 * step payloads and prompt text. Anything that cannot be explained yields
 * null.
 */

import { EngineConfigSchema, type EngineConfig } from "../config.ts";
import type { MetricRun, SampleContext, StepResult } from "../run/types.ts";
import { isExplainable, normalizeMetricName, resolveFamily, type ExplainableFamily } from "./families.ts";
import {
	agentGoalAccuracy,
	answerAccuracy,
	answerCorrectness,
	aspectCritic,
	bleu,
	chrf,
	contextEntityRecall,
	contextPrecision,
	contextRecall,
	contextRelevance,
	factualCorrectness,
	faithfulness,
	noiseSensitivity,
	responseGroundedness,
	responseRelevancy,
	rouge,
	rubrics,
	semanticSimilarity,
	simpleCriteria,
	stringSimilarity,
	toolCallAccuracy,
	topicAdherence,
	type ExtractionInput,
} from "./families/index.ts";
import type { MetricMetadata } from "./metadata.ts";
import type { Explanation } from "./model.ts";

export interface DispatchOptions {
	sample?: SampleContext;
	/** Engine settings; schema defaults when omitted */
	engine?: EngineConfig;
}

let defaultEngineConfig: EngineConfig | null = null;

function engineDefaults(): EngineConfig {
	if (!defaultEngineConfig) {
		defaultEngineConfig = EngineConfigSchema.parse({});
	}
	return defaultEngineConfig;
}

function assertNever(value: never): never {
	throw new Error(`Unhandled family: ${JSON.stringify(value)}`);
}

/**
 * Explanation from a metadata record. Hallucination metadata carries no
 * explanation.
 */
function fromMetadata(metadata: MetricMetadata, input: ExtractionInput): Explanation | null {
	switch (metadata.family) {
		case "faithfulness":
			return faithfulness.fromMetadata(metadata, input);
		case "aspect-critic":
			return aspectCritic.fromMetadata(metadata, input);
		case "context-precision":
			return contextPrecision.fromMetadata(metadata, input);
		case "context-recall":
			return contextRecall.fromMetadata(metadata, input);
		case "context-entity-recall":
			return contextEntityRecall.fromMetadata(metadata, input);
		case "response-relevancy":
			return responseRelevancy.fromMetadata(metadata, input);
		case "simple-criteria":
			return simpleCriteria.fromMetadata(metadata, input);
		case "rubrics":
			return rubrics.fromMetadata(metadata, input);
		case "semantic-similarity":
			return semanticSimilarity.fromMetadata(metadata, input);
		case "factual-correctness":
			return factualCorrectness.fromMetadata(metadata, input);
		case "answer-correctness":
			return answerCorrectness.fromMetadata(metadata, input);
		case "agent-goal-accuracy":
			return agentGoalAccuracy.fromMetadata(metadata, input);
		case "tool-call-accuracy":
			return toolCallAccuracy.fromMetadata(metadata, input);
		case "topic-adherence":
			return topicAdherence.fromMetadata(metadata, input);
		case "context-relevance":
			return contextRelevance.fromMetadata(metadata, input);
		case "response-groundedness":
			return responseGroundedness.fromMetadata(metadata, input);
		case "answer-accuracy":
			return answerAccuracy.fromMetadata(metadata, input);
		case "noise-sensitivity":
			return noiseSensitivity.fromMetadata(metadata, input);
		case "bleu":
			return bleu.fromMetadata(metadata, input);
		case "rouge":
			return rouge.fromMetadata(metadata, input);
		case "chrf":
			return chrf.fromMetadata(metadata, input);
		case "string-similarity":
			return stringSimilarity.fromMetadata(metadata, input);
		case "hallucination":
			return null;
		default:
			return assertNever(metadata);
	}
}

/**
 * Explanation rebuilt from raw step payloads and prompt text.
 */
function reconstruct(family: ExplainableFamily, input: ExtractionInput): Explanation | null {
	switch (family) {
		case "faithfulness":
			return faithfulness.reconstruct(input);
		case "aspect-critic":
			return aspectCritic.reconstruct(input);
		case "context-precision":
			return contextPrecision.reconstruct(input);
		case "context-recall":
			return contextRecall.reconstruct(input);
		case "context-entity-recall":
			return contextEntityRecall.reconstruct(input);
		case "response-relevancy":
			return responseRelevancy.reconstruct(input);
		case "simple-criteria":
			return simpleCriteria.reconstruct(input);
		case "rubrics":
			return rubrics.reconstruct(input);
		case "semantic-similarity":
			return semanticSimilarity.reconstruct(input);
		case "factual-correctness":
			return factualCorrectness.reconstruct(input);
		case "answer-correctness":
			return answerCorrectness.reconstruct(input);
		case "agent-goal-accuracy":
			return agentGoalAccuracy.reconstruct(input);
		case "tool-call-accuracy":
			return toolCallAccuracy.reconstruct(input);
		case "topic-adherence":
			return topicAdherence.reconstruct(input);
		case "context-relevance":
			return contextRelevance.reconstruct(input);
		case "response-groundedness":
			return responseGroundedness.reconstruct(input);
		case "answer-accuracy":
			return answerAccuracy.reconstruct(input);
		case "noise-sensitivity":
			return noiseSensitivity.reconstruct(input);
		case "bleu":
			return bleu.reconstruct(input);
		case "rouge":
			return rouge.reconstruct(input);
		case "chrf":
			return chrf.reconstruct(input);
		case "string-similarity":
			return stringSimilarity.reconstruct(input);
		default:
			return assertNever(family);
	}
}

/**
 * Explain one metric evaluation.
 *
 * The family comes from the metric name, or from the metadata when the name
 * is not recognized. Unknown metrics, disabled families and extraction
 * failures all return null.
 */
export function dispatch(
	metricName: string,
	steps: readonly StepResult[],
	score: number | null,
	config: unknown,
	metadata?: MetricMetadata,
	options: DispatchOptions = {},
): Explanation | null {
	const engine = options.engine ?? engineDefaults();
	if (!engine.explanations.enabled) return null;

	const family = resolveFamily(metricName) ?? metadata?.family;
	if (family === undefined || !isExplainable(family)) return null;

	const disabled = engine.explanations.disabledFamilies.map((entry) => resolveFamily(entry) ?? normalizeMetricName(entry));
	if (disabled.includes(family)) return null;

	const input: ExtractionInput = {
		metricName,
		steps,
		score,
		config,
		sample: options.sample,
		display: engine.display,
	};

	// Metadata of another family is not evidence for this one
	const usable = metadata !== undefined && metadata.family === family ? metadata : undefined;
	if (metadata !== undefined && usable === undefined) {
		console.debug(`[explanation] Ignoring ${metadata.family} metadata for ${metricName}`);
	}

	try {
		return usable ? fromMetadata(usable, input) : reconstruct(family, input);
	} catch (error) {
		console.warn(`[explanation] Failed to explain ${metricName}:`, error);
		return null;
	}
}

/**
 * Explain a sealed run.
 */
export function explainRun(run: MetricRun, engine?: EngineConfig): Explanation | null {
	return dispatch(run.metricName, run.steps, run.aggregatedScore, run.config, run.metadata, {
		sample: run.sample,
		engine,
	});
}
