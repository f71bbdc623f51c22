/**
 * Configuration schemas.
 * Engine settings come from YAML; metric configs arrive as opaque values
 * from the metric runner and are read leniently.
 */

import { z } from "zod";
import { AGGREGATION_STRATEGIES } from "./consensus/aggregator.ts";

// ============================================================================
// Engine Configuration Schema
// ============================================================================

const ExplanationsConfigSchema = z.object({
	enabled: z.boolean().default(true),
	disabledFamilies: z.array(z.string()).default([]),
});

const DisplayConfigSchema = z.object({
	truncateLength: z.number().int().positive().default(200),
	reasoningLength: z.number().int().positive().default(100),
});

const AggregationConfigSchema = z.object({
	strategy: z.enum(AGGREGATION_STRATEGIES).default("average"),
	tolerance: z.number().nonnegative().default(0.2),
});

export const EngineConfigSchema = z.object({
	explanations: ExplanationsConfigSchema.default({}),
	display: DisplayConfigSchema.default({}),
	aggregation: AggregationConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type DisplayConfig = z.infer<typeof DisplayConfigSchema>;
export type AggregationConfig = z.infer<typeof AggregationConfigSchema>;

export const DEFAULT_DISPLAY: DisplayConfig = { truncateLength: 200, reasoningLength: 100 };

// ============================================================================
// Metric Configuration Schemas
// ============================================================================

export const AspectCriticConfigSchema = z.object({
	name: z.string().optional(),
	definition: z.string().optional(),
	strictness: z.number().int().positive().default(1),
});

export const SimpleCriteriaConfigSchema = z.object({
	name: z.string().optional(),
	definition: z.string().optional(),
	minScore: z.number().default(1),
	maxScore: z.number().default(5),
	strictness: z.number().int().positive().default(1),
});

export const RubricsConfigSchema = z.object({
	rubrics: z.record(z.string(), z.string()).optional(),
});

export const SemanticSimilarityConfigSchema = z.object({
	threshold: z.number().nullable().optional(),
});

export const FactualCorrectnessConfigSchema = z.object({
	mode: z.enum(["F1", "PRECISION", "RECALL"]).default("F1"),
});

export const AnswerCorrectnessConfigSchema = z.object({
	factualWeight: z.number().nonnegative().default(0.75),
	semanticWeight: z.number().nonnegative().default(0.25),
});

export const AgentGoalConfigSchema = z.object({
	mode: z.enum(["WITH_REFERENCE", "WITHOUT_REFERENCE"]).default("WITH_REFERENCE"),
});

export const ToolCallConfigSchema = z.object({
	mode: z.enum(["STRICT", "FLEXIBLE"]).default("STRICT"),
});

export const TopicAdherenceConfigSchema = z.object({
	mode: z.enum(["F1", "PRECISION", "RECALL"]).default("F1"),
	referenceTopics: z.array(z.string()).default([]),
});

export const NoiseSensitivityConfigSchema = z.object({
	mode: z.enum(["RELEVANT", "IRRELEVANT"]).default("RELEVANT"),
});

export const BleuConfigSchema = z.object({
	maxNgram: z.number().int().positive().default(4),
	smoothing: z.string().default("NONE"),
});

export const RougeConfigSchema = z.object({
	rougeType: z.string().default("ROUGE_L"),
	mode: z.string().default("FMEASURE"),
});

export const ChrfConfigSchema = z.object({
	charNgramOrder: z.number().int().positive().default(6),
	wordNgramOrder: z.number().int().nonnegative().default(2),
	beta: z.number().positive().default(2),
});

export const StringSimilarityConfigSchema = z.object({
	distanceMeasure: z.string().default("LEVENSHTEIN"),
	caseSensitive: z.boolean().default(false),
});

/**
 * Read a metric config, falling back to the schema defaults when the
 * value is missing or does not match.
 */
export function readMetricConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, config: unknown): T {
	const parsed = schema.safeParse(config ?? {});
	if (parsed.success) {
		return parsed.data;
	}
	console.debug(`[explanation] Ignoring metric config: ${parsed.error.issues[0]?.message ?? "invalid"}`);
	return schema.parse({});
}
