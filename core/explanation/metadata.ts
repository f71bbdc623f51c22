/**
 * Structured metadata a metric may attach to its run. When present it is
 * the preferred source for an explanation; per-model maps are keyed by
 * model id.
 */

import { z } from "zod";

const PerModel = <T extends z.ZodTypeAny>(value: T) => z.record(z.string(), value);

const FaithfulnessMetadataSchema = z.object({
	family: z.literal("faithfulness"),
	extractedStatements: PerModel(z.array(z.string())),
	verdicts: PerModel(z.array(z.object({ statement: z.string(), verdict: z.number(), reason: z.string() }))),
	faithfulCount: z.number().int().nonnegative(),
	totalCount: z.number().int().nonnegative(),
});

const AspectCriticMetadataSchema = z.object({
	family: z.literal("aspect-critic"),
	definition: z.string(),
	strictness: z.number().int().positive(),
	/** Iteration verdicts per model; null marks a failed iteration */
	modelVerdicts: PerModel(z.array(z.boolean().nullable())),
	modelReasonings: PerModel(z.array(z.string())),
});

const ContextPrecisionMetadataSchema = z.object({
	family: z.literal("context-precision"),
	evaluationStrategy: z.string(),
	modelRelevanceResults: PerModel(z.array(z.boolean())),
	contextCount: z.number().int().nonnegative(),
});

const ContextRecallMetadataSchema = z.object({
	family: z.literal("context-recall"),
	classifications: PerModel(z.array(z.object({ statement: z.string(), attributed: z.number(), reason: z.string() }))),
	attributedCount: z.number().int().nonnegative(),
	totalCount: z.number().int().nonnegative(),
});

const ContextEntityRecallMetadataSchema = z.object({
	family: z.literal("context-entity-recall"),
	referenceEntities: PerModel(z.array(z.string())),
	contextEntities: PerModel(z.array(z.string())),
});

const ResponseRelevancyMetadataSchema = z.object({
	family: z.literal("response-relevancy"),
	generatedQuestions: PerModel(z.array(z.string())),
	noncommittalFlags: PerModel(z.array(z.boolean())),
	similarityScores: PerModel(z.number()),
});

const SimpleCriteriaMetadataSchema = z.object({
	family: z.literal("simple-criteria"),
	definition: z.string(),
	minScore: z.number(),
	maxScore: z.number(),
	modelRawScores: PerModel(z.array(z.number())),
	modelReasonings: PerModel(z.array(z.string())),
});

const RubricsMetadataSchema = z.object({
	family: z.literal("rubrics"),
	rubrics: z.record(z.string(), z.string()),
	modelScores: PerModel(z.number()),
	modelReasonings: PerModel(z.string()),
});

const SemanticSimilarityMetadataSchema = z.object({
	family: z.literal("semantic-similarity"),
	embeddingModelScores: PerModel(z.number()),
	threshold: z.number().nullable(),
});

const ClaimVerdictSchema = z.object({ claim: z.string(), verdict: z.number(), reason: z.string() });

const FactualCorrectnessMetadataSchema = z.object({
	family: z.literal("factual-correctness"),
	mode: z.enum(["F1", "PRECISION", "RECALL"]),
	responseClaims: PerModel(z.array(z.string())),
	referenceClaims: PerModel(z.array(z.string())),
	precisionVerdicts: PerModel(z.array(ClaimVerdictSchema)),
	recallVerdicts: PerModel(z.array(ClaimVerdictSchema)),
});

const AnswerCorrectnessMetadataSchema = z.object({
	family: z.literal("answer-correctness"),
	factualScore: z.number().nullable(),
	semanticScore: z.number().nullable(),
	factualWeight: z.number(),
	semanticWeight: z.number(),
});

const AgentGoalAccuracyMetadataSchema = z.object({
	family: z.literal("agent-goal-accuracy"),
	mode: z.enum(["WITH_REFERENCE", "WITHOUT_REFERENCE"]),
	inferredGoal: z.string().nullable(),
	modelVerdicts: PerModel(z.boolean()),
	modelReasonings: PerModel(z.string()),
});

const ToolCallAccuracyMetadataSchema = z.object({
	family: z.literal("tool-call-accuracy"),
	mode: z.enum(["STRICT", "FLEXIBLE"]),
	truePositives: z.number().int().nonnegative(),
	falsePositives: z.number().int().nonnegative(),
	falseNegatives: z.number().int().nonnegative(),
	precision: z.number(),
	recall: z.number(),
	matches: z.array(
		z.object({
			actualCall: z.string(),
			referenceCall: z.string().nullable(),
			matched: z.boolean(),
			matchScore: z.number(),
		}),
	),
});

const TopicAdherenceMetadataSchema = z.object({
	family: z.literal("topic-adherence"),
	mode: z.enum(["F1", "PRECISION", "RECALL"]),
	referenceTopics: z.array(z.string()),
	extractedTopics: z.array(z.string()),
	modelClassifications: PerModel(
		z.array(
			z.object({
				topic: z.string(),
				onTopic: z.boolean(),
				matchedReferenceTopic: z.string().nullable(),
				reasoning: z.string(),
			}),
		),
	),
});

const ContextRelevanceMetadataSchema = z.object({
	family: z.literal("context-relevance"),
	/** Normalized (0..1) score per context, in retrieval order */
	contextScores: z.array(z.number()),
	contextReasonings: z.array(z.string()).optional(),
});

const ResponseGroundednessMetadataSchema = z.object({
	family: z.literal("response-groundedness"),
	usedHeuristics: z.boolean(),
	reasoning: z.string().optional(),
});

const JudgmentSchema = z.object({ rawScore: z.number(), reasoning: z.string() });

const AnswerAccuracyMetadataSchema = z.object({
	family: z.literal("answer-accuracy"),
	initialJudgments: PerModel(JudgmentSchema),
	confirmationJudgments: PerModel(JudgmentSchema),
	usedDualJudge: z.boolean(),
});

const NoiseSensitivityMetadataSchema = z.object({
	family: z.literal("noise-sensitivity"),
	mode: z.enum(["RELEVANT", "IRRELEVANT"]),
	referenceStatements: PerModel(z.array(z.string())),
	responseStatements: PerModel(z.array(z.string())),
	contextCount: z.number().int().nonnegative(),
});

const BleuMetadataSchema = z.object({
	family: z.literal("bleu"),
	maxNgram: z.number().int().positive(),
	smoothing: z.string(),
});

const RougeMetadataSchema = z.object({
	family: z.literal("rouge"),
	rougeType: z.string(),
	mode: z.string(),
});

const ChrfMetadataSchema = z.object({
	family: z.literal("chrf"),
	charNgramOrder: z.number().int().positive(),
	wordNgramOrder: z.number().int().nonnegative(),
	beta: z.number().positive(),
});

const StringSimilarityMetadataSchema = z.object({
	family: z.literal("string-similarity"),
	distanceMeasure: z.string(),
	caseSensitive: z.boolean(),
});

const HallucinationMetadataSchema = z.object({
	family: z.literal("hallucination"),
	claims: z.array(z.object({ claim: z.string(), supported: z.boolean() })),
});

export const MetricMetadataSchema = z.discriminatedUnion("family", [
	FaithfulnessMetadataSchema,
	AspectCriticMetadataSchema,
	ContextPrecisionMetadataSchema,
	ContextRecallMetadataSchema,
	ContextEntityRecallMetadataSchema,
	ResponseRelevancyMetadataSchema,
	SimpleCriteriaMetadataSchema,
	RubricsMetadataSchema,
	SemanticSimilarityMetadataSchema,
	FactualCorrectnessMetadataSchema,
	AnswerCorrectnessMetadataSchema,
	AgentGoalAccuracyMetadataSchema,
	ToolCallAccuracyMetadataSchema,
	TopicAdherenceMetadataSchema,
	ContextRelevanceMetadataSchema,
	ResponseGroundednessMetadataSchema,
	AnswerAccuracyMetadataSchema,
	NoiseSensitivityMetadataSchema,
	BleuMetadataSchema,
	RougeMetadataSchema,
	ChrfMetadataSchema,
	StringSimilarityMetadataSchema,
	HallucinationMetadataSchema,
]);

export type MetricMetadata = z.infer<typeof MetricMetadataSchema>;

/** Metadata variant for a family */
export type MetadataOf<F extends MetricMetadata["family"]> = Extract<MetricMetadata, { family: F }>;

/**
 * Validate metadata received from outside the process.
 * Returns null, and logs, when it does not match any family's shape.
 */
export function parseMetricMetadata(value: unknown): MetricMetadata | null {
	const parsed = MetricMetadataSchema.safeParse(value);
	if (parsed.success) {
		return parsed.data;
	}
	const issue = parsed.error.issues[0];
	console.debug(
		`[explanation] Ignoring metadata: ${issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid"}`,
	);
	return null;
}

/**
 * Value of the first model in a per-model map, by insertion order. The value
 * is copied, so an explanation never shares arrays with the run's metadata.
 */
export function firstModelValue<T>(perModel: Readonly<Record<string, T>>): T | undefined {
	const [first] = Object.values(perModel);
	return first === undefined ? undefined : structuredClone(first);
}
