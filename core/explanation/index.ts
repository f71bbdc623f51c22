export { dispatch, explainRun, type DispatchOptions } from "./dispatcher.ts";
export {
	FamilyRegistry,
	getFamilyRegistry,
	isExplainable,
	METRIC_FAMILIES,
	normalizeMetricName,
	resetFamilyRegistry,
	resolveFamily,
	type ExplainableFamily,
	type FamilyDescriptor,
	type MetricFamily,
} from "./families.ts";
export { firstModelValue, MetricMetadataSchema, parseMetricMetadata, type MetadataOf, type MetricMetadata } from "./metadata.ts";
export { formatPercent, GOOD_THRESHOLD, projectScale, type ScaleProjection } from "./interpretation.ts";
export { hasMessage, message } from "./messages.ts";
export { modelStatus } from "./model.ts";
export type {
	AgentGoalAccuracyExplanation,
	AnswerAccuracyExplanation,
	AnswerCorrectnessExplanation,
	AspectCriticExplanation,
	BleuExplanation,
	ChrfExplanation,
	ClaimVerdict,
	ContextEntityRecallExplanation,
	ContextEvaluation,
	ContextPrecisionExplanation,
	ContextRecallExplanation,
	ContextRelevanceEvaluation,
	ContextRelevanceExplanation,
	DisplayedModelResult,
	Explanation,
	ExplanationItem,
	ExplanationOf,
	FactualCorrectnessExplanation,
	FaithfulnessExplanation,
	GeneratedQuestion,
	ModelSimilarity,
	ModelStatus,
	ModelStepResult,
	ModelVerdict,
	NoiseSensitivityExplanation,
	ResponseGroundednessExplanation,
	ResponseRelevancyExplanation,
	RougeExplanation,
	RubricLevel,
	RubricsExplanation,
	SampleTexts,
	ScaleLevel,
	ScoreInterpretation,
	SemanticSimilarityExplanation,
	SimpleCriteriaExplanation,
	StatementAttribution,
	StatementVerdict,
	StepExplanation,
	StringSimilarityExplanation,
	ToolCallAccuracyExplanation,
	ToolCallMatch,
	TopicAdherenceExplanation,
	TopicClassification,
} from "./model.ts";
export { matchEntities, normalizeWeights, parseRubricLevels, precisionAtK, selectLevel } from "./families/index.ts";
