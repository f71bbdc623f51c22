/**
 * Explanation values: one tagged variant per metric family, sharing the
 * step breakdown and score interpretation.
 */

import type { ConsensusResult } from "../consensus/index.ts";
import type { ExplainableFamily } from "./families.ts";

export type ModelStatus = "ERROR" | "AGREE" | "DISAGREE" | "OK";

export interface ModelStepResult {
	modelId: string;
	success: boolean;
	verdict?: boolean;
	numericResult?: number;
	reasoning?: string;
	errorMessage?: string;
}

/** A model's result as a step displays it */
export interface DisplayedModelResult extends ModelStepResult {
	status: ModelStatus;
}

export interface ExplanationItem {
	content: string;
	passed?: boolean;
	verdict?: string;
	reason?: string;
	source?: string;
	numericValue?: number;
	index?: number;
}

export interface StepExplanation {
	stepName: string;
	stepNumber: number;
	title: string;
	description: string;
	inputData?: string;
	outputSummary?: string;
	items: ExplanationItem[];
	modelResults: DisplayedModelResult[];
	hasModelDisagreement: boolean;
	agreementPercent: number;
}

export interface ScaleLevel {
	range: string;
	label: string;
	description: string;
	current: boolean;
}

export interface ScoreInterpretation {
	formula: string;
	calculation: string;
	numerator?: number;
	denominator?: number;
	score: number | null;
	scorePercent: string;
	level: string;
	isGood?: boolean;
	meaning: string;
	scaleLevels: ScaleLevel[];
	/** Index into scaleLevels, -1 when the family has no scale */
	currentLevelIndex: number;
	minLevel?: number;
	maxLevel?: number;
}

interface ExplanationBase<F extends ExplainableFamily> {
	metricType: F;
	score: number | null;
	description: string;
	steps: StepExplanation[];
	interpretation: ScoreInterpretation;
}

/**
 * Display status of one model within a step: failed calls are errors,
 * verdicts are compared against the step's majority, anything else is OK.
 */
export function modelStatus(result: ModelStepResult, majority?: boolean): ModelStatus {
	if (!result.success) return "ERROR";
	if (result.verdict === undefined || majority === undefined) return "OK";
	return result.verdict === majority ? "AGREE" : "DISAGREE";
}

// ============================================================================
// RAG families
// ============================================================================

export interface StatementVerdict {
	statement: string;
	faithful: boolean;
	reason: string;
}

export interface FaithfulnessExplanation extends ExplanationBase<"faithfulness"> {
	response: string;
	statements: string[];
	verdicts: StatementVerdict[];
	faithfulCount: number;
	totalCount: number;
}

export interface ContextEvaluation {
	position: number;
	text: string;
	relevant: boolean;
	reason: string;
}

export interface ContextPrecisionExplanation extends ExplanationBase<"context-precision"> {
	userInput: string;
	contexts: ContextEvaluation[];
	precisionAtK: number[];
}

export interface StatementAttribution {
	statement: string;
	attributed: boolean;
	reason: string;
}

export interface ContextRecallExplanation extends ExplanationBase<"context-recall"> {
	reference: string;
	context: string;
	classifications: StatementAttribution[];
	attributedCount: number;
	totalCount: number;
}

export interface ContextEntityRecallExplanation extends ExplanationBase<"context-entity-recall"> {
	reference: string;
	context: string;
	referenceEntities: string[];
	contextEntities: string[];
	foundEntities: string[];
	missingEntities: string[];
}

export interface GeneratedQuestion {
	question: string;
	noncommittal: boolean;
}

export interface ModelSimilarity {
	modelId: string;
	similarity: number;
}

export interface ResponseRelevancyExplanation extends ExplanationBase<"response-relevancy"> {
	question: string;
	response: string;
	generatedQuestions: GeneratedQuestion[];
	modelSimilarities: ModelSimilarity[];
}

export interface ContextRelevanceEvaluation {
	context: string;
	rawScore: number;
	normalizedScore: number;
	reasoning: string;
}

export interface ContextRelevanceExplanation extends ExplanationBase<"context-relevance"> {
	userInput: string;
	evaluations: ContextRelevanceEvaluation[];
}

export interface ResponseGroundednessExplanation extends ExplanationBase<"response-groundedness"> {
	response: string;
	context: string;
	rawScore: number | null;
	reasoning: string;
	usedHeuristics: boolean;
}

export interface NoiseSensitivityExplanation extends ExplanationBase<"noise-sensitivity"> {
	mode: "RELEVANT" | "IRRELEVANT";
	reference: string;
	response: string;
	referenceStatements: string[];
	responseStatements: string[];
	contextCount: number;
}

// ============================================================================
// Judge families
// ============================================================================

export interface AspectCriticExplanation extends ExplanationBase<"aspect-critic"> {
	aspectName: string;
	definition: string;
	response: string;
	passed: boolean;
	reasoning: string;
	strictness: number;
	modelIterations: Record<string, (boolean | null)[]>;
	consensus: ConsensusResult;
}

export interface SimpleCriteriaExplanation extends ExplanationBase<"simple-criteria"> {
	criteriaName: string;
	definition: string;
	reasoning: string;
	modelScores: Record<string, number>;
	rawScore: number;
	minScore: number;
	maxScore: number;
}

export interface RubricLevel {
	level: number;
	description: string;
}

export interface RubricsExplanation extends ExplanationBase<"rubrics"> {
	response: string;
	reasoning: string;
	modelScores: Record<string, number>;
	/** Highest level first */
	levels: RubricLevel[];
	selectedLevel: number;
	minLevel: number;
	maxLevel: number;
}

export interface AnswerAccuracyExplanation extends ExplanationBase<"answer-accuracy"> {
	response: string;
	reference: string;
	rawScore: number | null;
	reasoning: string;
	usedDualJudge: boolean;
	confirmationScore: number | null;
	confirmationReasoning: string;
}

export interface ClaimVerdict {
	claim: string;
	supported: boolean;
	reason: string;
}

export interface FactualCorrectnessExplanation extends ExplanationBase<"factual-correctness"> {
	mode: "F1" | "PRECISION" | "RECALL";
	responseClaims: string[];
	referenceClaims: string[];
	precisionVerdicts: ClaimVerdict[];
	recallVerdicts: ClaimVerdict[];
	precision: number | null;
	recall: number | null;
}

export interface AnswerCorrectnessExplanation extends ExplanationBase<"answer-correctness"> {
	factualScore: number | null;
	semanticScore: number | null;
	factualWeight: number;
	semanticWeight: number;
}

export interface SemanticSimilarityExplanation extends ExplanationBase<"semantic-similarity"> {
	response: string;
	reference: string;
	modelSimilarities: ModelSimilarity[];
	threshold: number | null;
}

// ============================================================================
// Agent families
// ============================================================================

export interface ModelVerdict {
	modelId: string;
	verdict: boolean;
	reasoning: string;
}

export interface AgentGoalAccuracyExplanation extends ExplanationBase<"agent-goal-accuracy"> {
	mode: "WITH_REFERENCE" | "WITHOUT_REFERENCE";
	inferredGoal: string;
	referenceGoal: string;
	goalAchieved: boolean;
	modelVerdicts: ModelVerdict[];
	consensus: ConsensusResult;
}

export interface ToolCallMatch {
	actualCall: string;
	referenceCall: string | null;
	matched: boolean;
	matchScore: number;
}

export interface ToolCallAccuracyExplanation extends ExplanationBase<"tool-call-accuracy"> {
	mode: "STRICT" | "FLEXIBLE";
	precision: number;
	recall: number;
	truePositives: number;
	falsePositives: number;
	falseNegatives: number;
	matches: ToolCallMatch[];
	/** Precision and recall were taken from the score because the steps reported none */
	approximated: boolean;
}

export interface TopicClassification {
	topic: string;
	onTopic: boolean;
	matchedReferenceTopic: string | null;
	reasoning: string;
}

export interface TopicAdherenceExplanation extends ExplanationBase<"topic-adherence"> {
	mode: "F1" | "PRECISION" | "RECALL";
	referenceTopics: string[];
	extractedTopics: string[];
	classifications: TopicClassification[];
	precision: number;
	recall: number;
	f1: number;
}

// ============================================================================
// Non-LLM families
// ============================================================================

export interface SampleTexts {
	response: string;
	reference: string;
}

export interface BleuExplanation extends ExplanationBase<"bleu">, SampleTexts {
	maxNgram: number;
	smoothing: string;
}

export interface RougeExplanation extends ExplanationBase<"rouge">, SampleTexts {
	rougeType: string;
	mode: string;
}

export interface ChrfExplanation extends ExplanationBase<"chrf">, SampleTexts {
	charNgramOrder: number;
	wordNgramOrder: number;
	beta: number;
}

export interface StringSimilarityExplanation extends ExplanationBase<"string-similarity">, SampleTexts {
	distanceMeasure: string;
	caseSensitive: boolean;
}

export type Explanation =
	| FaithfulnessExplanation
	| AspectCriticExplanation
	| ContextPrecisionExplanation
	| ContextRecallExplanation
	| ContextEntityRecallExplanation
	| ResponseRelevancyExplanation
	| SimpleCriteriaExplanation
	| RubricsExplanation
	| SemanticSimilarityExplanation
	| FactualCorrectnessExplanation
	| AnswerCorrectnessExplanation
	| AgentGoalAccuracyExplanation
	| ToolCallAccuracyExplanation
	| TopicAdherenceExplanation
	| ContextRelevanceExplanation
	| ResponseGroundednessExplanation
	| AnswerAccuracyExplanation
	| NoiseSensitivityExplanation
	| BleuExplanation
	| RougeExplanation
	| ChrfExplanation
	| StringSimilarityExplanation;

/** Explanation variant for a family */
export type ExplanationOf<F extends ExplainableFamily> = Extract<Explanation, { metricType: F }>;
