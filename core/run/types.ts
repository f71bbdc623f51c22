/**
 * Step and run records produced while a metric evaluates a sample.
 *
 * A metric runs a fixed protocol of steps (extract statements, verify them,
 * compute the score...). Each step is sent to every configured model and
 * yields one ModelResult per model, or one per model per iteration when the
 * metric samples the same model repeatedly. Iterations of one model are
 * told apart only by their order inside `modelResults`.
 */

import type { MetricMetadata } from "../explanation/metadata.ts";

export type StepType = "LLM" | "EMBEDDING" | "COMPUTE";

export interface SucceededModelResult {
	readonly modelId: string;
	readonly success: true;
	/** Raw model output: a JSON document or a bare scalar such as "0.87" */
	readonly resultPayload?: string;
	readonly durationMs?: number;
}

export interface FailedModelResult {
	readonly modelId: string;
	readonly success: false;
	readonly errorMessage: string;
	readonly durationMs?: number;
}

export type ModelResult = SucceededModelResult | FailedModelResult;

export interface StepResult {
	readonly stepName: string;
	readonly stepType: StepType;
	readonly modelResults: readonly ModelResult[];
	/** Prompt text sent to the models, when the runner kept it */
	readonly requestText?: string;
}

/**
 * A model dropped from the rest of a run after failing a step.
 */
export interface ModelExclusion {
	readonly modelId: string;
	readonly failedStepName: string;
	readonly failedStepIndex: number;
	readonly cause: string;
}

/**
 * Texts of the evaluated sample, when the runner passes them along.
 */
export interface SampleContext {
	readonly userInput?: string;
	readonly response?: string;
	readonly reference?: string;
	readonly retrievedContexts?: readonly string[];
}

/**
 * Sealed record of one metric evaluation.
 */
export interface MetricRun {
	readonly metricName: string;
	readonly steps: readonly StepResult[];
	/** null exactly when every model failed every scoring step */
	readonly aggregatedScore: number | null;
	/** Metric configuration as the metric received it; not interpreted here */
	readonly config: unknown;
	readonly modelIds: ReadonlySet<string>;
	readonly exclusions: readonly ModelExclusion[];
	readonly metadata?: MetricMetadata;
	readonly sample?: SampleContext;
}
