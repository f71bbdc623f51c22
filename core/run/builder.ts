/**
 * MetricRunBuilder - single-owner accumulator for one metric evaluation.
 *
 * The runner creates one builder per (metric, sample), appends steps as they
 * complete and seals it when the metric has its score. Sealing freezes the
 * collected steps, metadata and sample into a MetricRun; every later
 * mutation throws.
 */

import type { AggregationConfig } from "../config.ts";
import { aggregateModelScores } from "../consensus/aggregator.ts";
import type { MetricMetadata } from "../explanation/metadata.ts";
import type {
	MetricRun,
	ModelExclusion,
	ModelResult,
	SampleContext,
	StepResult,
	StepType,
} from "./types.ts";
import type { MetricExecutionListener } from "./listener.ts";
import { allModelsFailed, createStep, frozenCopy } from "./model-result.ts";

/**
 * Error thrown when a sealed builder is modified.
 */
export class SealedRunError extends Error {
	constructor(public readonly metricName: string, operation: string) {
		super(`MetricRun "${metricName}" is sealed; cannot ${operation}`);
		this.name = "SealedRunError";
	}
}

export interface MetricRunBuilderOptions {
	config?: unknown;
	sample?: SampleContext;
	/** Models the metric was configured with, including ones that later fail */
	modelIds?: Iterable<string>;
	listener?: MetricExecutionListener;
}

export class MetricRunBuilder {
	private readonly steps: StepResult[] = [];
	private readonly modelIds = new Set<string>();
	private readonly exclusions: ModelExclusion[] = [];
	private readonly config: unknown;
	private readonly sample?: SampleContext;
	private readonly listener?: MetricExecutionListener;
	private sealedRun: MetricRun | null = null;

	constructor(public readonly metricName: string, options: MetricRunBuilderOptions = {}) {
		this.config = options.config;
		this.sample = options.sample === undefined ? undefined : frozenCopy(options.sample);
		this.listener = options.listener;
		for (const id of options.modelIds ?? []) {
			this.modelIds.add(id);
		}

		this.listener?.onMetricStart?.({
			metricName,
			modelIds: [...this.modelIds],
			config: this.config,
			sample: this.sample,
		});
	}

	get isSealed(): boolean {
		return this.sealedRun !== null;
	}

	get stepCount(): number {
		return this.steps.length;
	}

	/**
	 * Append a completed step. Model ids seen in the step join the run's
	 * model set.
	 */
	addStep(step: StepResult): this {
		this.assertOpen("add a step");
		const frozen = createStep(step.stepName, step.stepType, step.modelResults, step.requestText);
		this.steps.push(frozen);
		for (const result of frozen.modelResults) {
			this.modelIds.add(result.modelId);
		}

		this.listener?.onStepComplete?.({
			metricName: this.metricName,
			stepIndex: this.steps.length - 1,
			step: frozen,
		});
		return this;
	}

	/**
	 * Shorthand for addStep(createStep(...)).
	 */
	recordStep(
		stepName: string,
		stepType: StepType,
		modelResults: readonly ModelResult[],
		requestText?: string,
	): this {
		return this.addStep(createStep(stepName, stepType, modelResults, requestText));
	}

	/**
	 * Record that a model was dropped after failing a step. The model stays
	 * in the run's model set; callers report it as excluded, not as a "no" vote.
	 */
	excludeModel(exclusion: ModelExclusion): this {
		this.assertOpen("exclude a model");
		const frozen = Object.freeze({ ...exclusion });
		this.exclusions.push(frozen);
		this.modelIds.add(frozen.modelId);
		this.listener?.onModelExcluded?.({ metricName: this.metricName, ...frozen });
		return this;
	}

	/**
	 * Freeze the run. Metadata and sample are deep-frozen copies, so later
	 * edits to the caller's objects do not reach the run. A score is dropped
	 * to null when every recorded model result failed, or when it is not a
	 * finite number.
	 *
	 * @throws SealedRunError if the builder was already sealed
	 */
	seal(aggregatedScore: number | null, metadata?: MetricMetadata): MetricRun {
		this.assertOpen("seal it again");

		const score = aggregatedScore !== null && Number.isFinite(aggregatedScore) && !allModelsFailed(this.steps)
			? aggregatedScore
			: null;

		const run: MetricRun = Object.freeze({
			metricName: this.metricName,
			steps: Object.freeze([...this.steps]),
			aggregatedScore: score,
			config: this.config,
			modelIds: new Set(this.modelIds),
			exclusions: Object.freeze([...this.exclusions]),
			metadata: metadata === undefined ? undefined : frozenCopy(metadata),
			sample: this.sample,
		});
		this.sealedRun = run;
		this.listener?.onMetricComplete?.(run);
		return run;
	}

	/**
	 * Seal with the aggregate of per-model scores. Models without a score
	 * stay out of the aggregate.
	 *
	 * @throws ConsensusToleranceError when the "consensus" strategy finds the
	 * models too far apart; the builder stays open
	 */
	sealWithModelScores(
		modelScores: Readonly<Record<string, number | null>>,
		aggregation: AggregationConfig,
		metadata?: MetricMetadata,
	): MetricRun {
		this.assertOpen("seal it again");
		const { score } = aggregateModelScores(modelScores, aggregation.strategy, { tolerance: aggregation.tolerance });
		return this.seal(score, metadata);
	}

	/**
	 * The sealed run, or null while the builder is still open.
	 */
	get run(): MetricRun | null {
		return this.sealedRun;
	}

	private assertOpen(operation: string): void {
		if (this.sealedRun !== null) {
			throw new SealedRunError(this.metricName, operation);
		}
	}
}

