/**
 * Execution listeners.
 *
 * The evaluation runner reports progress through these callbacks. The
 * builder records what it is told; other listeners log or forward it.
 */

import type { MetricRun, ModelExclusion, SampleContext, StepResult } from "./types.ts";
import { failedResults, stepDurationMs, successfulResults } from "./model-result.ts";

export interface MetricStartEvent {
	metricName: string;
	modelIds: readonly string[];
	config: unknown;
	sample?: SampleContext;
}

export interface StepCompleteEvent {
	metricName: string;
	stepIndex: number;
	step: StepResult;
}

export interface ModelExcludedEvent extends ModelExclusion {
	metricName: string;
}

/**
 * All callbacks are optional and synchronous.
 */
export interface MetricExecutionListener {
	onMetricStart?(event: MetricStartEvent): void;
	onStepComplete?(event: StepCompleteEvent): void;
	onModelExcluded?(event: ModelExcludedEvent): void;
	onMetricComplete?(run: MetricRun): void;
}

/**
 * Fans events out to several listeners. A listener that throws is logged
 * and skipped; the others still receive the event.
 */
export class CompositeListener implements MetricExecutionListener {
	private readonly listeners: readonly MetricExecutionListener[];

	constructor(listeners: readonly MetricExecutionListener[]) {
		this.listeners = [...listeners];
	}

	onMetricStart(event: MetricStartEvent): void {
		this.each("onMetricStart", (l) => l.onMetricStart?.(event));
	}

	onStepComplete(event: StepCompleteEvent): void {
		this.each("onStepComplete", (l) => l.onStepComplete?.(event));
	}

	onModelExcluded(event: ModelExcludedEvent): void {
		this.each("onModelExcluded", (l) => l.onModelExcluded?.(event));
	}

	onMetricComplete(run: MetricRun): void {
		this.each("onMetricComplete", (l) => l.onMetricComplete?.(run));
	}

	private each(callback: string, fn: (listener: MetricExecutionListener) => void): void {
		for (const listener of this.listeners) {
			try {
				fn(listener);
			} catch (error) {
				console.warn(`[run] Listener failed in ${callback}:`, error);
			}
		}
	}
}

/**
 * Prints a one-line summary per event.
 */
export class LoggingExecutionListener implements MetricExecutionListener {
	constructor(private readonly log: (line: string) => void = (line) => console.info(line)) {}

	onMetricStart(event: MetricStartEvent): void {
		this.log(`[run] ${event.metricName}: started with ${event.modelIds.length} model(s)`);
	}

	onStepComplete(event: StepCompleteEvent): void {
		const { step } = event;
		const ok = successfulResults(step).length;
		const failedIds = failedResults(step).map((r) => r.modelId);
		this.log(
			`[run] ${event.metricName}: step ${event.stepIndex + 1} ${step.stepName} (${step.stepType}) ` +
				`${ok}/${step.modelResults.length} ok in ${stepDurationMs(step)}ms` +
				(failedIds.length > 0 ? `, failed: ${failedIds.join(", ")}` : ""),
		);
	}

	onModelExcluded(event: ModelExcludedEvent): void {
		this.log(
			`[run] ${event.metricName}: excluded ${event.modelId} after ${event.failedStepName}: ${event.cause}`,
		);
	}

	onMetricComplete(run: MetricRun): void {
		const score = run.aggregatedScore === null ? "not calculated" : run.aggregatedScore.toFixed(4);
		this.log(`[run] ${run.metricName}: completed, score ${score}`);
	}
}
