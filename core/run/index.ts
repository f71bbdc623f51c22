export type {
	FailedModelResult,
	MetricRun,
	ModelExclusion,
	ModelResult,
	SampleContext,
	StepResult,
	StepType,
	SucceededModelResult,
} from "./types.ts";
export {
	allModelsFailed,
	createStep,
	failed,
	failedResults,
	stepDurationMs,
	succeeded,
	successfulResults,
} from "./model-result.ts";
export { MetricRunBuilder, SealedRunError, type MetricRunBuilderOptions } from "./builder.ts";
export {
	CompositeListener,
	LoggingExecutionListener,
	type MetricExecutionListener,
	type MetricStartEvent,
	type ModelExcludedEvent,
	type StepCompleteEvent,
} from "./listener.ts";
