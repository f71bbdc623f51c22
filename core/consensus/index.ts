export {
	agreementPercent,
	computeConsensus,
	computeNumericConsensus,
	computeSingleVerdictConsensus,
	crossModelDecision,
	majorityDecision,
	type ConsensusResult,
	type IterationVerdict,
	type VerdictMap,
} from "./voting.ts";
export {
	AGGREGATION_STRATEGIES,
	aggregateModelScores,
	aggregateScores,
	ConsensusToleranceError,
	type AggregationOptions,
	type AggregationStrategy,
	type ModelScoreAggregation,
} from "./aggregator.ts";
