/**
 * Reduction of per-model scores into the metric's aggregated score.
 */

import { mean, median, summarize } from "../analysis/statistics.ts";

export const AGGREGATION_STRATEGIES = [
	"average",
	"median",
	"min",
	"max",
	"majority-voting",
	"consensus",
] as const;

export type AggregationStrategy = (typeof AGGREGATION_STRATEGIES)[number];

/**
 * Error thrown by the consensus strategy when models disagree by more than
 * the configured tolerance.
 */
export class ConsensusToleranceError extends Error {
	constructor(
		public readonly spread: number,
		public readonly tolerance: number,
	) {
		super(`Model scores spread ${spread.toFixed(4)} exceeds consensus tolerance ${tolerance}`);
		this.name = "ConsensusToleranceError";
	}
}

export interface AggregationOptions {
	/** Maximum max-min spread accepted by the consensus strategy (default 0.2) */
	tolerance?: number;
}

/**
 * Aggregate a list of scores. Returns null for an empty list.
 *
 * @throws ConsensusToleranceError for "consensus" when the spread exceeds the tolerance
 */
export function aggregateScores(
	scores: readonly number[],
	strategy: AggregationStrategy,
	options: AggregationOptions = {},
): number | null {
	if (scores.length === 0) return null;

	switch (strategy) {
		case "average":
			return mean(scores);
		case "median":
			return median(scores);
		case "min":
			return Math.min(...scores);
		case "max":
			return Math.max(...scores);
		case "majority-voting": {
			const passVotes = scores.filter((s) => s >= 0.5).length;
			return passVotes > scores.length / 2 ? 1 : 0;
		}
		case "consensus": {
			const tolerance = options.tolerance ?? 0.2;
			const summary = summarize(scores);
			if (summary === null) return null;
			if (summary.range > tolerance) {
				throw new ConsensusToleranceError(summary.range, tolerance);
			}
			return summary.mean;
		}
	}
}

export interface ModelScoreAggregation {
	score: number | null;
	/** Models whose score entered the aggregate */
	includedModels: string[];
	/** Models with no score (failed every scoring step) */
	excludedModels: string[];
}

/**
 * Aggregate a per-model score map, leaving models without a score out of
 * both numerator and denominator.
 */
export function aggregateModelScores(
	modelScores: Readonly<Record<string, number | null>>,
	strategy: AggregationStrategy,
	options: AggregationOptions = {},
): ModelScoreAggregation {
	const includedModels: string[] = [];
	const excludedModels: string[] = [];
	const values: number[] = [];

	for (const [modelId, score] of Object.entries(modelScores)) {
		if (score === null || !Number.isFinite(score)) {
			excludedModels.push(modelId);
			continue;
		}
		includedModels.push(modelId);
		values.push(score);
	}

	return { score: aggregateScores(values, strategy, options), includedModels, excludedModels };
}
