/**
 * Majority voting across models and repeated iterations.
 *
 * Verdicts arrive as a map from model id to that model's iterations in the
 * order they ran. A `null` iteration is a failed call. Models without a
 * single successful iteration take no part in the vote and are listed in
 * `excludedModels` instead of being counted as "no".
 *
 * Two fixed policies apply:
 * - a model passes only with a strict majority of its successful
 *   iterations, so 1 pass out of 2 is a fail;
 * - a tie between passing and failing models resolves to fail.
 */

import { mean } from "../analysis/statistics.ts";

export type IterationVerdict = boolean | null;

export type VerdictMap = Readonly<Record<string, readonly IterationVerdict[]>>;

export interface ConsensusResult {
	/** Cross-model decision */
	decision: boolean;
	/** Share of voting models on the majority side, 0..100 */
	agreementPercent: number;
	/** Voting models are split */
	hasDisagreement: boolean;
	/** Voting models whose own decision is a pass */
	successCount: number;
	/** Voting models, i.e. models with at least one successful iteration */
	totalCount: number;
	/** Per-model decision of every voting model */
	modelDecisions: Record<string, boolean>;
	/** Models with no successful iteration, in input order */
	excludedModels: string[];
}

/**
 * Strict majority over one model's successful iterations.
 * Returns null when none succeeded.
 */
export function majorityDecision(iterations: readonly IterationVerdict[]): boolean | null {
	let passVotes = 0;
	let successful = 0;
	for (const verdict of iterations) {
		if (verdict === null) continue;
		successful++;
		if (verdict) passVotes++;
	}
	if (successful === 0) return null;
	return passVotes > successful / 2;
}

/**
 * Majority of per-model decisions; ties fail.
 */
export function crossModelDecision(decisions: readonly boolean[]): boolean {
	let pass = 0;
	for (const decision of decisions) {
		if (decision) pass++;
	}
	return pass > decisions.length - pass;
}

/**
 * max(agree, disagree) / total * 100. 100 when nobody voted.
 */
export function agreementPercent(passCount: number, totalCount: number): number {
	if (totalCount === 0) return 100;
	return (Math.max(passCount, totalCount - passCount) / totalCount) * 100;
}

export function computeConsensus(verdicts: VerdictMap): ConsensusResult {
	const modelDecisions: Record<string, boolean> = {};
	const excludedModels: string[] = [];
	const decisions: boolean[] = [];

	for (const [modelId, iterations] of Object.entries(verdicts)) {
		const decision = majorityDecision(iterations);
		if (decision === null) {
			excludedModels.push(modelId);
			continue;
		}
		modelDecisions[modelId] = decision;
		decisions.push(decision);
	}

	const totalCount = decisions.length;
	const successCount = decisions.filter(Boolean).length;

	return {
		decision: crossModelDecision(decisions),
		agreementPercent: agreementPercent(successCount, totalCount),
		hasDisagreement: successCount > 0 && successCount < totalCount,
		successCount,
		totalCount,
		modelDecisions,
		excludedModels,
	};
}

/**
 * Consensus over numeric verdicts: each model's successful scores are
 * averaged and the mean passes when it reaches `threshold`.
 */
export function computeNumericConsensus(
	scores: Readonly<Record<string, readonly (number | null)[]>>,
	threshold = 0.5,
): ConsensusResult {
	const verdicts: Record<string, IterationVerdict[]> = {};
	for (const [modelId, values] of Object.entries(scores)) {
		const present = values.filter((v): v is number => v !== null && Number.isFinite(v));
		const m = mean(present);
		verdicts[modelId] = m === null ? [null] : [m >= threshold];
	}
	return computeConsensus(verdicts);
}

/**
 * Consensus over single boolean verdicts (one iteration per model).
 */
export function computeSingleVerdictConsensus(
	verdicts: Readonly<Record<string, boolean | null>>,
): ConsensusResult {
	const wrapped: Record<string, IterationVerdict[]> = {};
	for (const [modelId, verdict] of Object.entries(verdicts)) {
		wrapped[modelId] = [verdict];
	}
	return computeConsensus(wrapped);
}
