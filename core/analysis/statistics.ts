/**
 * Descriptive statistics over per-model scores.
 *
 * Used by the score aggregator and by the numeric consensus path.
 * Every function treats an empty input as "no data" and returns null
 * rather than NaN.
 */

/**
 * Summary of a score sample.
 */
export interface ScoreSummary {
	/** Number of observations */
	n: number;
	mean: number;
	median: number;
	min: number;
	max: number;
	/** Sample standard deviation (0 for fewer than two values) */
	std: number;
	/** max - min */
	range: number;
}

/**
 * Compute mean of an array.
 */
export function mean(values: readonly number[]): number | null {
	if (values.length === 0) return null;
	return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Median; the average of the two middle values for even-sized input.
 */
export function median(values: readonly number[]): number | null {
	if (values.length === 0) return null;
	const sorted = [...values].sort((a, b) => a - b);
	const mid = Math.floor(sorted.length / 2);
	if (sorted.length % 2 === 0) {
		return (sorted[mid - 1] + sorted[mid]) / 2;
	}
	return sorted[mid];
}

/**
 * Compute sample standard deviation.
 */
export function std(values: readonly number[]): number | null {
	const m = mean(values);
	if (m === null) return null;
	if (values.length === 1) return 0;
	const variance = values.reduce((acc, v) => acc + (v - m) ** 2, 0) / (values.length - 1);
	return Math.sqrt(variance);
}

export function summarize(values: readonly number[]): ScoreSummary | null {
	const m = mean(values);
	const med = median(values);
	const s = std(values);
	if (m === null || med === null || s === null) return null;

	const min = Math.min(...values);
	const max = Math.max(...values);
	return { n: values.length, mean: m, median: med, min, max, std: s, range: max - min };
}
