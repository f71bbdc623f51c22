/**
 * Score interpretation: percentages, quality levels and the scale shown
 * beside every explanation. Scale and level are projections of the score
 * alone, so both extraction paths render them identically.
 */

import type { ExplainableFamily } from "./families.ts";
import { firstMessage, message, type MessageArg } from "./messages.ts";
import type { ScaleLevel, ScoreInterpretation } from "./model.ts";

export type LevelKey = "excellent" | "good" | "moderate" | "poor";

const LEVEL_KEYS: readonly LevelKey[] = ["excellent", "good", "moderate", "poor"];
const STANDARD_RANGES = ["90-100%", "70-90%", "50-70%", "0-50%"];
const INVERTED_RANGES = ["0-10%", "10-30%", "30-50%", "50-100%"];

export const GOOD_THRESHOLD = 0.7;

export function formatPercent(score: number | null): string {
	return score === null ? "N/A" : `${(score * 100).toFixed(2)}%`;
}

export function formatFixed(value: number | null, digits = 2): string {
	return value === null ? "N/A" : value.toFixed(digits);
}

/**
 * 0 excellent (>= 0.9), 1 good (>= 0.7), 2 moderate (>= 0.5), 3 poor.
 * A missing score sits at the bottom.
 */
export function levelIndex(score: number | null): number {
	if (score === null) return 3;
	if (score >= 0.9) return 0;
	if (score >= 0.7) return 1;
	if (score >= 0.5) return 2;
	return 3;
}

/** Same four levels for scores where lower is better. */
export function invertedLevelIndex(score: number | null): number {
	if (score === null) return 3;
	if (score <= 0.1) return 0;
	if (score <= 0.3) return 1;
	if (score <= 0.5) return 2;
	return 3;
}

function levelKeyAt(index: number): LevelKey {
	return LEVEL_KEYS[index] ?? "poor";
}

export function levelName(index: number): string {
	return message(`scale.${levelKeyAt(index)}`);
}

export function buildScale(family: ExplainableFamily, currentIndex: number, inverted = false): ScaleLevel[] {
	const ranges = inverted ? INVERTED_RANGES : STANDARD_RANGES;
	return LEVEL_KEYS.map((key, index) => ({
		range: ranges[index] ?? "",
		label: message(`scale.${key}`),
		description: firstMessage([`${family}.scale.${key}`, `scale.${key}.description`]),
		current: index === currentIndex,
	}));
}

export interface ScaleProjection {
	scaleLevels: ScaleLevel[];
	currentLevelIndex: number;
	level: string;
}

/**
 * Scale, current level and level name for a score.
 */
export function projectScale(family: ExplainableFamily, score: number | null, inverted = false): ScaleProjection {
	const currentLevelIndex = inverted ? invertedLevelIndex(score) : levelIndex(score);
	return {
		scaleLevels: buildScale(family, currentLevelIndex, inverted),
		currentLevelIndex,
		level: score === null ? message("level.unknown") : levelName(currentLevelIndex),
	};
}

export interface CalculationParts {
	formula: string;
	calculation: string;
	numerator?: number;
	denominator?: number;
}

function meaningFor(family: ExplainableFamily, score: number | null, index: number, args: readonly MessageArg[]): string {
	if (score === null) return message("score.notCalculated");
	const key = levelKeyAt(index);
	return firstMessage([`${family}.meaning.${key}`, `meaning.${key}`], ...args);
}

/**
 * Four-level interpretation where higher is better.
 */
export function standardInterpretation(
	family: ExplainableFamily,
	score: number | null,
	parts: CalculationParts,
	meaningArgs: readonly MessageArg[] = [],
): ScoreInterpretation {
	const projection = projectScale(family, score);
	return {
		...parts,
		score,
		scorePercent: formatPercent(score),
		level: projection.level,
		isGood: score !== null && score >= GOOD_THRESHOLD,
		meaning: meaningFor(family, score, projection.currentLevelIndex, meaningArgs),
		scaleLevels: projection.scaleLevels,
		currentLevelIndex: projection.currentLevelIndex,
	};
}

/**
 * Four-level interpretation where lower is better.
 */
export function invertedInterpretation(
	family: ExplainableFamily,
	score: number | null,
	parts: CalculationParts,
	meaningArgs: readonly MessageArg[] = [],
): ScoreInterpretation {
	const projection = projectScale(family, score, true);
	return {
		...parts,
		score,
		scorePercent: formatPercent(score),
		level: projection.level,
		isGood: score !== null && score <= 1 - GOOD_THRESHOLD,
		meaning: meaningFor(family, score, projection.currentLevelIndex, meaningArgs),
		scaleLevels: projection.scaleLevels,
		currentLevelIndex: projection.currentLevelIndex,
	};
}

/**
 * PASS/FAIL interpretation. `passed` decides the level; a missing score
 * still reads as not calculated.
 */
export function binaryInterpretation(
	family: ExplainableFamily,
	score: number | null,
	passed: boolean,
	parts: CalculationParts,
	meaningArgs: readonly MessageArg[] = [],
): ScoreInterpretation {
	const currentLevelIndex = score !== null && passed ? 0 : 1;
	const outcome = passed ? "pass" : "fail";
	return {
		...parts,
		score,
		scorePercent: formatPercent(score),
		level: score === null ? message("level.unknown") : message(`verdict.${outcome}`),
		isGood: score !== null && passed,
		meaning:
			score === null
				? message("score.notCalculated")
				: firstMessage([`${family}.meaning.${outcome}`, `meaning.${outcome}`], ...meaningArgs),
		scaleLevels: [
			{
				range: "1.0",
				label: message("verdict.pass"),
				description: firstMessage([`${family}.scale.pass`, "scale.pass.description"]),
				current: currentLevelIndex === 0,
			},
			{
				range: "0.0",
				label: message("verdict.fail"),
				description: firstMessage([`${family}.scale.fail`, "scale.fail.description"]),
				current: currentLevelIndex === 1,
			},
		],
		currentLevelIndex,
	};
}
