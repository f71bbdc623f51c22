import { z } from "zod";
import { FactualCorrectnessConfigSchema, readMetricConfig } from "../../config.ts";
import { formatFixed, formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import { firstModelValue } from "../metadata.ts";
import type { ClaimVerdict, ExplanationItem, FactualCorrectnessExplanation } from "../model.ts";
import { BinaryVerdictSchema, fieldReader, firstValueIn, StringListSchema, stepsNamed } from "../payload.ts";
import {
	buildSteps,
	computeScoreStep,
	countCalculation,
	f1Calculation,
	ratio,
	truncate,
	type ExtractionInput,
	type FamilyExtractor,
} from "./shared.ts";

type FactualMode = FactualCorrectnessExplanation["mode"];

interface FactualEvidence {
	mode: FactualMode;
	responseClaims: string[];
	referenceClaims: string[];
	precisionVerdicts: ClaimVerdict[];
	recallVerdicts: ClaimVerdict[];
}

const readClaims = fieldReader("claims", StringListSchema);
const readClaimVerdicts = fieldReader(
	"verdicts",
	z.array(
		z
			.object({
				claim: z.string().optional(),
				statement: z.string().optional(),
				verdict: BinaryVerdictSchema,
				reason: z.string().default(""),
			})
			.transform((v) => ({ claim: v.claim ?? v.statement ?? "", supported: v.verdict, reason: v.reason })),
	),
);

function verdictItems(verdicts: readonly ClaimVerdict[], source: string, reasonLength: number): ExplanationItem[] {
	return verdicts.map((v, i) => ({
		content: v.claim,
		passed: v.supported,
		verdict: message(v.supported ? "verdict.supported" : "verdict.notSupported"),
		reason: truncate(v.reason, reasonLength),
		source,
		index: i + 1,
	}));
}

function supportedCount(verdicts: readonly ClaimVerdict[]): number {
	return verdicts.filter((v) => v.supported).length;
}

function calculationFor(
	mode: FactualMode,
	evidence: FactualEvidence,
	precision: number | null,
	recall: number | null,
	score: number | null,
): string {
	switch (mode) {
		case "PRECISION":
			return countCalculation(supportedCount(evidence.precisionVerdicts), evidence.precisionVerdicts.length, score);
		case "RECALL":
			return countCalculation(supportedCount(evidence.recallVerdicts), evidence.recallVerdicts.length, score);
		case "F1":
			return precision !== null && recall !== null ? f1Calculation(precision, recall) : formatPercent(score);
	}
}

function build(evidence: FactualEvidence, input: ExtractionInput): FactualCorrectnessExplanation {
	const { score, display } = input;
	const { mode } = evidence;
	const precision = ratio(supportedCount(evidence.precisionVerdicts), evidence.precisionVerdicts.length);
	const recall = ratio(supportedCount(evidence.recallVerdicts), evidence.recallVerdicts.length);

	return {
		metricType: "factual-correctness",
		score,
		description: message("factual-correctness.description"),
		mode,
		responseClaims: evidence.responseClaims,
		referenceClaims: evidence.referenceClaims,
		precisionVerdicts: evidence.precisionVerdicts,
		recallVerdicts: evidence.recallVerdicts,
		precision,
		recall,
		steps: buildSteps("factual-correctness", [
			{
				name: "DecomposeResponseClaims",
				inputData: input.sample?.response ? truncate(input.sample.response, display.truncateLength) : undefined,
				outputSummary: message("factual-correctness.claims", evidence.responseClaims.length),
				items: evidence.responseClaims.map((content, i) => ({ content, index: i + 1 })),
			},
			mode !== "PRECISION" && {
				name: "DecomposeReferenceClaims",
				inputData: input.sample?.reference ? truncate(input.sample.reference, display.truncateLength) : undefined,
				outputSummary: message("factual-correctness.claims", evidence.referenceClaims.length),
				items: evidence.referenceClaims.map((content, i) => ({ content, index: i + 1 })),
			},
			{
				name: "VerifyClaims",
				outputSummary: `P = ${formatFixed(precision)}, R = ${formatFixed(recall)}`,
				items: [
					...verdictItems(evidence.precisionVerdicts, "precision", display.reasoningLength),
					...verdictItems(evidence.recallVerdicts, "recall", display.reasoningLength),
				],
			},
			computeScoreStep(score, `${formatPercent(score)} (${mode})`),
		]),
		interpretation: standardInterpretation("factual-correctness", score, {
			formula: message(`factual-correctness.formula.${mode}`),
			calculation: calculationFor(mode, evidence, precision, recall, score),
		}),
	};
}

export const factualCorrectness: FamilyExtractor<"factual-correctness"> = {
	fromMetadata(metadata, input) {
		const toVerdicts = (list: readonly { claim: string; verdict: number; reason: string }[] | undefined) =>
			(list ?? []).map((v) => ({ claim: v.claim, supported: v.verdict === 1, reason: v.reason }));
		return build(
			{
				mode: metadata.mode,
				responseClaims: firstModelValue(metadata.responseClaims) ?? [],
				referenceClaims: firstModelValue(metadata.referenceClaims) ?? [],
				precisionVerdicts: toVerdicts(firstModelValue(metadata.precisionVerdicts)),
				recallVerdicts: toVerdicts(firstModelValue(metadata.recallVerdicts)),
			},
			input,
		);
	},

	reconstruct(input) {
		const config = readMetricConfig(FactualCorrectnessConfigSchema, input.config);
		const { steps } = input;
		return build(
			{
				mode: config.mode,
				responseClaims: firstValueIn(stepsNamed(steps, "DecomposeResponseClaims"), readClaims) ?? [],
				referenceClaims: firstValueIn(stepsNamed(steps, "DecomposeReferenceClaims"), readClaims) ?? [],
				precisionVerdicts: firstValueIn(stepsNamed(steps, "VerifyPrecision"), readClaimVerdicts) ?? [],
				recallVerdicts: firstValueIn(stepsNamed(steps, "VerifyRecall"), readClaimVerdicts) ?? [],
			},
			input,
		);
	},
};
