import { mean } from "../../analysis/statistics.ts";
import { formatPercent, standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import type { AnswerAccuracyExplanation, ModelStepResult } from "../model.ts";
import { firstRequestText, firstValueIn, readReasoning, scalarReader, stepsNamed } from "../payload.ts";
import { extractReference, extractResponse } from "../prompt-sections.ts";
import {
	buildSteps,
	computeScoreStep,
	modelResultsAcross,
	numericDetail,
	truncate,
	type ExtractionInput,
	type StepDraft,
	type FamilyExtractor,
} from "./shared.ts";

const MAX_RATING = 2;

interface Judgment {
	rawScore: number | null;
	reasoning: string;
	modelResults: ModelStepResult[];
}

interface AccuracyEvidence {
	response: string;
	reference: string;
	initial: Judgment;
	confirmation: Judgment | null;
}

const readRating = scalarReader(["rating", "score"]);

function judgmentCalculation(initial: number | null, confirmation: number | null, score: number | null): string {
	if (initial === null) return formatPercent(score);
	if (confirmation === null) {
		return `${initial.toFixed(1)} / ${MAX_RATING} = ${(initial / MAX_RATING).toFixed(2)}`;
	}
	const total = MAX_RATING * 2;
	return `(${initial.toFixed(1)} + ${confirmation.toFixed(1)}) / ${total} = ${((initial + confirmation) / total).toFixed(2)}`;
}

function judgmentStep(name: string, judgment: Judgment, reasoningLength: number): StepDraft {
	return {
		name,
		outputSummary: judgment.rawScore === null ? undefined : `${judgment.rawScore.toFixed(1)}/${MAX_RATING}`,
		items: judgment.reasoning ? [{ content: truncate(judgment.reasoning, reasoningLength) }] : [],
		modelResults: judgment.modelResults,
	};
}

function build(evidence: AccuracyEvidence, input: ExtractionInput): AnswerAccuracyExplanation {
	const { score, display } = input;
	const { initial, confirmation } = evidence;
	const usedDualJudge = confirmation !== null;

	return {
		metricType: "answer-accuracy",
		score,
		description: message("answer-accuracy.description"),
		response: evidence.response,
		reference: evidence.reference,
		rawScore: initial.rawScore,
		reasoning: initial.reasoning,
		usedDualJudge,
		confirmationScore: confirmation?.rawScore ?? null,
		confirmationReasoning: confirmation?.reasoning ?? "",
		steps: buildSteps("answer-accuracy", [
			{
				...judgmentStep("InitialJudgment", initial, display.reasoningLength),
				inputData: evidence.response ? truncate(evidence.response, display.truncateLength) : undefined,
			},
			confirmation !== null && judgmentStep("ConfirmationJudgment", confirmation, display.reasoningLength),
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation("answer-accuracy", score, {
			formula: message(usedDualJudge ? "answer-accuracy.formula.dual" : "answer-accuracy.formula.single"),
			calculation: judgmentCalculation(initial.rawScore, confirmation?.rawScore ?? null, score),
		}),
	};
}

function judgmentOf(judgments: Readonly<Record<string, { rawScore: number; reasoning: string }>>): Judgment {
	const entries = Object.entries(judgments);
	return {
		rawScore: mean(entries.map(([, j]) => j.rawScore)),
		reasoning: entries.map(([, j]) => j.reasoning).find((r) => r !== "") ?? "",
		modelResults: entries.map(([modelId, j]) => ({
			modelId,
			success: true,
			numericResult: j.rawScore,
			reasoning: j.reasoning,
		})),
	};
}

function judgmentFrom(input: ExtractionInput, name: string): Judgment | null {
	const steps = stepsNamed(input.steps, name);
	const modelResults = modelResultsAcross(steps, numericDetail(readRating));
	const ratings = modelResults.flatMap((r) => (r.numericResult === undefined ? [] : [r.numericResult]));
	if (ratings.length === 0) return null;
	return {
		rawScore: mean(ratings),
		reasoning: firstValueIn(steps, readReasoning) ?? "",
		modelResults,
	};
}

export const answerAccuracy: FamilyExtractor<"answer-accuracy"> = {
	fromMetadata(metadata, input) {
		const hasConfirmation = metadata.usedDualJudge && Object.keys(metadata.confirmationJudgments).length > 0;
		return build(
			{
				response: input.sample?.response ?? "",
				reference: input.sample?.reference ?? "",
				initial: judgmentOf(metadata.initialJudgments),
				confirmation: hasConfirmation ? judgmentOf(metadata.confirmationJudgments) : null,
			},
			input,
		);
	},

	reconstruct(input) {
		const prompt = firstRequestText(stepsNamed(input.steps, "InitialJudgment"));
		return build(
			{
				response: input.sample?.response ?? extractResponse(prompt),
				reference: input.sample?.reference ?? extractReference(prompt),
				initial: judgmentFrom(input, "InitialJudgment") ?? { rawScore: null, reasoning: "", modelResults: [] },
				confirmation: judgmentFrom(input, "ConfirmationJudgment"),
			},
			input,
		);
	},
};
