import { z } from "zod";
import { standardInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import { firstModelValue } from "../metadata.ts";
import type { FaithfulnessExplanation, ModelStepResult, StatementVerdict } from "../model.ts";
import {
	BinaryVerdictSchema,
	fieldReader,
	firstRequestText,
	firstValueIn,
	StringListSchema,
	stepsNamed,
} from "../payload.ts";
import { extractResponse } from "../prompt-sections.ts";
import {
	buildSteps,
	computeScoreStep,
	countCalculation,
	modelResultsAcross,
	truncate,
	type ExtractionInput,
	type FamilyExtractor,
} from "./shared.ts";

interface FaithfulnessEvidence {
	response: string;
	statements: string[];
	verdicts: StatementVerdict[];
	faithfulCount: number;
	totalCount: number;
	statementModels: ModelStepResult[];
	verdictModels: ModelStepResult[];
}

const readStatements = fieldReader("statements", StringListSchema);
const readVerdicts = fieldReader(
	"verdicts",
	z.array(z.object({ statement: z.string(), verdict: BinaryVerdictSchema, reason: z.string().default("") })),
);

function build(evidence: FaithfulnessEvidence, input: ExtractionInput): FaithfulnessExplanation {
	const { score, display } = input;
	const { faithfulCount, totalCount } = evidence;

	return {
		metricType: "faithfulness",
		score,
		description: message("faithfulness.description"),
		response: evidence.response,
		statements: evidence.statements,
		verdicts: evidence.verdicts,
		faithfulCount,
		totalCount,
		steps: buildSteps("faithfulness", [
			{
				name: "ExtractStatements",
				inputData: evidence.response ? truncate(evidence.response, display.truncateLength) : undefined,
				outputSummary: message("faithfulness.statementsExtracted", evidence.statements.length),
				items: evidence.statements.map((content, i) => ({ content, index: i + 1 })),
				modelResults: evidence.statementModels,
			},
			{
				name: "VerifyStatements",
				outputSummary: message("faithfulness.verified", faithfulCount, totalCount),
				items: evidence.verdicts.map((v, i) => ({
					content: v.statement,
					passed: v.faithful,
					verdict: message(v.faithful ? "verdict.faithful" : "verdict.notFaithful"),
					reason: truncate(v.reason, display.reasoningLength),
					index: i + 1,
				})),
				modelResults: evidence.verdictModels,
			},
			computeScoreStep(score),
		]),
		interpretation: standardInterpretation(
			"faithfulness",
			score,
			{
				formula: message("faithfulness.formula"),
				calculation: countCalculation(faithfulCount, totalCount, score),
				numerator: faithfulCount,
				denominator: totalCount,
			},
			[faithfulCount, totalCount],
		),
	};
}

export const faithfulness: FamilyExtractor<"faithfulness"> = {
	fromMetadata(metadata, input) {
		const verdicts = (firstModelValue(metadata.verdicts) ?? []).map((v) => ({
			statement: v.statement,
			faithful: v.verdict === 1,
			reason: v.reason,
		}));
		return build(
			{
				response: input.sample?.response ?? "",
				statements: firstModelValue(metadata.extractedStatements) ?? [],
				verdicts,
				faithfulCount: metadata.faithfulCount,
				totalCount: metadata.totalCount,
				statementModels: Object.keys(metadata.extractedStatements).map((modelId) => ({ modelId, success: true })),
				verdictModels: Object.keys(metadata.verdicts).map((modelId) => ({ modelId, success: true })),
			},
			input,
		);
	},

	reconstruct(input) {
		const statementSteps = stepsNamed(input.steps, "GenerateStatements");
		const verdictSteps = stepsNamed(input.steps, "EvaluateFaithfulness");

		const verdicts = (firstValueIn(verdictSteps, readVerdicts) ?? []).map((v) => ({
			statement: v.statement,
			faithful: v.verdict,
			reason: v.reason,
		}));
		if (verdicts.length === 0) return null;

		return build(
			{
				response: input.sample?.response ?? extractResponse(firstRequestText(statementSteps)),
				statements: firstValueIn(statementSteps, readStatements) ?? [],
				verdicts,
				faithfulCount: verdicts.filter((v) => v.faithful).length,
				totalCount: verdicts.length,
				statementModels: modelResultsAcross(statementSteps),
				verdictModels: modelResultsAcross(verdictSteps),
			},
			input,
		);
	},
};
