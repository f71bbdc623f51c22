import { z } from "zod";
import { AgentGoalConfigSchema, readMetricConfig } from "../../config.ts";
import { computeSingleVerdictConsensus } from "../../consensus/index.ts";
import { binaryInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import type { AgentGoalAccuracyExplanation, ModelVerdict } from "../model.ts";
import { BinaryVerdictSchema, fieldReader, firstValueIn, isSucceeded, stepsNamed, TextSchema } from "../payload.ts";
import { buildSteps, computeScoreStep, passFail, truncate, type ExtractionInput, type FamilyExtractor } from "./shared.ts";

type GoalMode = AgentGoalAccuracyExplanation["mode"];

interface GoalEvidence {
	mode: GoalMode;
	inferredGoal: string;
	referenceGoal: string;
	/** null for a model whose call failed */
	verdicts: Record<string, boolean | null>;
	reasonings: Record<string, string>;
}

const readGoal = fieldReader(["goal", "inferredGoal", "end_state"], TextSchema);
const readOutcome = fieldReader(
	"$",
	z.object({
		verdict: BinaryVerdictSchema,
		reasoning: z.string().optional(),
		reason: z.string().optional(),
	}),
);

function build(evidence: GoalEvidence, input: ExtractionInput): AgentGoalAccuracyExplanation {
	const { score, display } = input;
	const { mode } = evidence;
	const consensus = computeSingleVerdictConsensus(evidence.verdicts);
	const goalAchieved = score !== null ? score >= 0.5 : consensus.decision;

	const modelVerdicts: ModelVerdict[] = Object.entries(consensus.modelDecisions).map(([modelId, verdict]) => ({
		modelId,
		verdict,
		reasoning: evidence.reasonings[modelId] ?? "",
	}));
	const outcomeStep = mode === "WITH_REFERENCE" ? "CompareOutcome" : "EvaluateOutcome";

	return {
		metricType: "agent-goal-accuracy",
		score,
		description: message(`agent-goal-accuracy.description.${mode}`),
		mode,
		inferredGoal: evidence.inferredGoal,
		referenceGoal: evidence.referenceGoal,
		goalAchieved,
		modelVerdicts,
		consensus,
		steps: buildSteps("agent-goal-accuracy", [
			{
				name: "InferGoal",
				outputSummary: evidence.inferredGoal ? truncate(evidence.inferredGoal, display.truncateLength) : undefined,
			},
			{
				name: outcomeStep,
				inputData: evidence.referenceGoal ? truncate(evidence.referenceGoal, display.truncateLength) : undefined,
				outputSummary: passFail(goalAchieved),
				items: modelVerdicts.map((v) => ({
					content: passFail(v.verdict),
					passed: v.verdict,
					reason: truncate(v.reasoning, display.reasoningLength),
					source: v.modelId,
				})),
				modelResults: Object.entries(evidence.verdicts).map(([modelId, verdict]) =>
					verdict === null
						? { modelId, success: false }
						: { modelId, success: true, verdict, reasoning: evidence.reasonings[modelId] },
				),
				hasModelDisagreement: consensus.hasDisagreement,
				agreementPercent: consensus.agreementPercent,
			},
			computeScoreStep(score),
		]),
		interpretation: binaryInterpretation("agent-goal-accuracy", score, goalAchieved, {
			formula: message("agent-goal-accuracy.formula"),
			calculation: `${passFail(goalAchieved)} → ${goalAchieved ? "1.0" : "0.0"}`,
			numerator: consensus.successCount,
			denominator: consensus.totalCount,
		}),
	};
}

export const agentGoalAccuracy: FamilyExtractor<"agent-goal-accuracy"> = {
	fromMetadata(metadata, input) {
		return build(
			{
				mode: metadata.mode,
				inferredGoal: metadata.inferredGoal ?? "",
				referenceGoal: input.sample?.reference ?? "",
				verdicts: { ...metadata.modelVerdicts },
				reasonings: { ...metadata.modelReasonings },
			},
			input,
		);
	},

	reconstruct(input) {
		const config = readMetricConfig(AgentGoalConfigSchema, input.config);
		const verdicts: Record<string, boolean | null> = {};
		const reasonings: Record<string, string> = {};
		for (const step of stepsNamed(input.steps, "EvaluateOutcome", "CompareOutcome")) {
			for (const result of step.modelResults) {
				if (!isSucceeded(result)) {
					if (!(result.modelId in verdicts)) verdicts[result.modelId] = null;
					continue;
				}
				const outcome = readOutcome(result.resultPayload);
				if (!outcome.ok) continue;
				verdicts[result.modelId] = outcome.value.verdict;
				reasonings[result.modelId] = outcome.value.reasoning ?? outcome.value.reason ?? "";
			}
		}

		return build(
			{
				mode: config.mode,
				inferredGoal: firstValueIn(stepsNamed(input.steps, "InferGoal"), readGoal) ?? "",
				referenceGoal: input.sample?.reference ?? "",
				verdicts,
				reasonings,
			},
			input,
		);
	},
};
