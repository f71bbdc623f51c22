import { AspectCriticConfigSchema, readMetricConfig } from "../../config.ts";
import { computeConsensus, type IterationVerdict } from "../../consensus/index.ts";
import { binaryInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import { firstModelValue } from "../metadata.ts";
import type { AspectCriticExplanation, ExplanationItem, ModelStepResult } from "../model.ts";
import { BinaryVerdictSchema, fieldReader, firstRequestText, firstValueIn, isSucceeded, readReasoning } from "../payload.ts";
import { extractResponse } from "../prompt-sections.ts";
import { buildSteps, computeScoreStep, passFail, truncate, type ExtractionInput, type FamilyExtractor } from "./shared.ts";

interface AspectEvidence {
	aspectName: string;
	definition: string;
	response: string;
	reasoning: string;
	strictness: number;
	iterations: Record<string, IterationVerdict[]>;
}

const readVerdict = fieldReader("verdict", BinaryVerdictSchema);

function aspectName(configName: string | undefined, definition: string): string {
	return configName || definition || "Custom Aspect";
}

function build(evidence: AspectEvidence, input: ExtractionInput): AspectCriticExplanation {
	const { score, display } = input;
	const consensus = computeConsensus(evidence.iterations);
	const passed = score !== null ? score >= 0.5 : consensus.decision;

	const votes: ExplanationItem[] = [];
	const modelResults: ModelStepResult[] = [];
	for (const [modelId, iterations] of Object.entries(evidence.iterations)) {
		const decision: boolean | undefined = consensus.modelDecisions[modelId];
		if (decision === undefined) {
			votes.push({ content: message("aspect-critic.noVote"), source: modelId });
			modelResults.push({ modelId, success: false, errorMessage: message("aspect-critic.noVote") });
			continue;
		}
		const passVotes = iterations.filter((v) => v === true).length;
		const successful = iterations.filter((v) => v !== null).length;
		votes.push({
			content: `${passVotes}/${successful} PASS → ${passFail(decision)}`,
			passed: decision,
			source: modelId,
		});
		modelResults.push({ modelId, success: true, verdict: decision });
	}

	const { successCount, totalCount } = consensus;
	const calculation =
		totalCount > 1
			? `${successCount} PASS + ${totalCount - successCount} FAIL = ${successCount}/${totalCount} = ${(successCount / totalCount).toFixed(2)}`
			: `${passFail(passed)} → ${passed ? "1.0" : "0.0"}`;

	return {
		metricType: "aspect-critic",
		score,
		description: message("aspect-critic.description"),
		aspectName: evidence.aspectName,
		definition: evidence.definition,
		response: evidence.response,
		passed,
		reasoning: evidence.reasoning,
		strictness: evidence.strictness,
		modelIterations: evidence.iterations,
		consensus,
		steps: buildSteps("aspect-critic", [
			{
				name: "DefineAspect",
				inputData: truncate(evidence.definition, display.truncateLength),
				outputSummary: evidence.aspectName,
			},
			{
				name: "EvaluateAspect",
				inputData: evidence.response ? truncate(evidence.response, display.truncateLength) : undefined,
				outputSummary: message("aspect-critic.votes", successCount, totalCount),
				items: votes,
				modelResults,
				hasModelDisagreement: consensus.hasDisagreement,
				agreementPercent: consensus.agreementPercent,
			},
			evidence.strictness > 1 && {
				name: "MajorityVoting",
				titleArgs: [evidence.strictness],
				outputSummary: message("aspect-critic.majority", evidence.strictness),
				items: Object.entries(consensus.modelDecisions).map(([modelId, decision]) => ({
					content: passFail(decision),
					passed: decision,
					source: modelId,
				})),
			},
			{
				...computeScoreStep(score),
				items: evidence.reasoning ? [{ content: truncate(evidence.reasoning, display.reasoningLength) }] : [],
			},
		]),
		interpretation: binaryInterpretation(
			"aspect-critic",
			score,
			passed,
			{
				formula: message("aspect-critic.formula"),
				calculation,
				numerator: successCount,
				denominator: totalCount,
			},
			[evidence.aspectName],
		),
	};
}

export const aspectCritic: FamilyExtractor<"aspect-critic"> = {
	fromMetadata(metadata, input) {
		const config = readMetricConfig(AspectCriticConfigSchema, input.config);
		const iterations: Record<string, IterationVerdict[]> = {};
		for (const [modelId, verdicts] of Object.entries(metadata.modelVerdicts)) {
			iterations[modelId] = [...verdicts];
		}
		return build(
			{
				aspectName: aspectName(config.name, metadata.definition),
				definition: metadata.definition,
				response: input.sample?.response ?? "",
				reasoning: firstModelValue(metadata.modelReasonings)?.[0] ?? "",
				strictness: metadata.strictness,
				iterations,
			},
			input,
		);
	},

	reconstruct(input) {
		const config = readMetricConfig(AspectCriticConfigSchema, input.config);
		const definition = config.definition ?? "";

		const iterations: Record<string, IterationVerdict[]> = {};
		for (const step of input.steps) {
			for (const result of step.modelResults) {
				const list = iterations[result.modelId] ?? [];
				// An unreadable verdict counts as a failed iteration
				const verdict = isSucceeded(result) ? readVerdict(result.resultPayload) : null;
				list.push(verdict?.ok ? verdict.value : null);
				iterations[result.modelId] = list;
			}
		}

		return build(
			{
				aspectName: aspectName(config.name, definition),
				definition,
				response: input.sample?.response ?? extractResponse(firstRequestText(input.steps)),
				reasoning: firstValueIn(input.steps, readReasoning) ?? "",
				strictness: config.strictness,
				iterations,
			},
			input,
		);
	},
};
