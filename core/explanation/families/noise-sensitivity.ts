import { NoiseSensitivityConfigSchema, readMetricConfig } from "../../config.ts";
import { formatPercent, invertedInterpretation } from "../interpretation.ts";
import { message } from "../messages.ts";
import { firstModelValue } from "../metadata.ts";
import type { NoiseSensitivityExplanation } from "../model.ts";
import { fieldReader, firstValue, StringListSchema } from "../payload.ts";
import { extractResponse } from "../prompt-sections.ts";
import { buildSteps, computeScoreStep, truncate, type ExtractionInput, type FamilyExtractor } from "./shared.ts";

interface NoiseEvidence {
	mode: NoiseSensitivityExplanation["mode"];
	reference: string;
	response: string;
	referenceStatements: string[];
	responseStatements: string[];
	contextCount: number;
}

const readStatements = fieldReader("statements", StringListSchema);

function build(evidence: NoiseEvidence, input: ExtractionInput): NoiseSensitivityExplanation {
	const { score, display } = input;
	const { mode } = evidence;

	return {
		metricType: "noise-sensitivity",
		score,
		description: message(`noise-sensitivity.description.${mode}`),
		mode,
		reference: evidence.reference,
		response: evidence.response,
		referenceStatements: evidence.referenceStatements,
		responseStatements: evidence.responseStatements,
		contextCount: evidence.contextCount,
		steps: buildSteps("noise-sensitivity", [
			{
				name: "ReferenceStatements",
				inputData: evidence.reference ? truncate(evidence.reference, display.truncateLength) : undefined,
				outputSummary: message("noise-sensitivity.statements", evidence.referenceStatements.length),
				items: evidence.referenceStatements.map((content, i) => ({ content, index: i + 1 })),
			},
			{
				name: "ResponseStatements",
				inputData: evidence.response ? truncate(evidence.response, display.truncateLength) : undefined,
				outputSummary: message("noise-sensitivity.statements", evidence.responseStatements.length),
				items: evidence.responseStatements.map((content, i) => ({ content, index: i + 1 })),
			},
			{
				name: "EvaluateContexts",
				titleArgs: [mode],
				outputSummary: message("noise-sensitivity.contexts", evidence.contextCount),
			},
			computeScoreStep(score),
		]),
		interpretation: invertedInterpretation("noise-sensitivity", score, {
			formula: message(`noise-sensitivity.formula.${mode}`),
			calculation: formatPercent(score),
		}),
	};
}

export const noiseSensitivity: FamilyExtractor<"noise-sensitivity"> = {
	fromMetadata(metadata, input) {
		return build(
			{
				mode: metadata.mode,
				reference: input.sample?.reference ?? "",
				response: input.sample?.response ?? "",
				referenceStatements: firstModelValue(metadata.referenceStatements) ?? [],
				responseStatements: firstModelValue(metadata.responseStatements) ?? [],
				contextCount: metadata.contextCount,
			},
			input,
		);
	},

	reconstruct(input) {
		const config = readMetricConfig(NoiseSensitivityConfigSchema, input.config);
		let reference = "";
		let response = "";
		const referenceStatements: string[] = [];
		const responseStatements: string[] = [];

		// Both statement prompts label their text "Answer:"
		for (const step of input.steps) {
			const name = step.stepName;
			if (name.includes("Reference") || name.includes("Ground")) {
				if (reference === "") reference = extractResponse(step.requestText);
				referenceStatements.push(...(firstValue(step, readStatements) ?? []));
			} else if (name.includes("Response") && !name.includes("Matrix")) {
				if (response === "") response = extractResponse(step.requestText);
				responseStatements.push(...(firstValue(step, readStatements) ?? []));
			}
		}

		return build(
			{
				mode: config.mode,
				reference: input.sample?.reference ?? reference,
				response: input.sample?.response ?? response,
				referenceStatements,
				responseStatements,
				contextCount: input.sample?.retrievedContexts?.length ?? 0,
			},
			input,
		);
	},
};
