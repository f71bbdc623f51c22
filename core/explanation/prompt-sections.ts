/**
 * Recover labeled sections ("Question:", "Context:", ...) from prompt text.
 * Only used when a run carries no structured metadata.
 */

export interface SectionRule {
	/** Labels tried in order; the first one present starts the section */
	labels: readonly string[];
	/** The section ends at the earliest of these after its start */
	terminators: readonly string[];
}

const LINE_END = ["\n"];

export const RESPONSE_SECTION: SectionRule = {
	labels: ["AI Response:", "Answer:", "Response:"],
	terminators: [
		"Reference:",
		"Evaluation Rubrics:",
		"Instructions:",
		"CRITICAL INSTRUCTIONS:",
		"IMPORTANT:",
		"Rubrics:",
		"Context:",
		"Criteria:",
		"Example:",
		"Output:",
		"Now generate",
		"Your task:",
		"You must:",
		"Please ",
		"\n\n1.",
		"\n1.",
	],
};

export const QUESTION_SECTION: SectionRule = {
	labels: ["User Question:", "Question:"],
	terminators: LINE_END,
};

export const REFERENCE_SECTION: SectionRule = {
	labels: ["Reference Answer:", "Reference:", "Ground Truth:"],
	terminators: LINE_END,
};

export const USER_INPUT_SECTION: SectionRule = {
	labels: ["Question:", "User Input:"],
	terminators: LINE_END,
};

export const CONTEXT_SECTION: SectionRule = {
	labels: ["Context:"],
	terminators: ["Reference Answer:", "Reference:", "Instructions:"],
};

export const TEXT_SECTION: SectionRule = {
	labels: ["Text:"],
	terminators: ["Instructions:", "Examples:", "Respond with"],
};

export const CONTEXT_CHUNK_SECTION: SectionRule = {
	labels: ["Retrieved Context Chunk:"],
	terminators: ["Instructions:", "Respond with"],
};

/**
 * Text after the first label present, up to the nearest terminator.
 * Returns "" when no label is present.
 */
export function extractSection(prompt: string | undefined, rule: SectionRule): string {
	if (!prompt) return "";
	for (const label of rule.labels) {
		const labelAt = prompt.indexOf(label);
		if (labelAt === -1) continue;

		const start = labelAt + label.length;
		let end = prompt.length;
		for (const terminator of rule.terminators) {
			const at = prompt.indexOf(terminator, start);
			if (at !== -1 && at < end) end = at;
		}
		return prompt.slice(start, end).trim();
	}
	return "";
}

export const extractResponse = (prompt: string | undefined): string => extractSection(prompt, RESPONSE_SECTION);
export const extractQuestion = (prompt: string | undefined): string => extractSection(prompt, QUESTION_SECTION);
export const extractReference = (prompt: string | undefined): string => extractSection(prompt, REFERENCE_SECTION);
export const extractUserInput = (prompt: string | undefined): string => extractSection(prompt, USER_INPUT_SECTION);
export const extractContext = (prompt: string | undefined): string => extractSection(prompt, CONTEXT_SECTION);
export const extractText = (prompt: string | undefined): string => extractSection(prompt, TEXT_SECTION);
export const extractContextChunk = (prompt: string | undefined): string =>
	extractSection(prompt, CONTEXT_CHUNK_SECTION);
