import { describe, test, expect } from "vitest";
import { DEFAULT_DISPLAY } from "../../config.ts";
import { createStep, succeeded } from "../../run/index.ts";
import { contextRelevance } from "./context-relevance.ts";

describe("contextRelevance", () => {
	const steps = [
		createStep(
			"EvaluateRelevance_1",
			"LLM",
			[
				succeeded("model-a", JSON.stringify({ rating: 2, reasoning: "answers the question" })),
				succeeded("model-b", JSON.stringify({ rating: 1 })),
			],
			"Question: What is the capital of France?\nContext: Paris is the capital of France.\nInstructions: rate 0-2",
		),
		createStep("EvaluateRelevance_2", "LLM", [succeeded("model-a", JSON.stringify({ rating: 0 }))]),
	];

	test("averages each context's ratings and normalizes them onto 0..1", () => {
		const explanation = contextRelevance.reconstruct({
			metricName: "ContextRelevance",
			steps,
			score: 0.375,
			config: undefined,
			display: DEFAULT_DISPLAY,
		});
		if (!explanation) throw new Error("expected an explanation");

		expect(explanation.userInput).toBe("What is the capital of France?");
		expect(explanation.evaluations).toEqual([
			{
				context: "Paris is the capital of France.",
				rawScore: 1.5,
				normalizedScore: 0.75,
				reasoning: "answers the question",
			},
			{ context: "Context #2", rawScore: 0, normalizedScore: 0, reasoning: "" },
		]);
		expect(explanation.steps[0]?.outputSummary).toBe("2 contexts rated");
		expect(explanation.steps[0]?.items.map((i) => i.verdict)).toEqual(["1.5/2 → 0.75", "0.0/2 → 0.00"]);
		expect(explanation.interpretation.calculation).toBe("(0.75 + 0.00) / 2 = 0.38");
		expect(explanation.interpretation.level).toBe("Poor");
	});

	test("metadata scores are normalized, raw ratings are derived from them", () => {
		const explanation = contextRelevance.fromMetadata(
			{ family: "context-relevance", contextScores: [1, 0.5], contextReasonings: ["on point"] },
			{
				metricName: "ContextRelevance",
				steps: [],
				score: 0.75,
				config: undefined,
				sample: { userInput: "Capital of France?", retrievedContexts: ["Paris is the capital.", "France is in Europe."] },
				display: DEFAULT_DISPLAY,
			},
		);

		expect(explanation.evaluations.map((e) => [e.context, e.rawScore, e.reasoning])).toEqual([
			["Paris is the capital.", 2, "on point"],
			["France is in Europe.", 1, ""],
		]);
		expect(explanation.interpretation.calculation).toBe("(1.00 + 0.50) / 2 = 0.75");
		expect(explanation.interpretation.level).toBe("Good");
	});
});
