import { describe, test, expect } from "vitest";
import { DEFAULT_DISPLAY } from "../../config.ts";
import { createStep, succeeded, type StepResult } from "../../run/index.ts";
import { answerAccuracy } from "./answer-accuracy.ts";

function input(steps: StepResult[], score: number | null) {
	return { metricName: "AnswerAccuracy", steps, score, config: undefined, display: DEFAULT_DISPLAY };
}

describe("answerAccuracy", () => {
	test("dual judge sums both ratings over 4", () => {
		const steps = [
			createStep(
				"InitialJudgment",
				"LLM",
				[succeeded("model-a", "2"), succeeded("model-b", JSON.stringify({ rating: 1, reasoning: "partly right" }))],
				"Response: Paris\nReference: Paris, France\n",
			),
			createStep("ConfirmationJudgment", "LLM", [succeeded("model-a", JSON.stringify({ rating: 2 }))]),
		];
		const explanation = answerAccuracy.reconstruct(input(steps, 0.875));
		if (!explanation) throw new Error("expected an explanation");

		expect(explanation.response).toBe("Paris");
		expect(explanation.reference).toBe("Paris, France");
		expect(explanation.rawScore).toBe(1.5);
		expect(explanation.reasoning).toBe("partly right");
		expect(explanation.usedDualJudge).toBe(true);
		expect(explanation.confirmationScore).toBe(2);
		expect(explanation.steps.map((s) => s.outputSummary)).toEqual(["1.5/2", "2.0/2", "87.50%"]);
		expect(explanation.steps[0]?.modelResults).toEqual([
			{ modelId: "model-a", success: true, numericResult: 2, status: "OK" },
			{ modelId: "model-b", success: true, numericResult: 1, status: "OK" },
		]);
		expect(explanation.interpretation.formula).toBe("(initial + confirmation) / 4");
		expect(explanation.interpretation.calculation).toBe("(1.5 + 2.0) / 4 = 0.88");
		expect(explanation.interpretation.level).toBe("Good");
	});

	test("single judge from metadata", () => {
		const explanation = answerAccuracy.fromMetadata(
			{
				family: "answer-accuracy",
				initialJudgments: {
					"model-a": { rawScore: 1, reasoning: "" },
					"model-b": { rawScore: 2, reasoning: "matches the reference" },
				},
				confirmationJudgments: {},
				usedDualJudge: false,
			},
			input([], 0.75),
		);

		expect(explanation.usedDualJudge).toBe(false);
		expect(explanation.confirmationScore).toBeNull();
		expect(explanation.reasoning).toBe("matches the reference");
		expect(explanation.steps.map((s) => s.stepName)).toEqual(["InitialJudgment", "ComputeScore"]);
		expect(explanation.interpretation.formula).toBe("rating / 2");
		expect(explanation.interpretation.calculation).toBe("1.5 / 2 = 0.75");
	});
});
