import { describe, test, expect } from "vitest";
import { DEFAULT_DISPLAY } from "../../config.ts";
import { createStep, succeeded, type StepResult } from "../../run/index.ts";
import { responseGroundedness } from "./response-groundedness.ts";

function input(steps: StepResult[], score: number | null) {
	return { metricName: "ResponseGroundedness", steps, score, config: undefined, display: DEFAULT_DISPLAY };
}

describe("responseGroundedness", () => {
	test("averages the model ratings", () => {
		const steps = [
			createStep(
				"EvaluateGroundedness",
				"LLM",
				[
					succeeded("model-a", JSON.stringify({ rating: 2, reasoning: "fully supported" })),
					succeeded("model-b", JSON.stringify({ rating: 1 })),
				],
				"Answer: Paris is in France.\nContext: Paris is a city in France.\nInstructions: rate 0-2",
			),
		];
		const explanation = responseGroundedness.reconstruct(input(steps, 0.75));
		if (!explanation) throw new Error("expected an explanation");

		expect(explanation.response).toBe("Paris is in France.");
		expect(explanation.context).toBe("Paris is a city in France.");
		expect(explanation.rawScore).toBe(1.5);
		expect(explanation.reasoning).toBe("fully supported");
		expect(explanation.usedHeuristics).toBe(false);
		expect(explanation.steps[0]?.outputSummary).toBe("1.5/2");
		expect(explanation.steps[0]?.modelResults).toEqual([
			{ modelId: "model-a", success: true, numericResult: 2, status: "OK" },
			{ modelId: "model-b", success: true, numericResult: 1, status: "OK" },
		]);
		expect(explanation.interpretation.calculation).toBe("1.5 / 2 = 0.75");
		expect(explanation.interpretation.level).toBe("Good");
	});

	test("a successful heuristic step replaces the model rating", () => {
		const steps = [createStep("ApplyHeuristics", "COMPUTE", [succeeded("heuristics", "1")])];
		const explanation = responseGroundedness.reconstruct(input(steps, 1));
		if (!explanation) throw new Error("expected an explanation");

		expect(explanation.usedHeuristics).toBe(true);
		expect(explanation.rawScore).toBeNull();
		expect(explanation.steps.map((s) => s.stepName)).toEqual(["ApplyHeuristics", "ComputeScore"]);
		expect(explanation.interpretation.calculation).toBe("Decided by heuristics without a model call");
	});

	test("metadata derives the rating from the score", () => {
		const explanation = responseGroundedness.fromMetadata(
			{ family: "response-groundedness", usedHeuristics: false },
			input([], 0.5),
		);
		expect(explanation.rawScore).toBe(1);
		expect(explanation.interpretation.calculation).toBe("1.0 / 2 = 0.50");
	});
});
