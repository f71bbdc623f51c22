import { describe, test, expect } from "vitest";
import { DEFAULT_DISPLAY } from "../../config.ts";
import { createStep, succeeded } from "../../run/index.ts";
import { factualCorrectness } from "./factual-correctness.ts";

const steps = [
	createStep("DecomposeResponseClaims", "LLM", [
		succeeded("model-a", JSON.stringify({ claims: ["Paris is the capital", "Paris has 30 million people"] })),
	]),
	createStep("DecomposeReferenceClaims", "LLM", [
		succeeded("model-a", JSON.stringify({ claims: ["Paris is the capital"] })),
	]),
	createStep("VerifyPrecision", "LLM", [
		succeeded(
			"model-a",
			JSON.stringify({
				verdicts: [
					{ claim: "Paris is the capital", verdict: 1, reason: "stated in the reference" },
					{ claim: "Paris has 30 million people", verdict: 0 },
				],
			}),
		),
	]),
	createStep("VerifyRecall", "LLM", [
		succeeded("model-a", JSON.stringify({ verdicts: [{ statement: "Paris is the capital", verdict: true }] })),
	]),
];

function input(mode: string, score: number) {
	return { metricName: "FactualCorrectness", steps, score, config: { mode }, display: DEFAULT_DISPLAY };
}

describe("factualCorrectness", () => {
	test("F1 mode combines claim precision and recall", () => {
		const explanation = factualCorrectness.reconstruct(input("F1", 2 / 3));
		if (!explanation) throw new Error("expected an explanation");

		expect(explanation.precision).toBe(0.5);
		expect(explanation.recall).toBe(1);
		expect(explanation.precisionVerdicts[1]).toEqual({
			claim: "Paris has 30 million people",
			supported: false,
			reason: "",
		});
		expect(explanation.recallVerdicts).toEqual([{ claim: "Paris is the capital", supported: true, reason: "" }]);
		expect(explanation.steps.map((s) => s.stepName)).toEqual([
			"DecomposeResponseClaims",
			"DecomposeReferenceClaims",
			"VerifyClaims",
			"ComputeScore",
		]);
		expect(explanation.steps[0]?.outputSummary).toBe("2 claims");
		expect(explanation.steps[2]?.outputSummary).toBe("P = 0.50, R = 1.00");
		expect(explanation.steps[2]?.items.map((i) => i.source)).toEqual(["precision", "precision", "recall"]);
		expect(explanation.steps[3]?.outputSummary).toBe("66.67% (F1)");
		expect(explanation.interpretation.calculation).toBe("2 × (0.50 × 1.00) / (0.50 + 1.00) = 0.67");
	});

	test("PRECISION mode skips the reference claims", () => {
		const explanation = factualCorrectness.reconstruct(input("PRECISION", 0.5));
		if (!explanation) throw new Error("expected an explanation");

		expect(explanation.steps.map((s) => s.stepName)).toEqual(["DecomposeResponseClaims", "VerifyClaims", "ComputeScore"]);
		expect(explanation.interpretation.formula).toBe("supported response claims / response claims");
		expect(explanation.interpretation.calculation).toBe("1/2 = 0.50");
	});
});
