import { describe, test, expect } from "vitest";
import { DEFAULT_DISPLAY } from "../../config.ts";
import { createStep, succeeded, type StepResult } from "../../run/index.ts";
import { semanticSimilarity } from "./semantic-similarity.ts";

const steps = [
	createStep("ComputeSimilarity", "EMBEDDING", [
		succeeded("embedder-a", "0.875"),
		succeeded("embedder-b", JSON.stringify({ similarity: 0.75 })),
	]),
];

function input(stepList: StepResult[], score: number | null, config?: unknown) {
	return { metricName: "SemanticSimilarity", steps: stepList, score, config, display: DEFAULT_DISPLAY };
}

describe("semanticSimilarity", () => {
	test("averages the embedding models", () => {
		const explanation = semanticSimilarity.reconstruct(input(steps, 0.8125));
		if (!explanation) throw new Error("expected an explanation");

		expect(explanation.threshold).toBeNull();
		expect(explanation.modelSimilarities).toEqual([
			{ modelId: "embedder-a", similarity: 0.875 },
			{ modelId: "embedder-b", similarity: 0.75 },
		]);
		expect(explanation.steps.map((s) => s.title)).toEqual(["Input texts", "Compute similarity", "Compute final score"]);
		expect(explanation.steps[1]?.outputSummary).toBe("0.8125");
		expect(explanation.interpretation.calculation).toBe("mean(0.8750, 0.7500) = 0.8125");
		expect(explanation.interpretation.level).toBe("Good");
	});

	test("a threshold turns the score into a pass or a fail", () => {
		const explanation = semanticSimilarity.reconstruct(input(steps, 1, { threshold: 0.8 }));
		if (!explanation) throw new Error("expected an explanation");

		expect(explanation.steps[2]?.title).toBe("Apply threshold 0.8");
		expect(explanation.interpretation.calculation).toBe("0.8125 ≥ 0.8 → 1.0");
		expect(explanation.interpretation.level).toBe("PASS");
		expect(explanation.interpretation.meaning).toBe(
			"The response is semantically close to the reference (threshold 0.8).",
		);

		const failedCheck = semanticSimilarity.reconstruct(input(steps, 0, { threshold: 0.9 }));
		expect(failedCheck?.interpretation.calculation).toBe("0.8125 < 0.9 → 0.0");
		expect(failedCheck?.interpretation.level).toBe("FAIL");
	});

	test("falls back to embedding steps of any name", () => {
		const embed = [createStep("Embed", "EMBEDDING", [succeeded("embedder-a", "0.6")])];
		const explanation = semanticSimilarity.reconstruct(input(embed, 0.6));

		expect(explanation?.modelSimilarities).toEqual([{ modelId: "embedder-a", similarity: 0.6 }]);
		expect(explanation?.interpretation.calculation).toBe("60.00%");
	});
});
