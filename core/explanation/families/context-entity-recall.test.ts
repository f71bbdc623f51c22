import { describe, test, expect } from "vitest";
import { DEFAULT_DISPLAY } from "../../config.ts";
import { createStep, succeeded } from "../../run/index.ts";
import { contextEntityRecall, matchEntities } from "./context-entity-recall.ts";

describe("matchEntities", () => {
	test("matches case-insensitively and keeps the reference spelling", () => {
		expect(matchEntities(["Eiffel Tower", "Paris", "1889"], ["paris", "EIFFEL TOWER"])).toEqual({
			found: ["Eiffel Tower", "Paris"],
			missing: ["1889"],
		});
	});

	test("nothing to find", () => {
		expect(matchEntities([], ["Paris"])).toEqual({ found: [], missing: [] });
	});
});

describe("contextEntityRecall", () => {
	test("splits reference and context entities by step name", () => {
		const steps = [
			createStep(
				"ExtractReferenceEntities",
				"LLM",
				[succeeded("model-a", JSON.stringify({ entities: ["Eiffel Tower", "Paris", "1889"] }))],
				"Text: The Eiffel Tower in Paris opened in 1889.\nInstructions: list the entities",
			),
			createStep(
				"ExtractContextEntities",
				"LLM",
				[succeeded("model-a", JSON.stringify({ entities: ["paris", "Eiffel Tower"] }))],
				"Text: Paris is home to the Eiffel tower.\nInstructions: list the entities",
			),
		];
		const explanation = contextEntityRecall.reconstruct({
			metricName: "ContextEntityRecall",
			steps,
			score: 2 / 3,
			config: {},
			display: DEFAULT_DISPLAY,
		});
		if (!explanation) throw new Error("expected an explanation");

		expect(explanation.reference).toBe("The Eiffel Tower in Paris opened in 1889.");
		expect(explanation.context).toBe("Paris is home to the Eiffel tower.");
		expect(explanation.foundEntities).toEqual(["Eiffel Tower", "Paris"]);
		expect(explanation.missingEntities).toEqual(["1889"]);
		expect(explanation.interpretation.calculation).toBe("2/3 = 0.67");
		expect(explanation.interpretation.scorePercent).toBe("66.67%");
		expect(explanation.interpretation.meaning).toBe("Only 2 of 3 reference entities appear in the context.");
		expect(explanation.steps[2]?.items.map((i) => i.verdict)).toEqual(["Found", "Found", "Missing"]);
	});
});
