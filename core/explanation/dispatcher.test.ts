import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { EngineConfigSchema } from "../config.ts";
import { createStep, failed, MetricRunBuilder, succeeded } from "../run/index.ts";
import { dispatch, explainRun } from "./dispatcher.ts";
import { isExplainable, METRIC_FAMILIES } from "./families.ts";
import type { MetricMetadata } from "./metadata.ts";
import type { Explanation } from "./model.ts";

const faithfulnessSteps = [
	createStep("EvaluateFaithfulness", "LLM", [
		succeeded("model-a", JSON.stringify({ verdicts: [{ statement: "Paris is in France", verdict: 1 }] })),
	]),
];

const aspectSteps = [
	createStep("EvaluateAspect_1", "LLM", [
		succeeded("model-a", JSON.stringify({ verdict: 1 })),
		succeeded("model-b", JSON.stringify({ verdict: 0 })),
	]),
	createStep("EvaluateAspect_2", "LLM", [succeeded("model-a", JSON.stringify({ verdict: 1 })), failed("model-b", "timeout")]),
];

const bleuMetadata = { family: "bleu", maxNgram: 3, smoothing: "ADD_ONE" } as const;

const faithfulnessMetadata = {
	family: "faithfulness",
	extractedStatements: { "model-a": ["Paris is in France", "Paris is in Spain"] },
	verdicts: {
		"model-a": [
			{ statement: "Paris is in France", verdict: 1, reason: "stated" },
			{ statement: "Paris is in Spain", verdict: 0, reason: "contradicted" },
		],
	},
	faithfulCount: 1,
	totalCount: 2,
} satisfies MetricMetadata;

const toolCallMetadata = {
	family: "tool-call-accuracy",
	mode: "STRICT",
	truePositives: 1,
	falsePositives: 1,
	falseNegatives: 0,
	precision: 0.5,
	recall: 1,
	matches: [{ actualCall: "search()", referenceCall: "search()", matched: true, matchScore: 1 }],
} satisfies MetricMetadata;

describe("dispatch", () => {
	beforeEach(() => {
		vi.spyOn(console, "debug").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	test("resolves the family from the metric name", () => {
		expect(dispatch("FaithfulnessMetric", faithfulnessSteps, 1, undefined)?.metricType).toBe("faithfulness");
		expect(dispatch("answer_relevancy", [], 0.5, undefined)?.metricType).toBe("response-relevancy");
		expect(dispatch("NonLLMStringSimilarity", [], 0.5, undefined)?.metricType).toBe("string-similarity");
	});

	test("unknown metrics and hallucination have no explanation", () => {
		expect(dispatch("MyCustomMetric", faithfulnessSteps, 0.5, undefined)).toBeNull();
		expect(dispatch("Hallucination", [], 0.5, undefined, { family: "hallucination", claims: [] })).toBeNull();
	});

	test("an unrecognized name falls back to the metadata family", () => {
		const explanation = dispatch("house-judge", [], 0.6, undefined, bleuMetadata);
		if (explanation?.metricType !== "bleu") throw new Error("expected a bleu explanation");
		expect(explanation.maxNgram).toBe(3);
	});

	test("metadata of the metric's family is authoritative", () => {
		const explanation = dispatch("Bleu", [], 0.6, { maxNgram: 2 }, bleuMetadata);
		if (explanation?.metricType !== "bleu") throw new Error("expected a bleu explanation");
		expect(explanation.maxNgram).toBe(3);
	});

	test("tool-call metadata wins over the score approximation", () => {
		const steps = [
			createStep("AlignToolCalls", "COMPUTE", [
				succeeded("model-a", JSON.stringify({ matches: [{ actualCall: "search()", matched: true }] })),
			]),
		];
		const rebuilt = dispatch("ToolCallAccuracy", steps, 0.8, undefined);
		if (rebuilt?.metricType !== "tool-call-accuracy") throw new Error("expected a tool-call explanation");
		expect(rebuilt.approximated).toBe(true);

		const explanation = dispatch("ToolCallAccuracy", steps, 0.8, undefined, toolCallMetadata);
		if (explanation?.metricType !== "tool-call-accuracy") throw new Error("expected a tool-call explanation");
		expect(explanation.truePositives).toBe(1);
		expect(explanation.precision).toBe(0.5);
		expect(explanation.recall).toBe(1);
		expect(explanation.approximated).toBe(false);
	});

	test("metadata explains a run without steps", () => {
		const explanation = dispatch("Faithfulness", [], 0.5, undefined, faithfulnessMetadata);
		if (explanation?.metricType !== "faithfulness") throw new Error("expected a faithfulness explanation");
		expect(explanation.faithfulCount).toBe(1);
		expect(explanation.totalCount).toBe(2);
	});

	test("metadata of another family is ignored", () => {
		const explanation = dispatch("Bleu", [], 0.5, { maxNgram: 2 }, { family: "rouge", rougeType: "ROUGE_1", mode: "RECALL" });
		if (explanation?.metricType !== "bleu") throw new Error("expected a bleu explanation");
		expect(explanation.maxNgram).toBe(2);
		expect(console.debug).toHaveBeenCalledWith("[explanation] Ignoring rouge metadata for Bleu");
	});

	test("disabled families and a disabled engine return null", () => {
		const disabled = EngineConfigSchema.parse({ explanations: { disabledFamilies: ["Context_Precision"] } });
		expect(dispatch("ContextPrecision", [], 0.5, undefined, undefined, { engine: disabled })).toBeNull();
		expect(dispatch("ContextRecall", [], 0.5, undefined, undefined, { engine: disabled })?.metricType).toBe(
			"context-recall",
		);

		const byAlias = EngineConfigSchema.parse({ explanations: { disabledFamilies: ["AspectCritic", "bleu_score"] } });
		expect(dispatch("AspectCritic", aspectSteps, 1, undefined, undefined, { engine: byAlias })).toBeNull();
		expect(dispatch("aspect_critic", aspectSteps, 1, undefined, undefined, { engine: byAlias })).toBeNull();
		expect(dispatch("Bleu", [], 0.5, undefined, undefined, { engine: byAlias })).toBeNull();

		const off = EngineConfigSchema.parse({ explanations: { enabled: false } });
		expect(dispatch("Faithfulness", faithfulnessSteps, 1, undefined, undefined, { engine: off })).toBeNull();
	});

	test("extraction errors are logged and yield null", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const sample = {
			get response(): string {
				throw new Error("sample unavailable");
			},
		};

		expect(dispatch("Bleu", [], 0.5, undefined, undefined, { sample })).toBeNull();
		expect(warn).toHaveBeenCalledTimes(1);
		expect(warn.mock.calls[0]?.[0]).toBe("[explanation] Failed to explain Bleu:");
	});

	test("repeated dispatches give equal explanations", () => {
		const config = { definition: "Is the response polite?" };
		const first = dispatch("AspectCritic", aspectSteps, 1, config);
		const second = dispatch("AspectCritic", aspectSteps, 1, config);
		expect(first).not.toBeNull();
		expect(second).toEqual(first);
	});

	test("editing an explanation does not change the next one", () => {
		const first = dispatch("Faithfulness", [], 0.5, undefined, faithfulnessMetadata);
		if (first?.metricType !== "faithfulness") throw new Error("expected a faithfulness explanation");
		first.statements.push("Paris is in Italy");

		const second = dispatch("Faithfulness", [], 0.5, undefined, faithfulnessMetadata);
		if (second?.metricType !== "faithfulness") throw new Error("expected a faithfulness explanation");
		expect(second.statements).toEqual(["Paris is in France", "Paris is in Spain"]);
		expect(faithfulnessMetadata.extractedStatements["model-a"]).toEqual(["Paris is in France", "Paris is in Spain"]);
	});

	test.each([
		{
			name: "Faithfulness",
			score: 0.5,
			config: undefined,
			steps: [
				createStep("GenerateStatements", "LLM", [
					succeeded("model-a", JSON.stringify({ statements: ["Paris is in France", "Paris is in Spain"] })),
				]),
				createStep("EvaluateFaithfulness", "LLM", [
					succeeded(
						"model-a",
						JSON.stringify({
							verdicts: [
								{ statement: "Paris is in France", verdict: 1, reason: "stated" },
								{ statement: "Paris is in Spain", verdict: 0, reason: "contradicted" },
							],
						}),
					),
				]),
			],
			metadata: faithfulnessMetadata,
		},
		{
			name: "ContextPrecision",
			score: 1,
			config: undefined,
			steps: [
				createStep("EvaluateContext_1", "LLM", [succeeded("model-a", JSON.stringify({ relevant: 1 }))]),
				createStep("EvaluateContext_2", "LLM", [succeeded("model-a", JSON.stringify({ relevant: 0 }))]),
			],
			metadata: {
				family: "context-precision",
				evaluationStrategy: "LLM",
				modelRelevanceResults: { "model-a": [true, false] },
				contextCount: 2,
			} satisfies MetricMetadata,
		},
		{
			name: "ToolCallAccuracy",
			score: 2 / 3,
			config: undefined,
			steps: [
				createStep("ComputePrecisionRecall", "COMPUTE", [
					succeeded(
						"model-a",
						JSON.stringify({ truePositives: 1, falsePositives: 1, falseNegatives: 0, precision: 0.5, recall: 1 }),
					),
				]),
			],
			metadata: toolCallMetadata,
		},
		{
			name: "AspectCritic",
			score: 1,
			config: { definition: "Is the response polite?" },
			steps: aspectSteps,
			metadata: {
				family: "aspect-critic",
				definition: "Is the response polite?",
				strictness: 1,
				modelVerdicts: { "model-a": [true, true], "model-b": [false, null] },
				modelReasonings: {},
			} satisfies MetricMetadata,
		},
	])("$name reads the same from metadata and from raw steps", ({ name, score, config, steps, metadata }) => {
		const rebuilt = dispatch(name, steps, score, config);
		const fromMetadata = dispatch(name, [], score, config, metadata);
		if (rebuilt === null || fromMetadata === null) throw new Error("expected both explanations");

		const view = (e: Explanation) => ({
			score: e.score,
			scorePercent: e.interpretation.scorePercent,
			level: e.interpretation.level,
			calculation: e.interpretation.calculation,
			meaning: e.interpretation.meaning,
		});
		expect(view(fromMetadata)).toEqual(view(rebuilt));
	});

	test("a missing score reads as not calculated in every family", () => {
		for (const family of METRIC_FAMILIES.filter(isExplainable)) {
			const steps = family === "faithfulness" ? faithfulnessSteps : [];
			const explanation = dispatch(family, steps, null, undefined);
			if (explanation === null) throw new Error(`no explanation for ${family}`);

			expect(explanation.score).toBeNull();
			expect(explanation.interpretation.scorePercent).toBe("N/A");
			expect(explanation.interpretation.level).toBe("Unknown");
			expect(explanation.interpretation.meaning).toBe("Score not calculated");
			expect(explanation.interpretation.isGood).toBe(false);
		}
	});
});

describe("explainRun", () => {
	test("explains a sealed run with its config and sample", () => {
		const run = new MetricRunBuilder("Bleu", {
			config: { maxNgram: 2 },
			sample: { response: "the cat sat", reference: "the cat sat down" },
		}).seal(0.4);

		const explanation = explainRun(run);
		if (explanation?.metricType !== "bleu") throw new Error("expected a bleu explanation");
		expect(explanation.maxNgram).toBe(2);
		expect(explanation.score).toBe(0.4);
		expect(explanation.steps[0]?.inputData).toBe("the cat sat");
		expect(explanation.interpretation.level).toBe("Poor");
	});

	test("edits to the caller's sample after sealing do not reach the explanation", () => {
		const contexts = ["Paris is the capital of France."];
		const run = new MetricRunBuilder("ContextEntityRecall", {
			sample: { reference: "Paris", retrievedContexts: contexts },
		}).seal(1, {
			family: "context-entity-recall",
			referenceEntities: { "model-a": ["Paris"] },
			contextEntities: { "model-a": ["Paris", "France"] },
		});
		contexts[0] = "Lyon is in France.";

		const explanation = explainRun(run);
		if (explanation?.metricType !== "context-entity-recall") throw new Error("expected an entity recall explanation");
		expect(explanation.context).toBe("Paris is the capital of France.");
		expect(Object.isFrozen(run.metadata)).toBe(true);
	});
});
