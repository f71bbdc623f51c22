import { describe, test, expect, vi, afterEach } from "vitest";
import { createStep, failed, succeeded } from "../run/index.ts";
import {
	BinaryVerdictSchema,
	collectValues,
	fieldReader,
	firstRequestText,
	firstValue,
	firstValueIn,
	NumberSchema,
	parsePayload,
	parseScalar,
	readAnyField,
	readField,
	stepsNamed,
	StringListSchema,
	TextSchema,
} from "./payload.ts";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("parsePayload", () => {
	test("parses JSON objects", () => {
		expect(parsePayload('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
	});

	test("rejects empty, malformed and scalar payloads", () => {
		expect(parsePayload(undefined).ok).toBe(false);
		expect(parsePayload("  ").ok).toBe(false);
		expect(parsePayload("{not json").ok).toBe(false);
		expect(parsePayload("42")).toEqual({ ok: false, error: "payload is not a JSON object" });
	});
});

describe("field readers", () => {
	test("reads plain names and JSONPath expressions", () => {
		const payload = '{"statements":["a","b"],"nested":{"score":0.4}}';
		expect(readField(payload, "statements", StringListSchema)).toEqual({ ok: true, value: ["a", "b"] });
		expect(readField(payload, "$.nested.score", NumberSchema)).toEqual({ ok: true, value: 0.4 });
		expect(readField(payload, "nested.score", TextSchema).ok).toBe(false);
	});

	test("reports missing fields", () => {
		expect(readField('{"a":1}', "b", TextSchema)).toEqual({ ok: false, error: "missing field b" });
	});

	test("readAnyField takes the first matching name", () => {
		expect(readAnyField('{"reason":"short","reasoning":"long"}', ["reasoning", "reason"], TextSchema)).toEqual({
			ok: true,
			value: "long",
		});
		expect(readAnyField('{"x":1}', ["a", "b"], TextSchema)).toEqual({ ok: false, error: "missing fields a/b" });
	});

	test("binary verdicts accept booleans and 0/1", () => {
		const read = fieldReader("verdict", BinaryVerdictSchema);
		expect(read('{"verdict":1}')).toEqual({ ok: true, value: true });
		expect(read('{"verdict":0}')).toEqual({ ok: true, value: false });
		expect(read('{"verdict":true}')).toEqual({ ok: true, value: true });
		expect(read('{"verdict":"yes"}').ok).toBe(false);
	});
});

describe("parseScalar", () => {
	test("reads bare numbers", () => {
		expect(parseScalar(" 0.87 ")).toEqual({ ok: true, value: 0.87 });
		expect(parseScalar("abc").ok).toBe(false);
	});

	test("reads numeric fields from JSON", () => {
		expect(parseScalar('{"rating":2}', ["rating", "score"])).toEqual({ ok: true, value: 2 });
		expect(parseScalar('{"score":"high"}').ok).toBe(false);
	});
});

describe("step readers", () => {
	const read = fieldReader("statements", StringListSchema);

	test("collectValues skips failed models and unreadable payloads", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
		const step = createStep("GenerateStatements", "LLM", [
			succeeded("m1", '{"statements":["a"]}'),
			failed("m2", "timeout"),
			succeeded("m3", "not json"),
			succeeded("m1", '{"statements":["b"]}'),
		]);
		expect(collectValues(step, read)).toEqual([
			{ modelId: "m1", value: ["a"] },
			{ modelId: "m1", value: ["b"] },
		]);
		expect(debug).toHaveBeenCalledTimes(1);
	});

	test("firstValue and firstValueIn", () => {
		vi.spyOn(console, "debug").mockImplementation(() => {});
		const empty = createStep("A", "LLM", [failed("m1", "boom")]);
		const full = createStep("B", "LLM", [succeeded("m1", "{}"), succeeded("m2", '{"statements":["x"]}')]);
		expect(firstValue(empty, read)).toBeUndefined();
		expect(firstValue(full, read)).toEqual(["x"]);
		expect(firstValueIn([empty, full], read)).toEqual(["x"]);
	});

	test("stepsNamed matches name prefixes case-insensitively", () => {
		const steps = [
			createStep("EvaluateRelevance_1", "LLM", []),
			createStep("evaluaterelevance_2", "LLM", []),
			createStep("ComputeScore", "COMPUTE", []),
		];
		expect(stepsNamed(steps, "EvaluateRelevance").map((s) => s.stepName)).toEqual([
			"EvaluateRelevance_1",
			"evaluaterelevance_2",
		]);
	});

	test("firstRequestText skips steps without a prompt", () => {
		const steps = [createStep("A", "LLM", []), createStep("B", "LLM", [], ""), createStep("C", "LLM", [], "prompt")];
		expect(firstRequestText(steps)).toBe("prompt");
	});
});
