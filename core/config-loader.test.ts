import { afterEach, describe, expect, test } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
	clearEngineConfigCache,
	ConfigError,
	interpolateEnvVars,
	loadEngineConfig,
	parseEngineConfig,
} from "./config-loader.ts";
import { AspectCriticConfigSchema, readMetricConfig } from "./config.ts";

describe("interpolateEnvVars", () => {
	afterEach(() => {
		delete process.env.EXPLAIN_TEST_VAR;
	});

	test("substitutes set variables", () => {
		process.env.EXPLAIN_TEST_VAR = "median";
		expect(interpolateEnvVars("${EXPLAIN_TEST_VAR}")).toBe("median");
	});

	test("falls back to the default", () => {
		expect(interpolateEnvVars("${EXPLAIN_TEST_VAR:-max}")).toBe("max");
	});

	test("keeps unknown placeholders", () => {
		expect(interpolateEnvVars("x ${EXPLAIN_TEST_VAR} y")).toBe("x ${EXPLAIN_TEST_VAR} y");
	});
});

describe("parseEngineConfig", () => {
	test("empty document gives defaults", () => {
		const config = parseEngineConfig("");
		expect(config.explanations).toEqual({ enabled: true, disabledFamilies: [] });
		expect(config.display).toEqual({ truncateLength: 200, reasoningLength: 100 });
		expect(config.aggregation).toEqual({ strategy: "average", tolerance: 0.2 });
	});

	test("reads nested values", () => {
		const config = parseEngineConfig("display:\n  truncateLength: 50\naggregation:\n  strategy: median\n");
		expect(config.display.truncateLength).toBe(50);
		expect(config.display.reasoningLength).toBe(100);
		expect(config.aggregation.strategy).toBe("median");
	});

	test("invalid values raise ConfigError listing the path", () => {
		expect(() => parseEngineConfig("aggregation:\n  strategy: loudest\n", "engine.yaml")).toThrow(ConfigError);
		expect(() => parseEngineConfig("display:\n  truncateLength: -1\n", "engine.yaml")).toThrow(
			/^Validation failed for engine.yaml:\n {2}- display\.truncateLength: /,
		);
	});

	test("malformed YAML raises ConfigError", () => {
		expect(() => parseEngineConfig("display: [unclosed", "bad.yaml")).toThrow(/Invalid YAML in bad.yaml/);
	});
});

describe("loadEngineConfig", () => {
	let dir: string | undefined;

	afterEach(() => {
		clearEngineConfigCache();
		if (dir) rmSync(dir, { recursive: true, force: true });
		dir = undefined;
	});

	test("loads the bundled default file", () => {
		const config = loadEngineConfig();
		expect(config.explanations.enabled).toBe(true);
		expect(config.display.truncateLength).toBe(200);
	});

	test("caches by path", () => {
		dir = mkdtempSync(join(tmpdir(), "engine-config-"));
		const file = join(dir, "engine.yaml");
		writeFileSync(file, "aggregation:\n  tolerance: 0.1\n");
		const first = loadEngineConfig(file);
		writeFileSync(file, "aggregation:\n  tolerance: 0.3\n");
		expect(loadEngineConfig(file)).toBe(first);
		expect(first.aggregation.tolerance).toBe(0.1);

		clearEngineConfigCache();
		expect(loadEngineConfig(file).aggregation.tolerance).toBe(0.3);
	});

	test("missing file raises ConfigError", () => {
		expect(() => loadEngineConfig("/nonexistent/engine.yaml")).toThrow(ConfigError);
	});
});

describe("readMetricConfig", () => {
	test("applies defaults to a missing config", () => {
		expect(readMetricConfig(AspectCriticConfigSchema, undefined)).toEqual({ strictness: 1 });
	});

	test("falls back to defaults on a mismatched config", () => {
		expect(readMetricConfig(AspectCriticConfigSchema, { strictness: "three" })).toEqual({ strictness: 1 });
	});

	test("keeps valid fields", () => {
		expect(readMetricConfig(AspectCriticConfigSchema, { definition: "Is it polite?", strictness: 3 })).toEqual({
			definition: "Is it polite?",
			strictness: 3,
		});
	});
});
