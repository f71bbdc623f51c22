import { describe, test, expect } from "vitest";
import { firstMessage, hasMessage, message } from "./messages.ts";

describe("message catalog", () => {
	test("fills positional placeholders", () => {
		expect(message("faithfulness.verified", 3, 4)).toBe("3 of 4 statements are faithful");
		expect(message("rubrics.meaning", 2, "Poor")).toBe("Level 2: Poor");
	});

	test("leaves placeholders without an argument untouched", () => {
		expect(message("rubrics.meaning", 2)).toBe("Level 2: {1}");
	});

	test("returns the key for unknown messages", () => {
		expect(hasMessage("no.such.key")).toBe(false);
		expect(message("no.such.key")).toBe("no.such.key");
	});

	test("firstMessage prefers the first key present", () => {
		expect(firstMessage(["faithfulness.step.ComputeScore", "step.ComputeScore"])).toBe("Compute final score");
		expect(firstMessage(["noise-sensitivity.scale.poor", "scale.poor.description"])).toBe("Many incorrect statements");
	});

	test("firstMessage falls back to the last key", () => {
		expect(firstMessage(["missing.one", "missing.two"])).toBe("missing.two");
	});
});
