/**
 * Result-returning readers over raw model payloads.
 *
 * Payloads are JSON documents or bare scalars. Fields are addressed with
 * JSONPath and validated with Zod; a payload that does not parse or a field
 * that does not match yields `{ ok: false }` and is skipped by the caller.
 */

import { JSONPath } from "jsonpath-plus";
import { z } from "zod";
import type { ModelResult, StepResult, SucceededModelResult } from "../run/types.ts";

export type FieldResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type FieldSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function fail<T>(error: string): FieldResult<T> {
	return { ok: false, error };
}

// ============================================================================
// Common field schemas
// ============================================================================

export const TextSchema = z.string();
export const StringListSchema = z.array(z.string());
export const NumberSchema = z.number().finite();
/** Verdicts come as booleans or as 0/1 */
export const BinaryVerdictSchema = z.union([z.boolean(), z.number()]).transform((v) => v === true || v === 1);

// ============================================================================
// Payload readers
// ============================================================================

/**
 * Parse a payload into a JSON object or array.
 */
export function parsePayload(payload: string | undefined): FieldResult<object> {
	if (payload === undefined || payload.trim() === "") {
		return fail("empty payload");
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(payload);
	} catch (error) {
		return fail(error instanceof Error ? error.message : String(error));
	}
	if (typeof parsed !== "object" || parsed === null) {
		return fail("payload is not a JSON object");
	}
	return { ok: true, value: parsed };
}

function toJsonPath(field: string): string {
	return field.startsWith("$") ? field : `$.${field}`;
}

/**
 * Read one field of a parsed payload. `field` is a plain name or a JSONPath.
 */
export function readJsonField<T>(json: object, field: string, schema: FieldSchema<T>): FieldResult<T> {
	const found: unknown = JSONPath({ path: toJsonPath(field), json, wrap: false });
	if (found === undefined) {
		return fail(`missing field ${field}`);
	}
	const parsed = schema.safeParse(found);
	if (!parsed.success) {
		return fail(`field ${field}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
	}
	return { ok: true, value: parsed.data };
}

export function readField<T>(payload: string | undefined, field: string, schema: FieldSchema<T>): FieldResult<T> {
	const json = parsePayload(payload);
	if (!json.ok) return json;
	return readJsonField(json.value, field, schema);
}

/**
 * First of several alternative field names that matches.
 */
export function readAnyField<T>(
	payload: string | undefined,
	fields: readonly string[],
	schema: FieldSchema<T>,
): FieldResult<T> {
	const json = parsePayload(payload);
	if (!json.ok) return json;
	for (const field of fields) {
		const result = readJsonField(json.value, field, schema);
		if (result.ok) return result;
	}
	return fail(`missing fields ${fields.join("/")}`);
}

/**
 * A bare number ("0.87"), or a JSON object carrying one of `fields`.
 */
export function parseScalar(payload: string | undefined, fields: readonly string[] = ["score"]): FieldResult<number> {
	if (payload === undefined) {
		return fail("empty payload");
	}
	const trimmed = payload.trim();
	if (trimmed !== "" && !trimmed.startsWith("{")) {
		const value = Number(trimmed);
		return Number.isFinite(value) ? { ok: true, value } : fail(`not a number: ${trimmed.slice(0, 40)}`);
	}
	return readAnyField(trimmed, fields, NumberSchema);
}

// ============================================================================
// Step readers
// ============================================================================

export function isSucceeded(result: ModelResult): result is SucceededModelResult {
	return result.success;
}

function logSkipped(step: StepResult, modelId: string, error: string): void {
	console.debug(`[explanation] ${step.stepName}/${modelId}: ${error}`);
}

export type PayloadReader<T> = (payload: string | undefined) => FieldResult<T>;

export function fieldReader<T>(fields: string | readonly string[], schema: FieldSchema<T>): PayloadReader<T> {
	const names = typeof fields === "string" ? [fields] : fields;
	return (payload) => readAnyField(payload, names, schema);
}

export function scalarReader(fields: readonly string[] = ["score"]): PayloadReader<number> {
	return (payload) => parseScalar(payload, fields);
}

export interface ModelValue<T> {
	modelId: string;
	value: T;
}

/**
 * Every successful model's value, in result order. Iterations of one
 * model appear once each.
 */
export function collectValues<T>(step: StepResult, read: PayloadReader<T>): ModelValue<T>[] {
	const values: ModelValue<T>[] = [];
	for (const result of step.modelResults) {
		if (!isSucceeded(result)) continue;
		const value = read(result.resultPayload);
		if (value.ok) {
			values.push({ modelId: result.modelId, value: value.value });
		} else {
			logSkipped(step, result.modelId, value.error);
		}
	}
	return values;
}

/**
 * Value from the first successful model whose payload carries it.
 */
export function firstValue<T>(step: StepResult, read: PayloadReader<T>): T | undefined {
	for (const result of step.modelResults) {
		if (!isSucceeded(result)) continue;
		const value = read(result.resultPayload);
		if (value.ok) return value.value;
		logSkipped(step, result.modelId, value.error);
	}
	return undefined;
}

/**
 * First value found across steps, in step order.
 */
export function firstValueIn<T>(steps: readonly StepResult[], read: PayloadReader<T>): T | undefined {
	for (const step of steps) {
		const value = firstValue(step, read);
		if (value !== undefined) return value;
	}
	return undefined;
}

/**
 * Steps whose name equals one of `names` or starts with one of them,
 * compared case-insensitively.
 */
export function stepsNamed(steps: readonly StepResult[], ...names: string[]): StepResult[] {
	const wanted = names.map((name) => name.toLowerCase());
	return steps.filter((step) => {
		const stepName = step.stepName.toLowerCase();
		return wanted.some((name) => stepName.startsWith(name));
	});
}

export function stepNameContains(step: StepResult, fragment: string): boolean {
	return step.stepName.toLowerCase().includes(fragment.toLowerCase());
}

/** First prompt text among the steps, if the runner kept any. */
export function firstRequestText(steps: readonly StepResult[]): string | undefined {
	return steps.find((step) => step.requestText !== undefined && step.requestText !== "")?.requestText;
}

export const readReasoning = fieldReader(["reasoning", "reason"], TextSchema);
