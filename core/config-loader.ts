/**
 * Loads the engine configuration from YAML.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { ZodError } from "zod";
import { EngineConfigSchema, type EngineConfig } from "./config.ts";

export const DEFAULT_ENGINE_CONFIG_PATH = fileURLToPath(new URL("./engine.yaml", import.meta.url));

export class ConfigError extends Error {
	constructor(
		message: string,
		public readonly filePath: string,
	) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * Interpolate environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax; unknown variables without a
 * default are left as they are.
 */
export function interpolateEnvVars(value: string): string {
	return value.replace(
		/\$\{(\w+)(?::-([^}]*))?\}/g,
		(match: string, name: string, defaultValue?: string) => {
			const envVal = process.env[name];
			if (envVal !== undefined && envVal !== "") {
				return envVal;
			}
			if (defaultValue !== undefined) {
				return defaultValue;
			}
			return match;
		},
	);
}

/**
 * Recursively interpolate environment variables in parsed YAML.
 */
export function interpolateEnvVarsInObject(obj: unknown): unknown {
	if (typeof obj === "string") {
		return interpolateEnvVars(obj);
	}
	if (Array.isArray(obj)) {
		return obj.map((item) => interpolateEnvVarsInObject(item));
	}
	if (obj !== null && typeof obj === "object") {
		const result: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(obj)) {
			result[key] = interpolateEnvVarsInObject(value);
		}
		return result;
	}
	return obj;
}

export function formatZodError(error: ZodError, filePath: string): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `  - ${path ? `${path}: ` : ""}${issue.message}`;
	});
	return `Validation failed for ${filePath}:\n${issues.join("\n")}`;
}

/**
 * Parse and validate engine config text. An empty document yields the defaults.
 *
 * @throws ConfigError when the YAML is malformed or fails validation
 */
export function parseEngineConfig(content: string, filePath = "<inline>"): EngineConfig {
	let raw: unknown;
	try {
		raw = parse(content);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Invalid YAML in ${filePath}: ${reason}`, filePath);
	}

	try {
		return EngineConfigSchema.parse(interpolateEnvVarsInObject(raw ?? {}));
	} catch (error) {
		if (error instanceof ZodError) {
			throw new ConfigError(formatZodError(error, filePath), filePath);
		}
		throw error;
	}
}

const cache = new Map<string, EngineConfig>();

/**
 * Load the engine config, caching by path.
 *
 * @throws ConfigError when the file cannot be read or is invalid
 */
export function loadEngineConfig(filePath: string = DEFAULT_ENGINE_CONFIG_PATH): EngineConfig {
	const cached = cache.get(filePath);
	if (cached) {
		return cached;
	}

	let content: string;
	try {
		content = readFileSync(filePath, "utf8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Cannot read engine config ${filePath}: ${reason}`, filePath);
	}

	const config = parseEngineConfig(content, filePath);
	cache.set(filePath, config);
	return config;
}

export function clearEngineConfigCache(): void {
	cache.clear();
}
