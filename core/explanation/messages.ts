/**
 * English message catalog. Placeholders are positional: {0}, {1}, ...
 */

import catalog from "./messages.json";

const MESSAGES: Readonly<Record<string, string>> = catalog;

export type MessageArg = string | number;

function format(template: string, args: readonly MessageArg[]): string {
	return template.replace(/\{(\d+)\}/g, (match: string, index: string) => {
		const arg = args[Number(index)];
		return arg === undefined ? match : String(arg);
	});
}

export function hasMessage(key: string): boolean {
	return Object.prototype.hasOwnProperty.call(MESSAGES, key);
}

/**
 * Look up a message and fill its placeholders. Unknown keys come back as the key.
 */
export function message(key: string, ...args: MessageArg[]): string {
	const template = hasMessage(key) ? MESSAGES[key] : undefined;
	return template === undefined ? key : format(template, args);
}

/**
 * First key present in the catalog wins; falls back to the last key.
 */
export function firstMessage(keys: readonly string[], ...args: MessageArg[]): string {
	const key = keys.find(hasMessage) ?? keys[keys.length - 1] ?? "";
	return message(key, ...args);
}
