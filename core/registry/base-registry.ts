/**
 * BaseRegistry - keyed lookup table with aliases.
 *
 * Keys and aliases pass through an optional normalizer on both registration
 * and lookup, so callers can register "context-precision" and later resolve
 * "ContextPrecisionMetric" or "context_precision" to the same entry.
 *
 * Used by: FamilyRegistry
 *
 * @example
 * ```typescript
 * class ToolRegistry extends BaseRegistry<Tool> {
 *   register(tool: Tool): void {
 *     this.registerItem(tool.name, tool, tool.aliases);
 *   }
 * }
 * ```
 */

/**
 * Error thrown when a requested item is not found in the registry.
 */
export class RegistryNotFoundError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly availableKeys: string[],
	) {
		const available = availableKeys.length > 0
			? `Available: ${availableKeys.join(", ")}`
			: "Registry is empty";
		super(`${registryName}: "${key}" not found. ${available}`);
		this.name = "RegistryNotFoundError";
	}
}

/**
 * Error thrown when registration conflicts with an existing entry.
 */
export class RegistryConflictError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly conflictType: "key" | "alias",
	) {
		const type = conflictType === "key" ? "Key" : "Alias";
		super(`${registryName}: ${type} "${key}" is already registered`);
		this.name = "RegistryConflictError";
	}
}

export interface RegistryOptions {
	/** Name of the registry (used in error messages) */
	name: string;
	/** Whether to throw on duplicate registration (default: true) */
	throwOnConflict?: boolean;
	/** Applied to every key and alias before it is stored or looked up */
	normalizeKey?: (key: string) => string;
}

/**
 * Generic base registry class.
 *
 * @typeParam T - Type of items stored in the registry
 */
export class BaseRegistry<T> {
	protected items = new Map<string, T>();
	protected aliasMap = new Map<string, string>(); // alias -> primary key
	protected readonly registryName: string;
	protected readonly throwOnConflict: boolean;
	private readonly normalizeKey: (key: string) => string;

	constructor(options: RegistryOptions) {
		this.registryName = options.name;
		this.throwOnConflict = options.throwOnConflict ?? true;
		this.normalizeKey = options.normalizeKey ?? ((key) => key);
	}

	/**
	 * Register an item under a primary key and optional aliases.
	 *
	 * @throws RegistryConflictError if the key or an alias is taken (when throwOnConflict=true)
	 */
	protected registerItem(key: string, item: T, aliases?: readonly string[]): void {
		const primary = this.normalizeKey(key);
		if (this.isTaken(primary)) {
			if (this.throwOnConflict) {
				throw new RegistryConflictError(key, this.registryName, "key");
			}
			return;
		}

		const normalizedAliases: string[] = [];
		for (const alias of aliases ?? []) {
			const normalized = this.normalizeKey(alias);
			// An alias that normalizes onto the primary key adds nothing
			if (normalized === primary || normalizedAliases.includes(normalized)) {
				continue;
			}
			if (this.isTaken(normalized)) {
				if (this.throwOnConflict) {
					throw new RegistryConflictError(alias, this.registryName, "alias");
				}
				return;
			}
			normalizedAliases.push(normalized);
		}

		this.items.set(primary, item);
		for (const alias of normalizedAliases) {
			this.aliasMap.set(alias, primary);
		}
	}

	private isTaken(key: string): boolean {
		return this.items.has(key) || this.aliasMap.has(key);
	}

	/**
	 * Get an item by key or alias.
	 * Returns undefined if not found.
	 */
	get(keyOrAlias: string): T | undefined {
		const primary = this.resolveAlias(keyOrAlias);
		return this.items.get(primary);
	}

	/**
	 * Get an item by key or alias.
	 * Throws RegistryNotFoundError if not found.
	 */
	getOrThrow(keyOrAlias: string): T {
		const item = this.get(keyOrAlias);
		if (item === undefined) {
			throw new RegistryNotFoundError(keyOrAlias, this.registryName, this.keys());
		}
		return item;
	}

	has(keyOrAlias: string): boolean {
		return this.isTaken(this.normalizeKey(keyOrAlias));
	}

	list(): T[] {
		return Array.from(this.items.values());
	}

	/**
	 * Get all primary keys (sorted alphabetically).
	 */
	keys(): string[] {
		return Array.from(this.items.keys()).sort();
	}

	get size(): number {
		return this.items.size;
	}

	clear(): void {
		this.items.clear();
		this.aliasMap.clear();
	}

	/**
	 * Resolve a key or alias to its normalized primary key.
	 * Unknown inputs come back normalized but otherwise unchanged.
	 */
	resolveAlias(keyOrAlias: string): string {
		const normalized = this.normalizeKey(keyOrAlias);
		return this.aliasMap.get(normalized) ?? normalized;
	}
}
