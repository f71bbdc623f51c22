/**
 * Registry module - keyed lookup with aliases and key normalization.
 */

export {
	BaseRegistry,
	RegistryNotFoundError,
	RegistryConflictError,
	type RegistryOptions,
} from "./base-registry.ts";
