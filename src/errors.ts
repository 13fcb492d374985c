/**
 * Unsupported granule, address size or exception level, or a translation table base
 * that can't be used with them. Raised before any table is allocated.
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * Malformed or overlapping region in the memory map.
 */
export class InputError extends Error {
	readonly lineno: number;
	readonly diagnostic: string[];

	constructor(message: string, lineno: number, diagnostic: string[] = []) {
		super(message);
		this.name = "InputError";
		this.lineno = lineno;
		this.diagnostic = diagnostic;
	}
}

/**
 * Internal invariant broken, e.g. a region handed to a table that can't contain it.
 */
export class ContractViolation extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ContractViolation";
	}
}
