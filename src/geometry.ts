import createDebug from "debug";
import { sprintf } from "sprintf-js";
import { ConfigError } from "./errors.js";
import { hex } from "./utils.js";

const debug = createDebug("pgtable:geometry");

export const GRANULES = [4 * 1024, 16 * 1024, 64 * 1024] as const;
export const ADDRESS_SIZES = [32, 36, 40, 48] as const;
export const EXCEPTION_LEVELS = [1, 2, 3] as const;

export type Granule = typeof GRANULES[number];
export type AddressSize = typeof ADDRESS_SIZES[number];
export type ExceptionLevel = typeof EXCEPTION_LEVELS[number];

export type MmuConfig = {
	granule: Granule;
	tsz: AddressSize;
	el: ExceptionLevel;
	ttb: number;
};

export type Geometry = {
	granule: Granule;
	tsz: AddressSize;
	/** 64-bit descriptors per table */
	entriesPerTable: number;
	/** VA bits resolved by one table */
	indexBits: number;
	/** VA bits addressing a byte inside a granule */
	offsetBits: number;
	startLevel: number;
	/** Lowest-numbered level where block descriptors are allowed */
	minBlockLevel: number;
	/** Root entries actually reachable with a tsz-bit address space */
	rootEntries: number;
};

export function isGranule(value: number): value is Granule {
	return GRANULES.some((granule) => granule === value);
}

export function isAddressSize(value: number): value is AddressSize {
	return ADDRESS_SIZES.some((tsz) => tsz === value);
}

export function isExceptionLevel(value: number): value is ExceptionLevel {
	return EXCEPTION_LEVELS.some((el) => el === value);
}

export function parseGranule(str: string): Granule {
	const m = str.match(/^(4|16|64)K$/i);
	const granule = m ? parseInt(m[1], 10) * 1024 : NaN;
	if (!isGranule(granule))
		throw new ConfigError(`Unsupported translation granule: ${str} (expected 4K, 16K or 64K)`);
	return granule;
}

export function validateConfig(raw: { granule: number, tsz: number, el: number, ttb: number }): MmuConfig {
	const { granule, tsz, el, ttb } = raw;
	if (!isGranule(granule))
		throw new ConfigError(`Unsupported translation granule: ${granule}`);
	if (!isAddressSize(tsz))
		throw new ConfigError(`Unsupported address space size: ${tsz} (expected ${ADDRESS_SIZES.join(", ")})`);
	if (!isExceptionLevel(el))
		throw new ConfigError(`Unsupported exception level: ${el} (expected ${EXCEPTION_LEVELS.join(", ")})`);
	if (!Number.isSafeInteger(ttb) || ttb < 0 || ttb >= 2 ** 48)
		throw new ConfigError(`Invalid translation table base: ${ttb}`);
	if (ttb % granule != 0)
		throw new ConfigError(`Translation table base ${hex(ttb)} is not aligned to the ${granule / 1024}K granule`);
	return { granule, tsz, el, ttb };
}

export function resolveGeometry(granule: number, tsz: number): Geometry {
	if (!isGranule(granule))
		throw new ConfigError(`Unsupported translation granule: ${granule}`);
	if (!isAddressSize(tsz))
		throw new ConfigError(`Unsupported address space size: ${tsz}`);

	const entriesPerTable = granule / 8;
	const indexBits = Math.log2(entriesPerTable);
	const offsetBits = Math.log2(granule);

	// When tsz - offsetBits is an exact multiple of indexBits the top table is fully used
	const startLevel = 4 - Math.ceil((tsz - offsetBits) / indexBits);
	if (startLevel < 0 || startLevel > 3)
		throw new ConfigError(sprintf("Start level %d is out of range for %dK granule and %d-bit address space", startLevel, granule / 1024, tsz));

	const geometry: Geometry = {
		granule,
		tsz,
		entriesPerTable,
		indexBits,
		offsetBits,
		startLevel,
		minBlockLevel: granule == 4 * 1024 ? 1 : 2,
		rootEntries: 0,
	};
	geometry.rootEntries = 2 ** tsz / chunkSize(geometry, startLevel);

	debug(`entriesPerTable=${entriesPerTable} indexBits=${indexBits} offsetBits=${offsetBits}`);
	debug(`startLevel=${startLevel} minBlockLevel=${geometry.minBlockLevel} rootEntries=${geometry.rootEntries}`);

	return geometry;
}

/**
 * Bytes of VA covered by a single entry of a table at the given level.
 */
export function chunkSize(geometry: Pick<Geometry, "granule" | "indexBits">, level: number): number {
	return geometry.granule * 2 ** ((3 - level) * geometry.indexBits);
}
