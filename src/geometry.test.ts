import { describe, expect, test } from 'vitest';
import { ADDRESS_SIZES, chunkSize, GRANULES, parseGranule, resolveGeometry, validateConfig } from './geometry.js';
import { ConfigError } from './errors.js';

describe('resolveGeometry', () => {
	test('should derive 4K/32-bit constants', () => {
		expect(resolveGeometry(4096, 32)).toEqual({
			granule: 4096,
			tsz: 32,
			entriesPerTable: 512,
			indexBits: 9,
			offsetBits: 12,
			startLevel: 1,
			minBlockLevel: 1,
			rootEntries: 4,
		});
	});

	test('should pick the start level for every supported combination', () => {
		const expected: [number, number, number][] = [
			[4096, 32, 1], [4096, 36, 1], [4096, 40, 0], [4096, 48, 0],
			[16384, 32, 2], [16384, 36, 2], [16384, 40, 1], [16384, 48, 0],
			[65536, 32, 2], [65536, 36, 2], [65536, 40, 2], [65536, 48, 1],
		];
		for (const [granule, tsz, startLevel] of expected)
			expect(resolveGeometry(granule, tsz).startLevel, `${granule}/${tsz}`).toBe(startLevel);
	});

	test('should cover exactly the address space from the root table', () => {
		for (const granule of GRANULES) {
			for (const tsz of ADDRESS_SIZES) {
				const geometry = resolveGeometry(granule, tsz);
				expect(geometry.startLevel).toBeGreaterThanOrEqual(0);
				expect(geometry.startLevel).toBeLessThanOrEqual(3);
				expect(geometry.rootEntries).toBeLessThanOrEqual(geometry.entriesPerTable);
				expect(geometry.rootEntries * chunkSize(geometry, geometry.startLevel)).toBe(2 ** tsz);
				// one level lower would not be enough
				if (geometry.startLevel < 3)
					expect(geometry.entriesPerTable * chunkSize(geometry, geometry.startLevel + 1)).toBeLessThan(2 ** tsz);
			}
		}
	});

	test('should use level 2 as the first block level for 16K and 64K', () => {
		expect(resolveGeometry(4096, 48).minBlockLevel).toBe(1);
		expect(resolveGeometry(16384, 48).minBlockLevel).toBe(2);
		expect(resolveGeometry(65536, 48).minBlockLevel).toBe(2);
	});

	test('should reject unsupported granules and address sizes', () => {
		expect(() => resolveGeometry(8192, 32)).toThrow(ConfigError);
		expect(() => resolveGeometry(4096, 39)).toThrow(ConfigError);
	});
});

describe('chunkSize', () => {
	test('should return the span of one entry per level', () => {
		const geometry = resolveGeometry(4096, 48);
		expect(chunkSize(geometry, 3)).toBe(0x1000);
		expect(chunkSize(geometry, 2)).toBe(0x200000);
		expect(chunkSize(geometry, 1)).toBe(0x40000000);
		expect(chunkSize(geometry, 0)).toBe(2 ** 39);
	});
});

describe('validateConfig', () => {
	test('should accept a supported configuration', () => {
		expect(validateConfig({ granule: 4096, tsz: 32, el: 2, ttb: 0x80000000 })).toEqual({
			granule: 4096, tsz: 32, el: 2, ttb: 0x80000000,
		});
	});

	test('should reject bad values', () => {
		expect(() => validateConfig({ granule: 4096, tsz: 32, el: 4, ttb: 0 })).toThrow(/exception level/);
		expect(() => validateConfig({ granule: 4096, tsz: 33, el: 2, ttb: 0 })).toThrow(/address space size/);
		expect(() => validateConfig({ granule: 4096, tsz: 32, el: 2, ttb: 0x80000800 })).toThrow(/not aligned/);
		expect(() => validateConfig({ granule: 65536, tsz: 32, el: 2, ttb: 0x1000 })).toThrow(ConfigError);
	});

	test('should parse granule names', () => {
		expect(parseGranule("4K")).toBe(4096);
		expect(parseGranule("16K")).toBe(16384);
		expect(parseGranule("64K")).toBe(65536);
		expect(() => parseGranule("8K")).toThrow(ConfigError);
	});
});
