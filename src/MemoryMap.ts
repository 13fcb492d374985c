import createDebug from "debug";
import { InputError } from "./errors.js";
import { alignDown, alignUp, hex, parseAddress, parseSize } from "./utils.js";

const debug = createDebug("pgtable:mmap");

export enum MemoryType {
	DEVICE	= "DEVICE",
	RW_DATA	= "RW_DATA",
	CODE	= "CODE",
}

export type MemoryRegion = {
	/** 1-based line in the memory map file */
	lineno: number;
	label: string;
	addr: number;
	length: number;
	type: MemoryType;
};

export type MemoryMapOptions = {
	granule: number;
	tsz: number;
	/** File name used in diagnostics */
	source?: string;
};

export function copyRegion(region: MemoryRegion, overrides: Partial<MemoryRegion> = {}): MemoryRegion {
	return { ...region, ...overrides };
}

export function regionEnd(region: MemoryRegion) {
	return region.addr + region.length;
}

function isMemoryType(value: string): value is MemoryType {
	return Object.values(MemoryType).some((type) => type === value);
}

/**
 * Quote the line and underline the offending part of it.
 */
function diagnose(line: string, part: string): string[] {
	const column = Math.max(line.indexOf(part), 0);
	return [
		`    ${line}`,
		`    ${" ".repeat(column)}${"^".repeat(Math.max(part.length, 1))}`,
	];
}

/**
 * Parse a memory map with one region per line:
 *
 *   <addr>, <length>, <DEVICE|RW_DATA|CODE>, <label>
 *
 * e.g. "0x09000000, 4K, DEVICE, UART". Regions are widened to the granule and
 * returned sorted by base address.
 */
export function parseMemoryMap(text: string, options: MemoryMapOptions): MemoryRegion[] {
	const source = options.source ?? "<memory map>";
	const lines = text.split(/\r?\n/);
	const regions: MemoryRegion[] = [];

	for (let i = 0; i < lines.length; i++) {
		const lineno = i + 1;
		const line = lines[i].trim();
		if (line == "" || line.startsWith("#"))
			continue;

		debug(`parsing line ${lineno}: ${line}`);

		const badRegion = (what: string, part: string) => {
			return new InputError(`${source}:${lineno}: bad region ${what}: ${part}`, lineno, diagnose(line, part));
		};

		const fields = line.split(",");
		if (fields.length < 4)
			throw badRegion("format: incomplete", line);
		if (fields.length > 4)
			throw badRegion("format: unexpected field(s)", fields.slice(4).join(",").trim());

		const [addrStr, lengthStr, typeStr, label] = fields.map((field) => field.trim());

		let addr = parseAddress(addrStr);
		if (addr === undefined)
			throw badRegion("base address", addrStr);

		let length = parseSize(lengthStr);
		if (length === undefined || length == 0)
			throw badRegion("length", lengthStr);

		if (!isMemoryType(typeStr))
			throw badRegion("attributes", typeStr);

		if (label == "")
			throw badRegion("label", line);
		if (label.includes("*/"))
			throw badRegion("label", label);

		const start = alignDown(addr, options.granule);
		const end = alignUp(addr + length, options.granule);
		if (start != addr || end - start != length) {
			debug(`widened to granule: addr=${hex(start)} length=${hex(end - start)}`);
			addr = start;
			length = end - start;
		}

		if (end > 2 ** options.tsz)
			throw badRegion(`range: ends at ${hex(end)}, beyond the ${options.tsz}-bit address space`, addrStr);

		const overlapped = regions.filter((other) => addr < regionEnd(other) && other.addr < end);
		if (overlapped.length > 0) {
			const diagnostic = [`    ${line}`, "the overlapped regions are:"];
			for (const other of overlapped)
				diagnostic.push(`    ${lines[other.lineno - 1].trim()} (on line ${other.lineno})`);
			throw new InputError(`${source}:${lineno}: region overlaps other regions`, lineno, diagnostic);
		}

		const region: MemoryRegion = { lineno, label, addr, length, type: typeStr };
		regions.push(region);
		debug(`added ${label} addr=${hex(addr)} length=${hex(length)} type=${typeStr}`);
	}

	return regions.sort((a, b) => a.addr - b.addr);
}
