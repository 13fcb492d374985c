import { sprintf } from "sprintf-js";
import { MemoryType } from "./MemoryMap.js";
import { TableEntry, TranslationTable, TranslationTables } from "./TranslationTables.js";
import { formatSize, hex } from "./utils.js";

const MEMORY_TYPE_NAMES: Record<MemoryType, string> = {
	[MemoryType.DEVICE]: "Device-nGnRnE",
	[MemoryType.RW_DATA]: "Normal RW data",
	[MemoryType.CODE]: "Normal code",
};

/**
 * Walk entries in index order, yielding each contiguous run of leaves once.
 */
export function* tableEntries(table: TranslationTable): Generator<[number, TableEntry]> {
	const keys = [...table.entries.keys()].sort((a, b) => a - b);
	let skipUntil = -1;
	for (const idx of keys) {
		if (idx < skipUntil)
			continue;
		const entry = table.entries.get(idx);
		if (!entry)
			continue;
		if (entry.type == "leaf")
			skipUntil = idx + entry.contiguous;
		yield [idx, entry];
	}
}

function describeTable(tables: TranslationTables, table: TranslationTable, margin: string, lines: string[]) {
	const width = tables.geometry.tsz / 4;
	lines.push(sprintf("%slevel %d table @ %s (#%d, %s per entry)",
		margin, table.level, hex(table.addr), table.index, formatSize(table.chunk)));

	for (const [idx, entry] of tableEntries(table)) {
		switch (entry.type) {
			case "leaf":
			{
				const last = idx + entry.contiguous - 1;
				const slots = entry.contiguous > 1 ? `${idx}-${last}` : `${idx}`;
				const start = table.vaBase + idx * table.chunk;
				const end = table.vaBase + (last + 1) * table.chunk;
				lines.push(sprintf("%s  [#%9s] %s-%s %-5s %-14s %s",
					margin, slots, hex(start, width), hex(end - 1, width), table.level < 3 ? "block" : "page",
					MEMORY_TYPE_NAMES[entry.region.type], entry.region.label));
			}
			break;

			case "table":
			{
				const next = tables.get(entry.table);
				lines.push(sprintf("%s  [#%9s] %s-%s table",
					margin, `${idx}`, hex(next.vaBase, width), hex(next.vaBase + table.chunk - 1, width)));
				describeTable(tables, next, margin + "      ", lines);
			}
			break;
		}
	}
}

/**
 * Human-readable tree of all tables reachable from the root.
 */
export function describeTables(tables: TranslationTables): string {
	const lines: string[] = [];
	describeTable(tables, tables.root, "", lines);
	return lines.join("\n");
}

export function usage(tables: TranslationTables): string {
	const granule = tables.geometry.granule;
	return [
		`This memory map requires a total of ${tables.count} translation table(s).`,
		`Each table occupies ${formatSize(granule)} of memory (${hex(granule)} bytes).`,
		`The buffer pointed to by ${hex(tables.ttb)} must therefore be ${tables.count}x ${formatSize(granule)} = ${hex(tables.size)} bytes long.`,
	].join("\n");
}

export function buildReport(tables: TranslationTables): string {
	return describeTables(tables) + "\n\n" + usage(tables) + "\n";
}
