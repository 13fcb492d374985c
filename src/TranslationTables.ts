import createDebug from "debug";
import { ContractViolation } from "./errors.js";
import { chunkSize, Geometry } from "./geometry.js";
import { copyRegion, MemoryRegion, regionEnd } from "./MemoryMap.js";
import { alignDown, alignUp, hex } from "./utils.js";

const debug = createDebug("pgtable:table");

export type LeafEntry = {
	type: "leaf";
	region: MemoryRegion;
	/** Number of consecutive identical leaves starting at this index */
	contiguous: number;
};

export type TablePointerEntry = {
	type: "table";
	/** Arena index of the next-level table */
	table: number;
};

export type TableEntry = LeafEntry | TablePointerEntry;

export type TranslationTable = {
	/** Allocation order, also the table's slot in the ttb buffer */
	index: number;
	addr: number;
	level: number;
	/** VA span of one entry */
	chunk: number;
	/** VA of entry 0 */
	vaBase: number;
	entries: Map<number, TableEntry>;
};

/**
 * Arena of translation tables built for a single memory map.
 * Tables are allocated on demand from a flat buffer at ttb and never freed.
 */
export class TranslationTables {
	readonly geometry: Geometry;
	readonly ttb: number;
	readonly root: TranslationTable;
	private readonly tables: TranslationTable[] = [];

	constructor(geometry: Geometry, ttb: number) {
		this.geometry = geometry;
		this.ttb = ttb;
		this.root = this.alloc(geometry.startLevel, 0);
	}

	get count() {
		return this.tables.length;
	}

	/** Bytes the caller must reserve at ttb */
	get size() {
		return this.tables.length * this.geometry.granule;
	}

	get(index: number): TranslationTable {
		const table = this.tables[index];
		if (!table)
			throw new ContractViolation(`Table #${index} is not allocated`);
		return table;
	}

	all(): readonly TranslationTable[] {
		return this.tables;
	}

	map(region: MemoryRegion) {
		debug(`mapping ${region.label} ${hex(region.addr)}-${hex(regionEnd(region) - 1)}`);
		this.mapInto(this.root, region);
	}

	mapAll(regions: Iterable<MemoryRegion>) {
		for (const region of regions)
			this.map(region);
		debug(`${this.tables.length} table(s) allocated`);
	}

	/**
	 * Index of the entry covering addr.
	 */
	indexOf(table: TranslationTable, addr: number) {
		return Math.floor((addr - table.vaBase) / table.chunk);
	}

	private alloc(level: number, vaBase: number): TranslationTable {
		const index = this.tables.length;
		const table: TranslationTable = {
			index,
			addr: this.ttb + index * this.geometry.granule,
			level,
			chunk: chunkSize(this.geometry, level),
			vaBase,
			entries: new Map(),
		};
		this.tables.push(table);
		debug(`allocated table #${index} @ ${hex(table.addr)} level=${level} va=${hex(vaBase)}`);
		return table;
	}

	/**
	 * Next-level table at idx, allocated on first use.
	 */
	private prepareNext(table: TranslationTable, idx: number): TranslationTable {
		const entry = table.entries.get(idx);
		if (entry) {
			if (entry.type == "leaf")
				throw new ContractViolation(`Level ${table.level} table #${table.index} entry ${idx} is already a leaf (${entry.region.label})`);
			return this.get(entry.table);
		}

		if (table.level >= 3)
			throw new ContractViolation(`Level 3 table #${table.index} can't point to another table`);

		const next = this.alloc(table.level + 1, table.vaBase + idx * table.chunk);
		table.entries.set(idx, { type: "table", table: next.index });
		return next;
	}

	private setLeaf(table: TranslationTable, idx: number, region: MemoryRegion) {
		if (table.entries.has(idx))
			throw new ContractViolation(`Level ${table.level} table #${table.index} entry ${idx} is written twice (${region.label})`);
		table.entries.set(idx, { type: "leaf", region, contiguous: 1 });
	}

	private mapInto(table: TranslationTable, region: MemoryRegion) {
		const chunk = table.chunk;
		const start = region.addr;
		const end = regionEnd(region);
		const span = this.geometry.entriesPerTable * chunk;

		if (region.length <= 0 || start < table.vaBase || end > table.vaBase + span) {
			throw new ContractViolation(`${region.label} ${hex(start)}-${hex(end)} doesn't fit in level ${table.level} table #${table.index} ` +
				`${hex(table.vaBase)}-${hex(table.vaBase + span)}`);
		}

		const firstFull = alignUp(start, chunk);
		const lastFull = alignDown(end, chunk);

		/*
		 * Floating region, smaller than a chunk and not crossing a chunk boundary:
		 *
		 *   |    [~~~~~~]    |
		 *
		 * Nothing to write at this level.
		 */
		if (firstFull > lastFull) {
			const idx = this.indexOf(table, start);
			debug(`L${table.level}: floating ${region.label}, dispatching to entry ${idx}`);
			this.mapInto(this.prepareNext(table, idx), region);
			return;
		}

		/*
		 * Underflow and overflow, the partial chunks on either side:
		 *
		 *   |    [~~~|~~~~~~~~|~~~]    |
		 *
		 * Computed from the aligned boundaries, so a region that is misaligned on
		 * both ends never has one chunk counted as both partial and complete.
		 */
		const underflow = start % chunk;
		if (underflow) {
			const idx = this.indexOf(table, start);
			debug(`L${table.level}: underflow=${hex(underflow)}, dispatching to entry ${idx}`);
			this.mapInto(this.prepareNext(table, idx), copyRegion(region, { length: firstFull - start }));
		}

		const overflow = end % chunk;
		if (overflow) {
			const idx = this.indexOf(table, lastFull);
			debug(`L${table.level}: overflow=${hex(overflow)}, dispatching to entry ${idx}`);
			this.mapInto(this.prepareNext(table, idx), copyRegion(region, { addr: lastFull, length: overflow }));
		}

		const startIdx = this.indexOf(table, firstFull);
		const numChunks = (lastFull - firstFull) / chunk;
		if (numChunks == 0)
			return;

		if (table.level < this.geometry.minBlockLevel) {
			debug(`L${table.level}: no blocks allowed, dispatching ${numChunks} chunk(s) from entry ${startIdx}`);
			for (let idx = startIdx; idx < startIdx + numChunks; idx++) {
				const full = copyRegion(region, { addr: table.vaBase + idx * chunk, length: chunk });
				this.mapInto(this.prepareNext(table, idx), full);
			}
			return;
		}

		debug(`L${table.level}: ${numChunks} ${table.level < 3 ? "block" : "page"}(s) from entry ${startIdx}`);
		for (let idx = startIdx; idx < startIdx + numChunks; idx++)
			this.setLeaf(table, idx, copyRegion(region, { addr: table.vaBase + idx * chunk, length: chunk }));

		const first = table.entries.get(startIdx);
		if (numChunks > 1 && first?.type == "leaf")
			first.contiguous = numChunks;
	}
}
