import createDebug from "debug";
import { generateAssembly } from "./codegen.js";
import { MmuConfig, resolveGeometry } from "./geometry.js";
import { MemoryRegion, parseMemoryMap } from "./MemoryMap.js";
import { buildReport } from "./report.js";
import { TranslationTables } from "./TranslationTables.js";

const debug = createDebug("pgtable:generate");

export type GenerateResult = {
	regions: MemoryRegion[];
	tables: TranslationTables;
	assembly: string;
	report: string;
};

export function buildTables(config: MmuConfig, regions: MemoryRegion[]): TranslationTables {
	const tables = new TranslationTables(resolveGeometry(config.granule, config.tsz), config.ttb);
	tables.mapAll(regions);
	return tables;
}

/**
 * Memory map text in, assembly and report out. Throws before producing anything
 * if the configuration or the map is invalid.
 */
export function generate(config: MmuConfig, mapText: string, source?: string): GenerateResult {
	const regions = parseMemoryMap(mapText, { granule: config.granule, tsz: config.tsz, source });
	debug(`${regions.length} region(s) parsed`);

	const tables = buildTables(config, regions);
	const assembly = generateAssembly(config, tables, { source });
	const report = buildReport(tables);

	for (const line of assembly.split("\n"))
		debug(line);

	return { regions, tables, assembly, report };
}
