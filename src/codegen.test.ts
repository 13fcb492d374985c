import { describe, expect, test } from 'vitest';
import { generateAssembly } from './codegen.js';
import { TranslationTables } from './TranslationTables.js';
import { MmuConfig, resolveGeometry } from './geometry.js';
import { MemoryRegion, MemoryType } from './MemoryMap.js';

function assemble(config: MmuConfig, regions: MemoryRegion[]) {
	const tables = new TranslationTables(resolveGeometry(config.granule, config.tsz), config.ttb);
	tables.mapAll(regions);
	return generateAssembly(config, tables, { source: "board.map" }).split("\n");
}

// Instructions and labels without their comments
function code(lines: string[]) {
	return lines.map((line) => line.includes(" * ") ? line : line.replace(/\s*\/\/.*$/, ""));
}

const EL2: MmuConfig = { granule: 4096, tsz: 32, el: 2, ttb: 0x80000000 };
const UART: MemoryRegion = { lineno: 1, label: "UART", addr: 0x09000000, length: 0x1000, type: MemoryType.DEVICE };

describe('generateAssembly', () => {
	test('should program every table of a single page mapping', () => {
		const lines = code(assemble(EL2, [UART]));

		expect(lines).toContain("program_table_0:");
		expect(lines).toContain("program_table_0_entry_0:");
		expect(lines).toContain("program_table_1_entry_72:");
		expect(lines).toContain("    LDR     x11, =0x80002000");
		expect(lines).toContain("    ORR     x11, x11, #0x3");
		expect(lines).toContain("program_table_2_entry_0:");
		expect(lines).toContain("    LDR     x12, =0x9000000");
		expect(lines).toContain("    ORR     x12, x12, x3");
		expect(lines.filter((line) => line.match(/^program_table_\d+:$/))).toEqual([
			"program_table_0:",
			"program_table_1:",
			"program_table_2:",
		]);
	});

	test('should zero the tables and load the templates', () => {
		const lines = code(assemble(EL2, [UART]));
		expect(lines).toContain("    LDR     x2, =0x80000000");
		expect(lines).toContain("    LDR     x3, =0x3000");
		expect(lines).toContain("    LDR     x2, =0x40000000000705");
		expect(lines).toContain("    LDR     x3, =0x40000000000707");
		expect(lines).toContain("    LDR     x4, =0x40000000000701");
		expect(lines).toContain("    LDR     x5, =0x40000000000703");
		expect(lines).toContain("    LDR     x20, =0x781");
		expect(lines).toContain("    LDR     x21, =0x783");
	});

	test('should program the system registers for the exception level', () => {
		const el2 = code(assemble(EL2, [UART]));
		expect(el2).toContain("    LDR     x1, =0x80000000");
		expect(el2).toContain("    MSR     ttbr0_el2, x1");
		expect(el2).toContain("    LDR     x1, =0xff");
		expect(el2).toContain("    LDR     x1, =0x80803520");
		expect(el2).toContain("    MRS     x2, tcr_el2");
		expect(el2).toContain("    LDR     x1, =0x30c51835");
		expect(el2).toContain("    MSR     sctlr_el2, x1");

		const el1 = code(assemble({ ...EL2, el: 1 }, [UART]));
		expect(el1).toContain("    MSR     tcr_el1, x1");
		expect(el1).toContain("    LDR     x1, =0x30d51835");
		expect(el1).toContain("    LDR     x2, =0x20000000000705");
	});

	test('should emit one loop per contiguous run', () => {
		const lines = code(assemble(EL2, [{ ...UART, label: "RAM", addr: 0x80000000, length: 0x800000, type: MemoryType.RW_DATA }]));
		expect(lines).toContain("program_table_1_entry_0_to_3:");
		expect(lines).toContain("    LDR     x11, =4");
		expect(lines).toContain("    ORR     x12, x12, x4");
		expect(lines.filter((line) => line.startsWith("program_table_1_entry_"))).toHaveLength(1);
	});

	test('should keep the lock protocol in program order', () => {
		const lines = code(assemble(EL2, [UART]));
		const order = [
			"    LDAXR   w2, [x0]",
			"    STXR    w3, w1, [x0]",
			"check_already_initialised:",
			"zero_out_tables:",
			"load_descriptor_templates:",
			"program_table_0:",
			"init_done:",
			"end:",
			"    MSR     sctlr_el2, x1",
			"    STLR    wzr, [x0]",
			"    RET",
		].map((line) => lines.indexOf(line));
		expect(order.every((pos) => pos >= 0)).toBe(true);
		expect([...order].sort((a, b) => a - b)).toEqual(order);
	});

	test('should keep labels from closing the header comment', () => {
		const lines = assemble(EL2, [{ ...UART, label: "UART */ evil" }]);
		const text = lines.join("\n");
		expect(lines).toContain(" */");
		expect(text.indexOf("*/")).toBe(text.indexOf("\n */\n") + 2);
		expect(lines).toContain(" * " + " ".repeat(14) + "[#        0] 0x09000000-0x09000fff page  Device-nGnRnE  UART * / evil");
	});

	test('should align comments and describe the layout in the header', () => {
		const lines = assemble(EL2, [UART]);
		expect(lines).toContain("    LDR     x10, =0".padEnd(41) + "// idx");
		expect(lines).toContain("    STLR    wzr, [x0]".padEnd(41) + "// release mmu_lock");
		expect(lines).toContain(" * " + " ".repeat(14) + "[#        0] 0x09000000-0x09000fff page  Device-nGnRnE  UART");
		expect(lines).toContain(" *      -i board.map");
		expect(lines).toContain(" *      --tg 4K");
		expect(lines).toContain(" * This memory map requires a total of 3 translation table(s).");
	});
});
