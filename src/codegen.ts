import { MmuConfig } from "./geometry.js";
import { MemoryType } from "./MemoryMap.js";
import { blockTemplate, mmuRegisters, pageTemplate, tableTemplate } from "./mmu.js";
import { describeTables, tableEntries, usage } from "./report.js";
import { LeafEntry, TranslationTable, TranslationTables } from "./TranslationTables.js";
import { alignComments, formatSize, hex } from "./utils.js";

export type CodegenOptions = {
	/** Memory map file name, quoted in the header */
	source?: string;
};

// Registers holding the [block, page] descriptor templates
const TEMPLATE_REGISTERS: Record<MemoryType, [string, string]> = {
	[MemoryType.DEVICE]: ["x2", "x3"],
	[MemoryType.RW_DATA]: ["x4", "x5"],
	[MemoryType.CODE]: ["x20", "x21"],
};

// Lines of the header comment, which must not close it early
function commentBlock(text: string) {
	return text.split("\n").map((line) => ` * ${line.replaceAll("*/", "* /")}`.trimEnd()).join("\n");
}

function mkTable(n: number, table: TranslationTable) {
	return `
program_table_${n}:

    LDR     x8, =${hex(table.addr)}          // base address of this table
    LDR     x9, =${hex(table.chunk)}         // chunk size`;
}

function mkBlocks(n: number, table: TranslationTable, idx: number, entry: LeafEntry) {
	const [block, page] = TEMPLATE_REGISTERS[entry.region.type];
	const template = table.level < 3 ? block : page;
	const range = entry.contiguous > 1 ? `_to_${idx + entry.contiguous - 1}` : "";
	return `

program_table_${n}_entry_${idx}${range}:

    LDR     x10, =${idx}                 // idx
    LDR     x11, =${entry.contiguous}    // number of contiguous entries
    LDR     x12, =${hex(entry.region.addr)}  // output address of entry[idx]
1:
    ORR     x12, x12, ${template}        // merge output address with template
    STR     X12, [x8, x10, lsl #3]      // write entry into table
    ADD     x10, x10, #1                // prepare for next entry idx+1
    ADD     x12, x12, x9                // add chunk to address
    SUBS    x11, x11, #1                // loop as required
    B.NE    1b`;
}

function mkNextLevelTable(n: number, idx: number, next: TranslationTable) {
	return `

program_table_${n}_entry_${idx}:

    LDR     x10, =${idx}                 // idx
    LDR     x11, =${hex(next.addr)}      // next-level table address
    ORR     x11, x11, #${hex(tableTemplate())}  // next-level table descriptor
    STR     x11, [x8, x10, lsl #3]      // write entry into table`;
}

function mkTables(tables: TranslationTables) {
	let str = "";
	for (const table of tables.all()) {
		str += mkTable(table.index, table);
		for (const [idx, entry] of tableEntries(table)) {
			switch (entry.type) {
				case "leaf":
					str += mkBlocks(table.index, table, idx, entry);
				break;

				case "table":
					str += mkNextLevelTable(table.index, idx, tables.get(entry.table));
				break;
			}
		}
	}
	return str;
}

/**
 * GNU assembly for `mmu_on`, which builds the tables at ttb and enables the MMU.
 * Safe to call from every core: the first one in populates the tables, all of them
 * program their own system registers.
 */
export function generateAssembly(config: MmuConfig, tables: TranslationTables, options: CodegenOptions = {}): string {
	const { el } = config;
	const regs = mmuRegisters(config);
	const template = (type: MemoryType, page: boolean) => hex(page ? pageTemplate(type, el) : blockTemplate(type, el));

	const text = `
/*
 * This file was automatically generated by pgtable-gen.
 *
 * THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
 * IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
 * FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT.
 *
 * This code programs the following translation table structure:
 *
${commentBlock(describeTables(tables))}
 *
 * The following options were used:
 *
 *      -i ${options.source ?? "<memory map>"}
 *      --ttb ${hex(config.ttb)}
 *      --el ${el}
 *      --tg ${formatSize(config.granule)}
 *      --tsz ${config.tsz}
 *
${commentBlock(usage(tables))}
 * It is the programmer's responsibility to guarantee this.
 *
 * The programmer must also ensure that the virtual memory region containing the
 * translation tables is itself marked as NORMAL in the memory map file.
 */

    .section .data.mmu
    .balign 2

    mmu_lock: .4byte 0                  // lock to ensure only 1 CPU runs init
    #define LOCKED 1

    mmu_init: .4byte 0                  // whether init has been run
    #define INITIALISED 1

    .section .text.mmu_on
    .balign 2
    .global mmu_on
    .type mmu_on, @function

mmu_on:

    ADRP    x0, mmu_lock                // get 4KB page containing mmu_lock
    ADD     x0, x0, :lo12:mmu_lock      // restore low 12 bits lost by ADRP
    MOV     w1, #LOCKED
    SEVL                                // first pass won't sleep
1:
    WFE                                 // sleep on retry
    LDAXR   w2, [x0]                    // read mmu_lock
    CBNZ    w2, 1b                      // not available, go back to sleep
    STXR    w3, w1, [x0]                // try to acquire mmu_lock
    CBNZ    w3, 1b                      // failed, go back to sleep

check_already_initialised:

    ADRP    x1, mmu_init                // get 4KB page containing mmu_init
    ADD     x1, x1, :lo12:mmu_init      // restore low 12 bits lost by ADRP
    LDR     w2, [x1]                    // read mmu_init
    CBNZ    w2, end                     // init already done, skip to the end

zero_out_tables:

    LDR     x2, =${hex(config.ttb)}     // address of first table
    LDR     x3, =${hex(tables.size)}    // combined length of all tables
    LSR     x3, x3, #5                  // number of required STP instructions
    FMOV    d0, xzr                     // clear q0
1:
    STP     q0, q0, [x2], #32           // zero out 4 table entries at a time
    SUBS    x3, x3, #1
    B.NE    1b

load_descriptor_templates:

    LDR     x2, =${template(MemoryType.DEVICE, false)}   // Device block
    LDR     x3, =${template(MemoryType.DEVICE, true)}    // Device page
    LDR     x4, =${template(MemoryType.RW_DATA, false)}  // RW data block
    LDR     x5, =${template(MemoryType.RW_DATA, true)}   // RW data page
    LDR     x20, =${template(MemoryType.CODE, false)}    // code block
    LDR     x21, =${template(MemoryType.CODE, true)}     // code page
${mkTables(tables)}

init_done:

    MOV     w2, #INITIALISED
    STR     w2, [x1]

end:

    LDR     x1, =${hex(regs.ttbr)}      // program ttbr0 on this CPU
    MSR     ttbr0_el${el}, x1
    LDR     x1, =${hex(regs.mair)}      // program mair on this CPU
    MSR     mair_el${el}, x1
    LDR     x1, =${hex(regs.tcr)}       // program tcr on this CPU
    MSR     tcr_el${el}, x1
    ISB
    MRS     x2, tcr_el${el}             // verify CPU supports desired config
    CMP     x2, x1
    B.NE    .
    LDR     x1, =${hex(regs.sctlr)}     // program sctlr on this CPU
    MSR     sctlr_el${el}, x1
    ISB                                 // synchronize context on this CPU
    STLR    wzr, [x0]                   // release mmu_lock
    RET                                 // done!
`;

	return alignComments(text);
}
