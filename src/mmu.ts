import { ExceptionLevel, Granule, AddressSize } from "./geometry.js";
import { MemoryType } from "./MemoryMap.js";
import { Register } from "./Register.js";

/*
 * MAIR_ELx
 * AttrIndx[0] = Normal, Inner/Outer Write-Back RAWA
 * AttrIndx[1] = Device-nGnRnE
 */
export const MAIR_ATTR_NORMAL = 0;
export const MAIR_ATTR_DEVICE = 1;

const TG0_ENCODING: Record<Granule, number> = {
	4096: 0,
	65536: 1,
	16384: 2,
};

const PS_ENCODING: Record<AddressSize, number> = {
	32: 0,
	36: 1,
	40: 2,
	48: 5,
};

// Access permissions, AP[2:1]
enum AccessPermission {
	RW	= 0b00,
	RO	= 0b10,
}

function leafTemplate(type: MemoryType, el: ExceptionLevel, page: boolean): bigint {
	const pte = new Register(page ? `page_${type.toLowerCase()}` : `block_${type.toLowerCase()}`);
	pte.field(0, 0, "valid", 1);
	pte.field(1, 1, "page", page ? 1 : 0);
	pte.field(4, 2, "attrindx", type == MemoryType.DEVICE ? MAIR_ATTR_DEVICE : MAIR_ATTR_NORMAL);
	pte.field(7, 6, "ap", type == MemoryType.CODE ? AccessPermission.RO : AccessPermission.RW);
	pte.field(9, 8, "sh", 3); // Inner Shareable
	pte.field(10, 10, "af", 1); // no Access Flag faults

	if (type != MemoryType.CODE) {
		if (el == 1) {
			pte.field(53, 53, "pxn", 1);
		} else {
			pte.field(54, 54, "xn", 1);
		}
	}
	return pte.value();
}

export function blockTemplate(type: MemoryType, el: ExceptionLevel): bigint {
	return leafTemplate(type, el, false);
}

export function pageTemplate(type: MemoryType, el: ExceptionLevel): bigint {
	return leafTemplate(type, el, true);
}

export function tableTemplate(): bigint {
	return 0x3n;
}

export function tcrValue(el: ExceptionLevel, tsz: AddressSize, granule: Granule): bigint {
	const reg = new Register(`tcr_el${el}`);
	reg.field(5, 0, "t0sz", 64 - tsz);
	reg.field(9, 8, "irgn0", 1); // Normal WB RAWA
	reg.field(11, 10, "orgn0", 1); // Normal WB RAWA
	reg.field(13, 12, "sh0", 3); // Inner Shareable
	reg.field(15, 14, "tg0", TG0_ENCODING[granule]);

	// EPD1 at EL1, RES1 at EL2/EL3
	reg.res1(23);

	if (el == 1) {
		reg.field(34, 32, "ips", PS_ENCODING[tsz]);
	} else {
		reg.field(18, 16, "ps", PS_ENCODING[tsz]);
		reg.res1(31);
	}
	return reg.value();
}

export function sctlrValue(el: ExceptionLevel): bigint {
	const reg = new Register(`sctlr_el${el}`);
	reg.field(0, 0, "m", 1); // MMU enabled
	reg.field(2, 2, "c", 1); // D-side cacheability controlled by pgtables
	reg.field(12, 12, "i", 1); // I-side cacheability controlled by pgtables
	reg.field(25, 25, "ee", 0); // little-endian data accesses

	for (const pos of [4, 5, 11, 16, 18, 22, 23, 28, 29])
		reg.res1(pos);

	if (el == 1)
		reg.res1(20);

	return reg.value();
}

export function mairValue(): bigint {
	return (0xFFn << BigInt(MAIR_ATTR_NORMAL * 8)) | (0x00n << BigInt(MAIR_ATTR_DEVICE * 8));
}

export function ttbrValue(ttb: number): bigint {
	return BigInt(ttb);
}

export type MmuRegisters = {
	ttbr: bigint;
	mair: bigint;
	tcr: bigint;
	sctlr: bigint;
};

export function mmuRegisters(config: { el: ExceptionLevel, tsz: AddressSize, granule: Granule, ttb: number }): MmuRegisters {
	return {
		ttbr: ttbrValue(config.ttb),
		mair: mairValue(),
		tcr: tcrValue(config.el, config.tsz, config.granule),
		sctlr: sctlrValue(config.el),
	};
}
