import createDebug from "debug";
import { ContractViolation } from "./errors.js";
import { hex } from "./utils.js";

const debug = createDebug("pgtable:register");

export type RegisterField = {
	name: string;
	hi: number;
	lo: number;
	value: bigint;
};

function fieldMask(hi: number, lo: number): bigint {
	return ((1n << BigInt(hi - lo + 1)) - 1n) << BigInt(lo);
}

/**
 * 64-bit system register or descriptor value assembled from bit fields.
 */
export class Register {
	readonly name: string;
	private readonly fields: RegisterField[] = [];
	private used = 0n;

	constructor(name: string) {
		this.name = name;
	}

	field(hi: number, lo: number, name: string, value: number | bigint): this {
		if (hi < lo || lo < 0 || hi > 63)
			throw new ContractViolation(`${this.name}.${name}: invalid bit range [${hi}:${lo}]`);

		const mask = fieldMask(hi, lo);
		if ((this.used & mask) != 0n)
			throw new ContractViolation(`${this.name}.${name}: bits [${hi}:${lo}] overlap another field`);
		this.used |= mask;

		const fieldValue = (BigInt(value) << BigInt(lo)) & mask;
		this.fields.push({ name, hi, lo, value: fieldValue });
		debug(`${this.name}.${name}=${value}`);
		return this;
	}

	res1(pos: number): this {
		return this.field(pos, pos, `res1[${pos}]`, 1);
	}

	value(): bigint {
		let value = 0n;
		for (const field of this.fields)
			value |= field.value;
		debug(`${this.name}=${hex(value)}`);
		return value;
	}
}
