import { sprintf } from "sprintf-js";

const SIZE_UNITS = "KMGT";

export function hex(value: number | bigint, width = 0) {
	return "0x" + value.toString(16).padStart(width, "0");
}

export function formatSize(size: number) {
	let unit = -1;
	while (unit < SIZE_UNITS.length - 1 && size >= 1024 && size % 1024 == 0) {
		size /= 1024;
		unit++;
	}
	return unit < 0 ? `${size}` : `${size}${SIZE_UNITS[unit]}`;
}

/**
 * Parse sizes like "4K", "2M" or "1G" into bytes.
 */
export function parseSize(str: string): number | undefined {
	const m = str.match(/^(\d+)([KMGT])$/);
	if (!m)
		return undefined;
	return parseInt(m[1], 10) * 1024 ** (SIZE_UNITS.indexOf(m[2]) + 1);
}

export function parseAddress(str: string): number | undefined {
	if (str.match(/^0x[0-9a-f]+$/i))
		return parseInt(str.substring(2), 16);
	if (str.match(/^\d+$/))
		return parseInt(str, 10);
	return undefined;
}

export function alignDown(value: number, align: number) {
	return Math.floor(value / align) * align;
}

export function alignUp(value: number, align: number) {
	return Math.ceil(value / align) * align;
}

/**
 * Put every "//" comment of an assembly listing at the same column.
 * Lines of a block comment (" * ") are left alone.
 */
export function alignComments(text: string, column: number = 41): string {
	const lines: string[] = [];
	for (const line of text.split("\n")) {
		const idx = line.indexOf("//");
		if (idx < 0 || line.includes(" * ")) {
			lines.push(line);
			continue;
		}
		const code = line.substring(0, idx).trimEnd();
		const comment = line.substring(idx);
		lines.push(sprintf("%-" + (column - 1) + "s %s", code, comment));
	}
	return lines.join("\n");
}
