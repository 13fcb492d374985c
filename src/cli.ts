import fs from "node:fs";
import { parseArgs } from "node:util";
import createDebug from "debug";
import { ConfigError, InputError } from "./errors.js";
import { generate } from "./generate.js";
import { parseGranule, validateConfig } from "./geometry.js";
import { parseAddress } from "./utils.js";

export const EINVAL = 22;

export const USAGE = `USAGE: pgtable-gen -i memory.map -o mmu.S --ttb 0x80000000 [--el 2] [--tg 4K] [--tsz 32] [-v|-vv]`;

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
	return e instanceof Error && "code" in e && typeof e.code == "string";
}

function parseInteger(str: string, what: string): number {
	if (!str.match(/^\d+$/))
		throw new ConfigError(`Invalid ${what}: ${str}`);
	return parseInt(str, 10);
}

function parseOptions(args: string[]) {
	try {
		return parseArgs({
			args,
			options: {
				input: {
					type: "string",
					short: "i",
				},
				output: {
					type: "string",
					short: "o",
				},
				ttb: {
					type: "string",
				},
				el: {
					type: "string",
					default: "2",
				},
				tg: {
					type: "string",
					default: "4K",
				},
				tsz: {
					type: "string",
					default: "32",
				},
				verbose: {
					type: "boolean",
					short: "v",
					multiple: true,
				},
				help: {
					type: "boolean",
					short: "h",
					default: false,
				},
			}
		}).values;
	} catch (e) {
		if (isErrnoException(e) && e.code?.startsWith("ERR_PARSE_ARGS"))
			throw new ConfigError(`${e.message}\n${USAGE}`);
		throw e;
	}
}

function run(args: string[]): number {
	const argv = parseOptions(args);

	const verbosity = argv.verbose?.length ?? 0;
	if (verbosity >= 2) {
		createDebug.enable("pgtable:*");
	} else if (verbosity == 1) {
		createDebug.enable("pgtable:*,-pgtable:register");
	}

	if (argv.help) {
		console.log(USAGE);
		return 0;
	}

	if (!argv.input || !argv.output || !argv.ttb)
		throw new ConfigError(`-i, -o and --ttb are required\n${USAGE}`);

	const ttb = parseAddress(argv.ttb);
	if (ttb === undefined)
		throw new ConfigError(`Invalid translation table base: ${argv.ttb}`);

	const config = validateConfig({
		granule: parseGranule(argv.tg),
		tsz: parseInteger(argv.tsz, "address space size"),
		el: parseInteger(argv.el, "exception level"),
		ttb,
	});

	let mapText: string;
	try {
		mapText = fs.readFileSync(argv.input, "utf-8");
	} catch (e) {
		if (!isErrnoException(e))
			throw e;
		console.error(`[ERROR] failed to open map file: ${e.message}`);
		return 1;
	}

	const result = generate(config, mapText, argv.input);

	try {
		fs.writeFileSync(argv.output, result.assembly);
	} catch (e) {
		if (!isErrnoException(e))
			throw e;
		console.error(`[ERROR] failed to write output file: ${e.message}`);
		return 1;
	}

	console.log(result.report);
	console.log(`Wrote ${argv.output}`);
	return 0;
}

/**
 * Run pgtable-gen with the given command line, returning the exit status.
 */
export function main(args: string[]): number {
	try {
		return run(args);
	} catch (e) {
		if (e instanceof InputError) {
			console.error(`[ERROR] ${e.message}`);
			for (const line of e.diagnostic)
				console.error(`[ERROR] ${line}`);
			return EINVAL;
		}
		if (e instanceof ConfigError) {
			console.error(`[ERROR] ${e.message}`);
			return EINVAL;
		}
		throw e;
	}
}
