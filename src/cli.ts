import { existsSync } from "node:fs";
import {
	enumerateWorld,
	iterateRegionChunks,
	openRegionFile,
} from "./anvil/index.ts";
import {
	getNbtPath,
	isNbtError,
	readNbtFile,
	toSnbt,
} from "./nbt/index.ts";

// ─── Exit codes ─────────────────────────────────────────────────────────────

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_UNKNOWN_COMMAND = 2;
export const EXIT_BAD_FILE = 3;
export const EXIT_NOT_FOUND = 4;

const usage = () => {
	console.log("Usage: npm run nbt -- <command> [arguments]");
	console.log("Commands:");
	console.log("    print <file> [selector]  Print a file's NBT as SNBT");
	console.log("    region <file>            List the chunks stored in a region file");
	console.log("    world <dir>              List region files per dimension");
};

const exists = (path: string | undefined): path is string => {
	if (path && existsSync(path)) return true;
	console.error(`[nbt] File ${path ?? "(none)"} does not exist`);
	return false;
};

// ─── Commands ───────────────────────────────────────────────────────────────

const print = (args: string[]): number => {
	const [path, selector] = args;
	if (args.length > 2) {
		usage();
		return EXIT_BAD_FILE;
	}
	if (!exists(path)) return EXIT_BAD_FILE;
	const { parsed, compressed } = readNbtFile(path);
	if (selector === undefined) {
		console.log(
			`[nbt] Root tag ${JSON.stringify(parsed.name)} (${compressed ? "gzip" : "uncompressed"})`,
		);
		console.log(toSnbt(parsed));
		return EXIT_OK;
	}
	const selected = getNbtPath(parsed, selector);
	if (!selected) {
		console.error(`[nbt] No tag at ${selector}`);
		return EXIT_NOT_FOUND;
	}
	console.log(toSnbt(selected));
	return EXIT_OK;
};

const region = (args: string[]): number => {
	const [path] = args;
	if (!exists(path)) return EXIT_BAD_FILE;
	const cursor = iterateRegionChunks(openRegionFile(path));
	let count = 0;
	let failed = 0;
	for (;;) {
		try {
			const step = cursor.next();
			if (step.done) break;
			const { x, z, chunkX, chunkZ, timestamp } = step.value;
			const world = chunkX === null ? "" : ` chunk ${chunkX},${chunkZ}`;
			console.log(
				`[region] ${x},${z}${world} modified ${new Date(timestamp * 1000).toISOString()}`,
			);
			count++;
		} catch (error) {
			if (!isNbtError(error)) throw error;
			console.error(`[region] ${error.code}: ${error.message}`);
			failed++;
		}
	}
	console.log(`[region] ${count} chunks, ${failed} unreadable`);
	return EXIT_OK;
};

const world = (args: string[]): number => {
	const [dir] = args;
	if (!exists(dir)) return EXIT_BAD_FILE;
	for (const [dimension, files] of enumerateWorld(dir)) {
		console.log(`[nbt] Dimension ${dimension}: ${files.length} region files`);
		for (const file of files) {
			console.log(`    r.${file.x}.${file.z} (${file.format}) ${file.path}`);
		}
	}
	return EXIT_OK;
};

/** Run one command-line invocation and return its exit code. */
export const runNbtCli = (argv: readonly string[]): number => {
	const [command, ...args] = argv;
	if (command === undefined) {
		usage();
		return EXIT_FAILURE;
	}
	try {
		switch (command.toLowerCase()) {
			case "print":
				return print(args);
			case "region":
				return region(args);
			case "world":
				return world(args);
			default:
				console.error(`[nbt] Unknown command: ${command}`);
				usage();
				return EXIT_UNKNOWN_COMMAND;
		}
	} catch (error) {
		console.error("[nbt]", error instanceof Error ? error.message : error);
		return EXIT_FAILURE;
	}
};
