/**
 * Whole-file gzip framing for standalone NBT files such as level.dat.
 * Reading accepts gzip or raw NBT; writing to disk always gzips.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { gunzipSync, gzipSync } from "node:zlib";
import { NbtError } from "./errors.ts";
import { decodeNbt, encodeNbt } from "./nbt.ts";
import type { DecodeOptions } from "./read.ts";
import type { NbtParseResult, NbtRoot } from "./types.ts";

export type NbtCompression = "gzip" | "none";

export const isGzipped = (data: Uint8Array): boolean =>
	data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;

// Truncated and damaged gzip streams both end the NBT data early.
const gunzip = (data: Buffer | Uint8Array): Buffer => {
	try {
		return gunzipSync(data);
	} catch (error) {
		throw new NbtError(
			"UnexpectedEof",
			"Gzip stream ends before a complete NBT payload",
			{ cause: error },
		);
	}
};

/** Decode a root tag, inflating first when the data starts with the gzip magic. */
export const parseNbt = (
	data: Buffer | Uint8Array,
	options: DecodeOptions = {},
): NbtParseResult => {
	const compressed = isGzipped(data);
	const raw = compressed ? gunzip(data) : data;
	const { root, bytesRead } = decodeNbt(raw, options);
	return { parsed: root, compressed, bytesRead };
};

export const serializeNbt = (
	root: NbtRoot,
	compression: NbtCompression = "gzip",
): Buffer => {
	const raw = encodeNbt(root);
	return compression === "gzip" ? gzipSync(raw) : raw;
};

export const readNbtFile = (
	path: string,
	options: DecodeOptions = {},
): NbtParseResult => parseNbt(readFileSync(path), options);

export const writeNbtFile = (path: string, root: NbtRoot): void => {
	writeFileSync(path, serializeNbt(root, "gzip"));
};
