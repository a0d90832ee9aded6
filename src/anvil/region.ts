import { readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { deflateSync, gunzipSync, gzipSync, inflateSync } from "node:zlib";
import {
	decodeNbt,
	encodeNbt,
	NbtError,
	type NbtCompound,
	type NbtRoot,
} from "../nbt/index.ts";
import { type Chunk, createChunk } from "./chunk.ts";
import { regionPosFromPath } from "./world.ts";

export const SECTOR_BYTES = 4096;
export const REGION_WIDTH = 32;
const SLOT_COUNT = REGION_WIDTH * REGION_WIDTH;
const HEADER_BYTES = SECTOR_BYTES * 2;
const CHUNK_HEADER_SIZE = 5;
const MAX_SECTORS_PER_CHUNK = 255;
const EXTERNAL_FLAG = 0x80;

// ─── Per-chunk compression ──────────────────────────────────────────────────

export type ChunkCompression = "gzip" | "zlib" | "none";

const COMPRESSION_TO_ID: Readonly<Record<ChunkCompression, number>> = {
	gzip: 1,
	zlib: 2,
	none: 3,
};

const compressChunk = (compression: ChunkCompression, data: Buffer): Buffer => {
	if (compression === "gzip") return gzipSync(data);
	if (compression === "zlib") return deflateSync(data);
	return data;
};

// ─── Region state ───────────────────────────────────────────────────────────

export type RegionFile = {
	readonly path: string | null;
	readonly regionX: number | null;
	readonly regionZ: number | null;
	/** Whole file contents; replaced when a write grows the region. */
	data: Buffer;
	/** Location entries: sector offset << 8 | sector count. */
	readonly offsets: number[];
	readonly chunkTimestamps: number[];
	readonly sectorFree: boolean[];
};

export type RegionOptions = {
	readonly path?: string;
	readonly regionX?: number;
	readonly regionZ?: number;
};

const localCoord = (value: number): number =>
	((value % REGION_WIDTH) + REGION_WIDTH) % REGION_WIDTH;

/** Slot index for chunk coordinates; global coordinates wrap into the region. */
export const slotIndex = (x: number, z: number): number =>
	localCoord(z) * REGION_WIDTH + localCoord(x);

/** Parse the location and timestamp tables. Chunk payloads stay compressed until read. */
export const parseRegion = (
	source: Buffer,
	options: RegionOptions = {},
): RegionFile => {
	if (source.length < HEADER_BYTES) {
		throw new NbtError(
			"CorruptRegionFile",
			`Region file is ${source.length} bytes, shorter than its ${HEADER_BYTES} byte header`,
		);
	}

	// Always a private copy, zero-padded to whole sectors.
	const nSectors = Math.ceil(source.length / SECTOR_BYTES);
	const data = Buffer.alloc(nSectors * SECTOR_BYTES);
	source.copy(data);
	const sectorFree: boolean[] = new Array(nSectors).fill(true);
	sectorFree[0] = false; // offset table
	sectorFree[1] = false; // timestamps

	const offsets: number[] = [];
	const chunkTimestamps: number[] = [];
	for (let i = 0; i < SLOT_COUNT; i++) {
		const offset = data.readUInt32BE(i * 4);
		offsets.push(offset);
		chunkTimestamps.push(data.readUInt32BE(SECTOR_BYTES + i * 4));
		const start = offset >>> 8;
		const count = offset & 0xff;
		if (offset !== 0 && start >= 2 && start + count <= nSectors) {
			for (let s = 0; s < count; s++) sectorFree[start + s] = false;
		}
	}

	const pos = options.path ? regionPosFromPath(options.path) : null;
	return {
		path: options.path ?? null,
		regionX: options.regionX ?? pos?.x ?? null,
		regionZ: options.regionZ ?? pos?.z ?? null,
		data,
		offsets,
		chunkTimestamps,
		sectorFree,
	};
};

/** Read a region file; coordinates come from an `r.<x>.<z>.mca` name when present. */
export const openRegionFile = (path: string): RegionFile =>
	parseRegion(readFileSync(path), { path });

/** An empty region with both header tables zeroed. */
export const createRegion = (options: RegionOptions = {}): RegionFile =>
	parseRegion(Buffer.alloc(HEADER_BYTES), options);

/**
 * Write the region's bytes to `path`, or to the path it was opened from.
 * A region with neither is a caller mistake and throws a plain `Error`,
 * not an `NbtError`.
 */
export const saveRegionFile = (
	region: RegionFile,
	path: string | null = region.path,
): void => {
	if (path === null) throw new Error("Region has no path to save to");
	writeFileSync(path, region.data);
};

// ─── Lookups ────────────────────────────────────────────────────────────────

export const hasRegionChunk = (
	region: RegionFile,
	x: number,
	z: number,
): boolean => region.offsets[slotIndex(x, z)] !== 0;

export const getChunkTimestamp = (
	region: RegionFile,
	x: number,
	z: number,
): number => region.chunkTimestamps[slotIndex(x, z)];

export const countRegionChunks = (region: RegionFile): number =>
	region.offsets.filter((offset) => offset !== 0).length;

// ─── Chunk reads ────────────────────────────────────────────────────────────

const corrupt = (slot: number, message: string, cause?: unknown): NbtError =>
	new NbtError(
		"CorruptChunkEntry",
		`Chunk (${slot % REGION_WIDTH}, ${Math.floor(slot / REGION_WIDTH)}): ${message}`,
		cause === undefined ? undefined : { cause },
	);

const readExternalPayload = (region: RegionFile, slot: number): Buffer => {
	if (
		region.path === null ||
		region.regionX === null ||
		region.regionZ === null
	) {
		throw corrupt(slot, "stored externally but the region position is unknown");
	}
	const chunkX = region.regionX * REGION_WIDTH + (slot % REGION_WIDTH);
	const chunkZ =
		region.regionZ * REGION_WIDTH + Math.floor(slot / REGION_WIDTH);
	const external = join(dirname(region.path), `c.${chunkX}.${chunkZ}.mcc`);
	try {
		return readFileSync(external);
	} catch (error) {
		throw corrupt(slot, `cannot read external file ${external}`, error);
	}
};

const readSlotPayload = (region: RegionFile, slot: number): Buffer => {
	const offset = region.offsets[slot];
	const start = offset >>> 8;
	const count = offset & 0xff;
	const { data } = region;

	if (start < 2 || count === 0) {
		throw corrupt(slot, `invalid location (sector ${start}, count ${count})`);
	}
	const position = start * SECTOR_BYTES;
	if (position + CHUNK_HEADER_SIZE > data.length) {
		throw corrupt(slot, `sector ${start} lies past the end of the file`);
	}

	const length = data.readUInt32BE(position);
	const compression = data.readUInt8(position + 4);
	const external = (compression & EXTERNAL_FLAG) !== 0;
	if (length === 0 || (!external && length === 1)) {
		throw corrupt(slot, `empty payload (length ${length})`);
	}
	if (length + 4 > count * SECTOR_BYTES) {
		throw corrupt(
			slot,
			`payload of ${length} bytes does not fit in ${count} sectors`,
		);
	}
	if (position + 4 + length > data.length) {
		throw corrupt(slot, "payload is truncated by the end of the file");
	}

	const scheme = compression & 0x7f;
	if (scheme !== 1 && scheme !== 2 && scheme !== 3) {
		throw new NbtError(
			"UnsupportedCompression",
			`Chunk (${slot % REGION_WIDTH}, ${Math.floor(slot / REGION_WIDTH)}): unsupported compression type ${scheme}`,
		);
	}
	const stored = external
		? readExternalPayload(region, slot)
		: data.subarray(position + CHUNK_HEADER_SIZE, position + 4 + length);
	if (scheme === 3) return stored;
	try {
		return scheme === 1 ? gunzipSync(stored) : inflateSync(stored);
	} catch (error) {
		throw corrupt(slot, "payload does not decompress", error);
	}
};

const readSlot = (region: RegionFile, slot: number): Chunk | null => {
	if (region.offsets[slot] === 0) return null;
	const { root } = decodeNbt(readSlotPayload(region, slot));
	if (root.type !== "compound") {
		throw corrupt(slot, `root tag is ${root.type}, expected compound`);
	}
	const x = slot % REGION_WIDTH;
	const z = Math.floor(slot / REGION_WIDTH);
	return createChunk({
		x,
		z,
		chunkX: region.regionX === null ? null : region.regionX * REGION_WIDTH + x,
		chunkZ: region.regionZ === null ? null : region.regionZ * REGION_WIDTH + z,
		timestamp: region.chunkTimestamps[slot],
		nbt: root,
	});
};

/** Read and decode one chunk. Returns null if the slot is empty. */
export const readRegionChunk = (
	region: RegionFile,
	x: number,
	z: number,
): Chunk | null => readSlot(region, slotIndex(x, z));

/**
 * Cursor over the non-empty slots in slot order (z-major, then x).
 * Each `next()` decodes one chunk; a call that throws has already moved past
 * the failing slot, so calling `next()` again continues with the rest.
 */
export const iterateRegionChunks = (
	region: RegionFile,
): IterableIterator<Chunk> => {
	let index = 0;
	const cursor: IterableIterator<Chunk> = {
		next() {
			while (index < SLOT_COUNT) {
				const chunk = readSlot(region, index++);
				if (chunk) return { done: false, value: chunk };
			}
			return { done: true, value: undefined };
		},
		[Symbol.iterator]() {
			return cursor;
		},
	};
	return cursor;
};

// ─── Chunk writes ───────────────────────────────────────────────────────────

export type WriteChunkOptions = {
	readonly compression?: ChunkCompression;
	/** Seconds since the epoch; defaults to now. */
	readonly timestamp?: number;
};

const setOffset = (region: RegionFile, slot: number, offset: number) => {
	region.offsets[slot] = offset;
	region.data.writeUInt32BE(offset, slot * 4);
};

const setTimestamp = (region: RegionFile, slot: number, value: number) => {
	region.chunkTimestamps[slot] = value;
	region.data.writeUInt32BE(value, SECTOR_BYTES + slot * 4);
};

const freeSectors = (region: RegionFile, slot: number) => {
	const offset = region.offsets[slot];
	const start = offset >>> 8;
	for (let i = 0; i < (offset & 0xff); i++) {
		if (start + i >= 2 && start + i < region.sectorFree.length) {
			region.sectorFree[start + i] = true;
		}
	}
};

const findFreeRun = (region: RegionFile, sectorsNeeded: number): number => {
	let runStart = -1;
	let runLength = 0;
	for (let i = 0; i < region.sectorFree.length; i++) {
		if (region.sectorFree[i]) {
			if (runLength === 0) runStart = i;
			runLength++;
			if (runLength >= sectorsNeeded) return runStart;
		} else {
			runLength = 0;
		}
	}
	return -1;
};

const growRegion = (region: RegionFile, sectors: number): number => {
	const start = region.sectorFree.length;
	const grown = Buffer.alloc((start + sectors) * SECTOR_BYTES);
	region.data.copy(grown);
	region.data = grown;
	for (let i = 0; i < sectors; i++) region.sectorFree.push(true);
	return start;
};

/** Encode, compress and store a chunk, reusing its sectors when the size allows. */
export const writeRegionChunk = (
	region: RegionFile,
	x: number,
	z: number,
	nbt: NbtRoot<NbtCompound>,
	options: WriteChunkOptions = {},
): void => {
	const compression = options.compression ?? "zlib";
	const compressed = compressChunk(compression, encodeNbt(nbt));
	const length = compressed.length + 1;
	const sectorsNeeded = Math.ceil((length + 4) / SECTOR_BYTES);
	if (sectorsNeeded > MAX_SECTORS_PER_CHUNK) {
		throw new NbtError(
			"ChunkTooLarge",
			`Chunk needs ${sectorsNeeded} sectors, the limit is ${MAX_SECTORS_PER_CHUNK}`,
		);
	}

	const slot = slotIndex(x, z);
	const offset = region.offsets[slot];
	let sectorNumber = offset >>> 8;
	const reusable =
		(offset & 0xff) === sectorsNeeded &&
		sectorNumber >= 2 &&
		sectorNumber + sectorsNeeded <= region.sectorFree.length;
	if (!reusable) {
		freeSectors(region, slot);
		sectorNumber = findFreeRun(region, sectorsNeeded);
		if (sectorNumber === -1) sectorNumber = growRegion(region, sectorsNeeded);
		for (let i = 0; i < sectorsNeeded; i++) {
			region.sectorFree[sectorNumber + i] = false;
		}
		setOffset(region, slot, sectorNumber * 256 + sectorsNeeded);
	}

	const position = sectorNumber * SECTOR_BYTES;
	region.data.fill(0, position, position + sectorsNeeded * SECTOR_BYTES);
	region.data.writeUInt32BE(length, position);
	region.data.writeUInt8(COMPRESSION_TO_ID[compression], position + 4);
	compressed.copy(region.data, position + CHUNK_HEADER_SIZE);

	setTimestamp(
		region,
		slot,
		options.timestamp ?? Math.floor(Date.now() / 1000),
	);
};

/** Empty a slot and release its sectors. */
export const deleteRegionChunk = (
	region: RegionFile,
	x: number,
	z: number,
): void => {
	const slot = slotIndex(x, z);
	freeSectors(region, slot);
	setOffset(region, slot, 0);
	setTimestamp(region, slot, 0);
};
