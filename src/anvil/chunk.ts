import type { NbtCompound, NbtRoot } from "../nbt/index.ts";

/** One decoded chunk of a region file. */
export type Chunk = {
	/** Column inside the region, 0..31. */
	readonly x: number;
	/** Row inside the region, 0..31. */
	readonly z: number;
	/** World chunk coordinates, when the region knows its own position. */
	readonly chunkX: number | null;
	readonly chunkZ: number | null;
	/** Last modification, seconds since the epoch. */
	readonly timestamp: number;
	readonly nbt: NbtRoot<NbtCompound>;
};

export const createChunk = (chunk: Chunk): Chunk => Object.freeze({ ...chunk });
