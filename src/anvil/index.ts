export { type Chunk, createChunk } from "./chunk.ts";
export {
	type ChunkCompression,
	countRegionChunks,
	createRegion,
	deleteRegionChunk,
	getChunkTimestamp,
	hasRegionChunk,
	iterateRegionChunks,
	openRegionFile,
	parseRegion,
	REGION_WIDTH,
	type RegionFile,
	type RegionOptions,
	readRegionChunk,
	SECTOR_BYTES,
	saveRegionFile,
	slotIndex,
	type WriteChunkOptions,
	writeRegionChunk,
} from "./region.ts";
export {
	enumerateRegionFiles,
	enumerateWorld,
	groupRegionFiles,
	type RegionFileInfo,
	type RegionFormat,
	type RegionPos,
	regionPosFromPath,
} from "./world.ts";
