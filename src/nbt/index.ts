export {
	isGzipped,
	type NbtCompression,
	parseNbt,
	readNbtFile,
	serializeNbt,
	writeNbtFile,
} from "./compression.ts";
export { isNbtError, NbtError, type NbtErrorCode } from "./errors.ts";
export {
	appendNbtList,
	decodeNbt,
	deleteNbtEntry,
	encodeNbt,
	equalNbt,
	getNbtPath,
	type NbtEntries,
	nbtBool,
	nbtByte,
	nbtByteArray,
	nbtCompound,
	nbtDouble,
	nbtFloat,
	nbtInt,
	nbtIntArray,
	nbtList,
	nbtLong,
	nbtLongArray,
	nbtRoot,
	nbtShort,
	nbtString,
	setNbtEntry,
	simplifyNbt,
} from "./nbt.ts";
export { DEFAULT_MAX_DEPTH, type DecodeOptions, readRootTag } from "./read.ts";
export { parseSnbt, type SnbtOptions, toSnbt } from "./snbt.ts";
export * from "./types.ts";
export { writeRootTag } from "./write.ts";
