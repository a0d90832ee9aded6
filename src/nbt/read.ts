import { NbtError } from "./errors.ts";
import type {
	NbtCompound,
	NbtList,
	NbtListElementType,
	NbtRoot,
	NbtTag,
	NbtTagType,
	ReadResult,
} from "./types.ts";
import { TAG_ID_TO_TYPE } from "./types.ts";

export const DEFAULT_MAX_DEPTH = 512;

export type DecodeOptions = {
	/** Deepest compound/list nesting accepted before `DepthExceeded`. */
	readonly maxDepth?: number;
};

type Reader = {
	readonly buf: Buffer;
	readonly maxDepth: number;
};

// ─── Bounds ─────────────────────────────────────────────────────────────────

const ensureAvailable = (reader: Reader, offset: number, size: number) => {
	if (offset + size > reader.buf.length) {
		const available = Math.max(0, reader.buf.length - offset);
		throw new NbtError(
			"UnexpectedEof",
			`Unexpected end of data at offset ${offset}: needed ${size} bytes, ${available} available`,
		);
	}
};

// ─── Big-endian primitives ──────────────────────────────────────────────────

const readUInt8 = (reader: Reader, offset: number): number => {
	ensureAvailable(reader, offset, 1);
	return reader.buf.readUInt8(offset);
};

const readCount = (reader: Reader, offset: number): number => {
	ensureAvailable(reader, offset, 4);
	const count = reader.buf.readInt32BE(offset);
	if (count < 0) {
		throw new NbtError(
			"NegativeLength",
			`Negative length ${count} at offset ${offset}`,
		);
	}
	return count;
};

const readString = (reader: Reader, offset: number): ReadResult<string> => {
	ensureAvailable(reader, offset, 2);
	const length = reader.buf.readUInt16BE(offset);
	ensureAvailable(reader, offset + 2, length);
	return {
		value: reader.buf.toString("utf8", offset + 2, offset + 2 + length),
		size: 2 + length,
	};
};

const readKind = (reader: Reader, offset: number): NbtListElementType => {
	const id = readUInt8(reader, offset);
	const kind = TAG_ID_TO_TYPE[id];
	if (kind === undefined) {
		throw new NbtError(
			"UnknownTagKind",
			`Unknown tag ID ${id} at offset ${offset}`,
		);
	}
	return kind;
};

// ─── Tag payload readers ────────────────────────────────────────────────────

const readNumbers = <T>(
	reader: Reader,
	offset: number,
	width: number,
	readOne: (buf: Buffer, at: number) => T,
): ReadResult<T[]> => {
	const count = readCount(reader, offset);
	const start = offset + 4;
	ensureAvailable(reader, start, count * width);
	const value: T[] = new Array(count);
	for (let i = 0; i < count; i++) {
		value[i] = readOne(reader.buf, start + i * width);
	}
	return { value, size: 4 + count * width };
};

const enterNested = (reader: Reader, depth: number, offset: number): number => {
	const next = depth + 1;
	if (next > reader.maxDepth) {
		throw new NbtError(
			"DepthExceeded",
			`Nesting deeper than ${reader.maxDepth} levels at offset ${offset}`,
		);
	}
	return next;
};

const readList = (
	reader: Reader,
	offset: number,
	depth: number,
): ReadResult<NbtList> => {
	const nested = enterNested(reader, depth, offset);
	const elementType = readKind(reader, offset);
	const count = readCount(reader, offset + 1);
	if (elementType === "end" && count > 0) {
		throw new NbtError(
			"UnexpectedEnd",
			`List at offset ${offset} declares ${count} End elements`,
		);
	}
	let pos = offset + 5;
	const items: NbtTag[] = [];
	if (elementType !== "end") {
		for (let i = 0; i < count; i++) {
			const result = readPayload(reader, pos, elementType, nested);
			items.push(result.value);
			pos += result.size;
		}
	}
	return {
		value: { type: "list", elementType, value: items },
		size: pos - offset,
	};
};

const readCompound = (
	reader: Reader,
	offset: number,
	depth: number,
): ReadResult<NbtCompound> => {
	const nested = enterNested(reader, depth, offset);
	const entries = new Map<string, NbtTag>();
	let pos = offset;
	for (;;) {
		const kind = readKind(reader, pos);
		pos += 1;
		if (kind === "end") break;
		const name = readString(reader, pos);
		pos += name.size;
		const payload = readPayload(reader, pos, kind, nested);
		entries.set(name.value, payload.value);
		pos += payload.size;
	}
	return { value: { type: "compound", value: entries }, size: pos - offset };
};

const readPayload = (
	reader: Reader,
	offset: number,
	tagType: NbtTagType,
	depth: number,
): ReadResult<NbtTag> => {
	const { buf } = reader;
	switch (tagType) {
		case "byte":
			ensureAvailable(reader, offset, 1);
			return { value: { type: "byte", value: buf.readInt8(offset) }, size: 1 };
		case "short":
			ensureAvailable(reader, offset, 2);
			return {
				value: { type: "short", value: buf.readInt16BE(offset) },
				size: 2,
			};
		case "int":
			ensureAvailable(reader, offset, 4);
			return { value: { type: "int", value: buf.readInt32BE(offset) }, size: 4 };
		case "long":
			ensureAvailable(reader, offset, 8);
			return {
				value: { type: "long", value: buf.readBigInt64BE(offset) },
				size: 8,
			};
		case "float":
			ensureAvailable(reader, offset, 4);
			return {
				value: { type: "float", value: buf.readFloatBE(offset) },
				size: 4,
			};
		case "double":
			ensureAvailable(reader, offset, 8);
			return {
				value: { type: "double", value: buf.readDoubleBE(offset) },
				size: 8,
			};
		case "byteArray": {
			const { value, size } = readNumbers(reader, offset, 1, (b, at) =>
				b.readInt8(at),
			);
			return { value: { type: "byteArray", value }, size };
		}
		case "string": {
			const { value, size } = readString(reader, offset);
			return { value: { type: "string", value }, size };
		}
		case "list":
			return readList(reader, offset, depth);
		case "compound":
			return readCompound(reader, offset, depth);
		case "intArray": {
			const { value, size } = readNumbers(reader, offset, 4, (b, at) =>
				b.readInt32BE(at),
			);
			return { value: { type: "intArray", value }, size };
		}
		case "longArray": {
			const { value, size } = readNumbers(reader, offset, 8, (b, at) =>
				b.readBigInt64BE(at),
			);
			return { value: { type: "longArray", value }, size };
		}
	}
};

// ─── Root tag reader ────────────────────────────────────────────────────────

/** Read one named tag (kind byte, name, payload) starting at `offset`. */
export const readRootTag = (
	buf: Buffer,
	offset = 0,
	options: DecodeOptions = {},
): ReadResult<NbtRoot> => {
	const reader: Reader = {
		buf,
		maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
	};
	const kind = readKind(reader, offset);
	if (kind === "end") {
		throw new NbtError(
			"UnexpectedEnd",
			`Root tag at offset ${offset} is an End tag`,
		);
	}
	const name = readString(reader, offset + 1);
	const payload = readPayload(reader, offset + 1 + name.size, kind, 0);
	return {
		value: { ...payload.value, name: name.value },
		size: 1 + name.size + payload.size,
	};
};
