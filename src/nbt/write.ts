import { NbtError } from "./errors.ts";
import type { NbtRoot, NbtTag } from "./types.ts";
import { TAG_TYPE_TO_ID } from "./types.ts";

const MAX_STRING_BYTES = 0xffff;

// ─── Strings ────────────────────────────────────────────────────────────────

const encodeString = (value: string): Buffer => {
	const bytes = Buffer.from(value, "utf8");
	if (bytes.length > MAX_STRING_BYTES) {
		throw new NbtError(
			"StringTooLong",
			`String of ${bytes.length} bytes exceeds the ${MAX_STRING_BYTES} byte limit`,
		);
	}
	return bytes;
};

// ─── Size pass ──────────────────────────────────────────────────────────────

// Strings are encoded once here and replayed in the write pass, in the same order.
type Sizer = { readonly strings: Buffer[] };

const sizeOfString = (sizer: Sizer, value: string): number => {
	const bytes = encodeString(value);
	sizer.strings.push(bytes);
	return 2 + bytes.length;
};

const sizeOfPayload = (sizer: Sizer, tag: NbtTag): number => {
	switch (tag.type) {
		case "byte":
			return 1;
		case "short":
			return 2;
		case "int":
		case "float":
			return 4;
		case "long":
		case "double":
			return 8;
		case "byteArray":
			return 4 + tag.value.length;
		case "intArray":
			return 4 + tag.value.length * 4;
		case "longArray":
			return 4 + tag.value.length * 8;
		case "string":
			return sizeOfString(sizer, tag.value);
		case "list": {
			let size = 5;
			for (const item of tag.value) size += sizeOfPayload(sizer, item);
			return size;
		}
		case "compound": {
			let size = 1;
			for (const [name, child] of tag.value) {
				size += 1 + sizeOfString(sizer, name) + sizeOfPayload(sizer, child);
			}
			return size;
		}
	}
};

// ─── Write pass ─────────────────────────────────────────────────────────────

type Writer = {
	readonly buf: Buffer;
	readonly strings: readonly Buffer[];
	nextString: number;
};

const writeString = (writer: Writer, offset: number): number => {
	const bytes = writer.strings[writer.nextString++];
	writer.buf.writeUInt16BE(bytes.length, offset);
	bytes.copy(writer.buf, offset + 2);
	return offset + 2 + bytes.length;
};

const writeNumbers = <T>(
	writer: Writer,
	values: readonly T[],
	offset: number,
	width: number,
	writeOne: (buf: Buffer, value: T, at: number) => void,
): number => {
	writer.buf.writeInt32BE(values.length, offset);
	let pos = offset + 4;
	for (const value of values) {
		writeOne(writer.buf, value, pos);
		pos += width;
	}
	return pos;
};

const writePayload = (writer: Writer, tag: NbtTag, offset: number): number => {
	const { buf } = writer;
	switch (tag.type) {
		case "byte":
			buf.writeInt8(tag.value, offset);
			return offset + 1;
		case "short":
			buf.writeInt16BE(tag.value, offset);
			return offset + 2;
		case "int":
			buf.writeInt32BE(tag.value, offset);
			return offset + 4;
		case "long":
			buf.writeBigInt64BE(tag.value, offset);
			return offset + 8;
		case "float":
			buf.writeFloatBE(tag.value, offset);
			return offset + 4;
		case "double":
			buf.writeDoubleBE(tag.value, offset);
			return offset + 8;
		case "byteArray":
			return writeNumbers(writer, tag.value, offset, 1, (b, v, at) =>
				b.writeInt8(v, at),
			);
		case "intArray":
			return writeNumbers(writer, tag.value, offset, 4, (b, v, at) =>
				b.writeInt32BE(v, at),
			);
		case "longArray":
			return writeNumbers(writer, tag.value, offset, 8, (b, v, at) =>
				b.writeBigInt64BE(v, at),
			);
		case "string":
			return writeString(writer, offset);
		case "list": {
			buf.writeUInt8(TAG_TYPE_TO_ID[tag.elementType], offset);
			buf.writeInt32BE(tag.value.length, offset + 1);
			let pos = offset + 5;
			for (const item of tag.value) pos = writePayload(writer, item, pos);
			return pos;
		}
		case "compound": {
			let pos = offset;
			for (const child of tag.value.values()) {
				buf.writeUInt8(TAG_TYPE_TO_ID[child.type], pos);
				pos = writeString(writer, pos + 1);
				pos = writePayload(writer, child, pos);
			}
			buf.writeUInt8(0, pos);
			return pos + 1;
		}
	}
};

// ─── Root tag writer ────────────────────────────────────────────────────────

/** Serialize a named root tag to big-endian NBT bytes. */
export const writeRootTag = (root: NbtRoot): Buffer => {
	const sizer: Sizer = { strings: [] };
	const size = 1 + sizeOfString(sizer, root.name) + sizeOfPayload(sizer, root);

	const writer: Writer = {
		buf: Buffer.alloc(size),
		strings: sizer.strings,
		nextString: 0,
	};
	writer.buf.writeUInt8(TAG_TYPE_TO_ID[root.type], 0);
	const offset = writeString(writer, 1);
	writePayload(writer, root, offset);
	return writer.buf;
};
