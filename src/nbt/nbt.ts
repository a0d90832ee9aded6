import { NbtError } from "./errors.ts";
import { type DecodeOptions, readRootTag } from "./read.ts";
import type {
	NbtByte,
	NbtByteArray,
	NbtCompound,
	NbtDouble,
	NbtFloat,
	NbtInt,
	NbtIntArray,
	NbtList,
	NbtListElementType,
	NbtLong,
	NbtLongArray,
	NbtRoot,
	NbtShort,
	NbtString,
	NbtTag,
} from "./types.ts";
import { writeRootTag } from "./write.ts";

// ─── Decode / encode (uncompressed) ─────────────────────────────────────────

export const decodeNbt = (
	data: Buffer | Uint8Array,
	options: DecodeOptions = {},
): { readonly root: NbtRoot; readonly bytesRead: number } => {
	const buf = Buffer.isBuffer(data) ? data : Buffer.from(data);
	const { value, size } = readRootTag(buf, 0, options);
	return { root: value, bytesRead: size };
};

export const encodeNbt = (root: NbtRoot): Buffer => writeRootTag(root);

// ─── Range checks ───────────────────────────────────────────────────────────

const checkInteger = (
	kind: string,
	value: number,
	min: number,
	max: number,
): number => {
	if (!Number.isInteger(value) || value < min || value > max) {
		throw new NbtError(
			"ValueOutOfRange",
			`${kind} value ${value} is not an integer in [${min}, ${max}]`,
		);
	}
	return value;
};

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const checkLong = (value: bigint): bigint => {
	if (value < INT64_MIN || value > INT64_MAX) {
		throw new NbtError(
			"ValueOutOfRange",
			`long value ${value} does not fit in 64 bits`,
		);
	}
	return value;
};

const checkByte = (value: number) => checkInteger("byte", value, -128, 127);
const checkShort = (value: number) =>
	checkInteger("short", value, -32768, 32767);
const checkInt = (value: number) =>
	checkInteger("int", value, -2147483648, 2147483647);

// ─── Builder functions ──────────────────────────────────────────────────────

export const nbtByte = (value: number): NbtByte => ({
	type: "byte",
	value: checkByte(value),
});

export const nbtBool = (value = false): NbtByte => nbtByte(value ? 1 : 0);

export const nbtShort = (value: number): NbtShort => ({
	type: "short",
	value: checkShort(value),
});

export const nbtInt = (value: number): NbtInt => ({
	type: "int",
	value: checkInt(value),
});

export const nbtLong = (value: bigint | number): NbtLong => ({
	type: "long",
	value: checkLong(BigInt(value)),
});

/** Stored rounded to single precision, as it will be on the wire. */
export const nbtFloat = (value: number): NbtFloat => ({
	type: "float",
	value: Math.fround(value),
});

export const nbtDouble = (value: number): NbtDouble => ({
	type: "double",
	value,
});

export const nbtString = (value: string): NbtString => ({
	type: "string",
	value,
});

export const nbtByteArray = (value: Iterable<number> = []): NbtByteArray => ({
	type: "byteArray",
	value: Array.from(value, checkByte),
});

export const nbtIntArray = (value: Iterable<number> = []): NbtIntArray => ({
	type: "intArray",
	value: Array.from(value, checkInt),
});

export const nbtLongArray = (
	value: Iterable<bigint | number> = [],
): NbtLongArray => ({
	type: "longArray",
	value: Array.from(value, (v) => checkLong(BigInt(v))),
});

const checkListItem = (
	elementType: NbtListElementType,
	item: NbtTag,
	index: number,
): NbtTag => {
	if (item.type !== elementType) {
		throw new NbtError(
			"TypeMismatch",
			`List of ${elementType} cannot hold ${item.type} at index ${index}`,
		);
	}
	return item;
};

/** Homogeneous list. An `end` list must stay empty. */
export const nbtList = (
	elementType: NbtListElementType = "end",
	items: Iterable<NbtTag> = [],
): NbtList => ({
	type: "list",
	elementType,
	value: Array.from(items, (item, i) => checkListItem(elementType, item, i)),
});

export const appendNbtList = (list: NbtList, item: NbtTag): NbtList => ({
	type: "list",
	elementType: list.elementType,
	value: [
		...list.value,
		checkListItem(list.elementType, item, list.value.length),
	],
});

export type NbtEntries =
	| Readonly<Record<string, NbtTag>>
	| Iterable<readonly [string, NbtTag]>;

const isEntryIterable = (
	entries: NbtEntries,
): entries is Iterable<readonly [string, NbtTag]> =>
	Symbol.iterator in entries;

/** Ordered compound. A repeated name keeps its first position and its last value. */
export const nbtCompound = (entries: NbtEntries = {}): NbtCompound => ({
	type: "compound",
	value: new Map<string, NbtTag>(
		isEntryIterable(entries) ? entries : Object.entries(entries),
	),
});

export const setNbtEntry = (
	compound: NbtCompound,
	name: string,
	tag: NbtTag,
): NbtCompound => {
	const value = new Map(compound.value);
	value.set(name, tag);
	return { type: "compound", value };
};

export const deleteNbtEntry = (
	compound: NbtCompound,
	name: string,
): NbtCompound => {
	const value = new Map(compound.value);
	value.delete(name);
	return { type: "compound", value };
};

export const nbtRoot = <T extends NbtTag>(tag: T, name = ""): NbtRoot<T> => ({
	...tag,
	name,
});

// ─── Simplify (strip type wrappers → plain JS values) ──────────────────────

export const simplifyNbt = (tag: NbtTag): unknown => {
	switch (tag.type) {
		case "compound":
			return Object.fromEntries(
				Array.from(tag.value, ([key, child]) => [key, simplifyNbt(child)]),
			);
		case "list":
			return tag.value.map(simplifyNbt);
		default:
			return tag.value;
	}
};

// ─── Path lookup ────────────────────────────────────────────────────────────

/** Follow a dotted selector such as `Data.Player.Inventory.0`. */
export const getNbtPath = (
	tag: NbtTag,
	selector: string,
): NbtTag | undefined => {
	if (selector === "") return tag;
	let current: NbtTag | undefined = tag;
	for (const step of selector.split(".")) {
		if (current?.type === "compound") {
			current = current.value.get(step);
		} else if (current?.type === "list" && /^\d+$/.test(step)) {
			current = current.value[Number(step)];
		} else {
			return undefined;
		}
	}
	return current;
};

// ─── Equality (deep structural comparison) ──────────────────────────────────

const equalArrays = <T>(
	a: readonly T[],
	b: readonly T[],
	equal: (x: T, y: T) => boolean,
): boolean => a.length === b.length && a.every((v, i) => equal(v, b[i]));

const same = <T>(x: T, y: T): boolean => x === y;

export const equalNbt = (a: NbtTag, b: NbtTag): boolean => {
	switch (a.type) {
		case "compound": {
			if (b.type !== "compound" || a.value.size !== b.value.size) return false;
			const bEntries = Array.from(b.value);
			return Array.from(a.value).every(([key, val], i) => {
				const [bKey, bVal] = bEntries[i];
				return key === bKey && equalNbt(val, bVal);
			});
		}
		case "list":
			return (
				b.type === "list" &&
				a.elementType === b.elementType &&
				equalArrays(a.value, b.value, equalNbt)
			);
		case "byteArray":
			return b.type === "byteArray" && equalArrays(a.value, b.value, same);
		case "intArray":
			return b.type === "intArray" && equalArrays(a.value, b.value, same);
		case "longArray":
			return b.type === "longArray" && equalArrays(a.value, b.value, same);
		case "float":
			return b.type === "float" && Object.is(a.value, b.value);
		case "double":
			return b.type === "double" && Object.is(a.value, b.value);
		case "byte":
			return b.type === "byte" && a.value === b.value;
		case "short":
			return b.type === "short" && a.value === b.value;
		case "int":
			return b.type === "int" && a.value === b.value;
		case "long":
			return b.type === "long" && a.value === b.value;
		case "string":
			return b.type === "string" && a.value === b.value;
	}
};
