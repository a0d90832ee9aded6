// ─── Tag type identifiers ───────────────────────────────────────────────────

export type NbtTagType =
	| "byte"
	| "short"
	| "int"
	| "long"
	| "float"
	| "double"
	| "byteArray"
	| "string"
	| "list"
	| "compound"
	| "intArray"
	| "longArray";

/** Element kind a list may declare. `end` is only valid for empty lists. */
export type NbtListElementType = NbtTagType | "end";

// ─── Tag ID ↔ type mappings ────────────────────────────────────────────────

export const TAG_ID_TO_TYPE: readonly NbtListElementType[] = [
	"end",
	"byte",
	"short",
	"int",
	"long",
	"float",
	"double",
	"byteArray",
	"string",
	"list",
	"compound",
	"intArray",
	"longArray",
];

export const TAG_TYPE_TO_ID: Readonly<Record<NbtListElementType, number>> = {
	end: 0,
	byte: 1,
	short: 2,
	int: 3,
	long: 4,
	float: 5,
	double: 6,
	byteArray: 7,
	string: 8,
	list: 9,
	compound: 10,
	intArray: 11,
	longArray: 12,
};

// ─── Individual tag types ───────────────────────────────────────────────────

export type NbtByte = { readonly type: "byte"; readonly value: number };
export type NbtShort = { readonly type: "short"; readonly value: number };
export type NbtInt = { readonly type: "int"; readonly value: number };
export type NbtLong = { readonly type: "long"; readonly value: bigint };
export type NbtFloat = { readonly type: "float"; readonly value: number };
export type NbtDouble = { readonly type: "double"; readonly value: number };
export type NbtString = { readonly type: "string"; readonly value: string };
export type NbtByteArray = {
	readonly type: "byteArray";
	readonly value: readonly number[];
};
export type NbtIntArray = {
	readonly type: "intArray";
	readonly value: readonly number[];
};
export type NbtLongArray = {
	readonly type: "longArray";
	readonly value: readonly bigint[];
};
export type NbtList = {
	readonly type: "list";
	readonly elementType: NbtListElementType;
	readonly value: readonly NbtTag[];
};
export type NbtCompound = {
	readonly type: "compound";
	readonly value: ReadonlyMap<string, NbtTag>;
};

// ─── Union types ────────────────────────────────────────────────────────────

export type NbtTag =
	| NbtByte
	| NbtShort
	| NbtInt
	| NbtLong
	| NbtFloat
	| NbtDouble
	| NbtString
	| NbtByteArray
	| NbtIntArray
	| NbtLongArray
	| NbtList
	| NbtCompound;

/** Narrow the tag union to one kind. */
export type NbtTagOf<K extends NbtTagType> = Extract<NbtTag, { type: K }>;

// ─── Root NBT (tag with a name) ────────────────────────────────────────────

export type NbtRoot<T extends NbtTag = NbtTag> = T & { readonly name: string };

// ─── Read result (value + bytes consumed) ───────────────────────────────────

export type ReadResult<T> = { readonly value: T; readonly size: number };

// ─── Parse result ───────────────────────────────────────────────────────────

export type NbtParseResult = {
	readonly parsed: NbtRoot;
	readonly compressed: boolean;
	readonly bytesRead: number;
};
