/**
 * Stringified NBT: the text form used by game commands.
 *
 *   {name:"Steve",Pos:[0.5d,64d,0.5d],Inventory:[],Seed:42L,Heights:[I;1,2]}
 */

import { NbtError } from "./errors.ts";
import {
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
	nbtShort,
	nbtString,
} from "./nbt.ts";
import { DEFAULT_MAX_DEPTH } from "./read.ts";
import type { NbtTag } from "./types.ts";

export type SnbtOptions = {
	/** Write compound keys in sorted order instead of insertion order. */
	readonly sort?: boolean;
};

// ─── Stringify ──────────────────────────────────────────────────────────────

const BARE_KEY = /^[0-9A-Za-z._+-]+$/;

const quoteString = (value: string): string =>
	`"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

const quoteKey = (key: string): string =>
	BARE_KEY.test(key) ? key : quoteString(key);

export const toSnbt = (tag: NbtTag, options: SnbtOptions = {}): string => {
	switch (tag.type) {
		case "byte":
			return `${tag.value}b`;
		case "short":
			return `${tag.value}s`;
		case "int":
			return `${tag.value}`;
		case "long":
			return `${tag.value}L`;
		case "float":
			return `${tag.value}f`;
		case "double":
			return `${tag.value}d`;
		case "byteArray":
			return `[B;${tag.value.map((v) => `${v}b`).join(",")}]`;
		case "intArray":
			return `[I;${tag.value.join(",")}]`;
		case "longArray":
			return `[L;${tag.value.map((v) => `${v}L`).join(",")}]`;
		case "string":
			return quoteString(tag.value);
		case "list":
			return `[${tag.value.map((item) => toSnbt(item, options)).join(",")}]`;
		case "compound": {
			const entries = Array.from(tag.value);
			if (options.sort) {
				entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
			}
			const body = entries.map(
				([key, child]) => `${quoteKey(key)}:${toSnbt(child, options)}`,
			);
			return `{${body.join(",")}}`;
		}
	}
};

// ─── Parse ──────────────────────────────────────────────────────────────────

type Cursor = { readonly text: string; pos: number };

const fail = (cursor: Cursor, message: string): never => {
	throw new NbtError(
		"InvalidSnbt",
		`${message} at position ${cursor.pos} of SNBT input`,
	);
};

const skipWhitespace = (cursor: Cursor) => {
	while (cursor.pos < cursor.text.length && /\s/.test(cursor.text[cursor.pos]))
		cursor.pos++;
};

const peek = (cursor: Cursor): string | undefined => {
	skipWhitespace(cursor);
	return cursor.text[cursor.pos];
};

const consume = (cursor: Cursor, char: string) => {
	if (peek(cursor) !== char) fail(cursor, `Expected '${char}'`);
	cursor.pos++;
};

const BARE_CHAR = /[0-9A-Za-z._+-]/;

const readBare = (cursor: Cursor): string => {
	skipWhitespace(cursor);
	const start = cursor.pos;
	while (
		cursor.pos < cursor.text.length &&
		BARE_CHAR.test(cursor.text[cursor.pos])
	)
		cursor.pos++;
	if (cursor.pos === start) fail(cursor, "Expected a value");
	return cursor.text.slice(start, cursor.pos);
};

const readQuoted = (cursor: Cursor): string => {
	const quote = cursor.text[cursor.pos];
	cursor.pos++;
	let value = "";
	for (;;) {
		if (cursor.pos >= cursor.text.length) fail(cursor, "Unclosed string");
		const char = cursor.text[cursor.pos++];
		if (char === quote) return value;
		if (char === "\\") {
			const escaped = cursor.text[cursor.pos++];
			if (escaped !== "\\" && escaped !== '"' && escaped !== "'") {
				fail(cursor, `Invalid escape '\\${escaped ?? ""}'`);
			}
			value += escaped;
		} else {
			value += char;
		}
	}
};

const readSeparated = <T>(
	cursor: Cursor,
	close: string,
	readItem: () => T,
): T[] => {
	const items: T[] = [];
	while (peek(cursor) !== close) {
		if (cursor.pos >= cursor.text.length) fail(cursor, `Expected '${close}'`);
		if (items.length > 0) consume(cursor, ",");
		items.push(readItem());
	}
	cursor.pos++;
	return items;
};

const FLOAT =
	/^([-+]?(?:[0-9]+\.?|[0-9]*\.[0-9]+)(?:e[-+]?[0-9]+)?|[-+]?Infinity|NaN)([fd])$/i;
const DECIMAL = /^[-+]?(?:[0-9]+\.|[0-9]*\.[0-9]+)(?:e[-+]?[0-9]+)?$/i;
const INTEGER = /^([-+]?(?:0|[1-9][0-9]*))([bsl]?)$/i;

const parseBareValue = (token: string): NbtTag => {
	const float = FLOAT.exec(token);
	if (float) {
		const value = Number(float[1]);
		return float[2].toLowerCase() === "f" ? nbtFloat(value) : nbtDouble(value);
	}
	if (DECIMAL.test(token)) return nbtDouble(Number(token));
	const integer = INTEGER.exec(token);
	if (integer) {
		switch (integer[2].toLowerCase()) {
			case "b":
				return nbtByte(Number(integer[1]));
			case "s":
				return nbtShort(Number(integer[1]));
			case "l":
				return nbtLong(BigInt(integer[1]));
			default:
				return nbtInt(Number(integer[1]));
		}
	}
	if (token === "true") return nbtByte(1);
	if (token === "false") return nbtByte(0);
	return nbtString(token);
};

const ARRAY_SUFFIX: Readonly<Record<string, string>> = {
	B: "b",
	I: "",
	L: "l",
};

const readArray = (cursor: Cursor, kind: string): NbtTag => {
	const suffix = ARRAY_SUFFIX[kind];
	const values = readSeparated(cursor, "]", () => {
		const token = readBare(cursor);
		const match = INTEGER.exec(token);
		if (!match || match[2].toLowerCase() !== suffix) {
			fail(cursor, `Invalid element '${token}' in ${kind} array`);
		}
		return match ? match[1] : "";
	});
	if (kind === "B") return nbtByteArray(values.map(Number));
	if (kind === "L") return nbtLongArray(values.map(BigInt));
	return nbtIntArray(values.map(Number));
};

const enterNested = (cursor: Cursor, depth: number): number => {
	const next = depth + 1;
	if (next > DEFAULT_MAX_DEPTH) {
		throw new NbtError(
			"DepthExceeded",
			`Nesting deeper than ${DEFAULT_MAX_DEPTH} levels at position ${cursor.pos} of SNBT input`,
		);
	}
	return next;
};

const readValue = (cursor: Cursor, depth: number): NbtTag => {
	const char = peek(cursor);
	if (char === undefined) return fail(cursor, "Unexpected end of input");
	if (char === '"' || char === "'") return nbtString(readQuoted(cursor));
	if (char === "[") {
		cursor.pos++;
		skipWhitespace(cursor);
		const array = /^([BIL]);/.exec(
			cursor.text.slice(cursor.pos, cursor.pos + 2),
		);
		if (array) {
			cursor.pos += 2;
			return readArray(cursor, array[1]);
		}
		const nested = enterNested(cursor, depth);
		const items = readSeparated(cursor, "]", () => readValue(cursor, nested));
		return nbtList(items[0]?.type ?? "end", items);
	}
	if (char === "{") {
		cursor.pos++;
		const nested = enterNested(cursor, depth);
		const entries = readSeparated(cursor, "}", () => {
			const next = peek(cursor);
			const key =
				next === '"' || next === "'" ? readQuoted(cursor) : readBare(cursor);
			consume(cursor, ":");
			return [key, readValue(cursor, nested)] as const;
		});
		return nbtCompound(entries);
	}
	return parseBareValue(readBare(cursor));
};

/** Parse SNBT text. Lists and compounds nest at most 512 levels deep, as in binary NBT. */
export const parseSnbt = (text: string): NbtTag => {
	const cursor: Cursor = { text, pos: 0 };
	const tag = readValue(cursor, 0);
	if (peek(cursor) !== undefined) fail(cursor, "Unexpected trailing input");
	return tag;
};
