import { describe, expect, it } from "vitest";
import {
	equalNbt,
	getNbtPath,
	NbtError,
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
	parseSnbt,
	toSnbt,
} from "../src/nbt/index.ts";

const thrownCode = (fn: () => unknown): string | undefined => {
	try {
		fn();
	} catch (error) {
		return error instanceof NbtError ? error.code : `not an NbtError: ${error}`;
	}
	return undefined;
};

describe("toSnbt", () => {
	it("writes each kind with its suffix", () => {
		const tag = nbtCompound({
			name: nbtString("Steve"),
			Pos: nbtList("double", [nbtDouble(0.5), nbtDouble(64), nbtDouble(0.5)]),
			Seed: nbtLong(42),
			Heights: nbtIntArray([1, 2]),
			flag: nbtByte(1),
			"odd key": nbtShort(2),
			speed: nbtFloat(0.25),
			blocks: nbtByteArray([1, -1]),
			states: nbtLongArray([-3n]),
		});
		expect(toSnbt(tag)).toBe(
			'{name:"Steve",Pos:[0.5d,64d,0.5d],Seed:42L,Heights:[I;1,2],flag:1b,"odd key":2s,speed:0.25f,blocks:[B;1b,-1b],states:[L;-3L]}',
		);
	});

	it("sorts keys on request", () => {
		const tag = nbtCompound({ b: nbtInt(1), a: nbtInt(2) });
		expect(toSnbt(tag)).toBe("{b:1,a:2}");
		expect(toSnbt(tag, { sort: true })).toBe("{a:2,b:1}");
	});

	it("escapes quotes and backslashes", () => {
		expect(toSnbt(nbtString('say "hi" \\ ok'))).toBe('"say \\"hi\\" \\\\ ok"');
	});

	it("writes empty containers", () => {
		expect(toSnbt(nbtList())).toBe("[]");
		expect(toSnbt(nbtCompound())).toBe("{}");
		expect(toSnbt(nbtByteArray())).toBe("[B;]");
	});
});

describe("parseSnbt", () => {
	it("reads suffixed numbers, strings and arrays", () => {
		const tag = parseSnbt(
			"{a:1b, b: 2s, c:3, d:4L, e:1.5f, f:2.5, g:3d, h:'x\\'y', i:[1,2], j:[B;1b,-2b], k:[L;5l], l:true, m:unquoted}",
		);
		expect(getNbtPath(tag, "a")).toEqual(nbtByte(1));
		expect(getNbtPath(tag, "b")).toEqual(nbtShort(2));
		expect(getNbtPath(tag, "c")).toEqual(nbtInt(3));
		expect(getNbtPath(tag, "d")).toEqual(nbtLong(4));
		expect(getNbtPath(tag, "e")).toEqual(nbtFloat(1.5));
		expect(getNbtPath(tag, "f")).toEqual(nbtDouble(2.5));
		expect(getNbtPath(tag, "g")).toEqual(nbtDouble(3));
		expect(getNbtPath(tag, "h")).toEqual(nbtString("x'y"));
		expect(getNbtPath(tag, "i")).toEqual(nbtList("int", [nbtInt(1), nbtInt(2)]));
		expect(getNbtPath(tag, "j")).toEqual(nbtByteArray([1, -2]));
		expect(getNbtPath(tag, "k")).toEqual(nbtLongArray([5n]));
		expect(getNbtPath(tag, "l")).toEqual(nbtByte(1));
		expect(getNbtPath(tag, "m")).toEqual(nbtString("unquoted"));
	});

	it("allows whitespace before a typed array prefix", () => {
		expect(parseSnbt("[ I;1, 2]")).toEqual(nbtIntArray([1, 2]));
		expect(parseSnbt("{a:[\tB;1b]}")).toEqual(
			nbtCompound({ a: nbtByteArray([1]) }),
		);
	});

	it("limits nesting to 512 levels", () => {
		const nested = (depth: number) => "[".repeat(depth) + "]".repeat(depth);
		expect(thrownCode(() => parseSnbt(nested(512)))).toBeUndefined();
		expect(thrownCode(() => parseSnbt(nested(513)))).toBe("DepthExceeded");
		expect(thrownCode(() => parseSnbt(nested(100000)))).toBe("DepthExceeded");
		expect(thrownCode(() => parseSnbt("{a:".repeat(600)))).toBe(
			"DepthExceeded",
		);
	});

	it("reads an empty list as an End list", () => {
		expect(parseSnbt("[ ]")).toEqual(nbtList());
	});

	it("lets a repeated key overwrite in place", () => {
		const tag = parseSnbt("{a:1,b:2,a:3}");
		expect(equalNbt(tag, nbtCompound({ a: nbtInt(3), b: nbtInt(2) }))).toBe(
			true,
		);
	});

	it("parses what toSnbt writes", () => {
		const tag = nbtCompound({
			byte: nbtByte(-128),
			short: nbtShort(32767),
			int: nbtInt(-2147483648),
			long: nbtLong(-(2n ** 63n)),
			float: nbtFloat(0.1),
			floatNaN: nbtFloat(Number.NaN),
			double: nbtDouble(1e-7),
			doubleInf: nbtDouble(Number.POSITIVE_INFINITY),
			big: nbtDouble(1e21),
			string: nbtString('quote " and \\ and \' done'),
			"": nbtString("empty key"),
			"spaced key": nbtList(),
			bytes: nbtByteArray([]),
			ints: nbtIntArray([7, -7]),
			longs: nbtLongArray([2n ** 63n - 1n]),
			nested: nbtList("list", [
				nbtList("compound", [nbtCompound({ id: nbtString("stone") })]),
				nbtList("int", [nbtInt(1)]),
			]),
			empty: nbtCompound(),
		});
		expect(equalNbt(parseSnbt(toSnbt(tag)), tag)).toBe(true);
	});

	it("rejects heterogeneous lists with TypeMismatch", () => {
		expect(thrownCode(() => parseSnbt('[1,"a"]'))).toBe("TypeMismatch");
	});

	it("rejects values outside the suffix's range", () => {
		expect(thrownCode(() => parseSnbt("300b"))).toBe("ValueOutOfRange");
	});

	it("rejects malformed text with InvalidSnbt", () => {
		for (const text of ["", "{a:1", "{a:1} x", "[I;1b]", '"abc', "{a 1}", "[1 2]"]) {
			expect(thrownCode(() => parseSnbt(text))).toBe("InvalidSnbt");
		}
	});
});
