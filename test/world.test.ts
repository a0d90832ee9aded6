import { randomBytes } from "node:crypto";
import { promises as fs, mkdirSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	enumerateRegionFiles,
	enumerateWorld,
	groupRegionFiles,
	regionPosFromPath,
} from "../src/anvil/index.ts";

describe("regionPosFromPath", () => {
	it("reads coordinates and format from the file name", () => {
		expect(regionPosFromPath("/saves/world/region/r.-1.2.mca")).toEqual({
			x: -1,
			z: 2,
			format: "anvil",
		});
		expect(regionPosFromPath("r.0.-7.mcr")).toEqual({
			x: 0,
			z: -7,
			format: "region",
		});
	});

	it("returns null for other names", () => {
		for (const name of ["r.1.mca", "r.a.b.mca", "c.0.0.mcc", "r.0.0.mca.bak", "level.dat"]) {
			expect(regionPosFromPath(name)).toBeNull();
		}
	});
});

describe("world directories", () => {
	let tmpDir: string;

	const touch = (...parts: string[]) => {
		writeFileSync(join(tmpDir, ...parts), Buffer.alloc(0));
	};

	beforeEach(async () => {
		tmpDir = join(tmpdir(), `world-test-${randomBytes(4).toString("hex")}`);
		await fs.mkdir(tmpDir, { recursive: true });
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("lists region files ordered by x then z", () => {
		touch("r.1.0.mca");
		touch("r.-1.5.mca");
		touch("r.1.-3.mcr");
		touch("notes.txt");
		mkdirSync(join(tmpDir, "r.9.9.mca"));

		const files = enumerateRegionFiles(tmpDir);
		expect(files.map((f) => [f.x, f.z, f.format])).toEqual([
			[-1, 5, "anvil"],
			[1, -3, "region"],
			[1, 0, "anvil"],
		]);
		expect(files[0]?.path).toBe(join(tmpDir, "r.-1.5.mca"));
	});

	it("groups a world's region files by dimension", () => {
		mkdirSync(join(tmpDir, "region"));
		mkdirSync(join(tmpDir, "DIM-1", "region"), { recursive: true });
		mkdirSync(join(tmpDir, "DIM1"));
		mkdirSync(join(tmpDir, "data"));
		touch("region", "r.0.0.mca");
		touch("region", "r.0.1.mca");
		touch("DIM-1", "region", "r.-1.-1.mca");
		touch("level.dat");

		const world = enumerateWorld(tmpDir);
		expect([...world.keys()]).toEqual([-1, 0]);
		expect(world.get(0)?.map((f) => f.z)).toEqual([0, 1]);
		expect(world.get(-1)?.[0]?.path).toBe(
			join(tmpDir, "DIM-1", "region", "r.-1.-1.mca"),
		);
	});

	it("groups files by a caller-chosen key", () => {
		touch("r.0.0.mca");
		touch("r.0.1.mcr");
		touch("r.2.0.mca");

		const byFormat = groupRegionFiles(enumerateRegionFiles(tmpDir), (f) => f.format);
		expect(byFormat.get("anvil")?.map((f) => f.x)).toEqual([0, 2]);
		expect(byFormat.get("region")?.map((f) => f.z)).toEqual([1]);
	});
});
