import { readdirSync, statSync } from "node:fs";
import { basename, join } from "node:path";

const REGION_NAME = /^r\.(-?\d+)\.(-?\d+)\.(mca|mcr)$/;
const DIMENSION_NAME = /^DIM(-?\d+)$/;

export type RegionFormat = "anvil" | "region";

export type RegionPos = {
	readonly x: number;
	readonly z: number;
	readonly format: RegionFormat;
};

export type RegionFileInfo = RegionPos & { readonly path: string };

/** Region coordinates from an `r.<x>.<z>.mca` / `.mcr` file name, or null. */
export const regionPosFromPath = (path: string): RegionPos | null => {
	const match = REGION_NAME.exec(basename(path));
	if (!match) return null;
	return {
		x: Number(match[1]),
		z: Number(match[2]),
		format: match[3] === "mca" ? "anvil" : "region",
	};
};

const isDirectory = (path: string): boolean => {
	try {
		return statSync(path).isDirectory();
	} catch {
		return false;
	}
};

/** Region files directly inside `dir`, ordered by x then z. */
export const enumerateRegionFiles = (dir: string): RegionFileInfo[] => {
	const files: RegionFileInfo[] = [];
	for (const entry of readdirSync(dir, { withFileTypes: true })) {
		if (!entry.isFile()) continue;
		const path = join(dir, entry.name);
		const pos = regionPosFromPath(path);
		if (pos) files.push({ path, ...pos });
	}
	return files.sort((a, b) => a.x - b.x || a.z - b.z);
};

/** Region files of a world save keyed by dimension: `region/` is 0, `DIM<n>/region/` is n. */
export const enumerateWorld = (
	worldDir: string,
): Map<number, RegionFileInfo[]> => {
	const dimensions = new Map<number, RegionFileInfo[]>();
	for (const entry of readdirSync(worldDir, { withFileTypes: true })) {
		if (!entry.isDirectory()) continue;
		if (entry.name === "region") {
			dimensions.set(0, enumerateRegionFiles(join(worldDir, entry.name)));
			continue;
		}
		const match = DIMENSION_NAME.exec(entry.name);
		const regionDir = join(worldDir, entry.name, "region");
		if (match && isDirectory(regionDir)) {
			dimensions.set(Number(match[1]), enumerateRegionFiles(regionDir));
		}
	}
	return new Map([...dimensions].sort(([a], [b]) => a - b));
};

export const groupRegionFiles = <K>(
	files: readonly RegionFileInfo[],
	key: (file: RegionFileInfo) => K,
): Map<K, RegionFileInfo[]> => {
	const groups = new Map<K, RegionFileInfo[]>();
	for (const file of files) {
		const k = key(file);
		const group = groups.get(k);
		if (group) group.push(file);
		else groups.set(k, [file]);
	}
	return groups;
};
