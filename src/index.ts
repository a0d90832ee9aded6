export * from "./anvil/index.ts";
export * from "./nbt/index.ts";
