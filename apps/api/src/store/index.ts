// src/store/index.ts

export * from "./chunk.store.js";
export * from "./disk.chunk.store.js";
