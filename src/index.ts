export * from "./emitter.js";
export * from "./decoder.js";
export * from "./cli.js";
export * from "./utils.js";
