export * from "./address.js";
export * from "./bytes.js";
export * from "./errors.js";
export * from "./ethConversion.js";
export * from "./file.js";
export * from "./logger.js";
export * from "./objects.js";
