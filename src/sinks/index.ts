export * from "./file.js";
export * from "./http.js";
export * from "./pino.js";
export * from "./stream.js";
