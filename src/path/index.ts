// src/path/index.ts
export { PathMap } from "./path-map";
export { ResponsePath } from "./response-path";
