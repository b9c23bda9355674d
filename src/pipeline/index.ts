export { fetchMessages } from "./fetch.js";
export type { FetchOptions, FetchResult } from "./fetch.js";
export { withInterrupt } from "./interrupt.js";
export { processMessages } from "./process.js";
export type { ProcessOptions, ProcessResult } from "./process.js";
