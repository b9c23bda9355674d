export { RecordStore } from "./records.js";
