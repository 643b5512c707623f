export { flag, count } from "./flag.js";
export { int, uint, int8, int16, int32, int64, uint8, uint16, uint32, uint64, float } from "./numeric.js";
export { string, oneOf } from "./text.js";
export { list } from "./list.js";
export type { ListOptions } from "./list.js";
export { custom, from, fromSchema } from "./custom.js";
export type { CustomKindOptions } from "./custom.js";
