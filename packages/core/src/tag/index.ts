export { Tag, short, long, both, env } from "./tag.js";
export type { TagForms } from "./tag.js";
