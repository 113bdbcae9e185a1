export { stableStringify } from "./json";
