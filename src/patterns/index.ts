export { readPatterns, writePatterns } from "./patterns.ts";
