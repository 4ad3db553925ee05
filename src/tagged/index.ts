export * from "./constants.ts";
export {
	equalMasks,
	equalLayers,
	equalPlanes,
	equalStructureLists,
	equalStructures,
} from "./equal.ts";
export * from "./leaves.ts";
export { EMPTY_RECT, equalRect, readRect, rectShape, writeRect } from "./rect.ts";
export { DEFAULT_READ_OPTIONS, readContext, readStructures } from "./read.ts";
export { isRegisteredKey, type StructureReader, structureReader } from "./registry.ts";
export type * from "./types.ts";
export { writeContext, writeStructure, writeStructures } from "./write.ts";
