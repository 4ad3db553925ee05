export {
	findResource,
	type ImageResourcesReadOptions,
	imageResourcesTag,
	readImageResources,
	writeImageResources,
} from "./resources.ts";
export * from "./types.ts";
