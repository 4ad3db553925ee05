export {
	emptyImageSourceData,
	equalImageSourceData,
	IMAGE_SOURCE_DATA_TAG,
	type ImageSourceDataReadOptions,
	type ImageSourceDataWriteOptions,
	imageSourceDataTag,
	type PsdImageSourceData,
	readImageSourceData,
	writeImageSourceData,
} from "./imageSourceData.ts";
