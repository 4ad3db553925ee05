export {
	bytesToSamples,
	createPlane,
	decodePlane,
	encodePlane,
	planeSize,
	samplesToBytes,
	sampleTypeOf,
} from "./compression.ts";
export { decodePackBits, encodePackBits } from "./packbits.ts";
export {
	deltaDecode,
	deltaEncode,
	floatPredictDecode,
	floatPredictEncode,
} from "./predictor.ts";
export {
	COMPRESSION_ID_TO_TYPE,
	COMPRESSION_TYPE_TO_ID,
	type PsdCompression,
	type PsdPlane,
	type PsdPlaneData,
	type PsdSampleType,
	type PsdShape,
	type RleCounts,
	SAMPLE_BYTES,
} from "./types.ts";
