export {
	type ChannelHeader,
	channelShape,
	compressionFromId,
	encodeChannel,
	LAYERS_SAMPLE_TYPE,
	readChannel,
	rleCounts,
} from "./channel.ts";
export {
	type LayerRecord,
	readLayerChannels,
	readLayerRecord,
	writeLayerRecord,
} from "./layer.ts";
export {
	canvasShape,
	emptyLayers,
	layerImage,
	layerOffset,
	layerShape,
	readLayers,
	writeLayers,
} from "./layers.ts";
export {
	hasRealMask,
	maskParameterFlags,
	readLayerMask,
	writeLayerMask,
} from "./mask.ts";
export { layersSampleType, psdChannel, psdLayer, psdLayers } from "./builders.ts";
