import { createPlane } from "../compression/compression.ts";
import type { PsdCompression, PsdSampleType } from "../compression/types.ts";
import { PsdBlendMode, PsdLayerFlags } from "../tagged/constants.ts";
import { rectShape } from "../tagged/rect.ts";
import type {
	PsdChannel,
	PsdLayer,
	PsdLayers,
	PsdLayersKey,
	PsdRectangle,
} from "../tagged/types.ts";
import { LAYERS_SAMPLE_TYPE } from "./channel.ts";

/** Visible, fully opaque, normal-blended layer with no channels. */
export const psdLayer = (
	fields: Partial<PsdLayer> & { readonly rect: PsdRectangle },
): PsdLayer => ({
	name: "",
	channels: [],
	opacity: 255,
	blendMode: PsdBlendMode.NORMAL,
	clipping: 0,
	flags: PsdLayerFlags.PHOTOSHOP5,
	blendingRanges: [],
	info: [],
	...fields,
});

/** Channel holding a zero plane sized to the rectangle. */
export const psdChannel = (
	id: number,
	rect: PsdRectangle,
	type: PsdSampleType = "uint8",
	compression: PsdCompression = "raw",
): PsdChannel => ({ id, compression, plane: createPlane(rectShape(rect), type) });

export const psdLayers = (
	layers: readonly PsdLayer[],
	key: PsdLayersKey = "Layr",
	hasTransparency = false,
): PsdLayers => ({ type: "layers", key, hasTransparency, layers });

export const layersSampleType = (key: PsdLayersKey): PsdSampleType =>
	LAYERS_SAMPLE_TYPE[key];
