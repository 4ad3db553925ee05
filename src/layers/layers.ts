import type { PsdFormat } from "../binary/format.ts";
import type { ByteReader } from "../binary/reader.ts";
import type { ByteWriter } from "../binary/writer.ts";
import type { PsdPlane, PsdShape } from "../compression/types.ts";
import { PsdChannelId } from "../tagged/constants.ts";
import { rectShape } from "../tagged/rect.ts";
import type {
	PsdLayer,
	PsdLayers,
	PsdLayersKey,
	ReadContext,
	WriteContext,
} from "../tagged/types.ts";
import { LAYERS_SAMPLE_TYPE } from "./channel.ts";
import {
	type LayerRecord,
	readLayerChannels,
	readLayerRecord,
	writeLayerRecord,
} from "./layer.ts";

// ─── Layer list ─────────────────────────────────────────────────────────────
//
// i16 count (negative: first alpha channel is the merged transparency),
// every layer record, then every layer's channel data in the same order,
// padded to an even length.

export const readLayers = (
	r: ByteReader,
	format: PsdFormat,
	key: PsdLayersKey,
	size: number,
	ctx: ReadContext,
): PsdLayers => {
	const start = r.tell();
	const count = format.read.int16(r);
	const records: LayerRecord[] = [];
	for (let i = 0; i < Math.abs(count); i++) {
		records.push(readLayerRecord(r, format, ctx));
	}
	const type = LAYERS_SAMPLE_TYPE[key];
	const layers = records.map((record) =>
		readLayerChannels(r, format, record, type),
	);
	r.seek(start + size);
	return { type: "layers", key, hasTransparency: count < 0, layers };
};

export const writeLayers = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdLayers,
	ctx: WriteContext,
): void => {
	const start = w.tell();
	const count = value.layers.length;
	format.write.int16(w, value.hasTransparency ? -count : count);
	const type = LAYERS_SAMPLE_TYPE[value.key];
	const payloads = value.layers.map((layer) =>
		writeLayerRecord(w, format, layer, type, ctx),
	);
	for (const layer of payloads) {
		for (const payload of layer) w.write(payload);
	}
	w.align(2, start);
};

export const emptyLayers = (key: PsdLayersKey = "Layr"): PsdLayers => ({
	type: "layers",
	key,
	hasTransparency: false,
	layers: [],
});

// ─── Derived views ──────────────────────────────────────────────────────────

export const layerShape = (layer: PsdLayer): PsdShape => rectShape(layer.rect);

export const layerOffset = (
	layer: PsdLayer,
): { readonly top: number; readonly left: number } => ({
	top: layer.rect.top,
	left: layer.rect.left,
});

/** Smallest canvas holding every layer and mask rectangle. */
export const canvasShape = (value: PsdLayers): PsdShape => {
	let height = 0;
	let width = 0;
	for (const layer of value.layers) {
		for (const rect of [layer.rect, layer.mask?.rect]) {
			if (rect === undefined) continue;
			height = Math.max(height, rect.bottom);
			width = Math.max(width, rect.right);
		}
	}
	return { height, width };
};

/**
 * Color channels of a layer in id order, followed by its transparency
 * channel when present. With `channelId`, just that channel.
 */
export const layerImage = (
	layer: PsdLayer,
	channelId?: number,
): readonly PsdPlane[] => {
	if (channelId !== undefined) {
		return layer.channels.filter((c) => c.id === channelId).map((c) => c.plane);
	}
	const color = layer.channels
		.filter((c) => c.id >= 0)
		.sort((a, b) => a.id - b.id);
	const alpha = layer.channels.filter(
		(c) => c.id === PsdChannelId.TRANSPARENCY_MASK,
	);
	return [...color, ...alpha].map((c) => c.plane);
};
