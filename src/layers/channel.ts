import { DecodeError, EncodeError } from "../binary/errors.ts";
import { type PsdFormat, rleCountWidth } from "../binary/format.ts";
import type { ByteReader } from "../binary/reader.ts";
import {
	decodePlane,
	encodePlane,
	sampleTypeOf,
} from "../compression/compression.ts";
import {
	COMPRESSION_ID_TO_TYPE,
	COMPRESSION_TYPE_TO_ID,
	type PsdCompression,
	type PsdPlane,
	type PsdSampleType,
	type PsdShape,
	type RleCounts,
} from "../compression/types.ts";
import { PsdChannelId } from "../tagged/constants.ts";
import { rectShape } from "../tagged/rect.ts";
import type { PsdChannel, PsdLayer, PsdLayersKey } from "../tagged/types.ts";

export const LAYERS_SAMPLE_TYPE: Readonly<Record<PsdLayersKey, PsdSampleType>> = {
	Layr: "uint8",
	Lr16: "uint16",
	Lr32: "float32",
};

export const rleCounts = (format: PsdFormat): RleCounts => ({
	width: rleCountWidth(format),
	byteOrder: format.byteOrder,
});

export const compressionFromId = (id: number): PsdCompression => {
	const compression = COMPRESSION_ID_TO_TYPE[id];
	if (compression === undefined) {
		throw new DecodeError(`Invalid compression kind ${id}`);
	}
	return compression;
};

/** Mask channels take their shape from the layer mask, all others from the layer. */
export const channelShape = (
	layer: Pick<PsdLayer, "rect" | "mask">,
	id: number,
): PsdShape => {
	const mask = layer.mask;
	if (id === PsdChannelId.USER_LAYER_MASK) {
		return mask?.rect ? rectShape(mask.rect) : { height: 0, width: 0 };
	}
	if (id === PsdChannelId.REAL_USER_LAYER_MASK) {
		const rect = mask?.realRect ?? mask?.rect;
		return rect ? rectShape(rect) : { height: 0, width: 0 };
	}
	return rectShape(layer.rect);
};

// ─── Channel data ───────────────────────────────────────────────────────────

/** Channel header as stored before the layer's extra data. */
export type ChannelHeader = { readonly id: number; readonly length: number };

/** Read one channel's u16 compression code and compressed payload. */
export const readChannel = (
	r: ByteReader,
	format: PsdFormat,
	header: ChannelHeader,
	shape: PsdShape,
	type: PsdSampleType,
): PsdChannel => {
	if (header.length < 2) {
		throw new DecodeError(
			`Channel ${header.id} data length ${header.length} is shorter than its compression code`,
		);
	}
	const compression = compressionFromId(format.read.uint16(r));
	const data = r.bytes(header.length - 2);
	const plane = decodePlane(data, compression, shape, type, rleCounts(format));
	return { id: header.id, compression, plane };
};

/** Compression code followed by the compressed plane, in the format's byte order. */
export const encodeChannel = (
	format: PsdFormat,
	channel: PsdChannel,
	shape: PsdShape,
	type: PsdSampleType,
	override: PsdCompression | undefined,
): Buffer => {
	checkPlane(channel.id, channel.plane, shape, type);
	const compression = override ?? channel.compression;
	const code = Buffer.alloc(2);
	if (format.byteOrder === "big") code.writeUInt16BE(COMPRESSION_TYPE_TO_ID[compression]);
	else code.writeUInt16LE(COMPRESSION_TYPE_TO_ID[compression]);
	return Buffer.concat([
		code,
		encodePlane(channel.plane, compression, rleCounts(format)),
	]);
};

const checkPlane = (
	id: number,
	plane: PsdPlane,
	shape: PsdShape,
	type: PsdSampleType,
): void => {
	if (plane.height !== shape.height || plane.width !== shape.width) {
		throw new EncodeError(
			`Channel ${id} plane is ${plane.height}x${plane.width}, expected ${shape.height}x${shape.width}`,
		);
	}
	const actual = sampleTypeOf(plane.data);
	if (actual !== type) {
		throw new EncodeError(
			`Channel ${id} holds ${actual} samples, layer list stores ${type}`,
		);
	}
};
