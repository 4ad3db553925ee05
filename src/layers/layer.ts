import { DecodeError, EncodeError } from "../binary/errors.ts";
import { type PsdFormat, readSize, writeSize } from "../binary/format.ts";
import type { ByteReader } from "../binary/reader.ts";
import type { ByteWriter } from "../binary/writer.ts";
import {
	readPaddedPascalString,
	writePaddedPascalString,
} from "../binary/text.ts";
import type { PsdSampleType } from "../compression/types.ts";
import { readRect, writeRect } from "../tagged/rect.ts";
import { readStructures } from "../tagged/read.ts";
import type {
	PsdChannel,
	PsdLayer,
	ReadContext,
	WriteContext,
} from "../tagged/types.ts";
import { writeStructures } from "../tagged/write.ts";
import {
	type ChannelHeader,
	channelShape,
	encodeChannel,
	readChannel,
} from "./channel.ts";
import { readLayerMask, writeLayerMask } from "./mask.ts";

/** Layer record without pixel data; channels follow after every record. */
export type LayerRecord = Omit<PsdLayer, "channels"> & {
	readonly channelHeaders: readonly ChannelHeader[];
};

// ─── Read ───────────────────────────────────────────────────────────────────

export const readLayerRecord = (
	r: ByteReader,
	format: PsdFormat,
	ctx: ReadContext,
): LayerRecord => {
	const rect = readRect(format, r);
	const channelCount = format.read.uint16(r);
	const channelHeaders: ChannelHeader[] = [];
	for (let i = 0; i < channelCount; i++) {
		const id = format.read.int16(r);
		channelHeaders.push({ id, length: readSize(format, r) });
	}

	const signature = r.bytes(4).toString("latin1");
	if (signature !== format.signature) {
		throw new DecodeError(
			`Layer blend signature ${JSON.stringify(signature)} does not match ${format.signature}`,
		);
	}
	const blendMode = format.read.key(r);
	const opacity = r.u8();
	const clipping = r.u8();
	const flags = r.u8();
	r.skip(1);

	const extraSize = format.read.uint32(r);
	const end = r.tell() + extraSize;
	const mask = readLayerMask(r, format);

	const rangeBytes = format.read.uint32(r);
	const blendingRanges: number[] = [];
	for (let i = 0; i < Math.floor(rangeBytes / 4); i++) {
		blendingRanges.push(format.read.int32(r));
	}
	r.skip(rangeBytes % 4);

	const name = readPaddedPascalString(r, 4);
	const info = readStructures(r, format, end, ctx, 2);
	r.seek(end);

	return {
		name,
		rect,
		channelHeaders,
		...(mask ? { mask } : {}),
		opacity,
		blendMode,
		clipping,
		flags,
		blendingRanges,
		info,
	};
};

export const readLayerChannels = (
	r: ByteReader,
	format: PsdFormat,
	record: LayerRecord,
	type: PsdSampleType,
): PsdLayer => {
	const channels: PsdChannel[] = record.channelHeaders.map((header) =>
		readChannel(r, format, header, channelShape(record, header.id), type),
	);
	const { channelHeaders, ...layer } = record;
	return { ...layer, channels };
};

// ─── Write ──────────────────────────────────────────────────────────────────

/**
 * Write the layer record and return its encoded channel payloads, which the
 * caller emits after every record in the list.
 */
export const writeLayerRecord = (
	w: ByteWriter,
	format: PsdFormat,
	layer: PsdLayer,
	type: PsdSampleType,
	ctx: WriteContext,
): Buffer[] => {
	if (layer.channels.length > 0xffff) {
		throw new EncodeError(`Layer has ${layer.channels.length} channels`);
	}
	const payloads = layer.channels.map((channel) =>
		encodeChannel(
			format,
			channel,
			channelShape(layer, channel.id),
			type,
			ctx.compression,
		),
	);

	writeRect(format, w, layer.rect);
	format.write.uint16(w, layer.channels.length);
	layer.channels.forEach((channel, i) => {
		format.write.int16(w, channel.id);
		writeSize(format, w, payloads[i]?.length ?? 0);
	});

	w.write(Buffer.from(format.signature, "latin1"));
	format.write.key(w, layer.blendMode);
	w.u8(layer.opacity);
	w.u8(layer.clipping);
	w.u8(layer.flags);
	w.u8(0);

	const sizeAt = w.tell();
	format.write.uint32(w, 0);
	const start = w.tell();
	writeLayerMask(w, format, layer.mask);
	format.write.uint32(w, layer.blendingRanges.length * 4);
	for (const value of layer.blendingRanges) format.write.int32(w, value);
	writePaddedPascalString(w, layer.name, 4);
	writeStructures(w, format, layer.info, ctx, 2);

	const end = w.tell();
	w.seek(sizeAt);
	format.write.uint32(w, end - start);
	w.seek(end);
	return payloads;
};
