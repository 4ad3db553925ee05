/**
 * Channel compression codec.
 *
 * Sample bytes on the wire are always big-endian, whatever the byte order of
 * the surrounding structure. Only the RLE scanline byte counts follow the
 * structure's byte order (and width).
 */

import { deflateSync, inflateSync } from "node:zlib";
import { DecodeError, EncodeError } from "../binary/errors.ts";
import { decodePackBits, encodePackBits } from "./packbits.ts";
import {
	deltaDecode,
	deltaEncode,
	floatPredictDecode,
	floatPredictEncode,
} from "./predictor.ts";
import {
	type PsdCompression,
	type PsdPlane,
	type PsdPlaneData,
	type PsdSampleType,
	type PsdShape,
	type RleCounts,
	SAMPLE_BYTES,
} from "./types.ts";

// ─── Planes ─────────────────────────────────────────────────────────────────

export const sampleTypeOf = (data: PsdPlaneData): PsdSampleType => {
	if (data instanceof Uint8Array) return "uint8";
	if (data instanceof Uint16Array) return "uint16";
	if (data instanceof Float32Array) return "float32";
	throw new EncodeError("Unsupported sample array type");
};

const allocSamples = (type: PsdSampleType, count: number): PsdPlaneData => {
	switch (type) {
		case "uint8":
			return new Uint8Array(count);
		case "uint16":
			return new Uint16Array(count);
		case "float32":
			return new Float32Array(count);
	}
};

/** Zero-filled plane of the given shape. */
export const createPlane = (
	shape: PsdShape,
	type: PsdSampleType = "uint8",
): PsdPlane => ({
	height: shape.height,
	width: shape.width,
	data: allocSamples(type, shape.height * shape.width),
});

export const planeSize = (shape: PsdShape): number =>
	Math.max(0, shape.height) * Math.max(0, shape.width);

// ─── Big-endian sample bytes ────────────────────────────────────────────────

export const samplesToBytes = (data: PsdPlaneData): Buffer => {
	if (data instanceof Uint8Array) return Buffer.from(data);
	const out = Buffer.alloc(data.length * data.BYTES_PER_ELEMENT);
	if (data instanceof Uint16Array) {
		data.forEach((value, i) => out.writeUInt16BE(value, i * 2));
	} else {
		data.forEach((value, i) => out.writeFloatBE(value, i * 4));
	}
	return out;
};

export const bytesToSamples = (
	bytes: Uint8Array,
	type: PsdSampleType,
	count: number,
): PsdPlaneData => {
	const needed = count * SAMPLE_BYTES[type];
	if (bytes.length < needed) {
		throw new DecodeError(
			`Channel data too short: expected ${needed} bytes, got ${bytes.length}`,
		);
	}
	const view = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	const samples = allocSamples(type, count);
	if (samples instanceof Uint8Array) {
		samples.set(view.subarray(0, count));
	} else if (samples instanceof Uint16Array) {
		for (let i = 0; i < count; i++) samples[i] = view.readUInt16BE(i * 2);
	} else {
		for (let i = 0; i < count; i++) samples[i] = view.readFloatBE(i * 4);
	}
	return samples;
};

// ─── RLE ────────────────────────────────────────────────────────────────────

const writeCount = (
	out: Buffer,
	offset: number,
	value: number,
	counts: RleCounts,
): void => {
	if (counts.width === 2) {
		if (counts.byteOrder === "big") out.writeUInt16BE(value, offset);
		else out.writeUInt16LE(value, offset);
	} else if (counts.byteOrder === "big") out.writeUInt32BE(value, offset);
	else out.writeUInt32LE(value, offset);
};

const readCount = (src: Buffer, offset: number, counts: RleCounts): number => {
	if (counts.width === 2) {
		return counts.byteOrder === "big"
			? src.readUInt16BE(offset)
			: src.readUInt16LE(offset);
	}
	return counts.byteOrder === "big"
		? src.readUInt32BE(offset)
		: src.readUInt32LE(offset);
};

const encodeRle = (
	bytes: Buffer,
	height: number,
	rowBytes: number,
	counts: RleCounts,
): Buffer => {
	const lines: Buffer[] = [];
	for (let y = 0; y < height; y++) {
		lines.push(encodePackBits(bytes.subarray(y * rowBytes, (y + 1) * rowBytes)));
	}
	const table = Buffer.alloc(height * counts.width);
	lines.forEach((line, y) => {
		if (counts.width === 2 && line.length > 0xffff) {
			throw new EncodeError(
				`RLE scanline of ${line.length} bytes does not fit a 2-byte count`,
			);
		}
		writeCount(table, y * counts.width, line.length, counts);
	});
	return Buffer.concat([table, ...lines]);
};

const decodeRle = (
	data: Buffer,
	height: number,
	rowBytes: number,
	counts: RleCounts,
): Buffer => {
	const tableBytes = height * counts.width;
	if (data.length < tableBytes) {
		throw new DecodeError(
			`RLE data too short for ${height} scanline counts (${data.length} bytes)`,
		);
	}
	const out = Buffer.alloc(height * rowBytes);
	let pos = tableBytes;
	for (let y = 0; y < height; y++) {
		const length = readCount(data, y * counts.width, counts);
		const line = data.subarray(pos, pos + length);
		const produced = decodePackBits(line, out, y * rowBytes, rowBytes);
		if (produced !== rowBytes) {
			throw new DecodeError(
				`RLE scanline ${y} decoded to ${produced} bytes, expected ${rowBytes}`,
			);
		}
		pos += length;
	}
	return out;
};

// ─── Inflate ────────────────────────────────────────────────────────────────

const inflate = (data: Buffer, expected: number): Buffer => {
	let out: Buffer;
	try {
		out = inflateSync(data);
	} catch (err) {
		throw new DecodeError("Invalid ZIP channel data", { cause: err });
	}
	if (out.length < expected) {
		throw new DecodeError(
			`ZIP channel data inflated to ${out.length} bytes, expected ${expected}`,
		);
	}
	return out;
};

// ─── Encode / decode ────────────────────────────────────────────────────────

/** Compress a plane. An empty plane encodes to zero bytes. */
export const encodePlane = (
	plane: PsdPlane,
	compression: PsdCompression,
	counts: RleCounts,
): Buffer => {
	const type = sampleTypeOf(plane.data);
	const { height, width } = plane;
	if (planeSize(plane) === 0) return Buffer.alloc(0);
	if (plane.data.length !== height * width) {
		throw new EncodeError(
			`Plane data holds ${plane.data.length} samples, shape is ${height}x${width}`,
		);
	}

	switch (compression) {
		case "raw":
			return samplesToBytes(plane.data);
		case "zip":
			return deflateSync(samplesToBytes(plane.data));
		case "zipPredicted": {
			if (type === "float32") {
				const predicted = floatPredictEncode(
					samplesToBytes(plane.data),
					height,
					width,
					SAMPLE_BYTES[type],
				);
				return deflateSync(predicted);
			}
			const samples = plane.data.slice();
			if (samples instanceof Float32Array) {
				throw new EncodeError("Integer predictor applied to float samples");
			}
			deltaEncode(samples, height, width);
			return deflateSync(samplesToBytes(samples));
		}
		case "rle":
			return encodeRle(
				samplesToBytes(plane.data),
				height,
				width * SAMPLE_BYTES[type],
				counts,
			);
	}
};

/** Decompress a plane. An empty shape yields an empty plane and reads nothing. */
export const decodePlane = (
	data: Buffer,
	compression: PsdCompression,
	shape: PsdShape,
	type: PsdSampleType,
	counts: RleCounts,
): PsdPlane => {
	const height = Math.max(0, shape.height);
	const width = Math.max(0, shape.width);
	const count = height * width;
	if (count === 0) return createPlane({ height, width }, type);

	const sampleBytes = SAMPLE_BYTES[type];
	const expected = count * sampleBytes;

	switch (compression) {
		case "raw":
			return { height, width, data: bytesToSamples(data, type, count) };
		case "zip":
			return {
				height,
				width,
				data: bytesToSamples(inflate(data, expected), type, count),
			};
		case "zipPredicted": {
			const inflated = inflate(data, expected);
			if (type === "float32") {
				const restored = floatPredictDecode(
					inflated.subarray(0, expected),
					height,
					width,
					sampleBytes,
				);
				return { height, width, data: bytesToSamples(restored, type, count) };
			}
			const samples = bytesToSamples(inflated, type, count);
			if (samples instanceof Float32Array) {
				throw new DecodeError("Integer predictor applied to float samples");
			}
			deltaDecode(samples, height, width);
			return { height, width, data: samples };
		}
		case "rle":
			return {
				height,
				width,
				data: bytesToSamples(
					decodeRle(data, height, width * sampleBytes, counts),
					type,
					count,
				),
			};
	}
};
