import { DecodeError, EncodeError } from "../binary/errors.ts";
import type { PsdFormat } from "../binary/format.ts";
import type { ByteReader } from "../binary/reader.ts";
import type { ByteWriter } from "../binary/writer.ts";
import {
	readPascalString,
	readUnicodeString,
	writePascalString,
	writeUnicodeString,
} from "../binary/text.ts";
import { decodePlane, encodePlane, sampleTypeOf } from "../compression/compression.ts";
import {
	COMPRESSION_TYPE_TO_ID,
	type PsdSampleType,
} from "../compression/types.ts";
import { compressionFromId, rleCounts } from "../layers/channel.ts";
import { PsdImageMode } from "../tagged/constants.ts";
import { readRect, rectShape, writeRect } from "../tagged/rect.ts";
import type {
	PsdPattern,
	PsdPatternChannel,
	PsdPatterns,
} from "../tagged/types.ts";

const PATTERN_VERSION = 1;
const VMA_LIST_VERSION = 3;
const COLOR_TABLE_SIZE = 768;

const DEPTH_TO_TYPE: Readonly<Record<number, PsdSampleType>> = {
	8: "uint8",
	16: "uint16",
	32: "float32",
};

const TYPE_TO_DEPTH: Readonly<Record<PsdSampleType, number>> = {
	uint8: 8,
	uint16: 16,
	float32: 32,
};

// ─── Length-prefixed blocks ─────────────────────────────────────────────────

const beginBlock = (w: ByteWriter, format: PsdFormat): number => {
	format.write.uint32(w, 0);
	return w.tell();
};

const endBlock = (w: ByteWriter, format: PsdFormat, start: number): void => {
	const end = w.tell();
	w.seek(start - 4);
	format.write.uint32(w, end - start);
	w.seek(end);
};

// ─── Virtual memory arrays ──────────────────────────────────────────────────

const readArray = (
	r: ByteReader,
	format: PsdFormat,
): PsdPatternChannel => {
	if (format.read.uint32(r) === 0) return null;
	const length = format.read.uint32(r);
	if (length === 0) return { empty: true };
	const start = r.tell();

	const depth = format.read.uint32(r);
	const rect = readRect(format, r);
	r.skip(2);
	const compression = compressionFromId(r.u8());
	const type = DEPTH_TO_TYPE[depth];
	if (type === undefined) {
		throw new DecodeError(`Unsupported pattern channel depth ${depth}`);
	}
	const data = r.bytes(start + length - r.tell());
	const plane = decodePlane(data, compression, rectShape(rect), type, rleCounts(format));
	r.seek(start + length);
	return { depth, rect, compression, plane };
};

const writeArray = (
	w: ByteWriter,
	format: PsdFormat,
	array: PsdPatternChannel,
): void => {
	if (array === null) {
		format.write.uint32(w, 0);
		return;
	}
	format.write.uint32(w, 1);
	if ("empty" in array) {
		format.write.uint32(w, 0);
		return;
	}
	const start = beginBlock(w, format);
	const depth = TYPE_TO_DEPTH[sampleTypeOf(array.plane.data)];
	if (depth !== array.depth) {
		throw new EncodeError(
			`Pattern channel declares depth ${array.depth} but holds ${depth}-bit samples`,
		);
	}
	format.write.uint32(w, depth);
	writeRect(format, w, array.rect);
	format.write.uint16(w, depth);
	w.u8(COMPRESSION_TYPE_TO_ID[array.compression]);
	w.write(encodePlane(array.plane, array.compression, rleCounts(format)));
	endBlock(w, format, start);
};

// ─── Pattern ────────────────────────────────────────────────────────────────

const readPattern = (r: ByteReader, format: PsdFormat): PsdPattern => {
	const length = format.read.uint32(r);
	const start = r.tell();
	const version = format.read.uint32(r);
	if (version !== PATTERN_VERSION) {
		throw new DecodeError(`Unsupported pattern version ${version}`);
	}
	const imageMode = format.read.uint32(r);
	const height = format.read.int16(r);
	const width = format.read.int16(r);
	const name = readUnicodeString(format, r);
	const id = readPascalString(r);
	const colorTable =
		imageMode === PsdImageMode.INDEXED ? r.bytes(COLOR_TABLE_SIZE) : undefined;

	const listVersion = format.read.uint32(r);
	if (listVersion !== VMA_LIST_VERSION) {
		throw new DecodeError(`Unsupported pattern data version ${listVersion}`);
	}
	const listLength = format.read.uint32(r);
	const listStart = r.tell();
	const rect = readRect(format, r);
	const channelCount = format.read.uint32(r);
	const channels: PsdPatternChannel[] = [];
	for (let i = 0; i < channelCount + 2; i++) {
		channels.push(readArray(r, format));
	}
	r.seek(listStart + listLength);
	r.seek(start + length + ((4 - (length % 4)) % 4));

	return {
		imageMode,
		height,
		width,
		name,
		id,
		...(colorTable ? { colorTable } : {}),
		rect,
		channels,
	};
};

const writePattern = (
	w: ByteWriter,
	format: PsdFormat,
	pattern: PsdPattern,
): void => {
	if (pattern.channels.length < 2) {
		throw new EncodeError("Pattern needs a user mask and a sheet mask entry");
	}
	const start = beginBlock(w, format);
	format.write.uint32(w, PATTERN_VERSION);
	format.write.uint32(w, pattern.imageMode);
	format.write.int16(w, pattern.height);
	format.write.int16(w, pattern.width);
	writeUnicodeString(format, w, pattern.name);
	writePascalString(w, pattern.id);
	if (pattern.imageMode === PsdImageMode.INDEXED) {
		const table = Buffer.alloc(COLOR_TABLE_SIZE);
		if (pattern.colorTable) table.set(pattern.colorTable.subarray(0, COLOR_TABLE_SIZE));
		w.write(table);
	}

	format.write.uint32(w, VMA_LIST_VERSION);
	const listStart = beginBlock(w, format);
	writeRect(format, w, pattern.rect);
	format.write.uint32(w, pattern.channels.length - 2);
	for (const array of pattern.channels) writeArray(w, format, array);
	endBlock(w, format, listStart);

	endBlock(w, format, start);
	w.align(4, start);
};

// ─── Patterns record ────────────────────────────────────────────────────────

export const readPatterns = (
	r: ByteReader,
	format: PsdFormat,
	key: PsdPatterns["key"],
	size: number,
): PsdPatterns => {
	const end = r.tell() + size;
	const patterns: PsdPattern[] = [];
	while (r.tell() + 4 <= end) {
		patterns.push(readPattern(r, format));
	}
	return { type: "patterns", key, patterns };
};

export const writePatterns = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdPatterns,
): void => {
	for (const pattern of value.patterns) writePattern(w, format, pattern);
};
