/**
 * Fixed-layout leaf records. Readers and writers see only the payload;
 * the tagged-list walk owns the signature, key, size field and alignment.
 */

import type { PsdFormat } from "../binary/format.ts";
import type { ByteReader } from "../binary/reader.ts";
import type { ByteWriter } from "../binary/writer.ts";
import {
	readPascalString,
	readUnicodeString,
	writePascalString,
	writeUnicodeString,
} from "../binary/text.ts";
import { PsdColorSpace } from "./constants.ts";
import type {
	PsdBoolean,
	PsdColorComponents,
	PsdExposure,
	PsdFilterMask,
	PsdInteger,
	PsdMetadataSetting,
	PsdMetadataSettings,
	PsdReferencePoint,
	PsdSectionDivider,
	PsdSheetColorSetting,
	PsdString,
	PsdTextEngineData,
	PsdUnicodeString,
	PsdUserMask,
	PsdWord,
} from "./types.ts";

// ─── Scalars ────────────────────────────────────────────────────────────────

export const readBoolean = (r: ByteReader, key: string): PsdBoolean => ({
	type: "boolean",
	key,
	value: r.u8() !== 0,
});

export const writeBoolean = (w: ByteWriter, value: PsdBoolean): void => {
	w.u8(value.value ? 1 : 0);
	w.zeros(3);
};

export const readInteger = (
	r: ByteReader,
	format: PsdFormat,
	key: string,
): PsdInteger => ({ type: "integer", key, value: format.read.int32(r) });

export const writeInteger = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdInteger,
): void => format.write.int32(w, value.value);

export const readWord = (
	r: ByteReader,
	format: PsdFormat,
	key: string,
): PsdWord => ({ type: "word", key, value: format.read.key(r) });

export const writeWord = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdWord,
): void => format.write.key(w, value.value);

// ─── Strings ────────────────────────────────────────────────────────────────

export const readString = (r: ByteReader, key: string): PsdString => ({
	type: "string",
	key,
	value: readPascalString(r),
});

export const writeString = (w: ByteWriter, value: PsdString): void => {
	writePascalString(w, value.value);
};

export const readUnicode = (
	r: ByteReader,
	format: PsdFormat,
	key: string,
): PsdUnicodeString => ({
	type: "unicodeString",
	key,
	value: readUnicodeString(format, r),
});

export const writeUnicode = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdUnicodeString,
): void => writeUnicodeString(format, w, value.value);

// ─── Small records ──────────────────────────────────────────────────────────

export const readExposure = (
	r: ByteReader,
	format: PsdFormat,
	key: string,
): PsdExposure => ({
	type: "exposure",
	key,
	version: format.read.uint16(r),
	exposure: format.read.float32(r),
	offset: format.read.float32(r),
	gamma: format.read.float32(r),
});

export const writeExposure = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdExposure,
): void => {
	format.write.uint16(w, value.version);
	format.write.float32(w, value.exposure);
	format.write.float32(w, value.offset);
	format.write.float32(w, value.gamma);
};

export const readReferencePoint = (
	r: ByteReader,
	format: PsdFormat,
	key: string,
): PsdReferencePoint => ({
	type: "referencePoint",
	key,
	x: format.read.float64(r),
	y: format.read.float64(r),
});

export const writeReferencePoint = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdReferencePoint,
): void => {
	format.write.float64(w, value.x);
	format.write.float64(w, value.y);
};

/** Blend mode and subtype are present only in longer records. */
export const readSectionDivider = (
	r: ByteReader,
	format: PsdFormat,
	key: string,
	size: number,
): PsdSectionDivider => {
	const kind = format.read.uint32(r);
	if (size < 12) return { type: "sectionDivider", key, kind };
	r.skip(4);
	const blendMode = format.read.key(r);
	if (size < 16) return { type: "sectionDivider", key, kind, blendMode };
	const subtype = format.read.uint32(r);
	return { type: "sectionDivider", key, kind, blendMode, subtype };
};

export const writeSectionDivider = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdSectionDivider,
): void => {
	format.write.uint32(w, value.kind);
	if (value.blendMode === undefined) return;
	w.write(Buffer.from(format.signature, "latin1"));
	format.write.key(w, value.blendMode);
	if (value.subtype !== undefined) format.write.uint32(w, value.subtype);
};

export const readSheetColor = (
	r: ByteReader,
	format: PsdFormat,
	key: string,
): PsdSheetColorSetting => ({
	type: "sheetColor",
	key,
	color: format.read.uint16(r),
});

export const writeSheetColor = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdSheetColorSetting,
): void => {
	format.write.uint16(w, value.color);
	w.zeros(6);
};

// ─── Metadata settings ──────────────────────────────────────────────────────

export const readMetadataSettings = (
	r: ByteReader,
	format: PsdFormat,
	key: string,
): PsdMetadataSettings => {
	const count = format.read.uint32(r);
	const items: PsdMetadataSetting[] = [];
	for (let i = 0; i < count; i++) {
		r.skip(4);
		const itemKey = format.read.key(r);
		const copyOnSheetDuplication = r.u8() !== 0;
		r.skip(3);
		const length = format.read.uint32(r);
		items.push({ key: itemKey, copyOnSheetDuplication, data: r.bytes(length) });
	}
	return { type: "metadataSettings", key, items };
};

export const writeMetadataSettings = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdMetadataSettings,
): void => {
	format.write.uint32(w, value.items.length);
	for (const item of value.items) {
		w.write(Buffer.from(format.signature, "latin1"));
		format.write.key(w, item.key);
		w.u8(item.copyOnSheetDuplication ? 1 : 0);
		w.zeros(3);
		format.write.uint32(w, item.data.length);
		w.write(item.data);
	}
};

// ─── Opaque ─────────────────────────────────────────────────────────────────

export const readTextEngineData = (
	r: ByteReader,
	key: string,
	size: number,
): PsdTextEngineData => ({
	type: "textEngineData",
	key,
	data: r.bytes(size),
});

export const writeTextEngineData = (
	w: ByteWriter,
	value: PsdTextEngineData,
): void => w.write(value.data);

// ─── Global masks ───────────────────────────────────────────────────────────

const readComponents = (
	r: ByteReader,
	format: PsdFormat,
	colorSpace: number,
): PsdColorComponents => {
	const read = colorSpace === PsdColorSpace.LAB ? format.read.int16 : format.read.uint16;
	return [read(r), read(r), read(r), read(r)];
};

const writeComponents = (
	w: ByteWriter,
	format: PsdFormat,
	colorSpace: number,
	components: PsdColorComponents,
): void => {
	const write =
		colorSpace === PsdColorSpace.LAB ? format.write.int16 : format.write.uint16;
	for (const component of components) write(w, component);
};

export const readUserMask = (r: ByteReader, format: PsdFormat): PsdUserMask => {
	const colorSpace = format.read.int16(r);
	const components = readComponents(r, format, colorSpace);
	const opacity = format.read.uint16(r);
	const flag = r.u8();
	return { type: "userMask", key: "LMsk", colorSpace, components, opacity, flag };
};

export const writeUserMask = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdUserMask,
): void => {
	format.write.int16(w, value.colorSpace);
	writeComponents(w, format, value.colorSpace, value.components);
	format.write.uint16(w, value.opacity);
	w.u8(value.flag);
	w.zeros(1);
};

export const readFilterMask = (
	r: ByteReader,
	format: PsdFormat,
): PsdFilterMask => {
	const colorSpace = format.read.int16(r);
	const components = readComponents(r, format, colorSpace);
	const opacity = format.read.uint16(r);
	return { type: "filterMask", key: "FMsk", colorSpace, components, opacity };
};

export const writeFilterMask = (
	w: ByteWriter,
	format: PsdFormat,
	value: PsdFilterMask,
): void => {
	format.write.int16(w, value.colorSpace);
	writeComponents(w, format, value.colorSpace, value.components);
	format.write.uint16(w, value.opacity);
};

/** Default user mask substituted when a document carries none. */
export const defaultUserMask = (): PsdUserMask => ({
	type: "userMask",
	key: "LMsk",
	colorSpace: PsdColorSpace.RGB,
	components: [65535, 0, 0, 0],
	opacity: 50,
	flag: 128,
});
