import { asDecodeError, FormatError } from "../binary/errors.ts";
import { BE32BIT, type PsdFormat, psdFormat } from "../binary/format.ts";
import { createByteReader } from "../binary/reader.ts";
import { createByteWriter } from "../binary/writer.ts";
import { emptyLayers } from "../layers/layers.ts";
import { equalStructureLists, equalStructures } from "../tagged/equal.ts";
import { defaultUserMask } from "../tagged/leaves.ts";
import { readContext, readStructures } from "../tagged/read.ts";
import type {
	PsdLayers,
	PsdStructure,
	PsdUserMask,
	ReadOptions,
	WriteOptions,
} from "../tagged/types.ts";
import { writeContext, writeStructures } from "../tagged/write.ts";

export const IMAGE_SOURCE_DATA_TAG = 37724;

const LITERAL = Buffer.from("Adobe Photoshop Document Data Block\0", "latin1");

export type PsdImageSourceData = {
	/** Advisory label; not encoded and not compared. */
	readonly name?: string;
	readonly format: PsdFormat;
	readonly layers: PsdLayers;
	readonly userMask: PsdUserMask;
	readonly info: readonly PsdStructure[];
};

export type ImageSourceDataReadOptions = ReadOptions & {
	readonly name?: string;
};

export type ImageSourceDataWriteOptions = WriteOptions & {
	/** Encode under this format instead of the document's. */
	readonly format?: PsdFormat;
};

const withName = (name: string | undefined): { readonly name?: string } =>
	name !== undefined ? { name } : {};

export const emptyImageSourceData = (
	format: PsdFormat = BE32BIT,
): PsdImageSourceData => ({
	format,
	layers: emptyLayers(),
	userMask: defaultUserMask(),
	info: [],
});

// ─── Read ───────────────────────────────────────────────────────────────────

export const readImageSourceData = (
	bytes: Uint8Array,
	options: ImageSourceDataReadOptions = {},
): PsdImageSourceData => {
	const ctx = readContext(options);
	const r = createByteReader(bytes);
	if (r.length < LITERAL.length || !r.peek(LITERAL.length).equals(LITERAL)) {
		throw new FormatError("Data does not start with the document data block literal");
	}
	r.skip(LITERAL.length);
	if (r.remaining() === 0) {
		return { ...withName(options.name), ...emptyImageSourceData() };
	}

	const format = psdFormat(r.peek(4).toString("latin1"));
	let structures: PsdStructure[];
	try {
		structures = readStructures(r, format, r.length, ctx, 4);
	} catch (err) {
		throw asDecodeError(err, "Failed to read document data block");
	}

	let layers: PsdLayers | undefined;
	let userMask: PsdUserMask | undefined;
	const info: PsdStructure[] = [];
	for (const structure of structures) {
		if (structure.type === "layers" && layers === undefined) layers = structure;
		else if (structure.type === "userMask" && userMask === undefined) userMask = structure;
		else info.push(structure);
	}
	if (layers === undefined) {
		ctx.logger.warn("Document data block has no layer list");
		layers = emptyLayers();
	}
	if (userMask === undefined) {
		ctx.logger.warn("Document data block has no user mask");
		userMask = defaultUserMask();
	}
	return { ...withName(options.name), format, layers, userMask, info };
};

// ─── Write ──────────────────────────────────────────────────────────────────

export const writeImageSourceData = (
	doc: PsdImageSourceData,
	options: ImageSourceDataWriteOptions = {},
): Buffer => {
	const format = options.format ?? doc.format;
	const w = createByteWriter();
	w.write(LITERAL);
	writeStructures(
		w,
		format,
		[doc.layers, doc.userMask, ...doc.info],
		writeContext(options),
		4,
	);
	return w.toBuffer();
};

/** Container tag entry: id, type 7 (undefined), count, value, write once. */
export const imageSourceDataTag = (
	doc: PsdImageSourceData,
	options: ImageSourceDataWriteOptions = {},
): [number, number, number, Buffer, boolean] => {
	const bytes = writeImageSourceData(doc, options);
	return [IMAGE_SOURCE_DATA_TAG, 7, bytes.length, bytes, true];
};

/** Compares layers, user mask and info records; ignores name and format. */
export const equalImageSourceData = (
	a: PsdImageSourceData,
	b: PsdImageSourceData,
): boolean =>
	equalStructures(a.layers, b.layers) &&
	equalStructures(a.userMask, b.userMask) &&
	equalStructureLists(a.info, b.info);
