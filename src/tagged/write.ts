import { EncodeError } from "../binary/errors.ts";
import { type PsdFormat, sameFormat, writeSize } from "../binary/format.ts";
import type { ByteWriter } from "../binary/writer.ts";
import { writeLayers } from "../layers/layers.ts";
import { consoleLogger } from "../log.ts";
import { writePatterns } from "../patterns/patterns.ts";
import {
	writeBoolean,
	writeExposure,
	writeFilterMask,
	writeInteger,
	writeMetadataSettings,
	writeReferencePoint,
	writeSectionDivider,
	writeSheetColor,
	writeString,
	writeTextEngineData,
	writeUnicode,
	writeUserMask,
	writeWord,
} from "./leaves.ts";
import type { PsdStructure, WriteContext, WriteOptions } from "./types.ts";

export const writeContext = (options: WriteOptions = {}): WriteContext => ({
	logger: options.logger ?? consoleLogger,
	compression: options.compression,
	unknown: options.unknown ?? true,
});

/** Write one record's payload, without signature, key or size. */
export const writeStructure = (
	w: ByteWriter,
	format: PsdFormat,
	structure: PsdStructure,
	ctx: WriteContext,
): void => {
	switch (structure.type) {
		case "empty":
			return;
		case "unknown":
			if (!sameFormat(structure.format, format)) {
				throw new EncodeError(
					`Record ${JSON.stringify(structure.key)} was read as ${structure.format.name} and cannot be written as ${format.name}`,
				);
			}
			return w.write(structure.data);
		case "string":
			return writeString(w, structure);
		case "unicodeString":
			return writeUnicode(w, format, structure);
		case "boolean":
			return writeBoolean(w, structure);
		case "integer":
			return writeInteger(w, format, structure);
		case "word":
			return writeWord(w, format, structure);
		case "exposure":
			return writeExposure(w, format, structure);
		case "referencePoint":
			return writeReferencePoint(w, format, structure);
		case "sectionDivider":
			return writeSectionDivider(w, format, structure);
		case "sheetColor":
			return writeSheetColor(w, format, structure);
		case "metadataSettings":
			return writeMetadataSettings(w, format, structure);
		case "patterns":
			return writePatterns(w, format, structure);
		case "textEngineData":
			return writeTextEngineData(w, structure);
		case "layers":
			return writeLayers(w, format, structure, ctx);
		case "userMask":
			return writeUserMask(w, format, structure);
		case "filterMask":
			return writeFilterMask(w, format, structure);
	}
};

const skip = (
	format: PsdFormat,
	structure: PsdStructure,
	ctx: WriteContext,
): boolean => {
	if (structure.type !== "unknown") return false;
	if (!ctx.unknown) return true;
	if (sameFormat(structure.format, format)) return false;
	ctx.logger.warn(
		`Dropped record ${JSON.stringify(structure.key)}: read as ${structure.format.name}, writing ${format.name}`,
	);
	return true;
};

/**
 * Write each structure as signature, key, size and payload, patching the
 * size after the payload and padding to `alignment`. Returns bytes written.
 */
export const writeStructures = (
	w: ByteWriter,
	format: PsdFormat,
	structures: readonly PsdStructure[],
	ctx: WriteContext,
	alignment: number,
): number => {
	const begin = w.tell();
	const signature = Buffer.from(format.signature, "latin1");
	for (const structure of structures) {
		if (skip(format, structure, ctx)) continue;
		w.write(signature);
		format.write.key(w, structure.key);
		const sizeAt = w.tell();
		writeSize(format, w, 0, structure.key);
		const start = w.tell();
		writeStructure(w, format, structure, ctx);
		const end = w.tell();
		w.seek(sizeAt);
		writeSize(format, w, end - start, structure.key);
		w.seek(end);
		w.align(alignment, start);
	}
	return w.tell() - begin;
};
