import type { PsdFormat } from "../binary/format.ts";
import type { ByteReader } from "../binary/reader.ts";
import { readLayers } from "../layers/layers.ts";
import { readPatterns } from "../patterns/patterns.ts";
import { PsdKey } from "./constants.ts";
import {
	readBoolean,
	readExposure,
	readFilterMask,
	readInteger,
	readMetadataSettings,
	readReferencePoint,
	readSectionDivider,
	readSheetColor,
	readTextEngineData,
	readUnicode,
	readUserMask,
	readWord,
} from "./leaves.ts";
import type {
	PsdLayersKey,
	PsdPatterns,
	PsdStructure,
	ReadContext,
} from "./types.ts";

export type StructureReader = (
	r: ByteReader,
	format: PsdFormat,
	key: string,
	size: number,
	ctx: ReadContext,
) => PsdStructure;

const patterns =
	(key: PsdPatterns["key"]): StructureReader =>
	(r, format, _key, size) =>
		readPatterns(r, format, key, size);

const layers =
	(key: PsdLayersKey): StructureReader =>
	(r, format, _key, size, ctx) =>
		readLayers(r, format, key, size, ctx);

const build = (): ReadonlyMap<string, StructureReader> => {
	const entries: [readonly string[], StructureReader][] = [
		[
			[
				PsdKey.BLEND_CLIPPING_ELEMENTS,
				PsdKey.BLEND_INTERIOR_ELEMENTS,
				PsdKey.KNOCKOUT_SETTING,
				PsdKey.LAYER_MASK_AS_GLOBAL_MASK,
				PsdKey.VECTOR_MASK_AS_GLOBAL_MASK,
				PsdKey.TRANSPARENCY_SHAPES_LAYER,
			],
			(r, _format, key) => readBoolean(r, key),
		],
		[
			[
				PsdKey.LAYER_ID,
				PsdKey.LAYER_VERSION,
				PsdKey.PROTECTED_SETTING,
				PsdKey.USING_ALIGNED_RENDERING,
			],
			readInteger,
		],
		[[PsdKey.LAYER_NAME_SOURCE_SETTING], readWord],
		[[PsdKey.UNICODE_LAYER_NAME], readUnicode],
		[[PsdKey.EXPOSURE], readExposure],
		[[PsdKey.REFERENCE_POINT], readReferencePoint],
		[
			[PsdKey.SECTION_DIVIDER_SETTING, PsdKey.NESTED_SECTION_DIVIDER_SETTING],
			readSectionDivider,
		],
		[[PsdKey.SHEET_COLOR_SETTING], readSheetColor],
		[[PsdKey.METADATA_SETTING], readMetadataSettings],
		[
			[PsdKey.TEXT_ENGINE_DATA],
			(r, _format, key, size) => readTextEngineData(r, key, size),
		],
		[[PsdKey.USER_MASK], (r, format) => readUserMask(r, format)],
		[[PsdKey.FILTER_MASK], (r, format) => readFilterMask(r, format)],
		[[PsdKey.PATTERNS], patterns("Patt")],
		[[PsdKey.PATTERNS_2], patterns("Pat2")],
		[[PsdKey.PATTERNS_3], patterns("Pat3")],
		[[PsdKey.LAYER], layers("Layr")],
		[[PsdKey.LAYER_16], layers("Lr16")],
		[[PsdKey.LAYER_32], layers("Lr32")],
	];
	return new Map(
		entries.flatMap(([keys, reader]) =>
			keys.map((key): [string, StructureReader] => [key, reader]),
		),
	);
};

// Built on first lookup: the layer reader depends back on the tagged-list walk.
let registry: ReadonlyMap<string, StructureReader> | undefined;

export const structureReader = (key: string): StructureReader | undefined => {
	registry ??= build();
	return registry.get(key);
};

export const isRegisteredKey = (key: string): boolean =>
	structureReader(key) !== undefined;
