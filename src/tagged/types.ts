import type { PsdFormat } from "../binary/format.ts";
import type { Logger } from "../log.ts";
import type { PsdCompression, PsdPlane } from "../compression/types.ts";

// ─── Geometry ───────────────────────────────────────────────────────────────

export type PsdRectangle = {
	readonly top: number;
	readonly left: number;
	readonly bottom: number;
	readonly right: number;
};

// ─── Layers ─────────────────────────────────────────────────────────────────

export type PsdChannel = {
	/** Plane index, or a negative mask id (see PsdChannelId). */
	readonly id: number;
	readonly compression: PsdCompression;
	readonly plane: PsdPlane;
};

/** A mask exists only when `rect` is set. */
export type PsdLayerMask = {
	readonly rect?: PsdRectangle;
	readonly defaultColor: number;
	readonly flags: number;
	readonly userMaskDensity?: number;
	readonly userMaskFeather?: number;
	readonly vectorMaskDensity?: number;
	readonly vectorMaskFeather?: number;
	readonly realFlags?: number;
	readonly realBackground?: number;
	readonly realRect?: PsdRectangle;
};

export type PsdLayer = {
	readonly name: string;
	readonly rect: PsdRectangle;
	readonly channels: readonly PsdChannel[];
	readonly mask?: PsdLayerMask;
	readonly opacity: number;
	readonly blendMode: string;
	readonly clipping: number;
	readonly flags: number;
	readonly blendingRanges: readonly number[];
	readonly info: readonly PsdStructure[];
};

export type PsdLayersKey = "Layr" | "Lr16" | "Lr32";

export type PsdLayers = {
	readonly type: "layers";
	readonly key: PsdLayersKey;
	readonly hasTransparency: boolean;
	readonly layers: readonly PsdLayer[];
};

// ─── Patterns ───────────────────────────────────────────────────────────────

export type PsdVirtualMemoryArray = {
	readonly depth: number;
	readonly rect: PsdRectangle;
	readonly compression: PsdCompression;
	readonly plane: PsdPlane;
};

/** Array flagged as written, with a zero length. */
export type PsdEmptyVirtualMemoryArray = { readonly empty: true };

/** null: not written. */
export type PsdPatternChannel =
	| PsdVirtualMemoryArray
	| PsdEmptyVirtualMemoryArray
	| null;

export type PsdPattern = {
	readonly imageMode: number;
	readonly height: number;
	readonly width: number;
	readonly name: string;
	readonly id: string;
	/** 768 bytes of RGB triples; only for indexed image mode. */
	readonly colorTable?: Uint8Array;
	readonly rect: PsdRectangle;
	/** Color channels followed by user mask and sheet mask. */
	readonly channels: readonly PsdPatternChannel[];
};

export type PsdPatterns = {
	readonly type: "patterns";
	readonly key: "Patt" | "Pat2" | "Pat3";
	readonly patterns: readonly PsdPattern[];
};

// ─── Leaf records ───────────────────────────────────────────────────────────

export type PsdEmpty = { readonly type: "empty"; readonly key: string };

/** Opaque record, tied to the format it was read under. */
export type PsdUnknown = {
	readonly type: "unknown";
	readonly key: string;
	readonly format: PsdFormat;
	readonly data: Uint8Array;
};

export type PsdString = {
	readonly type: "string";
	readonly key: string;
	readonly value: string;
};

export type PsdUnicodeString = {
	readonly type: "unicodeString";
	readonly key: string;
	readonly value: string;
};

export type PsdBoolean = {
	readonly type: "boolean";
	readonly key: string;
	readonly value: boolean;
};

export type PsdInteger = {
	readonly type: "integer";
	readonly key: string;
	readonly value: number;
};

/** Four-character code payload. */
export type PsdWord = {
	readonly type: "word";
	readonly key: string;
	readonly value: string;
};

export type PsdExposure = {
	readonly type: "exposure";
	readonly key: string;
	readonly version: number;
	readonly exposure: number;
	readonly offset: number;
	readonly gamma: number;
};

export type PsdReferencePoint = {
	readonly type: "referencePoint";
	readonly key: string;
	readonly x: number;
	readonly y: number;
};

export type PsdSectionDivider = {
	readonly type: "sectionDivider";
	readonly key: string;
	readonly kind: number;
	readonly blendMode?: string;
	readonly subtype?: number;
};

export type PsdSheetColorSetting = {
	readonly type: "sheetColor";
	readonly key: string;
	readonly color: number;
};

export type PsdMetadataSetting = {
	readonly key: string;
	readonly copyOnSheetDuplication: boolean;
	readonly data: Uint8Array;
};

export type PsdMetadataSettings = {
	readonly type: "metadataSettings";
	readonly key: string;
	readonly items: readonly PsdMetadataSetting[];
};

export type PsdTextEngineData = {
	readonly type: "textEngineData";
	readonly key: string;
	readonly data: Uint8Array;
};

export type PsdColorComponents = readonly [number, number, number, number];

export type PsdUserMask = {
	readonly type: "userMask";
	readonly key: "LMsk";
	readonly colorSpace: number;
	readonly components: PsdColorComponents;
	readonly opacity: number;
	readonly flag: number;
};

export type PsdFilterMask = {
	readonly type: "filterMask";
	readonly key: "FMsk";
	readonly colorSpace: number;
	readonly components: PsdColorComponents;
	readonly opacity: number;
};

// ─── Structure union ────────────────────────────────────────────────────────

export type PsdStructure =
	| PsdEmpty
	| PsdUnknown
	| PsdString
	| PsdUnicodeString
	| PsdBoolean
	| PsdInteger
	| PsdWord
	| PsdExposure
	| PsdReferencePoint
	| PsdSectionDivider
	| PsdSheetColorSetting
	| PsdMetadataSettings
	| PsdPatterns
	| PsdTextEngineData
	| PsdLayers
	| PsdUserMask
	| PsdFilterMask;

export type PsdStructureType = PsdStructure["type"];

// ─── Options ────────────────────────────────────────────────────────────────

export type ReadOptions = {
	readonly logger?: Logger;
	/** Keep unrecognized records as `unknown` structures. */
	readonly unknown?: boolean;
	/** Reject records whose declared size runs past the enclosing list. */
	readonly strict?: boolean;
};

export type WriteOptions = {
	readonly logger?: Logger;
	/** Overrides the compression of every layer channel. */
	readonly compression?: PsdCompression;
	/** Emit `unknown` structures whose format matches the output format. */
	readonly unknown?: boolean;
};

export type ReadContext = {
	readonly logger: Logger;
	readonly unknown: boolean;
	readonly strict: boolean;
};

export type WriteContext = {
	readonly logger: Logger;
	readonly compression: PsdCompression | undefined;
	readonly unknown: boolean;
};
