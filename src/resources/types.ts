// ─── Resource ids ───────────────────────────────────────────────────────────

export const PsdResourceId = {
	RESOLUTION_INFO: 1005,
	ALPHA_NAMES_PASCAL: 1006,
	DISPLAY_INFO_OBSOLETE: 1007,
	CAPTION_PASCAL: 1008,
	BORDER_INFO: 1009,
	BACKGROUND_COLOR: 1010,
	PRINT_FLAGS: 1011,
	GRAYSCALE_HALFTONING_INFO: 1012,
	COLOR_HALFTONING_INFO: 1013,
	DUOTONE_HALFTONING_INFO: 1014,
	GRAYSCALE_TRANSFER_FUNCTION: 1015,
	COLOR_TRANSFER_FUNCTION: 1016,
	DUOTONE_TRANSFER_FUNCTION: 1017,
	DUOTONE_IMAGE_INFO: 1018,
	EFFECTIVE_BW: 1019,
	EPS_OPTIONS: 1021,
	QUICK_MASK_INFO: 1022,
	LAYER_STATE_INFO: 1024,
	WORKING_PATH: 1025,
	LAYER_GROUP_INFO: 1026,
	IPTC_NAA: 1028,
	IMAGE_MODE_RAW: 1029,
	JPEG_QUALITY: 1030,
	GRID_AND_GUIDES_INFO: 1032,
	THUMBNAIL_RESOURCE_PS4: 1033,
	COPYRIGHT_FLAG: 1034,
	URL: 1035,
	THUMBNAIL_RESOURCE: 1036,
	GLOBAL_ANGLE: 1037,
	ICC_PROFILE: 1039,
	WATERMARK: 1040,
	ICC_UNTAGGED_PROFILE: 1041,
	EFFECTS_VISIBLE: 1042,
	SPOT_HALFTONE: 1043,
	IDS_SEED_NUMBER: 1044,
	ALPHA_NAMES_UNICODE: 1045,
	INDEXED_COLOR_TABLE_COUNT: 1046,
	TRANSPARENCY_INDEX: 1047,
	GLOBAL_ALTITUDE: 1049,
	SLICES: 1050,
	WORKFLOW_URL: 1051,
	ALPHA_IDENTIFIERS: 1053,
	URL_LIST: 1054,
	VERSION_INFO: 1057,
	EXIF_DATA_1: 1058,
	EXIF_DATA_3: 1059,
	XMP_METADATA: 1060,
	CAPTION_DIGEST: 1061,
	PRINT_SCALE: 1062,
	PIXEL_ASPECT_RATIO: 1064,
	LAYER_SELECTION_IDS: 1069,
	LAYER_GROUPS_ENABLED_ID: 1072,
	MEASUREMENT_SCALE: 1074,
	TIMELINE_INFO: 1075,
	SHEET_DISCLOSURE: 1076,
	ONION_SKINS: 1078,
	COUNT_INFO: 1080,
	PRINT_INFO_CS5: 1082,
	PRINT_STYLE: 1083,
	PATH_SELECTION_STATE: 1088,
	PATH_INFO: 2000,
	CLIPPING_PATH_NAME: 2999,
	ORIGIN_PATH_INFO: 3000,
	PLUGIN_RESOURCE: 4000,
	IMAGE_READY_VARIABLES: 7000,
	IMAGE_READY_DATA_SETS: 7001,
	LIGHTROOM_WORKFLOW: 8000,
	PRINT_FLAGS_INFO: 10000,
} as const;

const RESOURCE_NAMES: ReadonlyMap<number, string> = new Map(
	Object.entries(PsdResourceId).map(([name, id]) => [id, name]),
);

/** Canonical name of a resource id; path and plug-in ranges fold to one name. */
export const resourceName = (id: number): string | undefined => {
	if (id >= 2000 && id <= 2997) return "PATH_INFO";
	if (id >= 4000 && id <= 4999) return "PLUGIN_RESOURCE";
	return RESOURCE_NAMES.get(id);
};

export const RESOURCE_SIGNATURES: ReadonlySet<string> = new Set([
	"8BIM",
	"MeSa",
	"AgHg",
	"PHUT",
	"DCSR",
]);

// ─── Blocks ─────────────────────────────────────────────────────────────────

type ResourceBase = {
	readonly id: number;
	readonly name: string;
	/** Defaults to "8BIM" on write. */
	readonly signature?: string;
};

export type PsdResourceString = ResourceBase & {
	readonly type: "string";
	readonly value: string;
};

export type PsdResourceStrings = ResourceBase & {
	readonly type: "strings";
	readonly unicode: boolean;
	readonly values: readonly string[];
};

export type PsdResourceColor = ResourceBase & {
	readonly type: "color";
	readonly colorSpace: number;
	readonly components: readonly [number, number, number, number];
};

export type PsdResourceVersion = ResourceBase & {
	readonly type: "version";
	readonly version: number;
	readonly hasRealMergedData: boolean;
	readonly writerName: string;
	readonly readerName: string;
	readonly fileVersion: number;
	/** Bytes after the parsed fields. */
	readonly trailing?: Uint8Array;
};

export type PsdResourceThumbnail = ResourceBase & {
	readonly type: "thumbnail";
	/** 1 for JPEG, 0 for raw RGB. */
	readonly format: number;
	readonly width: number;
	readonly height: number;
	readonly widthBytes: number;
	readonly totalSize: number;
	readonly bitsPerPixel: number;
	readonly planes: number;
	readonly data: Uint8Array;
	/** Bytes after the compressed image. */
	readonly trailing?: Uint8Array;
};

export type PsdResourceBytes = ResourceBase & {
	readonly type: "bytes";
	readonly data: Uint8Array;
};

export type PsdResource =
	| PsdResourceString
	| PsdResourceStrings
	| PsdResourceColor
	| PsdResourceVersion
	| PsdResourceThumbnail
	| PsdResourceBytes;

export type PsdImageResources = {
	/** Advisory label, not part of the encoded data. */
	readonly name?: string;
	readonly resources: readonly PsdResource[];
};
