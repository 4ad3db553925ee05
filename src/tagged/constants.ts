// ─── Record keys ────────────────────────────────────────────────────────────

export const PsdKey = {
	ALPHA: "Alph",
	ANIMATION_EFFECTS: "anFX",
	ANNOTATIONS: "Anno",
	ARTBOARD_DATA: "artb",
	ARTBOARD_DATA_2: "artd",
	ARTBOARD_DATA_3: "abdd",
	BLACK_AND_WHITE: "blwh",
	BLEND_CLIPPING_ELEMENTS: "clbl",
	BLEND_INTERIOR_ELEMENTS: "infx",
	BRIGHTNESS_AND_CONTRAST: "brit",
	CHANNEL_BLENDING_RESTRICTIONS_SETTING: "brst",
	CHANNEL_MIXER: "mixr",
	COLOR_BALANCE: "blnc",
	COLOR_LOOKUP: "clrL",
	COMPOSITOR_INFO: "cinf",
	CONTENT_GENERATOR_EXTRA_DATA: "CgEd",
	CURVES: "curv",
	EFFECTS_LAYER: "lrFX",
	EXPOSURE: "expA",
	FILTER_EFFECTS: "FXid",
	FILTER_EFFECTS_2: "FEid",
	FILTER_MASK: "FMsk",
	FOREIGN_EFFECT_ID: "ffxi",
	GRADIENT_FILL_SETTING: "GdFl",
	GRADIENT_MAP: "grdm",
	HUE_SATURATION: "hue2",
	HUE_SATURATION_PS4: "hue ",
	INVERT: "nvrt",
	KNOCKOUT_SETTING: "knko",
	LAYER: "Layr",
	LAYER_16: "Lr16",
	LAYER_32: "Lr32",
	LAYER_ID: "lyid",
	LAYER_MASK_AS_GLOBAL_MASK: "lmgm",
	LAYER_NAME_SOURCE_SETTING: "lnsr",
	LAYER_VERSION: "lyvr",
	LEVELS: "levl",
	LINKED_LAYER: "lnkD",
	LINKED_LAYER_2: "lnk2",
	LINKED_LAYER_3: "lnk3",
	LINKED_LAYER_EXTERNAL: "lnkE",
	METADATA_SETTING: "shmd",
	NESTED_SECTION_DIVIDER_SETTING: "lsdk",
	OBJECT_BASED_EFFECTS_LAYER_INFO: "lfx2",
	PATT: "patt",
	PATTERNS: "Patt",
	PATTERNS_2: "Pat2",
	PATTERNS_3: "Pat3",
	PATTERN_DATA: "shpa",
	PATTERN_FILL_SETTING: "PtFl",
	PHOTO_FILTER: "phfl",
	PIXEL_SOURCE_DATA: "PxSc",
	PIXEL_SOURCE_DATA_CC15: "PxSD",
	PLACED_LAYER: "plLd",
	PLACED_LAYER_CS3: "PlLd",
	POSTERIZE: "post",
	PROTECTED_SETTING: "lspf",
	REFERENCE_POINT: "fxrp",
	SAVING_MERGED_TRANSPARENCY: "Mtrn",
	SAVING_MERGED_TRANSPARENCY_2: "MTrn",
	SAVING_MERGED_TRANSPARENCY_16: "Mt16",
	SAVING_MERGED_TRANSPARENCY_32: "Mt32",
	SECTION_DIVIDER_SETTING: "lsct",
	SELECTIVE_COLOR: "selc",
	SHEET_COLOR_SETTING: "lclr",
	SMART_OBJECT_LAYER_DATA: "SoLd",
	SMART_OBJECT_LAYER_DATA_CC15: "SoLE",
	SOLID_COLOR_SHEET_SETTING: "SoCo",
	TEXT_ENGINE_DATA: "Txt2",
	THRESHOLD: "thrs",
	TRANSPARENCY_SHAPES_LAYER: "tsly",
	TYPE_TOOL_INFO: "tySh",
	TYPE_TOOL_OBJECT_SETTING: "TySh",
	UNICODE_LAYER_NAME: "luni",
	UNICODE_PATH_NAME: "pths",
	USER_MASK: "LMsk",
	USING_ALIGNED_RENDERING: "sn2P",
	VECTOR_MASK_AS_GLOBAL_MASK: "vmgm",
	VECTOR_MASK_SETTING: "vmsk",
	VECTOR_MASK_SETTING_CS6: "vsms",
	VECTOR_ORIGINATION_DATA: "vogk",
	VECTOR_STROKE_DATA: "vstk",
	VECTOR_STROKE_CONTENT_DATA: "vscg",
	VIBRANCE: "vibA",
} as const;

export type PsdKeyName = keyof typeof PsdKey;

const isKeyName = (name: string): name is PsdKeyName => name in PsdKey;

const KEY_NAMES: ReadonlyMap<string, PsdKeyName> = new Map(
	Object.entries(PsdKey).flatMap(([name, key]): [string, PsdKeyName][] =>
		isKeyName(name) ? [[key, name]] : [],
	),
);

/** Readable name of a record key, or undefined for keys outside the table. */
export const keyName = (key: string): PsdKeyName | undefined =>
	KEY_NAMES.get(key);

// ─── Blend modes ────────────────────────────────────────────────────────────

export const PsdBlendMode = {
	PASS_THROUGH: "pass",
	NORMAL: "norm",
	DISSOLVE: "diss",
	DARKEN: "dark",
	MULTIPLY: "mul ",
	COLOR_BURN: "idiv",
	LINEAR_BURN: "lbrn",
	DARKER_COLOR: "dkCl",
	LIGHTEN: "lite",
	SCREEN: "scrn",
	COLOR_DODGE: "div ",
	LINEAR_DODGE: "lddg",
	LIGHTER_COLOR: "lgCl",
	OVERLAY: "over",
	SOFT_LIGHT: "sLit",
	HARD_LIGHT: "hLit",
	VIVID_LIGHT: "vLit",
	LINEAR_LIGHT: "lLit",
	PIN_LIGHT: "pLit",
	HARD_MIX: "hMix",
	DIFFERENCE: "diff",
	EXCLUSION: "smud",
	SUBTRACT: "fsub",
	DIVIDE: "fdiv",
	HUE: "hue ",
	SATURATION: "sat ",
	COLOR: "colr",
	LUMINOSITY: "lum ",
} as const;

// ─── Enumerations ───────────────────────────────────────────────────────────

export const PsdColorSpace = {
	DUMMY: -1,
	RGB: 0,
	HSB: 1,
	CMYK: 2,
	PANTONE: 3,
	FOCOLTONE: 4,
	TRUMATCH: 5,
	TOYO: 6,
	LAB: 7,
	GRAY: 8,
	WIDE_CMYK: 9,
	HKS: 10,
	DIC: 11,
	TOTAL_INK: 12,
	MONITOR_RGB: 13,
	DUOTONE: 14,
	OPACITY: 15,
	WEB: 16,
	GRAY_FLOAT: 17,
	RGB_FLOAT: 18,
	OPACITY_FLOAT: 19,
} as const;

export const PsdImageMode = {
	BITMAP: 0,
	GRAYSCALE: 1,
	INDEXED: 2,
	RGB: 3,
	CMYK: 4,
	MULTICHANNEL: 7,
	DUOTONE: 8,
	LAB: 9,
} as const;

/** Non-negative ids are color planes; negative ids are masks. */
export const PsdChannelId = {
	TRANSPARENCY_MASK: -1,
	USER_LAYER_MASK: -2,
	REAL_USER_LAYER_MASK: -3,
} as const;

export const PsdClipping = {
	BASE: 0,
	NON_BASE: 1,
} as const;

export const PsdLayerFlags = {
	TRANSPARENCY_PROTECTED: 1,
	VISIBLE: 2,
	OBSOLETE: 4,
	PHOTOSHOP5: 8,
	IRRELEVANT: 16,
} as const;

export const PsdLayerMaskFlags = {
	RELATIVE: 1,
	DISABLED: 2,
	INVERT: 4,
	RENDERED: 8,
	APPLIED: 16,
} as const;

export const PsdLayerMaskParameterFlags = {
	USER_DENSITY: 1,
	USER_FEATHER: 2,
	VECTOR_DENSITY: 4,
	VECTOR_FEATHER: 8,
} as const;

export const PsdSectionDividerType = {
	OTHER: 0,
	OPEN_FOLDER: 1,
	CLOSED_FOLDER: 2,
	BOUNDING_SECTION_DIVIDER: 3,
} as const;

export const PsdSheetColor = {
	NONE: 0,
	RED: 1,
	ORANGE: 2,
	YELLOW: 3,
	GREEN: 4,
	BLUE: 5,
	VIOLET: 6,
	GRAY: 7,
} as const;
