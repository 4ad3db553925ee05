import type { ByteOrder } from "../binary/format.ts";

// ─── Sample types ───────────────────────────────────────────────────────────

export type PsdSampleType = "uint8" | "uint16" | "float32";

export type PsdPlaneData = Uint8Array | Uint16Array | Float32Array;

/** Row-major 2-D raster plane. */
export type PsdPlane = {
	readonly height: number;
	readonly width: number;
	readonly data: PsdPlaneData;
};

export type PsdShape = { readonly height: number; readonly width: number };

export const SAMPLE_BYTES: Readonly<Record<PsdSampleType, number>> = {
	uint8: 1,
	uint16: 2,
	float32: 4,
};

// ─── Compression kinds ──────────────────────────────────────────────────────

export type PsdCompression = "raw" | "rle" | "zip" | "zipPredicted";

export const COMPRESSION_ID_TO_TYPE: Readonly<Record<number, PsdCompression>> =
	{
		0: "raw",
		1: "rle",
		2: "zip",
		3: "zipPredicted",
	};

export const COMPRESSION_TYPE_TO_ID: Readonly<Record<PsdCompression, number>> =
	{
		raw: 0,
		rle: 1,
		zip: 2,
		zipPredicted: 3,
	};

/** How the per-scanline RLE byte counts are stored. */
export type RleCounts = {
	readonly width: 2 | 4;
	readonly byteOrder: ByteOrder;
};
