import type { PsdFormat } from "../binary/format.ts";
import type { ByteReader } from "../binary/reader.ts";
import type { ByteWriter } from "../binary/writer.ts";
import {
	PsdLayerMaskFlags,
	PsdLayerMaskParameterFlags,
} from "../tagged/constants.ts";
import { readRect, writeRect } from "../tagged/rect.ts";
import type { PsdLayerMask } from "../tagged/types.ts";

// ─── Layout ─────────────────────────────────────────────────────────────────
//
// u32 size, then (size 0 means no mask):
//   rect, u8 default color, u8 flags
//   [u8 parameter flags + parameters]   when flags has APPLIED
//   2 padding bytes                     when size is 20
//   u8 real flags, u8 real background, real rect   otherwise

const REAL_SIZE = 18;

type Parameters = Pick<
	PsdLayerMask,
	"userMaskDensity" | "userMaskFeather" | "vectorMaskDensity" | "vectorMaskFeather"
>;

const readParameters = (r: ByteReader, format: PsdFormat): Parameters => {
	const flags = r.u8();
	const { USER_DENSITY, USER_FEATHER, VECTOR_DENSITY, VECTOR_FEATHER } =
		PsdLayerMaskParameterFlags;
	return {
		...(flags & USER_DENSITY ? { userMaskDensity: r.u8() } : {}),
		...(flags & USER_FEATHER ? { userMaskFeather: format.read.float64(r) } : {}),
		...(flags & VECTOR_DENSITY ? { vectorMaskDensity: r.u8() } : {}),
		...(flags & VECTOR_FEATHER
			? { vectorMaskFeather: format.read.float64(r) }
			: {}),
	};
};

/** Parameter flags implied by which optional fields are set. */
export const maskParameterFlags = (mask: PsdLayerMask): number => {
	const { USER_DENSITY, USER_FEATHER, VECTOR_DENSITY, VECTOR_FEATHER } =
		PsdLayerMaskParameterFlags;
	return (
		(mask.userMaskDensity !== undefined ? USER_DENSITY : 0) |
		(mask.userMaskFeather !== undefined ? USER_FEATHER : 0) |
		(mask.vectorMaskDensity !== undefined ? VECTOR_DENSITY : 0) |
		(mask.vectorMaskFeather !== undefined ? VECTOR_FEATHER : 0)
	);
};

export const hasRealMask = (mask: PsdLayerMask): boolean =>
	mask.realFlags !== undefined ||
	mask.realBackground !== undefined ||
	mask.realRect !== undefined;

// ─── Read ───────────────────────────────────────────────────────────────────

export const readLayerMask = (
	r: ByteReader,
	format: PsdFormat,
): PsdLayerMask | undefined => {
	const size = format.read.uint32(r);
	if (size === 0) return undefined;
	const start = r.tell();

	const rect = readRect(format, r);
	const defaultColor = r.u8();
	const flags = r.u8();
	const parameters =
		flags & PsdLayerMaskFlags.APPLIED && size > 20 ? readParameters(r, format) : {};

	let mask: PsdLayerMask = { rect, defaultColor, flags, ...parameters };
	if (size !== 20 && r.tell() - start + REAL_SIZE <= size) {
		const realFlags = r.u8();
		const realBackground = r.u8();
		const realRect = readRect(format, r);
		mask = { ...mask, realFlags, realBackground, realRect };
	}
	r.seek(start + size);
	return mask;
};

// ─── Write ──────────────────────────────────────────────────────────────────

/** Writes the size-prefixed mask; an absent mask or rectangle writes size 0. */
export const writeLayerMask = (
	w: ByteWriter,
	format: PsdFormat,
	mask: PsdLayerMask | undefined,
): void => {
	if (mask?.rect === undefined) {
		format.write.uint32(w, 0);
		return;
	}
	const parameterFlags = maskParameterFlags(mask);
	const extended = parameterFlags !== 0 || hasRealMask(mask);
	const flags = parameterFlags
		? mask.flags | PsdLayerMaskFlags.APPLIED
		: mask.flags & ~PsdLayerMaskFlags.APPLIED;

	const sizeAt = w.tell();
	format.write.uint32(w, 0);
	const start = w.tell();

	writeRect(format, w, mask.rect);
	w.u8(mask.defaultColor);
	w.u8(flags);
	if (!extended) {
		w.zeros(2);
	} else {
		if (parameterFlags) {
			w.u8(parameterFlags);
			if (mask.userMaskDensity !== undefined) w.u8(mask.userMaskDensity);
			if (mask.userMaskFeather !== undefined) {
				format.write.float64(w, mask.userMaskFeather);
			}
			if (mask.vectorMaskDensity !== undefined) w.u8(mask.vectorMaskDensity);
			if (mask.vectorMaskFeather !== undefined) {
				format.write.float64(w, mask.vectorMaskFeather);
			}
		}
		w.u8(mask.realFlags ?? 0);
		w.u8(mask.realBackground ?? 0);
		writeRect(format, w, mask.realRect ?? mask.rect);
	}

	const end = w.tell();
	w.seek(sizeAt);
	format.write.uint32(w, end - start);
	w.seek(end);
};
