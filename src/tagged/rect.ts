import { type PsdFormat, pack, unpack } from "../binary/format.ts";
import type { ByteReader } from "../binary/reader.ts";
import type { ByteWriter } from "../binary/writer.ts";
import type { PsdShape } from "../compression/types.ts";
import type { PsdRectangle } from "./types.ts";

export const EMPTY_RECT: PsdRectangle = { top: 0, left: 0, bottom: 0, right: 0 };

/** Top, left, bottom, right as four int32. */
export const readRect = (format: PsdFormat, r: ByteReader): PsdRectangle => {
	const [top = 0, left = 0, bottom = 0, right = 0] = unpack(format, r, "4i");
	return { top, left, bottom, right };
};

export const writeRect = (
	format: PsdFormat,
	w: ByteWriter,
	rect: PsdRectangle,
): void => pack(format, w, "4i", [rect.top, rect.left, rect.bottom, rect.right]);

/** Inverted rectangles have an empty shape. */
export const rectShape = (rect: PsdRectangle): PsdShape => ({
	height: Math.max(0, rect.bottom - rect.top),
	width: Math.max(0, rect.right - rect.left),
});

export const equalRect = (
	a: PsdRectangle | undefined,
	b: PsdRectangle | undefined,
): boolean =>
	a === b ||
	(a !== undefined &&
		b !== undefined &&
		a.top === b.top &&
		a.left === b.left &&
		a.bottom === b.bottom &&
		a.right === b.right);
