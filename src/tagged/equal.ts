import { sampleTypeOf } from "../compression/compression.ts";
import type { PsdPlane } from "../compression/types.ts";
import { hasRealMask, maskParameterFlags } from "../layers/mask.ts";
import { PsdLayerMaskFlags } from "./constants.ts";
import { equalRect } from "./rect.ts";
import type {
	PsdChannel,
	PsdLayer,
	PsdLayerMask,
	PsdPattern,
	PsdPatternChannel,
	PsdStructure,
} from "./types.ts";

// ─── Primitives ─────────────────────────────────────────────────────────────

const equalBytes = (a: Uint8Array, b: Uint8Array): boolean =>
	Buffer.from(a.buffer, a.byteOffset, a.byteLength).equals(
		Buffer.from(b.buffer, b.byteOffset, b.byteLength),
	);

const equalList = <T>(
	a: readonly T[],
	b: readonly T[],
	equal: (x: T, y: T) => boolean,
): boolean =>
	a.length === b.length &&
	a.every((x, i) => {
		const y = b[i];
		return y !== undefined && equal(x, y);
	});

const equalNumbers = (a: readonly number[], b: readonly number[]): boolean =>
	equalList(a, b, Object.is);

/** Planes compare by shape, sample type and sample bytes. */
export const equalPlanes = (a: PsdPlane, b: PsdPlane): boolean =>
	a.height === b.height &&
	a.width === b.width &&
	sampleTypeOf(a.data) === sampleTypeOf(b.data) &&
	equalBytes(
		new Uint8Array(a.data.buffer, a.data.byteOffset, a.data.byteLength),
		new Uint8Array(b.data.buffer, b.data.byteOffset, b.data.byteLength),
	);

// ─── Layers ─────────────────────────────────────────────────────────────────

const equalChannels = (a: PsdChannel, b: PsdChannel): boolean =>
	a.id === b.id && equalPlanes(a.plane, b.plane);

/**
 * Masks as they read back: the APPLIED bit tracks the parameter fields and
 * an extended mask always carries its real-mask trailer.
 */
const normalizeMask = (
	mask: PsdLayerMask | undefined,
): PsdLayerMask | undefined => {
	if (mask?.rect === undefined) return undefined;
	const extended = maskParameterFlags(mask) !== 0 || hasRealMask(mask);
	return {
		...mask,
		flags: mask.flags & ~PsdLayerMaskFlags.APPLIED,
		...(extended
			? {
					realFlags: mask.realFlags ?? 0,
					realBackground: mask.realBackground ?? 0,
					realRect: mask.realRect ?? mask.rect,
				}
			: {}),
	};
};

export const equalMasks = (
	a: PsdLayerMask | undefined,
	b: PsdLayerMask | undefined,
): boolean => {
	const x = normalizeMask(a);
	const y = normalizeMask(b);
	if (x === undefined || y === undefined) return x === y;
	return (
		equalRect(x.rect, y.rect) &&
		x.defaultColor === y.defaultColor &&
		x.flags === y.flags &&
		x.userMaskDensity === y.userMaskDensity &&
		Object.is(x.userMaskFeather, y.userMaskFeather) &&
		x.vectorMaskDensity === y.vectorMaskDensity &&
		Object.is(x.vectorMaskFeather, y.vectorMaskFeather) &&
		x.realFlags === y.realFlags &&
		x.realBackground === y.realBackground &&
		equalRect(x.realRect, y.realRect)
	);
};

/** Names are display labels, stored lossily as Mac Roman; not compared. */
export const equalLayers = (a: PsdLayer, b: PsdLayer): boolean =>
	equalRect(a.rect, b.rect) &&
	a.opacity === b.opacity &&
	a.blendMode === b.blendMode &&
	a.clipping === b.clipping &&
	a.flags === b.flags &&
	equalNumbers(a.blendingRanges, b.blendingRanges) &&
	equalMasks(a.mask, b.mask) &&
	equalList(a.channels, b.channels, equalChannels) &&
	equalStructureLists(a.info, b.info);

// ─── Patterns ───────────────────────────────────────────────────────────────

const equalArrays = (a: PsdPatternChannel, b: PsdPatternChannel): boolean => {
	if (a === null || b === null) return a === b;
	if ("empty" in a || "empty" in b) return "empty" in a && "empty" in b;
	return (
		a.depth === b.depth &&
		equalRect(a.rect, b.rect) &&
		equalPlanes(a.plane, b.plane)
	);
};

const equalPatterns = (a: PsdPattern, b: PsdPattern): boolean =>
	a.imageMode === b.imageMode &&
	a.height === b.height &&
	a.width === b.width &&
	a.name === b.name &&
	a.id === b.id &&
	(a.colorTable === undefined || b.colorTable === undefined
		? a.colorTable === b.colorTable
		: equalBytes(a.colorTable, b.colorTable)) &&
	equalRect(a.rect, b.rect) &&
	equalList(a.channels, b.channels, equalArrays);

// ─── Structures ─────────────────────────────────────────────────────────────

/** Structural equality; compression kinds and source formats are not compared. */
export const equalStructures = (a: PsdStructure, b: PsdStructure): boolean => {
	if (a.key !== b.key) return false;
	switch (a.type) {
		case "empty":
			return b.type === "empty";
		case "unknown":
			return b.type === "unknown" && equalBytes(a.data, b.data);
		case "string":
			return b.type === "string" && a.value === b.value;
		case "unicodeString":
			return b.type === "unicodeString" && a.value === b.value;
		case "word":
			return b.type === "word" && a.value === b.value;
		case "boolean":
			return b.type === "boolean" && a.value === b.value;
		case "integer":
			return b.type === "integer" && a.value === b.value;
		case "exposure":
			return (
				b.type === "exposure" &&
				a.version === b.version &&
				Object.is(a.exposure, b.exposure) &&
				Object.is(a.offset, b.offset) &&
				Object.is(a.gamma, b.gamma)
			);
		case "referencePoint":
			return (
				b.type === "referencePoint" && Object.is(a.x, b.x) && Object.is(a.y, b.y)
			);
		case "sectionDivider":
			return (
				b.type === "sectionDivider" &&
				a.kind === b.kind &&
				a.blendMode === b.blendMode &&
				a.subtype === b.subtype
			);
		case "sheetColor":
			return b.type === "sheetColor" && a.color === b.color;
		case "metadataSettings":
			return (
				b.type === "metadataSettings" &&
				equalList(
					a.items,
					b.items,
					(x, y) =>
						x.key === y.key &&
						x.copyOnSheetDuplication === y.copyOnSheetDuplication &&
						equalBytes(x.data, y.data),
				)
			);
		case "patterns":
			return (
				b.type === "patterns" && equalList(a.patterns, b.patterns, equalPatterns)
			);
		case "textEngineData":
			return b.type === "textEngineData" && equalBytes(a.data, b.data);
		case "layers":
			return (
				b.type === "layers" &&
				a.hasTransparency === b.hasTransparency &&
				equalList(a.layers, b.layers, equalLayers)
			);
		case "userMask":
			return (
				b.type === "userMask" &&
				a.colorSpace === b.colorSpace &&
				equalNumbers(a.components, b.components) &&
				a.opacity === b.opacity &&
				a.flag === b.flag
			);
		case "filterMask":
			return (
				b.type === "filterMask" &&
				a.colorSpace === b.colorSpace &&
				equalNumbers(a.components, b.components) &&
				a.opacity === b.opacity
			);
	}
};

export const equalStructureLists = (
	a: readonly PsdStructure[],
	b: readonly PsdStructure[],
): boolean => equalList(a, b, equalStructures);
