import { describe, expect, it } from "vitest";
import {
	BE32BIT,
	BE64BIT,
	createByteWriter,
	FormatError,
	LE32BIT,
	LE64BIT,
	type PsdFormat,
} from "../src/binary/index.ts";
import type { PsdCompression } from "../src/compression/index.ts";
import {
	emptyImageSourceData,
	equalImageSourceData,
	imageSourceDataTag,
	type PsdImageSourceData,
	readImageSourceData,
	writeImageSourceData,
} from "../src/document/index.ts";
import { psdChannel, psdLayer, psdLayers } from "../src/layers/index.ts";
import { createMemoryLogger } from "../src/log.ts";
import { writeContext, writeStructures } from "../src/tagged/index.ts";

const FORMATS: readonly PsdFormat[] = [BE32BIT, LE32BIT, BE64BIT, LE64BIT];
const COMPRESSIONS: readonly PsdCompression[] = ["raw", "rle", "zip", "zipPredicted"];

const LITERAL = "Adobe Photoshop Document Data Block\0";

const sampleDocument = (): PsdImageSourceData => {
	const rect = { top: 3, left: 4, bottom: 8, right: 10 };
	const maskRect = { top: 0, left: 0, bottom: 2, right: 2 };
	const red = psdChannel(0, rect);
	for (let i = 0; i < red.plane.data.length; i++) red.plane.data[i] = (i * 7) % 256;
	const alpha = psdChannel(-1, rect);
	alpha.plane.data.fill(255);
	const mask = psdChannel(-2, maskRect);
	mask.plane.data.fill(128);

	const deep = psdChannel(0, rect, "float32");
	for (let i = 0; i < deep.plane.data.length; i++) deep.plane.data[i] = i / 8;

	return {
		format: BE32BIT,
		layers: psdLayers(
			[
				psdLayer({
					name: "Hintergrund",
					rect,
					channels: [alpha, red, mask],
					mask: { rect: maskRect, defaultColor: 0, flags: 0, userMaskDensity: 180 },
					info: [
						{ type: "unicodeString", key: "luni", value: "Hintergrund" },
						{ type: "integer", key: "lyid", value: 2 },
					],
				}),
				psdLayer({ name: "leer", rect: { top: 0, left: 0, bottom: 0, right: 0 } }),
			],
			"Layr",
			true,
		),
		userMask: {
			type: "userMask",
			key: "LMsk",
			colorSpace: 0,
			components: [0, 65535, 0, 0],
			opacity: 60,
			flag: 128,
		},
		info: [
			psdLayers([psdLayer({ rect, channels: [deep] })], "Lr32"),
			{ type: "boolean", key: "knko", value: false },
		],
	};
};

describe("readImageSourceData", () => {
	it("rejects data without the leading literal", () => {
		expect(() => readImageSourceData(Buffer.from("Not a document data block"))).toThrow(
			FormatError,
		);
	});

	it("rejects an unknown format signature", () => {
		expect(() => readImageSourceData(Buffer.from(`${LITERAL}ABCD`, "latin1"))).toThrow(
			FormatError,
		);
	});

	it("reads the bare literal as an empty document", () => {
		const logger = createMemoryLogger();
		const doc = readImageSourceData(Buffer.from(LITERAL, "latin1"), { logger, name: "a.tif" });
		expect(doc.name).toBe("a.tif");
		expect(doc.format).toBe(BE32BIT);
		expect(doc.layers.layers).toEqual([]);
		expect(doc.info).toEqual([]);
		expect(logger.messages).toEqual([]);
		expect(equalImageSourceData(doc, emptyImageSourceData())).toBe(true);
	});

	it("warns and substitutes defaults for a missing layer list and user mask", () => {
		const w = createByteWriter();
		w.write(Buffer.from(LITERAL, "latin1"));
		writeStructures(w, LE32BIT, [{ type: "integer", key: "lyid", value: 5 }], writeContext(), 4);
		const logger = createMemoryLogger();
		const doc = readImageSourceData(w.toBuffer(), { logger });
		expect(doc.format).toBe(LE32BIT);
		expect(doc.info).toEqual([{ type: "integer", key: "lyid", value: 5 }]);
		expect(doc.userMask).toEqual(emptyImageSourceData().userMask);
		expect(logger.messages).toEqual([
			"Document data block has no layer list",
			"Document data block has no user mask",
		]);
	});
});

describe("writeImageSourceData", () => {
	it("starts with the literal and the format signature", () => {
		const bytes = writeImageSourceData(emptyImageSourceData(BE64BIT));
		expect(bytes.toString("latin1", 0, LITERAL.length)).toBe(LITERAL);
		expect(bytes.toString("latin1", LITERAL.length, LITERAL.length + 8)).toBe("8B64Layr");
	});

	for (const format of FORMATS) {
		for (const compression of COMPRESSIONS) {
			it(`round-trips under ${format.name} with ${compression}`, () => {
				const doc = sampleDocument();
				const bytes = writeImageSourceData(doc, { format, compression });
				const decoded = readImageSourceData(bytes, { logger: createMemoryLogger() });
				expect(decoded.format).toBe(format);
				expect(equalImageSourceData(decoded, doc)).toBe(true);
				const channels = decoded.layers.layers.flatMap((layer) => layer.channels);
				expect(channels.map((c) => c.compression)).toEqual([
					compression,
					compression,
					compression,
				]);
			});
		}
	}

	it("keeps the first layer list separate from later ones", () => {
		const bytes = writeImageSourceData(sampleDocument());
		const decoded = readImageSourceData(bytes, { logger: createMemoryLogger() });
		expect(decoded.layers.key).toBe("Layr");
		expect(decoded.layers.hasTransparency).toBe(true);
		expect(decoded.info.map((s) => s.key)).toEqual(["Lr32", "knko"]);
	});

	it("keeps each channel's own compression without an override", () => {
		const doc = sampleDocument();
		const decoded = readImageSourceData(writeImageSourceData(doc), {
			logger: createMemoryLogger(),
		});
		const channels = decoded.layers.layers.flatMap((layer) => layer.channels);
		expect(channels.map((c) => c.compression)).toEqual(["raw", "raw", "raw"]);
	});

	it("drops unknown records when changing format", () => {
		const w = createByteWriter();
		w.write(Buffer.from(LITERAL, "latin1"));
		w.write(Buffer.from("8BIMzzzz", "latin1"));
		w.write(Buffer.from([0, 0, 0, 4, 1, 2, 3, 4]));
		const read = readImageSourceData(w.toBuffer(), { logger: createMemoryLogger() });
		expect(read.info.map((s) => s.type)).toEqual(["unknown"]);

		const logger = createMemoryLogger();
		const bytes = writeImageSourceData(read, { format: LE64BIT, logger });
		expect(logger.messages).toEqual([
			'Dropped record "zzzz": read as BE32BIT, writing LE64BIT',
		]);
		const decoded = readImageSourceData(bytes, { logger: createMemoryLogger() });
		expect(decoded.info).toEqual([]);
	});

	it("builds the container tag entry", () => {
		const doc = sampleDocument();
		const [tag, type, count, bytes, once] = imageSourceDataTag(doc, { compression: "rle" });
		expect(tag).toBe(37724);
		expect(type).toBe(7);
		expect(count).toBe(bytes.length);
		expect(bytes.equals(writeImageSourceData(doc, { compression: "rle" }))).toBe(true);
		expect(once).toBe(true);
	});
});

describe("equalImageSourceData", () => {
	it("ignores name and format", () => {
		const doc = sampleDocument();
		expect(equalImageSourceData({ ...doc, name: "x", format: LE64BIT }, doc)).toBe(true);
	});

	it("detects a changed user mask", () => {
		const doc = sampleDocument();
		const changed: PsdImageSourceData = { ...doc, userMask: { ...doc.userMask, opacity: 61 } };
		expect(equalImageSourceData(changed, doc)).toBe(false);
	});
});
