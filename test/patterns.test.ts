import { describe, expect, it } from "vitest";
import {
	BE32BIT,
	BE64BIT,
	createByteReader,
	createByteWriter,
	DecodeError,
	EncodeError,
	LE32BIT,
	LE64BIT,
	type PsdFormat,
} from "../src/binary/index.ts";
import { createPlane } from "../src/compression/index.ts";
import { createMemoryLogger } from "../src/log.ts";
import {
	equalStructures,
	type PsdPattern,
	type PsdPatterns,
	type PsdStructure,
	PsdImageMode,
	readContext,
	readStructures,
	writeContext,
	writeStructures,
} from "../src/tagged/index.ts";

const FORMATS: readonly PsdFormat[] = [BE32BIT, LE32BIT, BE64BIT, LE64BIT];

const encode = (format: PsdFormat, structure: PsdStructure): Buffer => {
	const w = createByteWriter();
	writeStructures(w, format, [structure], writeContext(), 4);
	return w.toBuffer();
};

const decode = (format: PsdFormat, bytes: Buffer): PsdStructure[] =>
	readStructures(
		createByteReader(bytes),
		format,
		bytes.length,
		readContext({ logger: createMemoryLogger() }),
		4,
	);

const RECT = { top: 0, left: 0, bottom: 1, right: 2 };

const tiny: PsdPattern = {
	imageMode: PsdImageMode.RGB,
	height: 1,
	width: 2,
	name: "P",
	id: "id",
	rect: RECT,
	channels: [
		{
			depth: 8,
			rect: RECT,
			compression: "raw",
			plane: { height: 1, width: 2, data: new Uint8Array([7, 9]) },
		},
		null,
		null,
	],
};

const indexed = (): PsdPattern => {
	const rect = { top: 0, left: 0, bottom: 3, right: 4 };
	const color = createPlane({ height: 3, width: 4 }, "uint16");
	for (let i = 0; i < color.data.length; i++) color.data[i] = i * 1000;
	const sheet = createPlane({ height: 3, width: 4 }, "uint8");
	sheet.data.fill(200);
	return {
		imageMode: PsdImageMode.INDEXED,
		height: 3,
		width: 4,
		name: "Kachel",
		id: "b1e2c3d4-test",
		colorTable: new Uint8Array(768).map((_, i) => i % 256),
		rect,
		channels: [
			{ depth: 16, rect, compression: "rle", plane: color },
			null,
			{ depth: 8, rect, compression: "zip", plane: sheet },
		],
	};
};

describe("patterns", () => {
	it("lays out one pattern as nested length blocks", () => {
		const patterns: PsdPatterns = { type: "patterns", key: "Patt", patterns: [tiny] };
		const bytes = encode(BE32BIT, patterns);
		expect(bytes.toString("latin1", 0, 8)).toBe("8BIMPatt");
		expect(bytes.readUInt32BE(8)).toBe(96);
		// Pattern length, then version 1 and image mode 3.
		expect(bytes.readUInt32BE(12)).toBe(90);
		expect(bytes.readUInt32BE(16)).toBe(1);
		expect(bytes.readUInt32BE(20)).toBe(3);
		expect(bytes.length).toBe(108);
	});

	for (const format of FORMATS) {
		it(`restores patterns under ${format.name}`, () => {
			const patterns: PsdPatterns = {
				type: "patterns",
				key: "Pat2",
				patterns: [tiny, indexed()],
			};
			const [decoded] = decode(format, encode(format, patterns));
			if (decoded?.type !== "patterns") throw new Error("expected patterns");
			expect(decoded.patterns).toHaveLength(2);
			expect(decoded.patterns[1]?.name).toBe("Kachel");
			expect(decoded.patterns[1]?.channels[1]).toBeNull();
			expect(decoded.patterns[1]?.colorTable?.[255]).toBe(255);
			expect(decoded.patterns[0]?.colorTable).toBeUndefined();
			expect(equalStructures(decoded, patterns)).toBe(true);
		});
	}

	it("keeps arrays written with zero length apart from absent ones", () => {
		const pattern: PsdPattern = { ...tiny, channels: [{ empty: true }, null, null] };
		const bytes = encode(BE32BIT, { type: "patterns", key: "Patt", patterns: [pattern] });
		// Written flag and zero length for the first array.
		expect(bytes.readUInt32BE(65)).toBe(1);
		expect(bytes.readUInt32BE(69)).toBe(0);
		expect(bytes.readUInt32BE(73)).toBe(0);
		const [decoded] = decode(BE32BIT, bytes);
		if (decoded?.type !== "patterns") throw new Error("expected patterns");
		expect(decoded.patterns[0]?.channels).toEqual([{ empty: true }, null, null]);
		expect(encode(BE32BIT, decoded).equals(bytes)).toBe(true);
		const absent: PsdPatterns = {
			type: "patterns",
			key: "Patt",
			patterns: [{ ...tiny, channels: [null, null, null] }],
		};
		expect(equalStructures(decoded, absent)).toBe(false);
	});

	it("rejects a depth that does not match the samples", () => {
		const [color] = tiny.channels;
		if (!color || "empty" in color) throw new Error("missing channel");
		const pattern: PsdPattern = { ...tiny, channels: [{ ...color, depth: 16 }, null, null] };
		expect(() =>
			encode(BE32BIT, { type: "patterns", key: "Patt", patterns: [pattern] }),
		).toThrow(EncodeError);
	});

	it("rejects a pattern without mask entries", () => {
		const pattern: PsdPattern = { ...tiny, channels: [null] };
		expect(() =>
			encode(BE32BIT, { type: "patterns", key: "Patt", patterns: [pattern] }),
		).toThrow(EncodeError);
	});

	it("rejects an unsupported pattern version", () => {
		const bytes = encode(BE32BIT, { type: "patterns", key: "Patt", patterns: [tiny] });
		bytes.writeUInt32BE(2, 16);
		expect(() => decode(BE32BIT, bytes)).toThrow(DecodeError);
	});
});
