import { describe, expect, it } from "vitest";
import {
	BE32BIT,
	BE64BIT,
	createByteReader,
	createByteWriter,
	DecodeError,
	decodeMacRoman,
	EncodeError,
	encodeMacRoman,
	FormatError,
	LE32BIT,
	LE64BIT,
	pack,
	psdFormat,
	readPaddedPascalString,
	readSize,
	readUnicodeString,
	rleCountWidth,
	sameFormat,
	sizeFieldWidth,
	stringEncoding,
	unpack,
	writePaddedPascalString,
	writeSize,
	writeUnicodeString,
} from "../src/binary/index.ts";

describe("psdFormat", () => {
	it("resolves formats by signature", () => {
		expect(psdFormat("8BIM")).toBe(BE32BIT);
		expect(psdFormat("MIB8")).toBe(LE32BIT);
		expect(psdFormat("8B64")).toBe(BE64BIT);
		expect(psdFormat("46B8")).toBe(LE64BIT);
	});

	it("resolves formats by name", () => {
		expect(psdFormat("LE64BIT").signature).toBe("46B8");
	});

	it("rejects unknown signatures", () => {
		expect(() => psdFormat("ABCD")).toThrow(FormatError);
	});

	it("compares formats by name", () => {
		expect(sameFormat(BE32BIT, psdFormat("8BIM"))).toBe(true);
		expect(sameFormat(BE32BIT, LE32BIT)).toBe(false);
	});

	it("selects string encoding from byte order", () => {
		expect(stringEncoding(BE64BIT)).toBe("utf-16be");
		expect(stringEncoding(LE32BIT)).toBe("utf-16le");
	});
});

describe("size fields", () => {
	it("uses 4 bytes under 32-bit formats", () => {
		expect(sizeFieldWidth(BE32BIT, "Layr")).toBe(4);
		expect(sizeFieldWidth(LE32BIT)).toBe(4);
	});

	it("widens only large-size keys under 64-bit formats", () => {
		expect(sizeFieldWidth(BE64BIT, "Layr")).toBe(8);
		expect(sizeFieldWidth(BE64BIT, "LMsk")).toBe(8);
		expect(sizeFieldWidth(BE64BIT, "luni")).toBe(4);
	});

	it("widens keyless sizes under 64-bit formats", () => {
		expect(sizeFieldWidth(LE64BIT)).toBe(8);
	});

	it("writes an 8-byte little-endian size", () => {
		const w = createByteWriter();
		writeSize(LE64BIT, w, 258, "Lr16");
		expect([...w.toBuffer()]).toEqual([2, 1, 0, 0, 0, 0, 0, 0]);
		expect(readSize(LE64BIT, createByteReader(w.toBuffer()), "Lr16")).toBe(258);
	});

	it("uses wider RLE counts under 64-bit formats", () => {
		expect(rleCountWidth(BE32BIT)).toBe(2);
		expect(rleCountWidth(LE64BIT)).toBe(4);
	});
});

describe("keys", () => {
	it("reverses keys under little-endian formats", () => {
		const w = createByteWriter();
		LE32BIT.write.key(w, "luni");
		expect(w.toBuffer().toString("latin1")).toBe("inul");
		expect(LE32BIT.read.key(createByteReader(w.toBuffer()))).toBe("luni");
	});

	it("keeps keys as they are under big-endian formats", () => {
		const w = createByteWriter();
		BE64BIT.write.key(w, "lsct");
		expect(w.toBuffer().toString("latin1")).toBe("lsct");
	});

	it("rejects keys that are not four bytes", () => {
		expect(() => BE32BIT.write.key(createByteWriter(), "abc")).toThrow(
			EncodeError,
		);
	});
});

describe("pack/unpack", () => {
	it("packs a layout in the format's byte order", () => {
		const w = createByteWriter();
		pack(LE32BIT, w, "hI", [-2, 1]);
		expect([...w.toBuffer()]).toEqual([0xfe, 0xff, 1, 0, 0, 0]);
	});

	it("unpacks repeated codes", () => {
		const bytes = Buffer.from([0, 0, 0, 1, 0, 0, 0, 2, 0xff, 0xff, 0xff, 0xff]);
		expect(unpack(BE32BIT, createByteReader(bytes), "3i")).toEqual([1, 2, -1]);
	});

	it("rejects a value count that does not match the layout", () => {
		expect(() => pack(BE32BIT, createByteWriter(), "2h", [1])).toThrow(
			EncodeError,
		);
	});

	it("fails on truncated input", () => {
		expect(() =>
			unpack(BE32BIT, createByteReader(Buffer.from([0, 1])), "i"),
		).toThrow(DecodeError);
	});
});

describe("strings", () => {
	it("maps Mac Roman high bytes", () => {
		expect(decodeMacRoman(Buffer.from([0x41, 0x80, 0xa5]))).toBe("AÄ•");
		expect([...encodeMacRoman("é")]).toEqual([0x8e]);
	});

	it("replaces characters outside Mac Roman", () => {
		expect(encodeMacRoman("a→b").toString("latin1")).toBe("a?b");
	});

	it("pads Pascal strings to the alignment", () => {
		const w = createByteWriter();
		writePaddedPascalString(w, "Layer", 4);
		expect(w.length()).toBe(8);
		const r = createByteReader(w.toBuffer());
		expect(readPaddedPascalString(r, 4)).toBe("Layer");
		expect(r.tell()).toBe(8);
	});

	it("pads the empty Pascal string to a full unit", () => {
		const w = createByteWriter();
		writePaddedPascalString(w, "", 4);
		expect([...w.toBuffer()]).toEqual([0, 0, 0, 0]);
	});

	it("writes unicode strings in the format's byte order", () => {
		const w = createByteWriter();
		writeUnicodeString(LE32BIT, w, "Hi");
		expect([...w.toBuffer()]).toEqual([2, 0, 0, 0, 0x48, 0, 0x69, 0]);
		expect(readUnicodeString(LE32BIT, createByteReader(w.toBuffer()))).toBe("Hi");
	});
});
