import { describe, expect, it } from "vitest";
import {
	createPlane,
	decodePackBits,
	decodePlane,
	deltaDecode,
	deltaEncode,
	encodePackBits,
	encodePlane,
	floatPredictDecode,
	floatPredictEncode,
	type PsdCompression,
	type PsdPlane,
	type PsdSampleType,
	type RleCounts,
	samplesToBytes,
} from "../src/compression/index.ts";
import { DecodeError, EncodeError } from "../src/binary/index.ts";

const BIG_2: RleCounts = { width: 2, byteOrder: "big" };
const LITTLE_4: RleCounts = { width: 4, byteOrder: "little" };

const COMPRESSIONS: readonly PsdCompression[] = ["raw", "rle", "zip", "zipPredicted"];
const TYPES: readonly PsdSampleType[] = ["uint8", "uint16", "float32"];

const gradient = (type: PsdSampleType, height: number, width: number): PsdPlane => {
	const plane = createPlane({ height, width }, type);
	for (let i = 0; i < plane.data.length; i++) {
		plane.data[i] = type === "float32" ? i * 0.25 - 3.5 : (i * 37) % 251;
	}
	return plane;
};

describe("PackBits", () => {
	it("encodes runs and literals", () => {
		const src = Buffer.from([1, 2, 3, 7, 7, 7, 7]);
		expect([...encodePackBits(src)]).toEqual([2, 1, 2, 3, 253, 7]);
	});

	it("decodes runs and literals", () => {
		const out = Buffer.alloc(7);
		expect(decodePackBits(Buffer.from([2, 1, 2, 3, 253, 7]), out)).toBe(7);
		expect([...out]).toEqual([1, 2, 3, 7, 7, 7, 7]);
	});

	it("skips the no-op header", () => {
		const out = Buffer.alloc(2);
		expect(decodePackBits(Buffer.from([128, 1, 9, 9]), out)).toBe(2);
		expect([...out]).toEqual([9, 9]);
	});

	it("splits runs longer than 128 bytes", () => {
		const encoded = encodePackBits(Buffer.alloc(130, 5));
		expect([...encoded]).toEqual([129, 5, 1, 5, 5]);
	});
});

describe("predictors", () => {
	it("delta-encodes each row independently", () => {
		const samples = new Uint8Array([1, 3, 6, 10, 10, 9]);
		deltaEncode(samples, 2, 3);
		expect([...samples]).toEqual([1, 2, 3, 10, 0, 255]);
		deltaDecode(samples, 2, 3);
		expect([...samples]).toEqual([1, 3, 6, 10, 10, 9]);
	});

	it("wraps 16-bit deltas", () => {
		const samples = new Uint16Array([65535, 0]);
		deltaEncode(samples, 1, 2);
		expect([...samples]).toEqual([65535, 1]);
	});

	it("splits float rows into byte planes before differencing", () => {
		// Two samples: 0x3f800000 (1.0) and 0x40000000 (2.0).
		const bytes = Buffer.from([0x3f, 0x80, 0, 0, 0x40, 0, 0, 0]);
		const encoded = floatPredictEncode(bytes, 1, 2, 4);
		// Planes: [3f 40][80 00][00 00][00 00], then byte deltas.
		expect([...encoded]).toEqual([0x3f, 0x01, 0x40, 0x80, 0, 0, 0, 0]);
		expect([...floatPredictDecode(encoded, 1, 2, 4)]).toEqual([...bytes]);
	});
});

describe("encodePlane/decodePlane", () => {
	for (const type of TYPES) {
		for (const compression of COMPRESSIONS) {
			it(`restores ${type} samples with ${compression}`, () => {
				const plane = gradient(type, 5, 7);
				const encoded = encodePlane(plane, compression, BIG_2);
				const decoded = decodePlane(encoded, compression, plane, type, BIG_2);
				expect(decoded.height).toBe(5);
				expect(decoded.width).toBe(7);
				expect([...decoded.data]).toEqual([...plane.data]);
			});
		}
	}

	it("encodes empty planes to zero bytes and decodes them without input", () => {
		for (const compression of COMPRESSIONS) {
			const empty = createPlane({ height: 0, width: 4 }, "uint16");
			expect(encodePlane(empty, compression, BIG_2).length).toBe(0);
			const decoded = decodePlane(Buffer.alloc(0), compression, empty, "uint16", BIG_2);
			expect(decoded.data.length).toBe(0);
			expect(decoded.data).toBeInstanceOf(Uint16Array);
		}
	});

	it("stores raw samples big-endian", () => {
		const plane: PsdPlane = { height: 1, width: 2, data: new Uint16Array([1, 0x0203]) };
		expect([...encodePlane(plane, "raw", LITTLE_4)]).toEqual([0, 1, 2, 3]);
		expect([...samplesToBytes(new Float32Array([1]))]).toEqual([0x3f, 0x80, 0, 0]);
	});

	it("writes RLE counts in the requested width and byte order", () => {
		const plane: PsdPlane = { height: 2, width: 4, data: new Uint8Array(8).fill(9) };
		const encoded = encodePlane(plane, "rle", LITTLE_4);
		expect([...encoded]).toEqual([2, 0, 0, 0, 2, 0, 0, 0, 253, 9, 253, 9]);
		const decoded = decodePlane(encoded, "rle", plane, "uint8", LITTLE_4);
		expect([...decoded.data]).toEqual([9, 9, 9, 9, 9, 9, 9, 9]);
	});

	it("rejects a plane whose data does not match its shape", () => {
		const plane: PsdPlane = { height: 2, width: 2, data: new Uint8Array(3) };
		expect(() => encodePlane(plane, "raw", BIG_2)).toThrow(EncodeError);
	});

	it("rejects truncated raw data", () => {
		expect(() =>
			decodePlane(Buffer.alloc(3), "raw", { height: 2, width: 2 }, "uint8", BIG_2),
		).toThrow(DecodeError);
	});

	it("rejects invalid deflate streams", () => {
		expect(() =>
			decodePlane(Buffer.from([1, 2, 3]), "zip", { height: 1, width: 1 }, "uint8", BIG_2),
		).toThrow(DecodeError);
	});
});
