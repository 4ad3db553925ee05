import macRoman from "./macRoman.json";
import { decodeUtf16, encodeUtf16, type PsdFormat } from "./format.ts";
import type { ByteReader } from "./reader.ts";
import type { ByteWriter } from "./writer.ts";

// ─── Mac Roman ──────────────────────────────────────────────────────────────

const HIGH_HALF: readonly number[] = macRoman.codePoints;

const ENCODE_HIGH: ReadonlyMap<number, number> = new Map(
	HIGH_HALF.map((codePoint, i) => [codePoint, 0x80 + i]),
);

export const decodeMacRoman = (bytes: Uint8Array): string => {
	let out = "";
	for (const byte of bytes) {
		out += String.fromCodePoint(
			byte < 0x80 ? byte : (HIGH_HALF[byte - 0x80] ?? 0x3f),
		);
	}
	return out;
};

/** Characters outside Mac Roman become "?". */
export const encodeMacRoman = (value: string): Buffer => {
	const out: number[] = [];
	for (const char of value) {
		const codePoint = char.codePointAt(0) ?? 0x3f;
		out.push(codePoint < 0x80 ? codePoint : (ENCODE_HIGH.get(codePoint) ?? 0x3f));
	}
	return Buffer.from(out);
};

// ─── Pascal strings ─────────────────────────────────────────────────────────

export const readPascalString = (r: ByteReader): string => {
	const length = r.u8();
	return decodeMacRoman(r.bytes(length));
};

/** Writes at most 255 bytes; returns the number of bytes written. */
export const writePascalString = (w: ByteWriter, value: string): number => {
	const bytes = encodeMacRoman(value).subarray(0, 255);
	w.u8(bytes.length);
	w.write(bytes);
	return 1 + bytes.length;
};

/** Pascal string whose total length (prefix included) is padded to `alignment`. */
export const readPaddedPascalString = (
	r: ByteReader,
	alignment: number,
): string => {
	const start = r.tell();
	const value = readPascalString(r);
	const used = r.tell() - start;
	r.skip((alignment - (used % alignment)) % alignment);
	return value;
};

export const writePaddedPascalString = (
	w: ByteWriter,
	value: string,
	alignment: number,
): void => {
	const used = writePascalString(w, value);
	w.zeros((alignment - (used % alignment)) % alignment);
};

// ─── Unicode strings ────────────────────────────────────────────────────────

/** u32 count of UTF-16 code units, then the code units. */
export const readUnicodeString = (format: PsdFormat, r: ByteReader): string => {
	const count = format.read.uint32(r);
	return decodeUtf16(r.bytes(count * 2), format.byteOrder);
};

export const writeUnicodeString = (
	format: PsdFormat,
	w: ByteWriter,
	value: string,
): void => {
	format.write.uint32(w, value.length);
	w.write(encodeUtf16(value, format.byteOrder));
};

/** Big-endian unicode string, as used by image resource blocks. */
export const readUnicodeStringBE = (r: ByteReader): string => {
	const count = r.buffer.readUInt32BE(r.take(4));
	return decodeUtf16(r.bytes(count * 2), "big");
};

export const writeUnicodeStringBE = (w: ByteWriter, value: string): void => {
	const o = w.take(4);
	w.buffer().writeUInt32BE(value.length, o);
	w.write(encodeUtf16(value, "big"));
};
