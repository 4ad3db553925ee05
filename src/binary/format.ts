import { DecodeError, EncodeError, FormatError } from "./errors.ts";
import type { ByteReader } from "./reader.ts";
import type { ByteWriter } from "./writer.ts";

// ─── Format ─────────────────────────────────────────────────────────────────

export type PsdFormatName = "BE32BIT" | "LE32BIT" | "BE64BIT" | "LE64BIT";

export type ByteOrder = "big" | "little";

export type StringEncoding = "utf-16be" | "utf-16le";

// ─── Format reader interface ────────────────────────────────────────────────

export type FormatReader = {
	readonly int16: (r: ByteReader) => number;
	readonly uint16: (r: ByteReader) => number;
	readonly int32: (r: ByteReader) => number;
	readonly uint32: (r: ByteReader) => number;
	readonly uint64: (r: ByteReader) => number;
	readonly float32: (r: ByteReader) => number;
	readonly float64: (r: ByteReader) => number;
	/** Four-character code; byte-reversed on the wire in little-endian files. */
	readonly key: (r: ByteReader) => string;
};

export type FormatWriter = {
	readonly int16: (w: ByteWriter, value: number) => void;
	readonly uint16: (w: ByteWriter, value: number) => void;
	readonly int32: (w: ByteWriter, value: number) => void;
	readonly uint32: (w: ByteWriter, value: number) => void;
	readonly uint64: (w: ByteWriter, value: number) => void;
	readonly float32: (w: ByteWriter, value: number) => void;
	readonly float64: (w: ByteWriter, value: number) => void;
	readonly key: (w: ByteWriter, value: string) => void;
};

/**
 * One of the four byte-order / size-width variants. A decoded tree is read
 * under exactly one of these and is re-encoded under exactly one.
 */
export type PsdFormat = {
	readonly name: PsdFormatName;
	/** Signature as it appears on the wire. */
	readonly signature: string;
	readonly byteOrder: ByteOrder;
	readonly is64Bit: boolean;
	readonly read: FormatReader;
	readonly write: FormatWriter;
};

// ─── Keys sized with 8 bytes in 64-bit files ────────────────────────────────

export const LARGE_SIZE_KEYS: ReadonlySet<string> = new Set([
	"LMsk",
	"Lr16",
	"Lr32",
	"Layr",
	"Mt16",
	"Mt32",
	"Mtrn",
	"Alph",
	"FMsk",
	"lnk2",
	"FEid",
	"FXid",
	"PxSD",
]);

// ─── Key helpers ────────────────────────────────────────────────────────────

const reverse = (value: string): string => [...value].reverse().join("");

const checkKey = (value: string): Buffer => {
	const bytes = Buffer.from(value, "latin1");
	if (bytes.length !== 4) {
		throw new EncodeError(`Key must be 4 bytes, got ${JSON.stringify(value)}`);
	}
	return bytes;
};

const toSafeNumber = (value: bigint): number => {
	if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw new DecodeError(`Size field ${value} exceeds the safe integer range`);
	}
	return Number(value);
};

// ─── Big-endian primitives ──────────────────────────────────────────────────

const bigEndianReader: FormatReader = {
	int16: (r) => r.buffer.readInt16BE(r.take(2)),
	uint16: (r) => r.buffer.readUInt16BE(r.take(2)),
	int32: (r) => r.buffer.readInt32BE(r.take(4)),
	uint32: (r) => r.buffer.readUInt32BE(r.take(4)),
	uint64: (r) => toSafeNumber(r.buffer.readBigUInt64BE(r.take(8))),
	float32: (r) => r.buffer.readFloatBE(r.take(4)),
	float64: (r) => r.buffer.readDoubleBE(r.take(8)),
	key: (r) => r.bytes(4).toString("latin1"),
};

const bigEndianWriter: FormatWriter = {
	int16: (w, value) => {
		const o = w.take(2);
		w.buffer().writeInt16BE(value, o);
	},
	uint16: (w, value) => {
		const o = w.take(2);
		w.buffer().writeUInt16BE(value, o);
	},
	int32: (w, value) => {
		const o = w.take(4);
		w.buffer().writeInt32BE(value, o);
	},
	uint32: (w, value) => {
		const o = w.take(4);
		w.buffer().writeUInt32BE(value, o);
	},
	uint64: (w, value) => {
		const o = w.take(8);
		w.buffer().writeBigUInt64BE(BigInt(value), o);
	},
	float32: (w, value) => {
		const o = w.take(4);
		w.buffer().writeFloatBE(value, o);
	},
	float64: (w, value) => {
		const o = w.take(8);
		w.buffer().writeDoubleBE(value, o);
	},
	key: (w, value) => w.write(checkKey(value)),
};

// ─── Little-endian primitives ───────────────────────────────────────────────

const littleEndianReader: FormatReader = {
	int16: (r) => r.buffer.readInt16LE(r.take(2)),
	uint16: (r) => r.buffer.readUInt16LE(r.take(2)),
	int32: (r) => r.buffer.readInt32LE(r.take(4)),
	uint32: (r) => r.buffer.readUInt32LE(r.take(4)),
	uint64: (r) => toSafeNumber(r.buffer.readBigUInt64LE(r.take(8))),
	float32: (r) => r.buffer.readFloatLE(r.take(4)),
	float64: (r) => r.buffer.readDoubleLE(r.take(8)),
	key: (r) => reverse(r.bytes(4).toString("latin1")),
};

const littleEndianWriter: FormatWriter = {
	int16: (w, value) => {
		const o = w.take(2);
		w.buffer().writeInt16LE(value, o);
	},
	uint16: (w, value) => {
		const o = w.take(2);
		w.buffer().writeUInt16LE(value, o);
	},
	int32: (w, value) => {
		const o = w.take(4);
		w.buffer().writeInt32LE(value, o);
	},
	uint32: (w, value) => {
		const o = w.take(4);
		w.buffer().writeUInt32LE(value, o);
	},
	uint64: (w, value) => {
		const o = w.take(8);
		w.buffer().writeBigUInt64LE(BigInt(value), o);
	},
	float32: (w, value) => {
		const o = w.take(4);
		w.buffer().writeFloatLE(value, o);
	},
	float64: (w, value) => {
		const o = w.take(8);
		w.buffer().writeDoubleLE(value, o);
	},
	key: (w, value) => w.write(checkKey(value).reverse()),
};

// ─── Format instances ───────────────────────────────────────────────────────

export const BE32BIT: PsdFormat = {
	name: "BE32BIT",
	signature: "8BIM",
	byteOrder: "big",
	is64Bit: false,
	read: bigEndianReader,
	write: bigEndianWriter,
};

export const LE32BIT: PsdFormat = {
	name: "LE32BIT",
	signature: "MIB8",
	byteOrder: "little",
	is64Bit: false,
	read: littleEndianReader,
	write: littleEndianWriter,
};

export const BE64BIT: PsdFormat = {
	name: "BE64BIT",
	signature: "8B64",
	byteOrder: "big",
	is64Bit: true,
	read: bigEndianReader,
	write: bigEndianWriter,
};

export const LE64BIT: PsdFormat = {
	name: "LE64BIT",
	signature: "46B8",
	byteOrder: "little",
	is64Bit: true,
	read: littleEndianReader,
	write: littleEndianWriter,
};

export const PSD_FORMATS: Readonly<Record<PsdFormatName, PsdFormat>> = {
	BE32BIT,
	LE32BIT,
	BE64BIT,
	LE64BIT,
};

const FORMATS_BY_SIGNATURE: ReadonlyMap<string, PsdFormat> = new Map(
	Object.values(PSD_FORMATS).map((format) => [format.signature, format]),
);

/** Resolve a format from its name or its on-wire signature. */
export const psdFormat = (nameOrSignature: PsdFormatName | string): PsdFormat => {
	const byName = Object.values(PSD_FORMATS).find(
		(format) => format.name === nameOrSignature,
	);
	if (byName) return byName;
	const bySignature = FORMATS_BY_SIGNATURE.get(nameOrSignature);
	if (bySignature) return bySignature;
	throw new FormatError(
		`Unrecognized format signature ${JSON.stringify(nameOrSignature)}`,
	);
};

export const sameFormat = (a: PsdFormat, b: PsdFormat): boolean =>
	a.name === b.name;

// ─── Size fields ────────────────────────────────────────────────────────────

/**
 * Width of a size field. Without a key (channel data lengths) the width
 * follows the variant; with a key only the large-size keys widen.
 */
export const sizeFieldWidth = (format: PsdFormat, key?: string): 4 | 8 => {
	if (!format.is64Bit) return 4;
	if (key === undefined) return 8;
	return LARGE_SIZE_KEYS.has(key) ? 8 : 4;
};

export const readSize = (
	format: PsdFormat,
	r: ByteReader,
	key?: string,
): number =>
	sizeFieldWidth(format, key) === 8 ? format.read.uint64(r) : format.read.uint32(r);

export const writeSize = (
	format: PsdFormat,
	w: ByteWriter,
	value: number,
	key?: string,
): void => {
	if (sizeFieldWidth(format, key) === 8) format.write.uint64(w, value);
	else format.write.uint32(w, value);
};

/** Width of the per-scanline byte counts that precede RLE channel data. */
export const rleCountWidth = (format: PsdFormat): 2 | 4 =>
	format.is64Bit ? 4 : 2;

// ─── Strings ────────────────────────────────────────────────────────────────

export const stringEncoding = (format: PsdFormat): StringEncoding =>
	format.byteOrder === "big" ? "utf-16be" : "utf-16le";

export const decodeUtf16 = (bytes: Buffer, order: ByteOrder): string => {
	if (order === "little") return bytes.toString("utf16le");
	const swapped = Buffer.from(bytes.subarray(0, bytes.length & ~1));
	return swapped.swap16().toString("utf16le");
};

export const encodeUtf16 = (value: string, order: ByteOrder): Buffer => {
	const bytes = Buffer.from(value, "utf16le");
	return order === "little" ? bytes : bytes.swap16();
};

// ─── Generic fixed-layout pack/unpack ───────────────────────────────────────

/**
 * Layout codes: b/B int8/uint8, h/H int16/uint16, i/I int32/uint32,
 * q/Q 64-bit (read as safe integers), f float32, d float64. A decimal
 * prefix repeats a code, e.g. "4i" for a rectangle.
 */
const expandLayout = (layout: string): string[] => {
	const codes: string[] = [];
	const pattern = /(\d*)([bBhHiIqQfd])/gy;
	let match: RegExpExecArray | null;
	let consumed = 0;
	while ((match = pattern.exec(layout)) !== null) {
		const count = match[1] ? Number.parseInt(match[1], 10) : 1;
		const code = match[2] ?? "";
		for (let i = 0; i < count; i++) codes.push(code);
		consumed = pattern.lastIndex;
	}
	if (consumed !== layout.length) {
		throw new FormatError(`Invalid layout ${JSON.stringify(layout)}`);
	}
	return codes;
};

const readCode = (format: PsdFormat, r: ByteReader, code: string): number => {
	switch (code) {
		case "b":
			return r.buffer.readInt8(r.take(1));
		case "B":
			return r.u8();
		case "h":
			return format.read.int16(r);
		case "H":
			return format.read.uint16(r);
		case "i":
			return format.read.int32(r);
		case "I":
			return format.read.uint32(r);
		case "q":
		case "Q":
			return format.read.uint64(r);
		case "f":
			return format.read.float32(r);
		default:
			return format.read.float64(r);
	}
};

const writeCode = (
	format: PsdFormat,
	w: ByteWriter,
	code: string,
	value: number,
): void => {
	switch (code) {
		case "b": {
			const o = w.take(1);
			w.buffer().writeInt8(value, o);
			return;
		}
		case "B":
			return w.u8(value);
		case "h":
			return format.write.int16(w, value);
		case "H":
			return format.write.uint16(w, value);
		case "i":
			return format.write.int32(w, value);
		case "I":
			return format.write.uint32(w, value);
		case "q":
		case "Q":
			return format.write.uint64(w, value);
		case "f":
			return format.write.float32(w, value);
		default:
			return format.write.float64(w, value);
	}
};

export const unpack = (
	format: PsdFormat,
	r: ByteReader,
	layout: string,
): number[] => expandLayout(layout).map((code) => readCode(format, r, code));

export const pack = (
	format: PsdFormat,
	w: ByteWriter,
	layout: string,
	values: readonly number[],
): void => {
	const codes = expandLayout(layout);
	if (codes.length !== values.length) {
		throw new EncodeError(
			`Layout ${JSON.stringify(layout)} takes ${codes.length} values, got ${values.length}`,
		);
	}
	codes.forEach((code, i) => writeCode(format, w, code, values[i] ?? 0));
};
