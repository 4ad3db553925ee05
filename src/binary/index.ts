export {
	asDecodeError,
	DecodeError,
	EncodeError,
	FormatError,
	PsdError,
} from "./errors.ts";
export {
	BE32BIT,
	BE64BIT,
	type ByteOrder,
	decodeUtf16,
	encodeUtf16,
	type FormatReader,
	type FormatWriter,
	LARGE_SIZE_KEYS,
	LE32BIT,
	LE64BIT,
	pack,
	PSD_FORMATS,
	type PsdFormat,
	type PsdFormatName,
	psdFormat,
	readSize,
	rleCountWidth,
	sameFormat,
	sizeFieldWidth,
	type StringEncoding,
	stringEncoding,
	unpack,
	writeSize,
} from "./format.ts";
export { type ByteReader, createByteReader } from "./reader.ts";
export {
	decodeMacRoman,
	encodeMacRoman,
	readPaddedPascalString,
	readPascalString,
	readUnicodeString,
	readUnicodeStringBE,
	writePaddedPascalString,
	writePascalString,
	writeUnicodeString,
	writeUnicodeStringBE,
} from "./text.ts";
export { type ByteWriter, createByteWriter } from "./writer.ts";
