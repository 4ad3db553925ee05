/**
 * Image resource blocks: signature, u16 id, Pascal name padded to an even
 * length, u32 size, payload padded to an even length. Always big-endian.
 */

import { asDecodeError } from "../binary/errors.ts";
import { BE32BIT } from "../binary/format.ts";
import { type ByteReader, createByteReader } from "../binary/reader.ts";
import {
	readPaddedPascalString,
	readPascalString,
	readUnicodeStringBE,
	writePaddedPascalString,
	writePascalString,
	writeUnicodeStringBE,
} from "../binary/text.ts";
import { type ByteWriter, createByteWriter } from "../binary/writer.ts";
import type { Logger } from "../log.ts";
import {
	type PsdImageResources,
	type PsdResource,
	PsdResourceId,
	RESOURCE_SIGNATURES,
} from "./types.ts";

const { read, write } = BE32BIT;

const IMAGE_RESOURCES_TAG = 34377;

export type ImageResourcesReadOptions = {
	readonly logger?: Logger;
	readonly name?: string;
};

// ─── Read ───────────────────────────────────────────────────────────────────

type Base = Pick<PsdResource, "id" | "name" | "signature">;

const readTrailing = (
	r: ByteReader,
	end: number,
): { readonly trailing?: Uint8Array } => {
	const rest = end - r.tell();
	return rest > 0 ? { trailing: r.bytes(rest) } : {};
};

const readPayload = (r: ByteReader, base: Base, size: number): PsdResource => {
	const end = r.tell() + size;
	switch (base.id) {
		case PsdResourceId.CAPTION_PASCAL:
		case PsdResourceId.CLIPPING_PATH_NAME:
			return { ...base, type: "string", value: readPascalString(r) };
		case PsdResourceId.ALPHA_NAMES_PASCAL:
		case PsdResourceId.ALPHA_NAMES_UNICODE: {
			const unicode = base.id === PsdResourceId.ALPHA_NAMES_UNICODE;
			const values: string[] = [];
			while (r.tell() < end) {
				values.push(unicode ? readUnicodeStringBE(r) : readPascalString(r));
			}
			return { ...base, type: "strings", unicode, values };
		}
		case PsdResourceId.BACKGROUND_COLOR:
			return {
				...base,
				type: "color",
				colorSpace: read.int16(r),
				components: [read.uint16(r), read.uint16(r), read.uint16(r), read.uint16(r)],
			};
		case PsdResourceId.VERSION_INFO:
			return {
				...base,
				type: "version",
				version: read.uint32(r),
				hasRealMergedData: r.u8() !== 0,
				writerName: readUnicodeStringBE(r),
				readerName: readUnicodeStringBE(r),
				fileVersion: read.uint32(r),
				...readTrailing(r, end),
			};
		case PsdResourceId.THUMBNAIL_RESOURCE_PS4:
		case PsdResourceId.THUMBNAIL_RESOURCE: {
			const format = read.uint32(r);
			const width = read.uint32(r);
			const height = read.uint32(r);
			const widthBytes = read.uint32(r);
			const totalSize = read.uint32(r);
			const compressedSize = read.uint32(r);
			const bitsPerPixel = read.uint16(r);
			const planes = read.uint16(r);
			const data = r.bytes(Math.min(compressedSize, end - r.tell()));
			return {
				...base,
				type: "thumbnail",
				format,
				width,
				height,
				widthBytes,
				totalSize,
				bitsPerPixel,
				planes,
				data,
				...readTrailing(r, end),
			};
		}
		default:
			return { ...base, type: "bytes", data: r.bytes(size) };
	}
};

export const readImageResources = (
	bytes: Uint8Array,
	options: ImageResourcesReadOptions = {},
): PsdImageResources => {
	const r = createByteReader(bytes);
	const resources: PsdResource[] = [];
	while (r.remaining() >= 4) {
		const signature = r.peek(4).toString("latin1");
		if (!RESOURCE_SIGNATURES.has(signature)) {
			options.logger?.warn(
				`Image resources end at ${r.tell()} on signature ${JSON.stringify(signature)}`,
			);
			break;
		}
		r.skip(4);
		try {
			const id = read.uint16(r);
			const name = readPaddedPascalString(r, 2);
			const size = read.uint32(r);
			const start = r.tell();
			resources.push(readPayload(r, { id, name, signature }, size));
			r.seek(start + size + (size % 2));
		} catch (err) {
			throw asDecodeError(err, "Failed to read image resource block");
		}
	}
	return { ...(options.name !== undefined ? { name: options.name } : {}), resources };
};

// ─── Write ──────────────────────────────────────────────────────────────────

const writePayload = (w: ByteWriter, resource: PsdResource): void => {
	switch (resource.type) {
		case "string":
			writePascalString(w, resource.value);
			return;
		case "strings":
			for (const value of resource.values) {
				if (resource.unicode) writeUnicodeStringBE(w, value);
				else writePascalString(w, value);
			}
			return;
		case "color":
			write.int16(w, resource.colorSpace);
			for (const component of resource.components) write.uint16(w, component);
			return;
		case "version":
			write.uint32(w, resource.version);
			w.u8(resource.hasRealMergedData ? 1 : 0);
			writeUnicodeStringBE(w, resource.writerName);
			writeUnicodeStringBE(w, resource.readerName);
			write.uint32(w, resource.fileVersion);
			if (resource.trailing) w.write(resource.trailing);
			return;
		case "thumbnail":
			write.uint32(w, resource.format);
			write.uint32(w, resource.width);
			write.uint32(w, resource.height);
			write.uint32(w, resource.widthBytes);
			write.uint32(w, resource.totalSize);
			write.uint32(w, resource.data.length);
			write.uint16(w, resource.bitsPerPixel);
			write.uint16(w, resource.planes);
			w.write(resource.data);
			if (resource.trailing) w.write(resource.trailing);
			return;
		case "bytes":
			w.write(resource.data);
	}
};

export const writeImageResources = (value: PsdImageResources): Buffer => {
	const w = createByteWriter();
	for (const resource of value.resources) {
		w.write(Buffer.from(resource.signature ?? "8BIM", "latin1"));
		write.uint16(w, resource.id);
		writePaddedPascalString(w, resource.name, 2);
		const sizeAt = w.tell();
		write.uint32(w, 0);
		const start = w.tell();
		writePayload(w, resource);
		const end = w.tell();
		w.seek(sizeAt);
		write.uint32(w, end - start);
		w.seek(end);
		w.align(2, start);
	}
	return w.toBuffer();
};

/** Container tag entry: id, type 7 (undefined), count, value, write once. */
export const imageResourcesTag = (
	value: PsdImageResources,
): [number, number, number, Buffer, boolean] => {
	const bytes = writeImageResources(value);
	return [IMAGE_RESOURCES_TAG, 7, bytes.length, bytes, true];
};

export const findResource = (
	value: PsdImageResources,
	id: number,
): PsdResource | undefined => value.resources.find((resource) => resource.id === id);
