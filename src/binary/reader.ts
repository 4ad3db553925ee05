import { DecodeError } from "./errors.ts";

/**
 * Cursor over an input buffer. Offsets are absolute within `buffer`.
 * Every read goes through `take`, which bounds-checks before advancing.
 */
export type ByteReader = {
	readonly buffer: Buffer;
	readonly length: number;
	readonly tell: () => number;
	readonly seek: (offset: number) => void;
	readonly skip: (count: number) => void;
	readonly remaining: () => number;
	/** Reserve `count` bytes and return the offset they start at. */
	readonly take: (count: number) => number;
	readonly peek: (count: number) => Buffer;
	/** Read `count` bytes into a new buffer that does not alias the input. */
	readonly bytes: (count: number) => Buffer;
	readonly u8: () => number;
};

export const createByteReader = (
	data: Buffer | Uint8Array,
	offset = 0,
): ByteReader => {
	const buffer = Buffer.isBuffer(data)
		? data
		: Buffer.from(data.buffer, data.byteOffset, data.byteLength);
	let position = offset;

	const take = (count: number): number => {
		if (count < 0 || position + count > buffer.length) {
			throw new DecodeError(
				`Unexpected end of data: need ${count} bytes at offset ${position}, have ${Math.max(0, buffer.length - position)}`,
			);
		}
		const start = position;
		position += count;
		return start;
	};

	return {
		buffer,
		length: buffer.length,
		tell: () => position,
		seek: (to: number) => {
			position = to;
		},
		skip: (count: number) => {
			position += count;
		},
		remaining: () => Math.max(0, buffer.length - position),
		take,
		peek: (count: number) =>
			buffer.subarray(position, Math.min(buffer.length, position + count)),
		bytes: (count: number) => {
			const start = take(count);
			return Buffer.from(buffer.subarray(start, start + count));
		},
		u8: () => buffer.readUInt8(take(1)),
	};
};
