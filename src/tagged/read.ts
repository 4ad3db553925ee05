import { asDecodeError, DecodeError } from "../binary/errors.ts";
import { type PsdFormat, readSize } from "../binary/format.ts";
import type { ByteReader } from "../binary/reader.ts";
import { consoleLogger } from "../log.ts";
import { structureReader } from "./registry.ts";
import type { PsdStructure, ReadContext, ReadOptions } from "./types.ts";

export const DEFAULT_READ_OPTIONS = Object.freeze({
	unknown: true,
	strict: false,
} as const);

export const readContext = (options: ReadOptions = {}): ReadContext => ({
	logger: options.logger ?? consoleLogger,
	unknown: options.unknown ?? DEFAULT_READ_OPTIONS.unknown,
	strict: options.strict ?? DEFAULT_READ_OPTIONS.strict,
});

const padded = (size: number, alignment: number): number =>
	size + ((alignment - (size % alignment)) % alignment);

/**
 * Walk signature/key/size records from the reader's position until `end`
 * or the first position not starting with the format's signature.
 */
export const readStructures = (
	r: ByteReader,
	format: PsdFormat,
	end: number,
	ctx: ReadContext,
	alignment: number,
): PsdStructure[] => {
	const signature = Buffer.from(format.signature, "latin1");
	const structures: PsdStructure[] = [];

	while (r.tell() + 4 <= end && r.peek(4).equals(signature)) {
		r.skip(4);
		const key = format.read.key(r);
		const size = readSize(format, r, key);
		const start = r.tell();

		if (start + size > end) {
			const message = `Record ${JSON.stringify(key)} at ${start} declares ${size} bytes, ${end - start} remain`;
			if (ctx.strict) throw new DecodeError(message);
			ctx.logger.warn(message);
		}

		const structure = readStructure(r, format, key, size, end, ctx);
		if (structure) structures.push(structure);
		r.seek(start + padded(size, alignment));
	}
	return structures;
};

const readStructure = (
	r: ByteReader,
	format: PsdFormat,
	key: string,
	size: number,
	end: number,
	ctx: ReadContext,
): PsdStructure | undefined => {
	if (size === 0) return { type: "empty", key };
	const reader = structureReader(key);
	if (reader) {
		try {
			return reader(r, format, key, size, ctx);
		} catch (err) {
			throw asDecodeError(err, `Failed to read ${JSON.stringify(key)} record`);
		}
	}
	if (!ctx.unknown) {
		ctx.logger.warn(`Skipped unknown record ${JSON.stringify(key)} (${size} bytes)`);
		return undefined;
	}
	// Past the end of the list, keep what is inside it.
	const available = Math.min(end - r.tell(), r.remaining());
	const data = r.bytes(Math.max(0, Math.min(size, available)));
	return { type: "unknown", key, format, data };
};
