/**
 * PackBits run-length coding, applied one scanline at a time.
 *
 * Header byte n: 0..127 copies the next n + 1 bytes literally, 129..255
 * repeats the next byte 257 - n times, 128 is a no-op.
 */

const MAX_RUN = 128;
const MIN_RUN = 3;

const runLength = (src: Uint8Array, start: number): number => {
	let run = 1;
	while (
		start + run < src.length &&
		run < MAX_RUN &&
		src[start + run] === src[start]
	)
		run++;
	return run;
};

export const encodePackBits = (src: Uint8Array): Buffer => {
	const out: number[] = [];
	let pos = 0;

	while (pos < src.length) {
		const run = runLength(src, pos);
		if (run >= MIN_RUN) {
			out.push(257 - run, src[pos] ?? 0);
			pos += run;
			continue;
		}

		const literalStart = pos;
		while (pos < src.length && pos - literalStart < MAX_RUN) {
			if (pos > literalStart && runLength(src, pos) >= MIN_RUN) break;
			pos++;
		}
		out.push(pos - literalStart - 1);
		for (let i = literalStart; i < pos; i++) out.push(src[i] ?? 0);
	}

	return Buffer.from(out);
};

/** Decode into exactly `expectedSize` bytes; returns how many were produced. */
export const decodePackBits = (
	src: Uint8Array,
	out: Uint8Array,
	outOffset = 0,
	expectedSize = out.length - outOffset,
): number => {
	const end = outOffset + expectedSize;
	let srcPos = 0;
	let dstPos = outOffset;

	while (srcPos < src.length && dstPos < end) {
		const header = src[srcPos++] ?? 0;
		if (header < 128) {
			const count = Math.min(header + 1, end - dstPos, src.length - srcPos);
			out.set(src.subarray(srcPos, srcPos + count), dstPos);
			srcPos += header + 1;
			dstPos += count;
		} else if (header > 128) {
			const count = Math.min(257 - header, end - dstPos);
			out.fill(src[srcPos++] ?? 0, dstPos, dstPos + count);
			dstPos += count;
		}
	}

	return dstPos - outOffset;
};
