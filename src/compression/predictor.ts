/**
 * Horizontal predictors applied before deflate (ZIP_PREDICTED).
 *
 * Integer samples: each sample minus its left neighbour, per row, wrapping
 * at the sample width. Float samples: each row's big-endian bytes are split
 * into byte planes (most significant plane first), then every byte minus
 * its left neighbour across the whole row.
 */

export const deltaEncode = (
	samples: Uint8Array | Uint16Array,
	height: number,
	width: number,
): void => {
	for (let y = 0; y < height; y++) {
		const row = y * width;
		for (let x = width - 1; x > 0; x--) {
			samples[row + x] = (samples[row + x] ?? 0) - (samples[row + x - 1] ?? 0);
		}
	}
};

export const deltaDecode = (
	samples: Uint8Array | Uint16Array,
	height: number,
	width: number,
): void => {
	for (let y = 0; y < height; y++) {
		const row = y * width;
		for (let x = 1; x < width; x++) {
			samples[row + x] = (samples[row + x] ?? 0) + (samples[row + x - 1] ?? 0);
		}
	}
};

/** `bytes` holds big-endian samples of `sampleBytes` each; returns a new buffer. */
export const floatPredictEncode = (
	bytes: Uint8Array,
	height: number,
	width: number,
	sampleBytes: number,
): Buffer => {
	const rowBytes = width * sampleBytes;
	const out = Buffer.alloc(bytes.length);
	for (let y = 0; y < height; y++) {
		const row = y * rowBytes;
		for (let x = 0; x < width; x++) {
			for (let k = 0; k < sampleBytes; k++) {
				out[row + k * width + x] = bytes[row + x * sampleBytes + k] ?? 0;
			}
		}
		for (let i = rowBytes - 1; i > 0; i--) {
			out[row + i] = ((out[row + i] ?? 0) - (out[row + i - 1] ?? 0)) & 0xff;
		}
	}
	return out;
};

export const floatPredictDecode = (
	bytes: Uint8Array,
	height: number,
	width: number,
	sampleBytes: number,
): Buffer => {
	const rowBytes = width * sampleBytes;
	const planes = Buffer.from(bytes);
	const out = Buffer.alloc(bytes.length);
	for (let y = 0; y < height; y++) {
		const row = y * rowBytes;
		for (let i = 1; i < rowBytes; i++) {
			planes[row + i] = ((planes[row + i] ?? 0) + (planes[row + i - 1] ?? 0)) & 0xff;
		}
		for (let x = 0; x < width; x++) {
			for (let k = 0; k < sampleBytes; k++) {
				out[row + x * sampleBytes + k] = planes[row + k * width + x] ?? 0;
			}
		}
	}
	return out;
};
