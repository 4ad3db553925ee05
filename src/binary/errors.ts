/**
 * Error kinds raised by the codec.
 *
 * - FormatError: bad leading literal or unrecognized format signature.
 * - DecodeError: truncated input, invalid compression kind, unsupported
 *   sample type on read.
 * - EncodeError: unsupported sample type, or opaque bytes that cannot be
 *   re-emitted under the requested format.
 */

export class PsdError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "PsdError";
	}
}

export class FormatError extends PsdError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "FormatError";
	}
}

export class DecodeError extends PsdError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "DecodeError";
	}
}

export class EncodeError extends PsdError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "EncodeError";
	}
}

/** Rethrow buffer range failures as DecodeError; keep codec errors as they are. */
export const asDecodeError = (err: unknown, context: string): PsdError => {
	if (err instanceof PsdError) return err;
	const detail = err instanceof Error ? err.message : String(err);
	return new DecodeError(`${context}: ${detail}`, { cause: err });
};
