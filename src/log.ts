/** Sink for non-fatal diagnostics raised while reading or writing. */
export type Logger = {
	readonly warn: (message: string) => void;
};

export const consoleLogger: Logger = {
	warn: (message) => console.warn(`[psd] ${message}`),
};

/** Collects messages instead of printing them. */
export const createMemoryLogger = (): Logger & {
	readonly messages: readonly string[];
} => {
	const messages: string[] = [];
	return {
		messages,
		warn: (message) => {
			messages.push(message);
		},
	};
};
