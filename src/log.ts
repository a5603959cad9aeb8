// Debug tracing for the character stream. Silent unless PPTOKENS_DEBUG is set.

export interface Logger {
	debug(message: string): void;
}

const PREFIX = '[pptokens]';

export const silentLogger: Logger = { debug: () => undefined };

export const consoleLogger: Logger = {
	debug: (message) => console.log(`${PREFIX} ${message}`),
};

export function defaultLogger(env: Record<string, string | undefined> = process.env): Logger {
	return env.PPTOKENS_DEBUG ? consoleLogger : silentLogger;
}
