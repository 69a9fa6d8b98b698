/**
 * Logger interface shared by the loader and the extraction engine
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/**
 * Default console logger
 */
export const consoleLogger: Logger = {
	debug: (message, ...args) => console.debug(`[USC] ${message}`, ...args),
	info: (message, ...args) => console.log(`[USC] ${message}`, ...args),
	warn: (message, ...args) => console.warn(`[USC] ${message}`, ...args),
	error: (message, ...args) => console.error(`[USC] ${message}`, ...args),
};

/**
 * Silent logger, the engine default
 */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
