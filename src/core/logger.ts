export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogModule = "CURSOR" | "CONNECTION" | "CLASSIFIER";

export interface LogContext {
	module?: LogModule;
	[key: string]: unknown;
}

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

/**
 * Console-backed logger with a level threshold.
 * Format: [timestamp] [LEVEL] [MODULE] message {context}
 */
export function createConsoleLogger(level: LogLevel = "warn"): Logger {
	const threshold = LEVEL_PRIORITY[level];

	const write = (
		entryLevel: Exclude<LogLevel, "silent">,
		message: string,
		context?: LogContext,
	): void => {
		if (LEVEL_PRIORITY[entryLevel] < threshold) {
			return;
		}
		const { module, ...rest } = context ?? {};
		const parts = [
			`[${new Date().toISOString()}]`,
			`[${entryLevel.toUpperCase()}]`,
		];
		if (module) parts.push(`[${module}]`);
		parts.push(message);
		if (Object.keys(rest).length > 0) parts.push(JSON.stringify(rest));
		const line = parts.join(" ");

		switch (entryLevel) {
			case "debug":
				console.debug(line);
				break;
			case "info":
				console.info(line);
				break;
			case "warn":
				console.warn(line);
				break;
			case "error":
				console.error(line);
				break;
		}
	};

	return {
		debug: (message, context) => write("debug", message, context),
		info: (message, context) => write("info", message, context),
		warn: (message, context) => write("warn", message, context),
		error: (message, context) => write("error", message, context),
	};
}

export const silentLogger: Logger = createConsoleLogger("silent");
