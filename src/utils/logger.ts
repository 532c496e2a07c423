export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
	level?: LogLevel;
	context?: string;
	silent?: boolean;
}

export interface Logger {
	debug(message: string, data?: Record<string, unknown>): void;
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
}

const levelPriority: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Leveled console logger with an optional context label
 */
export class ConsoleLogger implements Logger {
	private readonly level: LogLevel;
	private readonly context: string;
	private readonly silent: boolean;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? (process.env.DEBUG ? "debug" : "info");
		this.context = options.context ?? "";
		this.silent = options.silent ?? false;
	}

	debug(message: string, data?: Record<string, unknown>): void {
		if (this.shouldLog("debug")) {
			console.debug(this.format("debug", message, data));
		}
	}

	info(message: string, data?: Record<string, unknown>): void {
		if (this.shouldLog("info")) {
			console.info(this.format("info", message, data));
		}
	}

	warn(message: string, data?: Record<string, unknown>): void {
		if (this.shouldLog("warn")) {
			console.warn(this.format("warn", message, data));
		}
	}

	error(message: string, data?: Record<string, unknown>): void {
		if (this.shouldLog("error")) {
			console.error(this.format("error", message, data));
		}
	}

	private shouldLog(level: LogLevel): boolean {
		return !this.silent && levelPriority[level] >= levelPriority[this.level];
	}

	private format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
		const context = this.context ? ` (${this.context})` : "";
		const output = `[${level}]${context} ${message}`;
		return data ? `${output} ${JSON.stringify(data)}` : output;
	}
}

export function createLogger(options: LoggerOptions = {}): Logger {
	return new ConsoleLogger(options);
}
