/**
 * Logger Service
 * Centralized logging with levels, timestamps, contexts, and file persistence
 */

import { LogWriter } from "./LogWriter";
import { getLoggingConfig, LogLevel } from "../config/logging";

export { LogLevel } from "../config/logging";

export interface LoggerConfig {
	level: LogLevel;
	enableTimestamps: boolean;
	enableColors: boolean;
	enableConsoleLogging: boolean;
	/** Destination for file logging, shared by child loggers */
	writer: LogWriter | null;
}

function defaultConfig(): LoggerConfig {
	const loggingConfig = getLoggingConfig();
	return {
		level: loggingConfig.level,
		enableTimestamps: true,
		enableColors: Boolean(process.stdout.isTTY),
		enableConsoleLogging: loggingConfig.consoleLogging,
		writer: null,
	};
}

/**
 * ANSI color codes for terminal output
 */
const colors = {
	reset: "\x1b[0m",
	dim: "\x1b[2m",
	red: "\x1b[31m",
	yellow: "\x1b[33m",
	blue: "\x1b[34m",
	cyan: "\x1b[36m",
	gray: "\x1b[90m",
};

function stringify(data: unknown, pretty: boolean): string {
	if (typeof data !== "object" || data === null) return String(data);
	if (data instanceof Set) return JSON.stringify([...data]);
	return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Logger class with support for different log levels and contexts
 */
export class Logger {
	private config: LoggerConfig;
	private context: string;

	constructor(context = "App", config: Partial<LoggerConfig> = {}) {
		this.context = context;
		this.config = { ...defaultConfig(), ...config };
	}

	/**
	 * Create a child logger with a different context. The child shares
	 * this logger's settings, including later `configure` calls.
	 */
	child(context: string): Logger {
		const child = new Logger(context);
		child.config = this.config;
		return child;
	}

	/**
	 * Update settings in place for this logger and its children
	 */
	configure(config: Partial<LoggerConfig>): void {
		Object.assign(this.config, config);
	}

	getWriter(): LogWriter | null {
		return this.config.writer;
	}

	/**
	 * Set the minimum log level
	 */
	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	getContext(): string {
		return this.context;
	}

	/**
	 * Format log message with timestamp and context (with colors for console)
	 */
	private format(
		level: string,
		message: string,
		color: string,
		data?: unknown,
	): string {
		const paint = (value: string, tint: string) =>
			this.config.enableColors ? `${tint}${value}${colors.reset}` : value;
		const parts: string[] = [];

		if (this.config.enableTimestamps) {
			const timestamp = new Date().toISOString().slice(11, 23);
			parts.push(paint(`[${timestamp}]`, colors.gray));
		}

		parts.push(paint(level.padEnd(5), color));
		parts.push(paint(`[${this.context}]`, colors.cyan));
		parts.push(message);

		if (data !== undefined) {
			parts.push(`\n${paint(stringify(data, true), colors.dim)}`);
		}

		return parts.join(" ");
	}

	/**
	 * Format log message for file logging (no colors, full ISO timestamp)
	 */
	private formatPlain(level: string, message: string, data?: unknown): string {
		const parts = [
			new Date().toISOString(),
			`[${level}]`,
			`[${this.context}]`,
			message,
		];

		if (data !== undefined) {
			parts.push(stringify(data, false));
		}

		return parts.join(" ");
	}

	private log(
		level: LogLevel,
		levelStr: string,
		color: string,
		message: string,
		data?: unknown,
	): void {
		if (this.config.level > level) return;

		if (this.config.enableConsoleLogging) {
			const consoleMethod =
				level === LogLevel.ERROR
					? console.error
					: level === LogLevel.WARN
						? console.warn
						: console.log;
			consoleMethod(this.format(levelStr, message, color, data));
		}

		this.config.writer?.write(this.formatPlain(levelStr, message, data));
	}

	debug(message: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, "DEBUG", colors.gray, message, data);
	}

	info(message: string, data?: unknown): void {
		this.log(LogLevel.INFO, "INFO", colors.blue, message, data);
	}

	warn(message: string, data?: unknown): void {
		this.log(LogLevel.WARN, "WARN", colors.yellow, message, data);
	}

	/**
	 * Error log (highest priority)
	 */
	error(message: string, error?: unknown): void {
		let errorData: unknown = error;

		// Extract useful info from Error objects
		if (error instanceof Error) {
			errorData = {
				name: error.name,
				message: error.message,
				stack: error.stack,
			};
		}

		this.log(LogLevel.ERROR, "ERROR", colors.red, message, errorData);
	}
}

// Global logger instance
let globalLogger: Logger | null = null;

/**
 * Get the global logger, or a child of it for a specific context
 */
export function getLogger(context?: string): Logger {
	if (!globalLogger) {
		globalLogger = new Logger("App");
	}
	return context ? globalLogger.child(context) : globalLogger;
}

export interface ConfigureLoggerOptions extends Partial<Omit<LoggerConfig, "writer">> {
	/** Write logs to `<logDir>/spotwire.log` */
	fileLogging?: boolean;
	logDir?: string;
}

/**
 * Configure the global logger and every context logger derived from it.
 * A previous file writer is flushed and stopped.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): Logger {
	const { fileLogging, logDir, ...config } = options;
	const loggingConfig = getLoggingConfig();
	const root = getLogger();

	const writer =
		(fileLogging ?? loggingConfig.fileLogging)
			? new LogWriter({
					logDir: logDir ?? loggingConfig.logDir,
					maxFileSize: loggingConfig.maxFileSize,
					maxFiles: loggingConfig.maxFiles,
				})
			: null;

	const previous = root.getWriter();
	root.configure({ ...config, writer });

	previous?.shutdown().catch((error: unknown) => {
		root.warn("Failed to flush previous log writer", {
			error: error instanceof Error ? error.message : String(error),
		});
	});

	return root;
}

/**
 * Flush and stop file logging
 */
export async function shutdownLogger(): Promise<void> {
	const root = getLogger();
	const writer = root.getWriter();
	root.configure({ writer: null });
	await writer?.shutdown();
}
