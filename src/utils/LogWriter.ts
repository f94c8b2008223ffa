/**
 * LogWriter - Handles file-based logging with rotation and buffering
 *
 * Features:
 * - Buffered writes (reduces disk I/O)
 * - Size-based log rotation
 * - Async appends, sync rotation
 */

import {
	existsSync,
	mkdirSync,
	renameSync,
	statSync,
	unlinkSync,
} from "node:fs";
import { appendFile } from "node:fs/promises";
import { join } from "node:path";

export interface LogWriterConfig {
	/** Directory where log files are stored */
	logDir: string;
	/** Log file name */
	filename: string;
	/** Maximum size of a single log file in bytes */
	maxFileSize: number;
	/** Maximum number of rotated log files to keep */
	maxFiles: number;
	/** Interval in milliseconds to flush buffered logs */
	flushInterval: number;
}

const DEFAULT_CONFIG: Omit<LogWriterConfig, "logDir"> = {
	filename: "spotwire.log",
	maxFileSize: 5 * 1024 * 1024, // 5MB
	maxFiles: 5,
	flushInterval: 1000,
};

const MAX_BUFFERED_LINES = 100;

/**
 * LogWriter handles file-based logging with rotation
 */
export class LogWriter {
	private config: LogWriterConfig;
	private buffer: string[] = [];
	private currentSize = 0;
	private flushTimer: NodeJS.Timeout | null = null;
	private flushing = false;
	private enabled = false;

	constructor(config: Partial<LogWriterConfig> & Pick<LogWriterConfig, "logDir">) {
		this.config = { ...DEFAULT_CONFIG, ...config };
		this.initialize();
	}

	/**
	 * Create the log directory and start the flush timer
	 */
	private initialize(): void {
		try {
			if (!existsSync(this.config.logDir)) {
				mkdirSync(this.config.logDir, { recursive: true });
			}

			const logFile = this.getLogFilePath();
			if (existsSync(logFile)) {
				this.currentSize = statSync(logFile).size;
			}

			this.flushTimer = setInterval(() => {
				this.flush().catch((err: unknown) => {
					console.error("Log flush error:", err);
				});
			}, this.config.flushInterval);

			// Don't keep the process alive for logging
			this.flushTimer.unref();

			this.enabled = true;
		} catch (error) {
			console.error("Failed to initialize LogWriter:", error);
			this.enabled = false;
		}
	}

	getLogFilePath(): string {
		return join(this.config.logDir, this.config.filename);
	}

	private getRotatedLogFilePath(index: number): string {
		return join(this.config.logDir, `${this.config.filename}.${index}`);
	}

	/**
	 * Write a log line (adds to buffer)
	 */
	write(message: string): void {
		if (!this.enabled) {
			return;
		}

		const line = message.endsWith("\n") ? message : `${message}\n`;
		this.buffer.push(line);

		if (this.buffer.length > MAX_BUFFERED_LINES) {
			this.flush().catch((err: unknown) => {
				console.error("Log flush error:", err);
			});
		}
	}

	/**
	 * Flush buffered logs to disk
	 */
	async flush(): Promise<void> {
		if (!this.enabled || this.buffer.length === 0 || this.flushing) {
			return;
		}

		this.flushing = true;
		const content = this.buffer.join("");
		this.buffer = [];

		try {
			await appendFile(this.getLogFilePath(), content, "utf-8");
			this.currentSize += Buffer.byteLength(content, "utf-8");

			if (this.currentSize >= this.config.maxFileSize) {
				this.rotate();
			}
		} catch (error) {
			// Put the lines back so the next flush retries them
			this.buffer.unshift(content);
			throw error;
		} finally {
			this.flushing = false;
		}
	}

	/**
	 * Rotate log files: .4 -> .5 (oldest dropped), ..., current -> .1
	 */
	private rotate(): void {
		const logFile = this.getLogFilePath();

		for (let i = this.config.maxFiles; i > 0; i--) {
			const currentRotated = this.getRotatedLogFilePath(i);
			if (!existsSync(currentRotated)) continue;

			if (i === this.config.maxFiles) {
				unlinkSync(currentRotated);
			} else {
				renameSync(currentRotated, this.getRotatedLogFilePath(i + 1));
			}
		}

		if (existsSync(logFile)) {
			renameSync(logFile, this.getRotatedLogFilePath(1));
		}

		this.currentSize = 0;
	}

	/**
	 * Stop the timer and flush remaining lines
	 */
	async shutdown(): Promise<void> {
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}

		await this.flush();
		this.enabled = false;
	}

	getBufferSize(): number {
		return this.buffer.length;
	}
}
