import { isSpotifyError, type SpotifyErrorKind } from "../errors";
import { getLogger } from "../utils";

const logger = getLogger("ErrorHandler");

/**
 * Error severity levels
 */
export enum ErrorSeverity {
	/** Info - non-blocking, informational */
	INFO = "info",
	/** Warning - the call failed but retrying or waiting may help */
	WARNING = "warning",
	/** Error - the operation cannot succeed without intervention */
	ERROR = "error",
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
	/** Tokens, consent, credentials */
	AUTH = "auth",
	/** Transport failures and unexpected statuses */
	NETWORK = "network",
	/** Player endpoints (no active device) */
	PLAYBACK = "playback",
	/** Undecodable payloads and rejected requests */
	VALIDATION = "validation",
	UNKNOWN = "unknown",
}

/**
 * Error context for additional information
 */
export interface ErrorContext {
	category: ErrorCategory;
	severity: ErrorSeverity;
	kind?: SpotifyErrorKind;
	operation?: string; // What was being attempted
	metadata?: Record<string, unknown>;
	recoverable?: boolean;
}

/**
 * Recovery strategy function
 */
export type RecoveryStrategy = (
	error: Error,
	context: ErrorContext,
) => Promise<void> | void;

const CATEGORY_BY_KIND: Record<SpotifyErrorKind, [ErrorCategory, ErrorSeverity]> = {
	transport: [ErrorCategory.NETWORK, ErrorSeverity.WARNING],
	"unknown-response": [ErrorCategory.NETWORK, ErrorSeverity.ERROR],
	"request-failed": [ErrorCategory.VALIDATION, ErrorSeverity.WARNING],
	decode: [ErrorCategory.VALIDATION, ErrorSeverity.ERROR],
	"pager-busy": [ErrorCategory.VALIDATION, ErrorSeverity.WARNING],
	"not-found": [ErrorCategory.VALIDATION, ErrorSeverity.WARNING],
	"no-active-device": [ErrorCategory.PLAYBACK, ErrorSeverity.WARNING],
	"auth-provider": [ErrorCategory.AUTH, ErrorSeverity.ERROR],
	"invalid-token": [ErrorCategory.AUTH, ErrorSeverity.ERROR],
	forbidden: [ErrorCategory.AUTH, ErrorSeverity.ERROR],
	"reauthentication-required": [ErrorCategory.AUTH, ErrorSeverity.ERROR],
	"scopes-not-granted": [ErrorCategory.AUTH, ErrorSeverity.ERROR],
	"missing-refresh-token": [ErrorCategory.AUTH, ErrorSeverity.ERROR],
	"csrf-mismatch": [ErrorCategory.AUTH, ErrorSeverity.ERROR],
	"authorization-denied": [ErrorCategory.AUTH, ErrorSeverity.ERROR],
	"invalid-credential": [ErrorCategory.AUTH, ErrorSeverity.ERROR],
	"cache-write": [ErrorCategory.UNKNOWN, ErrorSeverity.WARNING],
	configuration: [ErrorCategory.UNKNOWN, ErrorSeverity.ERROR],
	"invalid-uri": [ErrorCategory.VALIDATION, ErrorSeverity.WARNING],
};

/**
 * Centralized Error Handler
 * Classifies library errors, logs them and runs the recovery strategies
 * registered for their category. Errors are reported, never swallowed:
 * the caller still decides whether to rethrow.
 */
export class ErrorHandler {
	private recoveryStrategies: Map<ErrorCategory, RecoveryStrategy[]> = new Map();

	/**
	 * Register a recovery strategy for a specific error category
	 */
	registerRecoveryStrategy(category: ErrorCategory, strategy: RecoveryStrategy): void {
		const strategies = this.recoveryStrategies.get(category) ?? [];
		strategies.push(strategy);
		this.recoveryStrategies.set(category, strategies);
	}

	/**
	 * Category and severity for an error
	 */
	classify(error: unknown): ErrorContext {
		if (isSpotifyError(error)) {
			const [category, severity] = CATEGORY_BY_KIND[error.kind];
			return { category, severity, kind: error.kind };
		}
		return { category: ErrorCategory.UNKNOWN, severity: ErrorSeverity.ERROR };
	}

	/**
	 * Log an error and run its recovery strategies. Explicit context
	 * fields override the classification.
	 */
	async handle(error: unknown, context: Partial<ErrorContext> = {}): Promise<ErrorContext> {
		const err = this.normalizeError(error);
		const resolved: ErrorContext = { ...this.classify(error), ...context };

		this.logError(err, resolved);

		if (resolved.recoverable !== false) {
			await this.executeRecoveryStrategies(err, resolved);
		}

		return resolved;
	}

	/**
	 * Normalize unknown errors to Error objects
	 */
	private normalizeError(error: unknown): Error {
		if (error instanceof Error) {
			return error;
		}
		return new Error(String(error));
	}

	private logError(error: Error, context: ErrorContext): void {
		const logMessage = `[${context.category}] ${context.operation || "Unknown operation"}: ${error.message}`;

		switch (context.severity) {
			case ErrorSeverity.INFO:
				logger.info(logMessage, context.metadata);
				break;
			case ErrorSeverity.WARNING:
				logger.warn(logMessage, context.metadata);
				break;
			case ErrorSeverity.ERROR:
				logger.error(logMessage, context.metadata);
				break;
		}
	}

	private async executeRecoveryStrategies(error: Error, context: ErrorContext): Promise<void> {
		const strategies = this.recoveryStrategies.get(context.category);
		if (!strategies || strategies.length === 0) {
			return;
		}

		for (const strategy of strategies) {
			try {
				await strategy(error, context);
			} catch (recoveryError) {
				logger.error("Recovery strategy failed:", recoveryError);
			}
		}
	}

	/**
	 * Remove all recovery strategies
	 */
	dispose(): void {
		this.recoveryStrategies.clear();
	}
}

export function createErrorHandler(): ErrorHandler {
	return new ErrorHandler();
}
