import type { ILogger } from '../logging/logger';
import { Result } from '../result/result';

/**
 * Error types for categorising collaborator failures
 */
export enum ErrorType {
	VALIDATION = 'VALIDATION',
	DATA_SOURCE = 'DATA_SOURCE',
	REPORT = 'REPORT',
}

/**
 * Structured error information
 */
export interface ErrorInfo {
	type: ErrorType;
	code: string;
	message: string;
	context?: Record<string, unknown>;
	originalError?: Error;
}

/**
 * Unified error handler for consistent error management across services
 */
export class ErrorHandler {
	constructor(private readonly logger: ILogger) {}

	/**
	 * Handle and log an error, returning a Result
	 */
	handleError<T>(
		error: unknown,
		type: ErrorType,
		code: string,
		message: string,
		context?: Record<string, unknown>
	): Result<T> {
		const errorInfo = this.createErrorInfo(error, type, code, message, context);
		this.logError(errorInfo);
		return Result.failure(new Error(errorInfo.message));
	}

	/**
	 * Safely execute an operation with error handling
	 */
	async safeExecute<T>(
		operation: () => Promise<T>,
		type: ErrorType,
		operationName: string,
		context?: Record<string, unknown>
	): Promise<Result<T>> {
		try {
			const result = await operation();
			return Result.success(result);
		} catch (error) {
			return this.handleError(
				error,
				type,
				`${type}_${toCodeSegment(operationName)}_FAILED`,
				`Failed to ${operationName}`,
				context
			);
		}
	}

	private createErrorInfo(
		error: unknown,
		type: ErrorType,
		code: string,
		message: string,
		context?: Record<string, unknown>
	): ErrorInfo {
		return {
			type,
			code,
			message,
			context,
			originalError: error instanceof Error ? error : new Error(String(error)),
		};
	}

	/**
	 * Log error with appropriate level based on type
	 */
	private logError(errorInfo: ErrorInfo): void {
		const logContext = {
			type: errorInfo.type,
			code: errorInfo.code,
			context: errorInfo.context,
			error: errorInfo.originalError?.message,
			stack: errorInfo.originalError?.stack,
		};

		switch (errorInfo.type) {
			case ErrorType.VALIDATION:
				this.logger.warn(errorInfo.message, logContext);
				break;
			case ErrorType.DATA_SOURCE:
			case ErrorType.REPORT:
			default:
				this.logger.error(errorInfo.message, logContext);
				break;
		}
	}
}

function toCodeSegment(operationName: string): string {
	return operationName.trim().toUpperCase().replace(/\s+/g, '_');
}
