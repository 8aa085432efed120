/**
 * Log level enum
 * Defines the severity levels for logging
 */
export enum LogLevel {
	DEBUG = 'debug',
	INFO = 'info',
	WARN = 'warn',
	ERROR = 'error',
}

export type LogContext = Record<string, unknown>;

/**
 * Logger interface
 * Defines the contract for logger implementations
 */
export interface ILogger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Parses a level name such as "INFO" or "warn".
 * @returns The matching level, or undefined for unknown names
 */
export function parseLogLevel(name: string): LogLevel | undefined {
	const normalized = name.trim().toLowerCase();
	return LEVEL_ORDER.find((level) => level === normalized);
}

/**
 * Console logger implementation
 *
 * Every level goes to stderr: stdout is reserved for the MCP stdio transport.
 */
export class ConsoleLogger implements ILogger {
	private readonly level: LogLevel;

	/**
	 * Creates a new console logger
	 * @param level - Minimum log level to display
	 */
	constructor(level: LogLevel = LogLevel.INFO) {
		this.level = level;
	}

	debug(message: string, context?: LogContext): void {
		this.write(LogLevel.DEBUG, message, context);
	}

	info(message: string, context?: LogContext): void {
		this.write(LogLevel.INFO, message, context);
	}

	warn(message: string, context?: LogContext): void {
		this.write(LogLevel.WARN, message, context);
	}

	error(message: string, context?: LogContext): void {
		this.write(LogLevel.ERROR, message, context);
	}

	private write(messageLevel: LogLevel, message: string, context?: LogContext): void {
		if (!this.shouldLog(messageLevel)) {
			return;
		}
		console.error(`[${messageLevel.toUpperCase()}] ${message}`, context || '');
	}

	/**
	 * Checks if a message with the given level should be logged
	 * @param messageLevel - Level of the message
	 * @returns True if the message should be logged, false otherwise
	 */
	private shouldLog(messageLevel: LogLevel): boolean {
		return LEVEL_ORDER.indexOf(messageLevel) >= LEVEL_ORDER.indexOf(this.level);
	}
}
