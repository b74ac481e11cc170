/**
 * Logging types and interfaces
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
	component?: string;
	operation?: string;
	[key: string]: unknown;
}

export interface LogMessage {
	/** Timestamp in milliseconds since epoch */
	timestamp: number;
	level: LogLevel;
	message: string;
	/** Component that produced the message */
	component: string;
	/** Stack directory the command operates on */
	stackDir?: string;
	context?: LogContext;
}

export interface LogBackend {
	/** Store a log message */
	log(message: LogMessage): Promise<void>;
	/** Flush and release resources */
	close?(): Promise<void>;
}

export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}
