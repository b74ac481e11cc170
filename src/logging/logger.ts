/**
 * Logger
 * ======
 *
 * Structured logging for brewstack commands. Every message is printed to the
 * console and forwarded to the configured backends (file, test memory, ...).
 *
 * Usage:
 *   const logger = new Logger([new FileLogBackend(stackDir)]);
 *   await logger.info('Migration applied', { component: 'ConvergenceEngine', stepId: 3 });
 *   logger.errorSync('Reconcile failed', error, { component: 'ContainerRuntime' });
 */

import type { LogBackend, LogContext, LogLevel, LogMessage } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export interface LoggerOptions {
	level?: LogLevel;
	/** Print to stdout/stderr as well as the backends (default: true) */
	console?: boolean;
}

export class Logger {
	private backends: LogBackend[];
	private minLogLevel: LogLevel;
	private consoleEnabled: boolean;
	private stackDir?: string;
	private pending = new Set<Promise<void>>();

	constructor(backends: LogBackend | LogBackend[] = [], options: LoggerOptions = {}) {
		this.backends = Array.isArray(backends) ? backends : [backends];
		this.minLogLevel = options.level ?? 'info';
		this.consoleEnabled = options.console ?? true;
	}

	public setStackDir(stackDir: string): void {
		this.stackDir = stackDir;
	}

	public addBackend(backend: LogBackend): void {
		this.backends.push(backend);
	}

	public setLogLevel(level: LogLevel): void {
		this.minLogLevel = level;
	}

	public getLogLevel(): LogLevel {
		return this.minLogLevel;
	}

	private shouldLog(level: LogLevel): boolean {
		return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLogLevel];
	}

	public async debug(message: string, context?: LogContext): Promise<void> {
		await this.log('debug', message, context);
	}

	public async info(message: string, context?: LogContext): Promise<void> {
		await this.log('info', message, context);
	}

	public async warn(message: string, context?: LogContext): Promise<void> {
		await this.log('warn', message, context);
	}

	public async error(message: string, error?: Error, context?: LogContext): Promise<void> {
		await this.log('error', message, withError(context, error));
	}

	/**
	 * Synchronous variants: backend writes continue in the background and are
	 * awaited by flush()
	 */
	public debugSync(message: string, context?: LogContext): void {
		this.track(this.log('debug', message, context));
	}

	public infoSync(message: string, context?: LogContext): void {
		this.track(this.log('info', message, context));
	}

	public warnSync(message: string, context?: LogContext): void {
		this.track(this.log('warn', message, context));
	}

	public errorSync(message: string, error?: Error, context?: LogContext): void {
		this.track(this.log('error', message, withError(context, error)));
	}

	/**
	 * Wait for background writes
	 */
	public async flush(): Promise<void> {
		await Promise.all([...this.pending]);
	}

	/**
	 * Flush, then close backends
	 */
	public async close(): Promise<void> {
		await this.flush();
		for (const backend of this.backends) {
			await backend.close?.();
		}
	}

	private track(write: Promise<void>): void {
		const tracked: Promise<void> = write.then(
			() => {
				this.pending.delete(tracked);
			},
			(err: unknown) => {
				this.pending.delete(tracked);
				console.error('[Logger] Failed to write log message:', err);
			},
		);
		this.pending.add(tracked);
	}

	private async log(level: LogLevel, message: string, context?: LogContext): Promise<void> {
		if (!this.shouldLog(level)) {
			return;
		}

		const component = context?.component ?? 'brewstack';
		const logMessage: LogMessage = {
			timestamp: Date.now(),
			level,
			message,
			component,
			...(this.stackDir ? { stackDir: this.stackDir } : {}),
			...(context ? { context } : {}),
		};

		if (this.consoleEnabled) {
			this.consoleLog(level, message, context);
		}

		await Promise.all(
			this.backends.map((backend) =>
				backend.log(logMessage).catch((err: unknown) => {
					// Console output above already carries the message
					console.error('[Logger] Failed to log to backend:', err);
				}),
			),
		);
	}

	private consoleLog(level: LogLevel, message: string, context?: LogContext): void {
		const timestamp = new Date().toISOString();
		const component = context?.component ?? 'brewstack';
		let output = `${timestamp} [${level.toUpperCase()}] [${component}] ${message}`;

		if (context) {
			const { component: _component, ...rest } = context;
			if (Object.keys(rest).length > 0) {
				output += ` ${JSON.stringify(rest)}`;
			}
		}

		switch (level) {
			case 'warn':
				console.warn(output);
				break;
			case 'error':
				console.error(output);
				break;
			default:
				console.log(output);
		}
	}
}

function withError(context: LogContext | undefined, error: Error | undefined): LogContext | undefined {
	if (!error) {
		return context;
	}
	return {
		...context,
		error: {
			name: error.name,
			message: error.message,
			stack: error.stack,
		},
	};
}
