/**
 * Component Logger
 * ================
 *
 * Wrapper around Logger that adds the component name to every call.
 *
 *   const logger = new ComponentLogger(rootLogger, 'StateStore');
 *   logger.infoSync('Record saved', { path });  // component: 'StateStore'
 */

import type { Logger } from './logger';
import type { LogContext } from './types';

export class ComponentLogger {
	constructor(
		private readonly logger: Logger | undefined,
		private readonly component: string,
	) {}

	private mergeContext(context?: LogContext): LogContext {
		return {
			component: this.component,
			...context,
		};
	}

	async info(message: string, context?: LogContext): Promise<void> {
		await this.logger?.info(message, this.mergeContext(context));
	}

	async warn(message: string, context?: LogContext): Promise<void> {
		await this.logger?.warn(message, this.mergeContext(context));
	}

	debugSync(message: string, context?: LogContext): void {
		this.logger?.debugSync(message, this.mergeContext(context));
	}

	infoSync(message: string, context?: LogContext): void {
		this.logger?.infoSync(message, this.mergeContext(context));
	}

	warnSync(message: string, context?: LogContext): void {
		this.logger?.warnSync(message, this.mergeContext(context));
	}

	errorSync(message: string, error: Error | undefined, context?: LogContext): void {
		this.logger?.errorSync(message, error, this.mergeContext(context));
	}
}
