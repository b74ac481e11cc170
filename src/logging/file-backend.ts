/**
 * File log backend
 *
 * JSON lines through winston's File transport, size-rotated, under
 * <stackDir>/logs/brewstack.log.
 */

import * as path from 'path';
import winston from 'winston';
import { LOG_DIR, LOG_FILE } from '../lib/constants';
import type { LogBackend, LogMessage } from './types';

const MAX_LOG_SIZE = 5 * 1024 * 1024;
const MAX_LOG_FILES = 3;

export class FileLogBackend implements LogBackend {
	private readonly logger: winston.Logger;

	constructor(stackDir: string, filename: string = path.join(stackDir, LOG_DIR, LOG_FILE)) {
		this.logger = winston.createLogger({
			level: 'debug',
			format: winston.format.combine(
				winston.format.timestamp(),
				winston.format.json(),
			),
			transports: [
				new winston.transports.File({
					filename,
					maxsize: MAX_LOG_SIZE,
					maxFiles: MAX_LOG_FILES,
					tailable: true,
				}),
			],
		});
	}

	async log(message: LogMessage): Promise<void> {
		this.logger.log({
			level: message.level,
			message: message.message,
			component: message.component,
			...(message.stackDir ? { stackDir: message.stackDir } : {}),
			...(message.context ? { context: message.context } : {}),
		});
	}

	async close(): Promise<void> {
		await new Promise<void>((resolve) => {
			this.logger.on('finish', () => resolve());
			this.logger.end();
		});
	}
}
