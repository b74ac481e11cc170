/**
 * install: create a stack directory and converge it to the current version.
 *
 * Installing Docker, host packages and rebooting are left to the operator.
 */

import { STACK_VERSION, type ExitCode } from '../lib/constants';
import { Version } from '../version/version';
import { type CommandContext, runCommand } from './context';
import { convergeStack } from './converge';
import { prepareStackDirectory } from './init';

export interface InstallOptions {
	release: string;
	/** Erase an existing stack directory */
	force: boolean;
	/** Start the containers once migrations are applied */
	start: boolean;
}

export function install(context: CommandContext, options: InstallOptions): Promise<ExitCode> {
	return runCommand(context, async () => {
		const lock = await prepareStackDirectory(context, { release: options.release, force: options.force });
		try {
			return await convergeStack(context, {
				target: Version.parse(STACK_VERSION),
				reconcile: options.start,
				lock,
			});
		} finally {
			await lock.release();
		}
	});
}
