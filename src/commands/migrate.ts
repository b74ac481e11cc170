import { STACK_VERSION, type ExitCode } from '../lib/constants';
import { InvalidArgumentError } from '../lib/errors';
import { Version } from '../version/version';
import { type CommandContext, runCommand } from './context';
import { convergeStack } from './converge';
import { requireStackDirectory } from './stack-directory';

export interface MigrateOptions {
	/** Defaults to the version this tool ships */
	target?: string;
	reconcile: boolean;
}

export function migrate(context: CommandContext, options: MigrateOptions): Promise<ExitCode> {
	return runCommand(context, async () => {
		const target = options.target ?? STACK_VERSION;
		if (!Version.isValid(target)) {
			throw new InvalidArgumentError(`Invalid target version '${target}'`);
		}
		await requireStackDirectory(context.stackDir);
		return convergeStack(context, { target: Version.parse(target), reconcile: options.reconcile });
	});
}
