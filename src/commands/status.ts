import { STACK_VERSION, ExitCode } from '../lib/constants';
import { StateStore } from '../state/state-store';
import { emptyStateRecord } from '../state/types';
import { Version } from '../version/version';
import { type CommandContext, runCommand } from './context';
import { requireStackDirectory } from './stack-directory';

export function status(context: CommandContext): Promise<ExitCode> {
	return runCommand(context, async () => {
		await requireStackDirectory(context.stackDir);
		const loaded = await new StateStore(context.stackDir, context.logger).load();
		const record = loaded.status === 'found' ? loaded.record : emptyStateRecord();
		const target = Version.parse(STACK_VERSION);
		const pending = context.registry.pending(record.installedVersion, target, record.appliedMigrations);

		const { output } = context;
		output.info(`Installed version: ${loaded.status === 'found' ? record.installedVersion.toString() : 'not installed'}`);
		output.info(`Available version: ${target.toString()}`);
		output.info(`Applied migrations: ${record.appliedMigrations.length > 0 ? record.appliedMigrations.join(', ') : 'none'}`);
		if (pending.length === 0) {
			output.info('Pending migrations: none');
		} else {
			output.info('Pending migrations:');
			for (const step of pending) {
				output.info(`   ${step.id} ${step.name}: ${step.description}`);
			}
		}
		for (const [key, value] of Object.entries(record.serviceFlags).sort(([a], [b]) => a.localeCompare(b))) {
			output.info(`   ${key} = ${String(value)}`);
		}
		return ExitCode.Success;
	});
}
