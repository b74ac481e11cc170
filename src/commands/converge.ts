import { ConvergenceEngine, describeFailure } from '../engine/convergence-engine';
import { ExitCode } from '../lib/constants';
import { UserError } from '../lib/errors';
import type { ReconcileReport } from '../runtime/types';
import type { LockHandle } from '../state/lock-file';
import type { Version } from '../version/version';
import type { CommandContext } from './context';
import { projectNameOf } from './stack-directory';

export interface ConvergeCommandOptions {
	target: Version;
	reconcile: boolean;
	lock?: LockHandle;
}

/**
 * Runs the convergence engine for the context's stack directory and prints
 * its progress and outcome
 */
export async function convergeStack(context: CommandContext, options: ConvergeCommandOptions): Promise<ExitCode> {
	const { output } = context;
	const runtime = options.reconcile
		? context.createRuntime({ project: await projectNameOf(context.stackDir), pullPolicy: context.config.pullPolicy })
		: undefined;

	const engine = new ConvergenceEngine({
		stackDir: context.stackDir,
		registry: context.registry,
		runtime,
		discovery: context.createDiscovery(),
		discoveryTimeoutMs: context.config.discoveryTimeoutMs,
		logger: context.logger,
	});
	engine.on('step-applied', (step) => output.info(`✅ Applied migration ${step.id} (${step.name})`));
	engine.on('step-skipped', (step) => output.info(`⏭️  Migration ${step.id} (${step.name}) already applied`));

	const result = await engine.converge({ target: options.target, reconcile: options.reconcile, lock: options.lock });

	if (result.report) {
		printReport(context, result.report);
	}
	if (result.status === 'failed') {
		output.error(`❌ ${describeFailure(result)}`);
		return result.error instanceof UserError ? ExitCode.UserError : ExitCode.Failed;
	}

	output.info(`🎉 Stack is at version ${result.installedVersion.toString()}`);
	return ExitCode.Success;
}

export function printReport(context: Pick<CommandContext, 'output'>, report: ReconcileReport): void {
	for (const outcome of report.outcomes) {
		const actions = outcome.actions.join(', ');
		if (outcome.status === 'ok') {
			context.output.info(`   ${outcome.service}: ${actions}`);
		} else if (actions === '') {
			context.output.error(`   ${outcome.service}: failed (${outcome.error ?? 'unknown error'})`);
		} else {
			context.output.error(`   ${outcome.service}: ${actions} failed (${outcome.error ?? 'unknown error'})`);
		}
	}
}
