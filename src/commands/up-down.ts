/**
 * up / down: converge containers with the compose definition as it is,
 * without running migrations
 */

import { ComposeStore } from '../compose/compose-store';
import { EnvFile } from '../compose/env-file';
import { ExitCode } from '../lib/constants';
import { toRuntimeSpecs } from '../runtime/runtime-spec';
import type { PullPolicy } from '../runtime/docker-operations';
import type { RuntimeServiceSpec, UnresolvedService } from '../runtime/types';
import { type CommandContext, runCommand } from './context';
import { printReport } from './converge';
import { projectNameOf, requireStackDirectory, withStackLock } from './stack-directory';

export interface UpOptions {
	/** Pull every image, even those present locally */
	pull: boolean;
}

export function up(context: CommandContext, options: UpOptions): Promise<ExitCode> {
	return runCommand(context, async () => {
		await requireStackDirectory(context.stackDir);
		return withStackLock(context, async () => {
			const { services } = await new ComposeStore(context.stackDir, context.logger).read();
			const env = await new EnvFile(context.stackDir).read();
			const { specs, warnings, unresolved } = toRuntimeSpecs(services, env, context.stackDir);
			for (const warning of warnings) {
				context.output.error(`⚠️  ${warning}`);
			}
			return applyContainers(context, specs, options.pull ? 'always' : context.config.pullPolicy, unresolved);
		});
	});
}

export function down(context: CommandContext): Promise<ExitCode> {
	return runCommand(context, async () => {
		await requireStackDirectory(context.stackDir);
		return withStackLock(context, () => applyContainers(context, [], context.config.pullPolicy));
	});
}

async function applyContainers(
	context: CommandContext,
	specs: RuntimeServiceSpec[],
	pullPolicy: PullPolicy,
	unresolved: UnresolvedService[] = [],
): Promise<ExitCode> {
	const runtime = context.createRuntime({ project: await projectNameOf(context.stackDir), pullPolicy });
	const report = await runtime.reconcile(specs, unresolved);
	printReport(context, report);
	if (!report.converged) {
		context.output.error('❌ Some services did not converge');
		return ExitCode.Failed;
	}
	context.output.info(specs.length > 0 ? '✅ Stack is up' : '✅ Stack is down');
	return ExitCode.Success;
}
