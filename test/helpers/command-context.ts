import type { BrewstackConfig } from '../../src/config/config-loader';
import { DEFAULT_CONFIG } from '../../src/config/config-loader';
import type { CommandContext, CommandOutput, RuntimeRequest } from '../../src/commands/context';
import type { DiscoveredDevice } from '../../src/discovery/types';
import type { MigrationRegistry } from '../../src/migrations/migration-registry';
import { builtinRegistry } from '../../src/migrations/steps';
import { ContainerRuntime } from '../../src/runtime/container-runtime';
import { FakeContainerOperations } from './fake-container-operations';
import { FakeDiscovery } from './fake-discovery';
import { MemoryLogBackend, createTestLogger } from './memory-log-backend';

export class CapturedOutput implements CommandOutput {
  public readonly lines: string[] = [];
  public readonly errors: string[] = [];

  info(line: string): void {
    this.lines.push(line);
  }

  error(line: string): void {
    this.errors.push(line);
  }

  clear(): void {
    this.lines.length = 0;
    this.errors.length = 0;
  }
}

export interface TestCommandContext {
  context: CommandContext;
  output: CapturedOutput;
  operations: FakeContainerOperations;
  discovery: FakeDiscovery;
  backend: MemoryLogBackend;
  runtimeRequests: RuntimeRequest[];
  runnerRequests: RuntimeRequest[];
}

export interface TestCommandContextOptions {
  devices?: DiscoveredDevice[];
  discoveryBehavior?: 'resolve' | 'hang' | 'reject';
  config?: Partial<BrewstackConfig>;
  /** Defaults to the built-in steps */
  registry?: MigrationRegistry;
}

/**
 * Command context over a temp stack directory, in-memory containers and
 * canned discovery results
 */
export function createTestCommandContext(
  stackDir: string,
  options: TestCommandContextOptions = {},
): TestCommandContext {
  const output = new CapturedOutput();
  const operations = new FakeContainerOperations();
  const discovery = new FakeDiscovery(options.devices ?? [], options.discoveryBehavior ?? 'resolve');
  const { logger, backend } = createTestLogger();
  const runtimeRequests: RuntimeRequest[] = [];
  const runnerRequests: RuntimeRequest[] = [];

  const context: CommandContext = {
    stackDir,
    config: { ...DEFAULT_CONFIG, discoveryTimeoutMs: 50, logToFile: false, ...options.config },
    logger,
    output,
    registry: options.registry ?? builtinRegistry(),
    createRuntime: (request) => {
      runtimeRequests.push(request);
      return new ContainerRuntime(operations, logger);
    },
    createRunner: (request) => {
      runnerRequests.push(request);
      return operations;
    },
    createDiscovery: () => discovery,
  };

  return { context, output, operations, discovery, backend, runtimeRequests, runnerRequests };
}
