import { install } from '../../../src/commands/install';
import { migrate } from '../../../src/commands/migrate';
import { MigrationRegistry } from '../../../src/migrations/migration-registry';
import { StateStore } from '../../../src/state/state-store';
import { createTestCommandContext } from '../../helpers/command-context';
import { flagStep } from '../../helpers/migration-fixtures';
import { makeTempDir, removeTempDir, writeFile } from '../../helpers/temp-dir';

describe('migrate', () => {
  let stackDir: string;

  beforeEach(() => {
    stackDir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(stackDir);
  });

  it('should migrate in stages up to each target', async () => {
    // Arrange
    writeFile(stackDir, '.env', 'BREWSTACK_RELEASE=edge\n');
    const { context, output } = createTestCommandContext(stackDir);

    // Act
    const first = await migrate(context, { target: '0.5.0', reconcile: false });
    const firstLines = [...output.lines];
    output.clear();
    const second = await migrate(context, { reconcile: false });

    // Assert
    expect(first).toBe(0);
    expect(firstLines).toEqual([
      '✅ Applied migration 1 (env-defaults)',
      '✅ Applied migration 2 (core-services)',
      '✅ Applied migration 3 (redis-datastore)',
      '🎉 Stack is at version 0.5.0',
    ]);
    expect(second).toBe(0);
    expect(output.lines).toEqual([
      '✅ Applied migration 4 (controller-identities)',
      '✅ Applied migration 5 (proxy-v2)',
      '🎉 Stack is at version 0.7.0',
    ]);

    const loaded = await new StateStore(stackDir).load();
    expect(loaded.status === 'found' && loaded.record.appliedMigrations).toEqual([1, 2, 3, 4, 5]);
  });

  it('should do nothing on a stack that is up to date', async () => {
    const { context, output } = createTestCommandContext(stackDir);
    await install(context, { release: 'edge', force: true, start: false });
    output.clear();

    const code = await migrate(context, { reconcile: false });

    expect(code).toBe(0);
    expect(output.lines).toEqual(['🎉 Stack is at version 0.7.0']);
  });

  it('should refuse to downgrade', async () => {
    // Arrange
    const { context, output } = createTestCommandContext(stackDir);
    await install(context, { release: 'edge', force: true, start: false });
    output.clear();

    // Act
    const code = await migrate(context, { target: '0.6.0', reconcile: false });

    // Assert
    expect(code).toBe(2);
    expect(output.errors).toEqual([
      '❌ Failed during loading: Installed version 0.7.0 is newer than target 0.6.0; downgrades are not supported',
    ]);
  });

  it('should reject an invalid target version', async () => {
    const { context, output } = createTestCommandContext(stackDir);

    const code = await migrate(context, { target: 'latest', reconcile: false });

    expect(code).toBe(2);
    expect(output.errors).toEqual(["❌ Invalid target version 'latest'"]);
  });

  it('should require a stack directory', async () => {
    const { context, output } = createTestCommandContext(stackDir);

    const code = await migrate(context, { reconcile: false });

    expect(code).toBe(2);
    expect(output.errors).toEqual([`❌ '${stackDir}' is not a brewstack directory`]);
  });

  it('should exit 1 when containers fail to converge', async () => {
    // Arrange
    writeFile(stackDir, '.env', 'BREWSTACK_RELEASE=edge\n');
    const { context, output, operations } = createTestCommandContext(stackDir);
    operations.failingServices.add('ui');

    // Act
    const code = await migrate(context, { reconcile: true });

    // Assert
    expect(code).toBe(1);
    expect(output.errors).toEqual([
      '   ui: create failed (cannot create ui)',
      '❌ Failed during reconciling: 1 service(s) failed to converge: ui',
    ]);
  });

  it('should exit 1 and name the migration that failed', async () => {
    // Arrange
    writeFile(stackDir, '.env', 'BREWSTACK_RELEASE=edge\n');
    const registry = new MigrationRegistry([
      flagStep(0, '0.0.0'),
      flagStep(1, '1.0.0', {
        transform: () => {
          throw new Error('controller unreachable');
        },
      }),
      flagStep(2, '2.0.0'),
    ]);
    const { context, output } = createTestCommandContext(stackDir, { registry });

    // Act
    const code = await migrate(context, { target: '3.0.0', reconcile: false });

    // Assert
    expect(code).toBe(1);
    expect(output.lines).toEqual(['✅ Applied migration 0 (step-0)']);
    expect(output.errors).toEqual([
      '❌ Failed during migrating at migration 1: Migration 1 (step-1) failed: controller unreachable',
    ]);
    const loaded = await new StateStore(stackDir).load();
    expect(loaded.status === 'found' && loaded.record.appliedMigrations).toEqual([0]);
    expect(loaded.status === 'found' && loaded.record.installedVersion.toString()).toBe('0.0.0');
  });
});
