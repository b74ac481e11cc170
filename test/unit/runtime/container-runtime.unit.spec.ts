/**
 * Unit Tests for ContainerRuntime
 * Real planning and execution over in-memory container operations
 */

import { ContainerRuntime } from '../../../src/runtime/container-runtime';
import { FakeContainerOperations } from '../../helpers/fake-container-operations';
import { createTestLogger } from '../../helpers/memory-log-backend';
import { observed, spec } from '../../helpers/runtime-fixtures';

describe('ContainerRuntime', () => {
  let operations: FakeContainerOperations;
  let runtime: ContainerRuntime;

  afterEach(() => {
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    operations = new FakeContainerOperations();
    runtime = new ContainerRuntime(operations, createTestLogger().logger);
  });

  it('should report one outcome per service', async () => {
    // Arrange
    operations.addContainer(observed('old-1', 'datastore'));
    operations.addContainer(observed('ui-1', 'ui', { running: false }));

    // Act
    const report = await runtime.reconcile([spec('eventbus'), spec('ui')]);

    // Assert
    expect(report).toEqual({
      converged: true,
      outcomes: [
        { service: 'datastore', actions: ['remove'], status: 'ok' },
        { service: 'eventbus', actions: ['create'], status: 'ok' },
        { service: 'ui', actions: ['start'], status: 'ok' },
      ],
    });
  });

  it('should issue no operations on a second run', async () => {
    const desired = [spec('eventbus'), spec('history'), spec('ui')];
    await runtime.reconcile(desired);
    operations.resetCalls();

    const report = await runtime.reconcile(desired);

    expect(operations.totalCalls()).toBe(0);
    expect(report.outcomes.map((outcome) => outcome.actions)).toEqual([['unchanged'], ['unchanged'], ['unchanged']]);
  });

  it('should replace an outdated container', async () => {
    operations.addContainer(observed('ui-1', 'ui', { digest: 'old' }));

    await runtime.reconcile([spec('ui')]);

    expect(operations.calls.remove).toEqual(['ui']);
    expect(operations.calls.create).toEqual(['ui']);
    expect([...operations.containers.values()].map((container) => container.digest)).toEqual(['ui-digest']);
  });

  it('should not let one failing service stop the others', async () => {
    // Arrange
    operations.failingServices.add('history');

    // Act
    const report = await runtime.reconcile([spec('eventbus'), spec('history'), spec('ui')]);

    // Assert
    expect(report.converged).toBe(false);
    expect(report.outcomes).toEqual([
      { service: 'eventbus', actions: ['create'], status: 'ok' },
      { service: 'history', actions: ['create'], status: 'failed', error: 'cannot create history' },
      { service: 'ui', actions: ['create'], status: 'ok' },
    ]);
    expect(operations.calls.create.sort()).toEqual(['eventbus', 'history', 'ui']);
  });

  it('should finish every removal before creating anything', async () => {
    // Arrange
    const events: string[] = [];
    const remove = operations.remove.bind(operations);
    const create = operations.create.bind(operations);
    jest.spyOn(operations, 'remove').mockImplementation(async (container) => {
      events.push(`remove-start ${container.service}`);
      await new Promise<void>((resolve) => setImmediate(resolve));
      await remove(container);
      events.push(`remove-end ${container.service}`);
    });
    jest.spyOn(operations, 'create').mockImplementation(async (desired) => {
      events.push(`create ${desired.name}`);
      await create(desired);
    });
    operations.addContainer(observed('old-1', 'oldproxy'));

    // Act
    const report = await runtime.reconcile([spec('proxy')]);

    // Assert
    expect(events).toEqual(['remove-start oldproxy', 'remove-end oldproxy', 'create proxy']);
    expect(report.converged).toBe(true);
  });

  it('should report a service without a runtime spec as failed and leave its containers alone', async () => {
    // Arrange
    operations.addContainer(observed('ui-1', 'ui', { digest: 'old' }));

    // Act
    const report = await runtime.reconcile(
      [spec('redis')],
      [{ service: 'ui', error: "Service 'ui' has no resolvable image" }],
    );

    // Assert
    expect(report).toEqual({
      converged: false,
      outcomes: [
        { service: 'redis', actions: ['create'], status: 'ok' },
        { service: 'ui', actions: [], status: 'failed', error: "Service 'ui' has no resolvable image" },
      ],
    });
    expect(operations.calls.remove).toEqual([]);
    expect(operations.containers.has('ui-1')).toBe(true);
  });

  it('should remove everything when nothing is desired', async () => {
    operations.addContainer(observed('ui-1', 'ui'));
    operations.addContainer(observed('eventbus-1', 'eventbus'));

    const report = await runtime.reconcile([]);

    expect(report.converged).toBe(true);
    expect(operations.containers.size).toBe(0);
  });

  it('should expose the plan without executing it', async () => {
    operations.addContainer(observed('ui-1', 'ui'));

    const plan = await runtime.plan([spec('ui'), spec('redis')]);

    expect(plan.map((step) => step.action)).toEqual(['create', 'unchanged']);
    expect(operations.totalCalls()).toBe(0);
  });
});
