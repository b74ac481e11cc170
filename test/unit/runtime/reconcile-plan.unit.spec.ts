import { isNoop, planReconciliation } from '../../../src/runtime/reconcile-plan';
import { observed, spec } from '../../helpers/runtime-fixtures';

describe('planReconciliation', () => {
  const summary = (plan: ReturnType<typeof planReconciliation>) =>
    plan.map((step) => `${step.action}:${step.service}`);

  it('should create services without containers', () => {
    expect(summary(planReconciliation([spec('ui')], []))).toEqual(['create:ui']);
  });

  it('should recreate containers whose digest differs', () => {
    const plan = planReconciliation([spec('ui', 'new')], [observed('c1', 'ui', { digest: 'old' })]);

    expect(summary(plan)).toEqual(['recreate:ui']);
  });

  it('should start stopped containers that are up to date', () => {
    const plan = planReconciliation([spec('ui')], [observed('c1', 'ui', { running: false })]);

    expect(summary(plan)).toEqual(['start:ui']);
  });

  it('should leave running, up-to-date containers alone', () => {
    const plan = planReconciliation([spec('ui')], [observed('c1', 'ui')]);

    expect(summary(plan)).toEqual(['unchanged:ui']);
    expect(isNoop(plan)).toBe(true);
  });

  it('should remove containers of services that are no longer desired, first', () => {
    const plan = planReconciliation([spec('ui')], [observed('c1', 'datastore')]);

    expect(summary(plan)).toEqual(['remove:datastore', 'create:ui']);
    expect(isNoop(plan)).toBe(false);
  });

  it('should keep the best duplicate and remove the others', () => {
    const plan = planReconciliation(
      [spec('ui')],
      [
        observed('c1', 'ui', { name: 'a', digest: 'old' }),
        observed('c2', 'ui', { name: 'b', running: false }),
        observed('c3', 'ui', { name: 'c' }),
      ],
    );

    expect(plan).toEqual([
      expect.objectContaining({ action: 'remove', container: expect.objectContaining({ id: 'c1' }) }),
      expect.objectContaining({ action: 'remove', container: expect.objectContaining({ id: 'c2' }) }),
      expect.objectContaining({ action: 'unchanged', container: expect.objectContaining({ id: 'c3' }) }),
    ]);
  });

  it('should treat containers without a digest label as outdated', () => {
    const plan = planReconciliation([spec('ui')], [observed('c1', 'ui', { digest: undefined })]);

    expect(summary(plan)).toEqual(['recreate:ui']);
  });

  it('should order service updates by name', () => {
    expect(summary(planReconciliation([spec('ui'), spec('eventbus')], []))).toEqual(['create:eventbus', 'create:ui']);
  });
});
