/**
 * Unit Tests for ConvergenceEngine
 * Real state, compose and env files in a temporary stack directory;
 * containers and discovery are in-memory fakes.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createDescriptor } from '../../../src/compose/service-descriptor-set';
import { ConvergenceEngine } from '../../../src/engine/convergence-engine';
import type { EnginePhase } from '../../../src/engine/types';
import {
  CorruptStateError,
  DowngradeError,
  LockHeldError,
  MigrationFailureError,
  ReconciliationFailureError,
} from '../../../src/lib/errors';
import { MigrationRegistry } from '../../../src/migrations/migration-registry';
import { builtinRegistry } from '../../../src/migrations/steps';
import type { MigrationStep } from '../../../src/migrations/types';
import { ContainerRuntime } from '../../../src/runtime/container-runtime';
import { acquireLock } from '../../../src/state/lock-file';
import { StateStore } from '../../../src/state/state-store';
import type { StateRecord } from '../../../src/state/types';
import { Version } from '../../../src/version/version';
import { FakeContainerOperations } from '../../helpers/fake-container-operations';
import { FakeDiscovery, device } from '../../helpers/fake-discovery';
import { createTestLogger } from '../../helpers/memory-log-backend';
import { flagStep } from '../../helpers/migration-fixtures';
import { makeTempDir, readFile, removeTempDir, writeFile } from '../../helpers/temp-dir';

const v = Version.parse;

describe('ConvergenceEngine', () => {
  let stackDir: string;
  let operations: FakeContainerOperations;

  const threeSteps = (overrides: Partial<Record<number, Partial<MigrationStep>>> = {}) =>
    new MigrationRegistry([
      flagStep(1, '0.0.0', overrides[1]),
      flagStep(2, '1.0.0', overrides[2]),
      flagStep(3, '2.0.0', overrides[3]),
    ]);

  const createEngine = (registry: MigrationRegistry, extra: { discovery?: FakeDiscovery; dir?: string } = {}) => {
    const { logger, backend } = createTestLogger();
    const engine = new ConvergenceEngine({
      stackDir: extra.dir ?? stackDir,
      registry,
      runtime: new ContainerRuntime(operations, logger),
      ...(extra.discovery ? { discovery: extra.discovery } : {}),
      discoveryTimeoutMs: 20,
      logger,
    });
    return { engine, backend, logger };
  };

  const saveState = async (record: StateRecord): Promise<void> => {
    await new StateStore(stackDir).save(record);
  };

  const loadState = async (dir: string = stackDir): Promise<StateRecord> => {
    const loaded = await new StateStore(dir).load();
    if (loaded.status !== 'found') {
      throw new Error('expected a state record');
    }
    return loaded.record;
  };

  beforeEach(() => {
    stackDir = makeTempDir();
    operations = new FakeContainerOperations();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeTempDir(stackDir);
  });

  describe('fresh install', () => {
    it('should run every step and persist the target version', async () => {
      // Arrange
      const { engine } = createEngine(threeSteps());
      const phases: EnginePhase[] = [];
      engine.on('phase-changed', (phase) => phases.push(phase));

      // Act
      const result = await engine.converge({ target: v('3.0.0') });

      // Assert
      expect(result.status).toBe('done');
      expect(result.applied).toEqual([1, 2, 3]);
      expect(phases).toEqual(['loading', 'migrating', 'reconciling', 'done']);
      const state = await loadState();
      expect(state.installedVersion.toString()).toBe('3.0.0');
      expect(state.appliedMigrations).toEqual([1, 2, 3]);
      expect(state.serviceFlags).toEqual({ 'step.1': true, 'step.2': true, 'step.3': true });
      expect(engine.getPhase()).toBe('done');
    });

    it('should release the lock when finished', async () => {
      const { engine } = createEngine(threeSteps());

      await engine.converge({ target: v('3.0.0') });

      expect(fs.existsSync(path.join(stackDir, '.brewstack', 'lock'))).toBe(false);
    });
  });

  describe('upgrades', () => {
    it('should only run steps whose lower bound lies above the installed version', async () => {
      // Arrange
      await saveState({ installedVersion: v('1.0.0'), appliedMigrations: [1], serviceFlags: {} });
      const { engine } = createEngine(threeSteps());

      // Act
      const result = await engine.converge({ target: v('3.0.0') });

      // Assert
      expect(result.applied).toEqual([2, 3]);
      expect((await loadState()).appliedMigrations).toEqual([1, 2, 3]);
    });

    it('should leave an applied migration 0 alone and run the later ones', async () => {
      // Arrange
      await saveState({ installedVersion: v('1.0.0'), appliedMigrations: [0], serviceFlags: {} });
      const registry = new MigrationRegistry([flagStep(0, '0.0.0'), flagStep(1, '1.0.0'), flagStep(2, '2.0.0')]);
      const { engine } = createEngine(registry);

      // Act
      const result = await engine.converge({ target: v('3.0.0') });

      // Assert
      expect(result.status).toBe('done');
      expect(result.applied).toEqual([1, 2]);
      const state = await loadState();
      expect(state.appliedMigrations).toEqual([0, 1, 2]);
      expect(state.serviceFlags).toEqual({ 'step.1': true, 'step.2': true });
    });

    it('should skip steps that an interrupted run already committed', async () => {
      await saveState({ installedVersion: v('0.0.0'), appliedMigrations: [1], serviceFlags: {} });
      const { engine } = createEngine(threeSteps());
      const skipped: number[] = [];
      engine.on('step-skipped', (step) => skipped.push(step.id));

      const result = await engine.converge({ target: v('3.0.0') });

      expect(result.status === 'done' && result.skipped).toEqual([1]);
      expect(result.applied).toEqual([2, 3]);
      expect(skipped).toEqual([1]);
    });

    it('should do nothing but reconcile when already at the target', async () => {
      await saveState({ installedVersion: v('3.0.0'), appliedMigrations: [1, 2, 3], serviceFlags: {} });
      const { engine } = createEngine(threeSteps());

      const result = await engine.converge({ target: v('3.0.0') });

      expect(result.status).toBe('done');
      expect(result.applied).toEqual([]);
    });

    it('should refuse to downgrade', async () => {
      await saveState({ installedVersion: v('2.0.0'), appliedMigrations: [1, 2, 3], serviceFlags: {} });
      const { engine } = createEngine(threeSteps());

      const result = await engine.converge({ target: v('1.0.0') });

      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.phase).toBe('loading');
        expect(result.error).toBeInstanceOf(DowngradeError);
      }
      expect((await loadState()).installedVersion.toString()).toBe('2.0.0');
    });
  });

  describe('failures', () => {
    it('should stop at a failing step and keep earlier checkpoints', async () => {
      // Arrange
      const failing = threeSteps({
        2: {
          transform: () => {
            throw new Error('controller unreachable');
          },
        },
      });
      const { engine } = createEngine(failing);

      // Act
      const result = await engine.converge({ target: v('3.0.0') });

      // Assert
      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.phase).toBe('migrating');
        expect(result.lastCompletedPhase).toBe('loading');
        expect(result.failedStepId).toBe(2);
        expect(result.error).toBeInstanceOf(MigrationFailureError);
        expect(result.error.message).toBe('Migration 2 (step-2) failed: controller unreachable');
      }
      expect(engine.getPhase()).toBe('failed');
      const state = await loadState();
      expect(state.appliedMigrations).toEqual([1]);
      expect(state.installedVersion.toString()).toBe('0.0.0');
      expect(operations.totalCalls()).toBe(0);
    });

    it('should resume after the failing step is fixed', async () => {
      const failing = threeSteps({
        2: {
          transform: () => {
            throw new Error('controller unreachable');
          },
        },
      });
      await createEngine(failing).engine.converge({ target: v('3.0.0') });

      const result = await createEngine(threeSteps()).engine.converge({ target: v('3.0.0') });

      expect(result.status === 'done' && result.skipped).toEqual([1]);
      expect(result.applied).toEqual([2, 3]);
      expect((await loadState()).installedVersion.toString()).toBe('3.0.0');
    });

    it('should fail a step whose output breaks the descriptor invariants', async () => {
      const broken = new MigrationRegistry([
        flagStep(1, '0.0.0', {
          transform: ({ state, services, env }) => ({
            state,
            services: services.upsert(createDescriptor({ name: 'ui', image: 'brewstack/ui:${UNDECLARED}' })),
            env,
          }),
        }),
      ]);
      const { engine } = createEngine(broken);

      const result = await engine.converge({ target: v('1.0.0') });

      expect(result.status === 'failed' && result.failedStepId).toBe(1);
      expect(fs.existsSync(path.join(stackDir, 'docker-compose.yml'))).toBe(false);
    });

    it('should not migrate when the state record is corrupt', async () => {
      writeFile(stackDir, '.brewstack/state.json', 'not json');
      const { engine } = createEngine(threeSteps());

      const result = await engine.converge({ target: v('3.0.0') });

      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.phase).toBe('loading');
        expect(result.error).toBeInstanceOf(CorruptStateError);
        expect(result.applied).toEqual([]);
      }
      expect(readFile(stackDir, '.brewstack/state.json')).toBe('not json');
    });

    it('should throw LockHeldError while another command holds the stack', async () => {
      const lock = await acquireLock(stackDir);
      const { engine } = createEngine(threeSteps());

      await expect(engine.converge({ target: v('3.0.0') })).rejects.toThrow(LockHeldError);

      expect(engine.getPhase()).toBe('idle');
      await lock.release();
    });

    it('should run under a lock the caller holds and leave it held', async () => {
      const lock = await acquireLock(stackDir);
      const { engine } = createEngine(threeSteps());

      const result = await engine.converge({ target: v('3.0.0'), lock });

      expect(result.status).toBe('done');
      expect(fs.existsSync(lock.path)).toBe(true);
      await lock.release();
    });

    it('should report failed services and keep the installed version', async () => {
      // Arrange
      operations.failingServices.add('ui');
      const { engine } = createEngine(builtinRegistry());

      // Act
      const result = await engine.converge({ target: v('0.7.0') });

      // Assert
      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.phase).toBe('reconciling');
        expect(result.lastCompletedPhase).toBe('migrating');
        expect(result.error).toBeInstanceOf(ReconciliationFailureError);
        expect(result.report?.outcomes.find((outcome) => outcome.service === 'ui')?.status).toBe('failed');
        expect(result.report?.outcomes.filter((outcome) => outcome.status === 'ok').map((outcome) => outcome.service)).toEqual(
          ['eventbus', 'history', 'proxy', 'redis'],
        );
      }
      const state = await loadState();
      expect(state.installedVersion.toString()).toBe('0.0.0');
      expect(state.appliedMigrations).toEqual([1, 2, 3, 4, 5]);
    });
  });

  describe('built-in migrations', () => {
    it('should converge a fresh stack and then leave it alone', async () => {
      // Arrange
      const { engine } = createEngine(builtinRegistry());

      // Act
      const first = await engine.converge({ target: v('0.7.0') });
      operations.resetCalls();
      const second = await engine.converge({ target: v('0.7.0') });

      // Assert
      expect(first.status).toBe('done');
      expect([...operations.containers.values()].map((container) => container.service).sort()).toEqual([
        'eventbus',
        'history',
        'proxy',
        'redis',
        'ui',
      ]);
      expect(second.status).toBe('done');
      expect(second.applied).toEqual([]);
      expect(operations.totalCalls()).toBe(0);
    });

    it('should end in the same state after a crash between checkpoints', async () => {
      // Arrange: an uninterrupted run in its own directory
      const referenceDir = makeTempDir();
      await createEngine(builtinRegistry(), { dir: referenceDir }).engine.converge({
        target: v('0.7.0'),
        reconcile: false,
      });

      // Arrange: the third state save fails after its compose and .env writes
      const rename = fs.promises.rename.bind(fs.promises);
      let stateWrites = 0;
      jest.spyOn(fs.promises, 'rename').mockImplementation(async (from: fs.PathLike, to: fs.PathLike) => {
        if (String(to).endsWith('state.json')) {
          stateWrites += 1;
          if (stateWrites === 3) {
            throw new Error('power loss');
          }
        }
        return rename(from, to);
      });

      // Act
      const crashed = await createEngine(builtinRegistry()).engine.converge({ target: v('0.7.0'), reconcile: false });
      jest.restoreAllMocks();
      const resumed = await createEngine(builtinRegistry()).engine.converge({ target: v('0.7.0'), reconcile: false });

      // Assert
      expect(crashed.status === 'failed' && crashed.failedStepId).toBe(3);
      expect((await loadState()).appliedMigrations).toEqual([1, 2, 3, 4, 5]);
      expect(resumed.applied).toEqual([3, 4, 5]);
      expect(readFile(stackDir, 'docker-compose.yml')).toBe(readFile(referenceDir, 'docker-compose.yml'));
      expect(readFile(stackDir, '.env')).toBe(readFile(referenceDir, '.env'));
      const [state, reference] = [await loadState(), await loadState(referenceDir)];
      expect({ ...state, updatedAt: undefined }).toEqual({ ...reference, updatedAt: undefined });
      removeTempDir(referenceDir);
    });

    it('should warn when the compose file was edited by hand', async () => {
      await createEngine(builtinRegistry()).engine.converge({ target: v('0.7.0'), reconcile: false });
      fs.appendFileSync(path.join(stackDir, 'docker-compose.yml'), '# local tweak\n');
      const { engine, backend } = createEngine(builtinRegistry());

      await engine.converge({ target: v('0.7.0'), reconcile: false });

      expect(backend.texts('warn')).toContain('Compose definition was edited since the last run');
    });
  });

  describe('discovery', () => {
    const discoveringStep = (id: number, lower: string, seen: string[][]): MigrationStep =>
      flagStep(id, lower, {
        transform: async (input, { discover }) => {
          seen.push((await discover()).map((found) => found.id));
          return input;
        },
      });

    it('should continue with no devices when discovery does not answer', async () => {
      // Arrange
      const seen: string[][] = [];
      const discovery = new FakeDiscovery([], 'hang');
      const { engine, backend } = createEngine(new MigrationRegistry([discoveringStep(1, '0.0.0', seen)]), { discovery });

      // Act
      const result = await engine.converge({ target: v('1.0.0') });

      // Assert
      expect(result.status).toBe('done');
      expect(seen).toEqual([[]]);
      expect(discovery.calls).toEqual([20]);
      expect(backend.texts('warn')).toContain('Discovery unavailable, continuing without devices');
    });

    it('should discover at most once per run', async () => {
      const seen: string[][] = [];
      const discovery = new FakeDiscovery([device('AAA')]);
      const registry = new MigrationRegistry([discoveringStep(1, '0.0.0', seen), discoveringStep(2, '0.1.0', seen)]);
      const { engine } = createEngine(registry, { discovery });

      await engine.converge({ target: v('1.0.0') });

      expect(seen).toEqual([['AAA'], ['AAA']]);
      expect(discovery.calls).toHaveLength(1);
    });
  });
});
