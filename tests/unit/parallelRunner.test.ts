import { test, describe } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import { runParallel } from '../../src/services/ParallelRunner.js';
import type { ILifecycle } from '../../src/interfaces/IServiceHooks.js';
import { RecordingService, createTestDeps, removeScratchRoot } from '../fixtures/testServiceBuilder.js';
import { TestAssertions } from '../fixtures/testAssertions.js';

class PhaseRecorder implements ILifecycle {
  constructor(
    private readonly name: string,
    private readonly log: string[],
    private readonly startDelayMs: number = 0,
    private readonly startFailure?: Error
  ) {}

  async start(): Promise<void> {
    this.log.push(`${this.name}.start`);
    if (this.startDelayMs > 0) {
      await delay(this.startDelayMs);
    }
    if (this.startFailure) {
      throw this.startFailure;
    }
    this.log.push(`${this.name}.started`);
  }

  async wait(): Promise<void> {
    this.log.push(`${this.name}.wait`);
  }

  async stop(): Promise<void> {
    this.log.push(`${this.name}.stop`);
  }
}

describe('runParallel', () => {
  test('should start all services before waiting on any, and wait on all before stopping any', async () => {
    const log: string[] = [];

    await runParallel(new PhaseRecorder('producer', log), new PhaseRecorder('consumer', log));

    TestAssertions.assertDeepEqual(log, [
      'producer.start', 'producer.started', 'consumer.start', 'consumer.started',
      'producer.wait', 'consumer.wait',
      'producer.stop', 'consumer.stop',
    ]);
  });

  test('should not start the next service until the previous start returns', async () => {
    const log: string[] = [];

    await runParallel(new PhaseRecorder('s1', log, 20), new PhaseRecorder('s2', log));

    TestAssertions.assertDeepEqual(log, [
      's1.start', 's1.started', 's2.start', 's2.started',
      's1.wait', 's2.wait',
      's1.stop', 's2.stop',
    ]);
  });

  test('should stop at the first start failure without touching later services', async () => {
    const log: string[] = [];
    const failure = new Error('broker unreachable');

    const error = await TestAssertions.assertRejectsWith(
      runParallel(new PhaseRecorder('broken', log, 0, failure), new PhaseRecorder('healthy', log)),
      Error
    );

    TestAssertions.assertEqual(error, failure);
    TestAssertions.assertDeepEqual(log, ['broken.start']);
  });

  test('should leave the second service untouched when the first fails to start a node', async () => {
    const deps = createTestDeps();
    try {
      const first = new RecordingService(deps, { numNodes: 1 });
      const second = new RecordingService(deps, { numNodes: 1 });
      first.failOn('startNode', 'worker1', new Error('boom'));

      const error = await TestAssertions.assertRejectsWith(runParallel(first, second), Error);

      TestAssertions.assertEqual(error.message, 'boom');
      TestAssertions.assertDeepEqual(first.calls, ['stopNode:worker1', 'cleanNode:worker1', 'startNode:worker1']);
      TestAssertions.assertDeepEqual(second.calls, []);
      TestAssertions.assertEqual(second.timestamps.startTime, null);
    } finally {
      removeScratchRoot(deps);
    }
  });

  test('should drive real services through every phase', async () => {
    const deps = createTestDeps();
    try {
      const producer = new RecordingService(deps, { numNodes: 1 });
      const consumer = new RecordingService(deps, { numNodes: 1 });

      await runParallel(producer, consumer);

      TestAssertions.assertDeepEqual(producer.calls, [
        'stopNode:worker1', 'cleanNode:worker1', 'startNode:worker1', 'waitNode:worker1', 'stopNode:worker1',
      ]);
      TestAssertions.assertDeepEqual(consumer.calls, [
        'stopNode:worker2', 'cleanNode:worker2', 'startNode:worker2', 'waitNode:worker2', 'stopNode:worker2',
      ]);
      TestAssertions.assertEqual(consumer.timestamps.stopTime, 1000);
    } finally {
      removeScratchRoot(deps);
    }
  });
});
