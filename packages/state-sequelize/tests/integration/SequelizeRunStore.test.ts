import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { RunRecord } from '@customer360/core';
import { RunConflictError, RunStatus } from '@customer360/core';
import { SequelizeRunStore } from '../../src/SequelizeRunStore.js';
import { createTestDatabase } from '../sqlite-database.js';
import type { TestDatabase } from '../sqlite-database.js';

function running(runId: string, startTime: number, jobName = 'Customer-360'): RunRecord {
  return { runId, jobName, startTime, status: RunStatus.RUNNING, dqScore: 87.5, errorCount: 3 };
}

describe('SequelizeRunStore', () => {
  let db: TestDatabase;
  let store: SequelizeRunStore;

  beforeEach(async () => {
    db = createTestDatabase();
    store = new SequelizeRunStore(db.sequelize);
    await store.initialize();
  });

  afterEach(async () => {
    await db.dispose();
  });

  it('should be idempotent on initialize', async () => {
    await expect(store.initialize()).resolves.toBeUndefined();
  });

  it('should persist and read back a RUNNING record', async () => {
    await store.create(running('Customer-360_20240601120000', 1717243200000));

    expect(await store.get('Customer-360_20240601120000')).toEqual({
      runId: 'Customer-360_20240601120000',
      jobName: 'Customer-360',
      startTime: 1717243200000,
      status: RunStatus.RUNNING,
      dqScore: 87.5,
      errorCount: 3,
    });
  });

  it('should return null for an unknown run', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('should reject a duplicate run id', async () => {
    await store.create(running('run-a', 1000));

    await expect(store.create(running('run-a', 2000))).rejects.toBeInstanceOf(RunConflictError);
    await expect(store.create(running('run-a', 3000))).rejects.toThrow("Run 'run-a' already exists");
    expect((await store.get('run-a'))?.startTime).toBe(1000);
  });

  it('should apply the completion fields', async () => {
    await store.create(running('run-a', 1000));

    await store.complete('run-a', {
      status: RunStatus.FAILED,
      endTime: 5000,
      recordCount: 9,
      dqScore: 87.5,
      errorCount: 3,
      error: 'Run run-a failed: boom',
    });

    expect(await store.get('run-a')).toEqual({
      runId: 'run-a',
      jobName: 'Customer-360',
      startTime: 1000,
      status: RunStatus.FAILED,
      endTime: 5000,
      recordCount: 9,
      dqScore: 87.5,
      errorCount: 3,
      error: 'Run run-a failed: boom',
    });
  });

  it('should reject completing an unknown run', async () => {
    await expect(
      store.complete('missing', { status: RunStatus.SUCCESS, endTime: 1, recordCount: 0, dqScore: 0, errorCount: 0 }),
    ).rejects.toThrow("Run 'missing' not found");
  });

  describe('findRunning', () => {
    it('should return the most recent RUNNING record of the job since the cutoff', async () => {
      await store.create(running('old', 1000));
      await store.create(running('newer', 3000));
      await store.create(running('other-job', 4000, 'Other'));

      expect((await store.findRunning('Customer-360', 500))?.runId).toBe('newer');
    });

    it('should ignore records started before the cutoff', async () => {
      await store.create(running('old', 1000));

      expect(await store.findRunning('Customer-360', 2000)).toBeNull();
    });

    it('should ignore finished records', async () => {
      await store.create(running('done', 3000));
      await store.complete('done', { status: RunStatus.SUCCESS, endTime: 4000, recordCount: 1, dqScore: 1, errorCount: 0 });

      expect(await store.findRunning('Customer-360', 0)).toBeNull();
    });
  });
});
