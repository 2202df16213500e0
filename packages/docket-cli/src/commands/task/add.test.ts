// packages/docket-cli/src/commands/task/add.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { runAdd } from './add.js';
import { initializeDbFromPath, closeDb, type Services } from '../../db.js';

const NOW = 1_767_225_600;

describe('runAdd', () => {
  let tempDir: string;
  let services: Services;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docket-add-test-'));
    services = initializeDbFromPath(path.join(tempDir, 'test.db'), { clock: () => NOW });
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    closeDb(services);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates an unqueued task as proposed', () => {
    const result = runAdd({ services, description: 'Write report', json: false });

    expect(result).toEqual({
      id: 1,
      description: 'Write report',
      project: null,
      tags: [],
      stage: 'proposed',
      queue_position: null,
    });
  });

  it('queues the new task when asked', () => {
    runAdd({ services, description: 'First', queue: true, json: false });
    const result = runAdd({ services, description: 'Second', queue: true, json: false });

    expect(result.queue_position).toBe(1);
    expect(result.stage).toBe('planned');
    expect(console.log).toHaveBeenLastCalledWith('✓ Created task 2: Second (queued at 1)');
  });

  it('stores project, tags and dates', () => {
    const result = runAdd({
      services,
      description: 'Plan trip',
      project: 'home',
      tags: ['travel', 'summer'],
      due: NOW + 86_400,
      allocSecs: 3600,
      json: false,
    });

    const task = services.taskService.requireTask(result.id);
    expect(task.project).toBe('home');
    expect(task.tags).toEqual(['travel', 'summer']);
    expect(task.due_ts).toBe(NOW + 86_400);
    expect(task.alloc_secs).toBe(3600);
    expect(task.created_ts).toBe(NOW);
  });

  it('prints the result envelope in json mode', () => {
    runAdd({ services, description: 'Json task', json: true });

    const payload = JSON.parse(String(vi.mocked(console.log).mock.calls[0]?.[0]));
    expect(payload.ok).toBe(true);
    expect(payload.data.description).toBe('Json task');
  });

  it('rejects an empty description', () => {
    expect(() => runAdd({ services, description: '', json: false })).toThrow();
    expect(services.taskService.listTasks()).toEqual([]);
  });
});
