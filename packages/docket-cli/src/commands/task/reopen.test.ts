// packages/docket-cli/src/commands/task/reopen.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { Lifecycle } from 'docket-core';
import { runReopen } from './reopen.js';
import { initializeDbFromPath, closeDb, type Services } from '../../db.js';

describe('runReopen', () => {
  let tempDir: string;
  let services: Services;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docket-reopen-test-'));
    services = initializeDbFromPath(path.join(tempDir, 'test.db'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    closeDb(services);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns a completed task to open without queueing it', () => {
    const task = services.taskService.createTask({ description: 'Again', enqueue: true });
    services.taskService.complete(task.id);

    const result = runReopen({ services, taskId: task.id, json: false });

    expect(result.lifecycle).toBe(Lifecycle.Open);
    expect(result.queue_position).toBeNull();
    expect(services.taskService.classify(task.id)).toBe('proposed');
  });

  it('leaves an open task as it is', () => {
    const task = services.taskService.createTask({ description: 'Still open' });

    const result = runReopen({ services, taskId: task.id, json: false });

    expect(result).toEqual(task);
    expect(services.taskService.history(task.id)).toHaveLength(1);
  });
});
