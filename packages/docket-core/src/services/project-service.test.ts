import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestServices, TEST_EPOCH, type TestHarness } from '../db/test-utils.js';
import { ProjectExistsError, ProjectNotFoundError } from '../errors.js';
import { EventType, Lifecycle, PROJECT_EVENT_TASK_ID } from '../events/types.js';

const T = TEST_EPOCH;

describe('ProjectService', () => {
  let h: TestHarness;

  function projectEvents() {
    return h.eventStore.getByTaskId(PROJECT_EVENT_TASK_ID);
  }

  beforeEach(() => {
    h = createTestServices();
  });

  afterEach(() => {
    h.db.close();
  });

  describe('createProject', () => {
    it('creates an active project and logs it', () => {
      const project = h.projectService.createProject('home');

      expect(project).toEqual({ id: 1, name: 'home', archived: false, created_ts: T, modified_ts: T });
      expect(projectEvents().map(e => [e.type, e.data])).toEqual([
        [EventType.ProjectCreated, { name: 'home' }],
      ]);
    });

    it('rejects a name that is taken or malformed', () => {
      h.projectService.createProject('home');

      expect(() => h.projectService.createProject('home')).toThrow(ProjectExistsError);
      expect(() => h.projectService.createProject('home')).toThrow("Project 'home' already exists");
      expect(() => h.projectService.createProject('.hidden')).toThrow();
    });
  });

  describe('tasks naming a project', () => {
    it('registers the project on create and update', () => {
      const id = h.taskService.createTask({ description: 'a', project: 'work' }).id;
      h.taskService.updateTask(id, { project: 'work.email' });
      h.taskService.createTask({ description: 'b', project: 'work' });

      expect(h.projectService.listProjects().map(p => p.name)).toEqual(['work', 'work.email']);
      expect(projectEvents()).toHaveLength(2);
    });

    it('matches nested projects by prefix when listing tasks', () => {
      const a = h.taskService.createTask({ description: 'a', project: 'work' }).id;
      const b = h.taskService.createTask({ description: 'b', project: 'work.email' }).id;
      h.taskService.createTask({ description: 'c', project: 'workshop' });
      h.taskService.createTask({ description: 'd', project: 'work_x' });

      expect(h.taskService.listTasks({ project: 'work' }).map(t => t.id)).toEqual([a, b]);
      expect(h.taskService.listTasks({ project: 'work.email' }).map(t => t.id)).toEqual([b]);
    });
  });

  describe('listProjects', () => {
    it('counts tasks and hides archived projects unless asked', () => {
      const a = h.taskService.createTask({ description: 'a', project: 'home' }).id;
      h.taskService.createTask({ description: 'b', project: 'home' });
      h.taskService.complete(a);
      h.projectService.createProject('garden');
      h.projectService.archiveProject('garden');

      expect(h.projectService.listProjects().map(p => [p.name, p.open_tasks, p.total_tasks])).toEqual([
        ['home', 1, 2],
      ]);
      expect(h.projectService.listProjects({ includeArchived: true }).map(p => [p.name, p.archived])).toEqual([
        ['garden', true],
        ['home', false],
      ]);
    });
  });

  describe('renameProject', () => {
    it('renames in place and moves the tasks', () => {
      const a = h.taskService.createTask({ description: 'a', project: 'home' }).id;
      h.clock.advance(60);

      const result = h.projectService.renameProject('home', 'house');

      expect(result).toEqual({
        project: { id: 1, name: 'house', archived: false, created_ts: T, modified_ts: T + 60 },
        merged: false,
        movedTaskIds: [a],
      });
      expect(h.taskService.requireTask(a)).toMatchObject({ project: 'house', modified_ts: T + 60 });
      const update = h.taskService.history(a).filter(e => e.type === EventType.TaskUpdated);
      expect(update.map(e => e.data)).toEqual([{ field: 'project', old_value: 'home', new_value: 'house' }]);
      expect(projectEvents().at(-1)?.data).toEqual({
        old_name: 'home',
        new_name: 'house',
        merged: false,
        tasks_moved: 1,
      });
    });

    it('merges into an existing project and drops the old record', () => {
      const a = h.taskService.createTask({ description: 'a', project: 'chores' }).id;
      const b = h.taskService.createTask({ description: 'b', project: 'home' }).id;

      const result = h.projectService.renameProject('chores', 'home');

      expect(result.merged).toBe(true);
      expect(result.project.id).toBe(2);
      expect(h.projectService.getProject('chores')).toBeNull();
      expect(h.taskService.listTasks({ project: 'home' }).map(t => t.id)).toEqual([a, b]);
    });

    it('keeps the archive state of the surviving project', () => {
      h.projectService.createProject('old');
      h.projectService.createProject('archive');
      h.projectService.archiveProject('archive');

      expect(h.projectService.renameProject('old', 'archive').project.archived).toBe(true);

      h.projectService.createProject('stale');
      h.projectService.archiveProject('stale');
      h.projectService.createProject('live');

      expect(h.projectService.renameProject('stale', 'live').project.archived).toBe(false);
    });

    it('leaves a rename onto the same name alone', () => {
      h.projectService.createProject('home');

      expect(h.projectService.renameProject('home', 'home').movedTaskIds).toEqual([]);
      expect(projectEvents()).toHaveLength(1);
    });

    it('rejects an unknown project', () => {
      expect(() => h.projectService.renameProject('nope', 'other')).toThrow(ProjectNotFoundError);
      expect(() => h.projectService.renameProject('nope', 'other')).toThrow("Project 'nope' not found");
    });
  });

  describe('archive and unarchive', () => {
    it('flips the flag without touching tasks', () => {
      const a = h.taskService.createTask({ description: 'a', project: 'home' }).id;

      expect(h.projectService.archiveProject('home').archived).toBe(true);
      expect(h.taskService.requireTask(a)).toMatchObject({ project: 'home', lifecycle: Lifecycle.Open });
      expect(h.projectService.unarchiveProject('home').archived).toBe(false);
      expect(projectEvents().slice(1).map(e => e.data)).toEqual([
        { name: 'home', archived: true },
        { name: 'home', archived: false },
      ]);
    });

    it('logs nothing when the state already matches', () => {
      h.projectService.createProject('home');

      h.projectService.unarchiveProject('home');

      expect(projectEvents()).toHaveLength(1);
    });

    it('rejects an unknown project', () => {
      expect(() => h.projectService.archiveProject('nope')).toThrow("Project 'nope' not found");
      expect(() => h.projectService.unarchiveProject('nope')).toThrow(ProjectNotFoundError);
    });
  });
});
