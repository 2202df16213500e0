import type { EventStore } from '../events/store.js';
import { EventType, PROJECT_EVENT_TASK_ID, projectName } from '../events/types.js';
import { ProjectExistsError, ProjectNotFoundError } from '../errors.js';
import type { FactStore } from '../store/fact-store.js';
import type { Clock, Project, ProjectSummary } from '../store/types.js';

export interface ListProjectsOptions {
  includeArchived?: boolean;
}

export interface RenameResult {
  project: Project;
  /** True when the new name already existed and the two were combined. */
  merged: boolean;
  movedTaskIds: number[];
}

/**
 * Named projects. Tasks carry the project by name; every name a task uses
 * has a record here, so archiving and renaming reach all of its tasks.
 */
export class ProjectService {
  constructor(
    private store: FactStore,
    private eventStore: EventStore,
    private clock: Clock
  ) {}

  createProject(name: string): Project {
    const parsed = projectName.parse(name);
    return this.store.write(() => {
      if (this.store.getProject(parsed)) {
        throw new ProjectExistsError(parsed);
      }
      return this.insert(parsed);
    });
  }

  /** Register `name` if no project has it yet. Used when a task names a project. */
  ensureProject(name: string): Project {
    return this.store.write(() => this.store.getProject(name) ?? this.insert(name));
  }

  getProject(name: string): Project | null {
    return this.store.getProject(name);
  }

  requireProject(name: string): Project {
    const project = this.store.getProject(name);
    if (!project) {
      throw new ProjectNotFoundError(name);
    }
    return project;
  }

  listProjects(opts: ListProjectsOptions = {}): ProjectSummary[] {
    return this.store.listProjects(opts.includeArchived ?? false);
  }

  /**
   * Rename a project. When `newName` is taken, the tasks move over and the
   * old record is dropped; the surviving project keeps its archive state.
   */
  renameProject(oldName: string, newName: string): RenameResult {
    const target = projectName.parse(newName);
    return this.store.write(() => {
      const source = this.requireProject(oldName);
      if (source.name === target) {
        return { project: source, merged: false, movedTaskIds: [] };
      }

      const now = this.clock();
      const existing = this.store.getProject(target);
      const movedTaskIds = this.store.moveProjectTasks(source.name, target, now);
      for (const taskId of movedTaskIds) {
        this.eventStore.append({
          task_id: taskId,
          type: EventType.TaskUpdated,
          data: { field: 'project', old_value: source.name, new_value: target },
          timestamp: now,
        });
      }

      if (existing) {
        this.store.deleteProject(source.id);
      } else {
        this.store.renameProject(source.id, target, now);
      }
      this.eventStore.append({
        task_id: PROJECT_EVENT_TASK_ID,
        type: EventType.ProjectRenamed,
        data: {
          old_name: source.name,
          new_name: target,
          merged: existing !== null,
          tasks_moved: movedTaskIds.length,
        },
        timestamp: now,
      });

      return { project: this.requireProject(target), merged: existing !== null, movedTaskIds };
    });
  }

  archiveProject(name: string): Project {
    return this.setArchived(name, true);
  }

  unarchiveProject(name: string): Project {
    return this.setArchived(name, false);
  }

  private setArchived(name: string, archived: boolean): Project {
    return this.store.write(() => {
      const project = this.requireProject(name);
      if (project.archived === archived) {
        return project;
      }
      const now = this.clock();
      this.store.setProjectArchived(project.id, archived, now);
      this.eventStore.append({
        task_id: PROJECT_EVENT_TASK_ID,
        type: EventType.ProjectArchived,
        data: { name: project.name, archived },
        timestamp: now,
      });
      return this.requireProject(name);
    });
  }

  private insert(name: string): Project {
    const now = this.clock();
    const project = this.store.insertProject(name, now);
    this.eventStore.append({
      task_id: PROJECT_EVENT_TASK_ID,
      type: EventType.ProjectCreated,
      data: { name },
      timestamp: now,
    });
    return project;
  }
}
