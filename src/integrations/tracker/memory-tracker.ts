import type { ProjectRecord, TaskRecord } from '../../types/index.js';
import type { TrackerApi } from './types.js';

export type NewProject = Omit<ProjectRecord, 'id' | 'tasks'>;
export type NewTask = Omit<TaskRecord, 'id' | 'project_id'>;

const DEMO_USERS = ['Alice', 'Bob', 'Carol', 'David', 'Eve'];
const DEMO_TASK_COUNTS = [4, 8, 3];

function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

/**
 * InMemoryTracker
 *
 * In-process tracker with the same contract as the HTTP client. Backs the
 * CLI demo mode and the tests. Reads return copies.
 */
export class InMemoryTracker implements TrackerApi {
  private projects: ProjectRecord[] = [];
  private nextProjectId = 1;
  private nextTaskId = 1;

  async listProjects(status?: string): Promise<ProjectRecord[]> {
    return this.projects
      .filter((project) => status === undefined || project.status === status)
      .map((project) => structuredClone(project));
  }

  async getProject(id: number): Promise<ProjectRecord | null> {
    const project = this.projects.find((candidate) => candidate.id === id);
    return project ? structuredClone(project) : null;
  }

  /** Tasks of active projects assigned to `assignee`, case-insensitively */
  async listTasks(assignee: string): Promise<TaskRecord[]> {
    const wanted = assignee.toLowerCase();
    return this.projects
      .filter((project) => project.status === 'active')
      .flatMap((project) => project.tasks)
      .filter((task) => task.assigned_to.toLowerCase() === wanted)
      .map((task) => structuredClone(task));
  }

  addProject(input: NewProject): ProjectRecord {
    const project: ProjectRecord = { ...input, id: this.nextProjectId++, tasks: [] };
    this.projects.push(project);
    return structuredClone(project);
  }

  addTask(projectId: number, input: NewTask): TaskRecord {
    const project = this.projects.find((candidate) => candidate.id === projectId);
    if (!project) {
      throw new Error(`Unknown project: ${projectId}`);
    }
    const task: TaskRecord = { ...input, id: this.nextTaskId++, project_id: projectId };
    project.tasks.push(task);
    return structuredClone(task);
  }

  clear(): void {
    this.projects = [];
    this.nextProjectId = 1;
    this.nextTaskId = 1;
  }

  /**
   * Replace all data with three demo projects of 4, 8 and 3 tasks spread
   * over five users, due dates two days apart around `today`.
   */
  seedDemoData(today: string): void {
    this.clear();

    DEMO_TASK_COUNTS.forEach((taskCount, index) => {
      const projectNumber = index + 1;
      const project = this.addProject({
        name: `Demo Project ${projectNumber}`,
        description: `Sample project ${projectNumber}`,
        start_date: addDays(today, -15),
        end_date: addDays(today, 15),
        status: 'active',
      });

      for (let j = 0; j < taskCount; j++) {
        this.addTask(project.id, {
          title: `Task ${j + 1} for Project ${projectNumber}`,
          assigned_to: DEMO_USERS[(projectNumber * j) % DEMO_USERS.length],
          status: j % 3 === 0 ? 'in-progress' : 'pending',
          due_date: addDays(today, (j - Math.floor(taskCount / 2)) * 2),
        });
      }
    });
  }
}
