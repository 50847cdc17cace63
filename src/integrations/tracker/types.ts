import type { ProjectRecord, TaskRecord } from '../../types/index.js';

/**
 * Contract of the external project tracker.
 *
 * Implementations throw UpstreamError for transport failures, timeouts and
 * malformed responses. A missing project is `null`, not an error.
 */
export interface TrackerApi {
  listProjects(status?: string): Promise<ProjectRecord[]>;
  getProject(id: number): Promise<ProjectRecord | null>;
  listTasks(assignee: string): Promise<TaskRecord[]>;
}
