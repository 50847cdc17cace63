/**
 * Project Tracker HTTP Client
 *
 * Talks to the tracker's REST API:
 *   GET /projects/?status=active   list projects (each with nested tasks)
 *   GET /projects/{id}             one project, 404 when unknown
 *
 * Usage:
 *   const tracker = new HttpTrackerClient({ apiRoot: 'http://localhost:8000' });
 *   const tasks = await tracker.listTasks('Alice');
 */

import { z } from 'zod';
import {
  ProjectRecordSchema,
  type ProjectRecord,
  type TaskRecord,
} from '../../types/index.js';
import { UpstreamError } from '../../kernel/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { TrackerApi } from './types.js';

const log = createLogger('trackwise:tracker-client');

const ProjectListSchema = z.array(ProjectRecordSchema);

export interface HttpTrackerOptions {
  apiRoot: string;
  timeoutMs?: number;
}

export class HttpTrackerClient implements TrackerApi {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: HttpTrackerOptions) {
    if (!options.apiRoot) {
      throw new Error('Tracker API root is required');
    }
    this.baseUrl = options.apiRoot.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async listProjects(status?: string): Promise<ProjectRecord[]> {
    const query = status ? `?status=${encodeURIComponent(status)}` : '';
    const body = await this.request(`/projects/${query}`);
    return this.parse(ProjectListSchema, body, 'project list');
  }

  async getProject(id: number): Promise<ProjectRecord | null> {
    const body = await this.request(`/projects/${id}`, { allowNotFound: true });
    if (body === null) return null;
    return this.parse(ProjectRecordSchema, body, `project ${id}`);
  }

  /**
   * The tracker has no task endpoint; tasks are read from active projects
   */
  async listTasks(assignee: string): Promise<TaskRecord[]> {
    const projects = await this.listProjects('active');
    const wanted = assignee.toLowerCase();
    const tasks: TaskRecord[] = [];

    for (const project of projects) {
      for (const task of project.tasks) {
        if (task.assigned_to.toLowerCase() === wanted) {
          tasks.push({ ...task, project_id: task.project_id ?? project.id });
        }
      }
    }

    return tasks;
  }

  private async request(path: string, options: { allowNotFound?: boolean } = {}): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;

    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      const message = timedOut
        ? `Tracker request timed out after ${this.timeoutMs}ms`
        : `Tracker unreachable: ${error instanceof Error ? error.message : String(error)}`;
      log.error({ url, timedOut }, message);
      throw new UpstreamError(message, undefined, error);
    }

    if (response.status === 404 && options.allowNotFound) {
      return null;
    }

    if (!response.ok) {
      log.error({ url, status: response.status }, 'Tracker returned an error status');
      throw new UpstreamError(`Tracker error: ${response.status} ${response.statusText}`, response.status);
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error: unknown) {
      throw new UpstreamError('Tracker returned a non-JSON body', response.status, error);
    }
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      log.error({ what, issues: result.error.issues.length }, 'Tracker response failed validation');
      throw new UpstreamError(`Tracker returned an invalid ${what}: ${result.error.message}`);
    }
    return result.data;
  }
}
