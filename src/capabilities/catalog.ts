import { UNSUPPORTED_MESSAGE, type TaskRecord } from '../types/index.js';
import { NotFoundError } from '../kernel/errors.js';
import type { Lexicon } from './lexicon.js';
import { getLexicon } from './lexicon.js';
import { CapabilityRegistry } from './registry.js';
import type { CapabilityHandler } from './types.js';

// ── Handlers ────────────────────────────────────────────────────────────────

function requireArgument(argument: string | null, capability: string): string {
  if (argument === null || argument.trim() === '') {
    throw new Error(`${capability} requires an argument`);
  }
  return argument;
}

function sameAssignee(task: TaskRecord, assignee: string): boolean {
  return task.assigned_to.toLowerCase() === assignee.toLowerCase();
}

/**
 * A task is overdue when its due date is strictly before today and it is not
 * done. Tasks whose due date is not an ISO date are skipped.
 */
export function isOverdue(task: TaskRecord, today: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}/.test(task.due_date)) return false;
  return task.due_date.slice(0, 10) < today && task.status.toLowerCase() !== 'done';
}

export const fetchAllTasks: CapabilityHandler = async (argument, { tracker }) => {
  const assignee = requireArgument(argument, 'FetchAllTasks');
  const tasks = await tracker.listTasks(assignee);
  return {
    kind: 'task_list',
    assignee,
    scope: 'all',
    tasks: tasks.filter((task) => sameAssignee(task, assignee)),
  };
};

export const fetchOverdueTasks: CapabilityHandler = async (argument, { tracker, today }) => {
  const assignee = requireArgument(argument, 'FetchOverdueTasks');
  const tasks = await tracker.listTasks(assignee);
  return {
    kind: 'task_list',
    assignee,
    scope: 'overdue',
    tasks: tasks.filter((task) => sameAssignee(task, assignee) && isOverdue(task, today)),
  };
};

export const listProjects: CapabilityHandler = async (_argument, { tracker }) => {
  const projects = await tracker.listProjects('active');
  return {
    kind: 'project_list',
    status: 'active',
    projects: projects.filter((project) => project.status === 'active'),
  };
};

export const getProjectById: CapabilityHandler = async (argument, { tracker }) => {
  const raw = requireArgument(argument, 'GetProjectById');
  const id = Number(raw);
  // An id past 2^53 would round onto some other project
  if (!Number.isSafeInteger(id)) {
    throw new NotFoundError('project', raw);
  }
  const project = await tracker.getProject(id);
  if (project === null) {
    throw new NotFoundError('project', id);
  }
  return { kind: 'project_detail', project };
};

export const unsupported: CapabilityHandler = async () => ({
  kind: 'unsupported',
  message: UNSUPPORTED_MESSAGE,
});

// ── Default registry ────────────────────────────────────────────────────────

/**
 * Build and seal the standard registry. Registration order is the router's
 * tie-break order.
 */
export function createDefaultRegistry(lexicon: Lexicon = getLexicon()): CapabilityRegistry {
  const registry = new CapabilityRegistry();

  registry.register({
    name: 'FetchOverdueTasks',
    description: 'Fetch only overdue tasks assigned to a specific user',
    triggers: lexicon.triggers.FetchOverdueTasks,
    argument: 'assignee',
    handler: fetchOverdueTasks,
  });

  registry.register({
    name: 'FetchAllTasks',
    description: 'Fetch all tasks assigned to a specific user',
    triggers: lexicon.triggers.FetchAllTasks,
    argument: 'assignee',
    handler: fetchAllTasks,
  });

  registry.register({
    name: 'ListProjects',
    description: 'List all active projects',
    triggers: lexicon.triggers.ListProjects,
    argument: 'none',
    handler: listProjects,
  });

  registry.register({
    name: 'GetProjectById',
    description: 'Get a specific project and its tasks by ID',
    triggers: lexicon.triggers.GetProjectById,
    argument: 'projectId',
    handler: getProjectById,
  });

  registry.register({
    name: 'fallback',
    description: "Used when the prompt doesn't match any known capability",
    triggers: [],
    argument: 'none',
    fallback: true,
    handler: unsupported,
  });

  registry.seal();
  return registry;
}
