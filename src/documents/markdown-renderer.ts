import type { CapabilityResult, ProjectRecord, TaskRecord } from '../types/index.js';

/**
 * Produces a document for a result and returns a reference to it
 */
export interface DocumentRenderer {
  render(result: CapabilityResult): Promise<string>;
}

function taskLine(task: TaskRecord): string {
  return `- [${task.status}] ${task.title} (#${task.id}), assigned to ${task.assigned_to}, due ${task.due_date}`;
}

function projectSection(project: ProjectRecord, lines: string[]): void {
  lines.push(`## ${project.name} (#${project.id})`);
  lines.push('');
  lines.push(project.description);
  lines.push('');
  lines.push(`Status: ${project.status}  `);
  lines.push(`Timeline: ${project.start_date} to ${project.end_date}`);
  lines.push('');
  if (project.tasks.length === 0) {
    lines.push('_No tasks._');
  } else {
    lines.push(...project.tasks.map(taskLine));
  }
  lines.push('');
}

/**
 * Render a result as Markdown text. The CLI prints it and the PDF report is
 * laid out from its lines.
 */
export function formatMarkdown(result: CapabilityResult): string {
  const lines: string[] = [];

  switch (result.kind) {
    case 'task_list':
      lines.push(`# ${result.scope === 'overdue' ? 'Overdue tasks' : 'Tasks'} for ${result.assignee}`);
      lines.push('');
      if (result.tasks.length === 0) {
        lines.push('_No matching tasks._');
      } else {
        lines.push(...result.tasks.map(taskLine));
      }
      break;
    case 'project_list':
      lines.push(`# Projects (${result.status})`);
      lines.push('');
      if (result.projects.length === 0) {
        lines.push('_No projects._');
      }
      for (const project of result.projects) {
        projectSection(project, lines);
      }
      break;
    case 'project_detail':
      lines.push(`# Project ${result.project.id}`);
      lines.push('');
      projectSection(result.project, lines);
      break;
    case 'not_found':
      lines.push(`# Not found`);
      lines.push('');
      lines.push(`No ${result.entity} with id ${result.id}.`);
      break;
    case 'unsupported':
    case 'unavailable':
      lines.push(`# Request not completed`);
      lines.push('');
      lines.push(result.message);
      break;
  }

  return lines.join('\n').trimEnd() + '\n';
}
