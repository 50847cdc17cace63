import { describe, it, expect } from 'vitest';
import { formatMarkdown } from '../../../src/documents/markdown-renderer.js';
import { UNSUPPORTED_MESSAGE, type ProjectRecord } from '../../../src/types/index.js';

const APOLLO: ProjectRecord = {
  id: 2,
  name: 'Apollo',
  description: 'Launch site rebuild',
  start_date: '2026-01-01',
  end_date: '2026-06-30',
  status: 'active',
  tasks: [],
};

describe('formatMarkdown', () => {
  it('should render a task list', () => {
    const markdown = formatMarkdown({
      kind: 'task_list',
      assignee: 'Alice',
      scope: 'overdue',
      tasks: [{ id: 1, title: 'Draft plan', assigned_to: 'Alice', status: 'pending', due_date: '2026-03-01' }],
    });

    expect(markdown).toBe(
      '# Overdue tasks for Alice\n\n- [pending] Draft plan (#1), assigned to Alice, due 2026-03-01\n'
    );
  });

  it('should render an empty task list', () => {
    expect(formatMarkdown({ kind: 'task_list', assignee: 'Bob', scope: 'all', tasks: [] })).toBe(
      '# Tasks for Bob\n\n_No matching tasks._\n'
    );
  });

  it('should render a project', () => {
    expect(formatMarkdown({ kind: 'project_detail', project: APOLLO })).toBe(
      '# Project 2\n\n## Apollo (#2)\n\nLaunch site rebuild\n\nStatus: active  \n' +
        'Timeline: 2026-01-01 to 2026-06-30\n\n_No tasks._\n'
    );
  });

  it('should render an empty project list', () => {
    expect(formatMarkdown({ kind: 'project_list', status: 'active', projects: [] })).toBe(
      '# Projects (active)\n\n_No projects._\n'
    );
  });

  it('should render not_found and unsupported results', () => {
    expect(formatMarkdown({ kind: 'not_found', entity: 'project', id: 9 })).toBe(
      '# Not found\n\nNo project with id 9.\n'
    );
    expect(formatMarkdown({ kind: 'not_found', entity: 'project', id: '12345678901234567890' })).toBe(
      '# Not found\n\nNo project with id 12345678901234567890.\n'
    );
    expect(formatMarkdown({ kind: 'unsupported', message: UNSUPPORTED_MESSAGE })).toBe(
      `# Request not completed\n\n${UNSUPPORTED_MESSAGE}\n`
    );
  });
});
