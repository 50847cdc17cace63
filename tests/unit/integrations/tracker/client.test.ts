import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HttpTrackerClient } from '../../../../src/integrations/tracker/client.js';
import { UpstreamError } from '../../../../src/kernel/errors.js';

// Mock logger
vi.mock('../../../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

// ─── Test Data ──────────────────────────────────────────────────────────────

const ACTIVE_PROJECTS = [
  {
    id: 1,
    name: 'Apollo',
    description: 'Launch site rebuild',
    start_date: '2026-01-01',
    end_date: '2026-06-30',
    status: 'active',
    tasks: [
      { id: 10, title: 'Draft plan', assigned_to: 'Alice', status: 'pending', due_date: '2026-03-01' },
      { id: 11, title: 'Write docs', assigned_to: 'Bob', status: 'pending', due_date: '2026-03-05' },
    ],
  },
  {
    id: 2,
    name: 'Gemini',
    description: 'Data pipeline',
    start_date: '2026-02-01',
    end_date: '2026-08-31',
    status: 'active',
    tasks: [{ id: 20, title: 'Load test', assigned_to: 'alice', status: 'done', due_date: '2026-02-20', project_id: 2 }],
  },
];

// ─── Helpers ────────────────────────────────────────────────────────────────

const fetchMock = vi.fn();

function respondWith(body: unknown, status = 200, statusText = 'OK'): void {
  fetchMock.mockResolvedValueOnce(
    new Response(JSON.stringify(body), { status, statusText, headers: { 'Content-Type': 'application/json' } })
  );
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe('HttpTrackerClient', () => {
  let client: HttpTrackerClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    client = new HttpTrackerClient({ apiRoot: 'http://tracker.test/', timeoutMs: 250 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should require an API root', () => {
    expect(() => new HttpTrackerClient({ apiRoot: '' })).toThrow('Tracker API root is required');
  });

  describe('listProjects', () => {
    it('should request projects by status', async () => {
      respondWith(ACTIVE_PROJECTS);

      const projects = await client.listProjects('active');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe('http://tracker.test/projects/?status=active');
      expect(projects.map((project) => project.name)).toEqual(['Apollo', 'Gemini']);
    });

    it('should omit the query without a status', async () => {
      respondWith([]);

      await client.listProjects();

      expect(fetchMock.mock.calls[0][0]).toBe('http://tracker.test/projects/');
    });

    it('should reject a malformed body', async () => {
      respondWith([{ id: 'one', name: 'Apollo' }]);

      await expect(client.listProjects('active')).rejects.toThrow(/^Tracker returned an invalid project list/);
    });
  });

  describe('getProject', () => {
    it('should return a project and default missing tasks', async () => {
      const { tasks: _tasks, ...withoutTasks } = ACTIVE_PROJECTS[0];
      respondWith(withoutTasks);

      const project = await client.getProject(1);

      expect(fetchMock.mock.calls[0][0]).toBe('http://tracker.test/projects/1');
      expect(project?.name).toBe('Apollo');
      expect(project?.tasks).toEqual([]);
    });

    it('should return null on 404', async () => {
      respondWith({ detail: 'Not found' }, 404, 'Not Found');

      expect(await client.getProject(99)).toBeNull();
    });
  });

  describe('listTasks', () => {
    it('should collect an assignee\'s tasks from active projects, case-insensitively', async () => {
      respondWith(ACTIVE_PROJECTS);

      const tasks = await client.listTasks('ALICE');

      expect(fetchMock.mock.calls[0][0]).toBe('http://tracker.test/projects/?status=active');
      expect(tasks.map((task) => [task.id, task.project_id])).toEqual([
        [10, 1],
        [20, 2],
      ]);
    });
  });

  describe('failures', () => {
    it('should raise UpstreamError on an error status', async () => {
      respondWith({ detail: 'boom' }, 500, 'Internal Server Error');

      const error = await client.listProjects().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ message: 'Tracker error: 500 Internal Server Error', status: 500 });
    });

    it('should raise UpstreamError when the tracker is unreachable', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(client.listProjects()).rejects.toThrow('Tracker unreachable: fetch failed');
    });

    it('should raise UpstreamError on timeout', async () => {
      fetchMock.mockRejectedValueOnce(
        Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' })
      );

      await expect(client.getProject(1)).rejects.toThrow('Tracker request timed out after 250ms');
    });

    it('should raise UpstreamError on a non-JSON body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

      await expect(client.listProjects()).rejects.toThrow('Tracker returned a non-JSON body');
    });
  });
});
