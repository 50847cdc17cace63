import { describe, it, expect } from 'vitest';
import { IntentRouter, compileTrigger } from '../../../src/routing/intent-router.js';
import { createDefaultRegistry } from '../../../src/capabilities/catalog.js';
import { createPrompt } from '../../../src/capabilities/types.js';

const router = new IntentRouter(createDefaultRegistry());

function route(text: string) {
  return router.route(createPrompt(text, new Date('2026-03-10T09:00:00Z')));
}

describe('compileTrigger', () => {
  it('should respect word boundaries on word-character edges', () => {
    const late = compileTrigger('late');

    expect(late.test('anything late for bob')).toBe(true);
    expect(late.test('translate this')).toBe(false);
    expect(late.test('latest news')).toBe(false);
  });

  it('should match across any run of whitespace', () => {
    expect(compileTrigger('assigned to').test('tasks assigned\tto alice')).toBe(true);
  });

  it('should not require a boundary before a leading apostrophe', () => {
    expect(compileTrigger("'s tasks").test("show me bob's tasks")).toBe(true);
  });

  it('should treat {n} as a run of digits', () => {
    const project = compileTrigger('project {n}');

    expect(project.test('show project 12 please')).toBe(true);
    expect(project.test('show project twelve')).toBe(false);
    expect(project.test('show project 12b')).toBe(false);
  });

  it('should escape regex metacharacters', () => {
    const hash = compileTrigger('project #{n}');

    expect(hash.test('open project #7')).toBe(true);
    expect(hash.test('open project 7')).toBe(false);
  });
});

describe('IntentRouter', () => {
  describe('route', () => {
    it('should route overdue requests with an assignee', () => {
      const match = route('Show me all overdue tasks assigned to Alice');

      expect(match.capability).toBe('FetchOverdueTasks');
      expect(match.argument).toBe('Alice');
      expect(match.rationale).toBe('matched "overdue" (specific) for FetchOverdueTasks; argument "Alice" via anchor "to"');
    });

    it('should route general workload requests', () => {
      const match = route('List everything Carol is working on');

      expect(match.capability).toBe('FetchAllTasks');
      expect(match.argument).toBe('Carol');
      expect(match.rationale).toBe('matched "working on" (generic) for FetchAllTasks; argument "Carol" via capitalized token');
    });

    it('should route numbered project requests', () => {
      const match = route('Show project 2 and its tasks');

      expect(match.capability).toBe('GetProjectById');
      expect(match.argument).toBe('2');
      expect(match.rationale).toBe('matched "project {n}" (specific) for GetProjectById; argument "2" via project reference');
    });

    it('should route project listings without an argument', () => {
      const match = route('Which projects are active right now?');

      expect(match.capability).toBe('ListProjects');
      expect(match.argument).toBeNull();
      expect(match.rationale).toBe('matched "projects" (generic) for ListProjects');
    });

    it('should fall back when nothing matches', () => {
      const match = route('asdkjasd random text');

      expect(match.capability).toBe('fallback');
      expect(match.argument).toBeNull();
      expect(match.rationale).toBe('no trigger phrase matched');
    });

    it('should fall back when the assignee cannot be extracted', () => {
      const match = route('show overdue tasks');

      expect(match.capability).toBe('fallback');
      expect(match.rationale).toBe(
        'matched "overdue" (specific) for FetchOverdueTasks but no assignee argument was found'
      );
    });

    it('should prefer overdue phrasing over a generic "assigned to"', () => {
      expect(route('tasks assigned to Bob that are past due').capability).toBe('FetchOverdueTasks');
      expect(route('Which tasks assigned to Eve slipped?').capability).toBe('FetchOverdueTasks');
    });

    it('should prefer a numbered project over the generic project list', () => {
      const match = route('projects: show project #3');

      expect(match.capability).toBe('GetProjectById');
      expect(match.argument).toBe('3');
    });

    it('should pick up a possessive assignee', () => {
      const match = route("Show me Bob's tasks");

      expect(match.capability).toBe('FetchAllTasks');
      expect(match.argument).toBe('Bob');
    });

    it('should not treat a word containing a trigger as a trigger', () => {
      expect(route('translate this sentence').capability).toBe('fallback');
    });

    it('should be deterministic', () => {
      const text = 'What is David responsible for and is anything late?';
      const first = route(text);

      for (let i = 0; i < 5; i++) {
        expect(route(text)).toEqual(first);
      }
      expect(first.capability).toBe('FetchOverdueTasks');
      expect(first.argument).toBe('David');
    });

    it('should not care about case or spacing of the trigger', () => {
      const match = route('  ALL   OVERDUE tasks for   Alice ');

      expect(match.capability).toBe('FetchOverdueTasks');
      expect(match.argument).toBe('Alice');
    });
  });

  describe('findCandidates', () => {
    it('should order specific candidates before generic ones', () => {
      const candidates = router.findCandidates('show me all overdue tasks assigned to alice');

      expect(candidates.map((candidate) => candidate.descriptor.name)).toEqual([
        'FetchOverdueTasks',
        'FetchAllTasks',
      ]);
      expect(candidates[1].trigger.phrase).toBe('assigned to');
    });

    it('should never include the fallback', () => {
      expect(router.findCandidates('asdkjasd random text')).toEqual([]);
    });
  });
});
