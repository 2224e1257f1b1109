import {
  isPassing,
  renderField,
  summarizeTasks,
  findTaskById,
  toTaskDetail,
  parseTaskId,
  formatSummary,
  formatRemainingTasks,
  formatNextTaskId,
  formatTaskDetail
} from './task_summary';
import type { TaskRecord } from '../record_types';

describe('task_summary', () => {
  const tasks: TaskRecord[] = [
    { id: 1, title: 'A', passes: true },
    { id: 2, title: 'B' }
  ];

  describe('isPassing', () => {
    it('should treat a truthy passes as passing', () => {
      expect(isPassing({ id: 1, passes: true })).toBe(true);
      expect(isPassing({ id: 1, passes: 1 })).toBe(true);
      expect(isPassing({ id: 1, passes: 'yes' })).toBe(true);
    });

    it('should treat an absent or falsy passes as remaining', () => {
      expect(isPassing({ id: 1 })).toBe(false);
      expect(isPassing({ id: 1, passes: false })).toBe(false);
      expect(isPassing({ id: 1, passes: 0 })).toBe(false);
      expect(isPassing({ id: 1, passes: null })).toBe(false);
      expect(isPassing({ id: 1, passes: '' })).toBe(false);
    });
  });

  describe('renderField', () => {
    it('should keep strings and blank absent values', () => {
      expect(renderField('Plain text')).toBe('Plain text');
      expect(renderField(undefined)).toBe('');
      expect(renderField(null)).toBe('');
    });

    it('should print other values in JSON notation', () => {
      expect(renderField(42)).toBe('42');
      expect(renderField(false)).toBe('false');
      expect(renderField(['a', 'b'])).toBe('["a","b"]');
      expect(renderField({ step: 1 })).toBe('{"step":1}');
    });
  });

  describe('summarizeTasks', () => {
    it('should count passing and remaining tasks', () => {
      expect(summarizeTasks(tasks)).toEqual({
        total: 2,
        passing: 1,
        remaining: 1,
        nextTask: { id: 2, title: 'B' },
        remainingTasks: [{ id: 2, title: 'B' }]
      });
    });

    it('should pick the first not-passing task in file order', () => {
      const summary = summarizeTasks([
        { id: 9, title: 'Done', passes: true },
        { id: 4, title: 'Explicit false', passes: false },
        { id: 3, title: 'Absent flag' }
      ]);

      expect(summary.nextTask).toEqual({ id: 4, title: 'Explicit false', passes: false });
      expect(summary.remaining).toBe(2);
      expect(summary.remainingTasks.map(task => task.id)).toEqual([4, 3]);
    });

    it('should return no next task when all pass', () => {
      const summary = summarizeTasks([{ id: 1, passes: true }, { id: 2, passes: true }]);

      expect(summary).toEqual({ total: 2, passing: 2, remaining: 0, nextTask: null, remainingTasks: [] });
    });

    it('should handle an empty list', () => {
      expect(summarizeTasks([])).toEqual({ total: 0, passing: 0, remaining: 0, nextTask: null, remainingTasks: [] });
    });

    it('should count a truthy non-boolean passes as passing', () => {
      const summary = summarizeTasks([
        { id: 1, title: 'A', passes: 1 },
        { id: 2, title: 'B' }
      ]);

      expect(summary.total).toBe(2);
      expect(summary.passing).toBe(1);
      expect(summary.nextTask).toEqual({ id: 2, title: 'B' });
    });

    it('should keep total equal to passing plus remaining', () => {
      const mixed: TaskRecord[] = [
        { id: 1, passes: true },
        { id: 2 },
        { id: 3, passes: false },
        { id: 4, passes: true },
        { id: 5 }
      ];

      const summary = summarizeTasks(mixed);

      expect(summary.total).toBe(5);
      expect(summary.passing + summary.remaining).toBe(summary.total);
    });
  });

  describe('findTaskById', () => {
    it('should find a task by id', () => {
      expect(findTaskById(tasks, 2)).toEqual({ id: 2, title: 'B' });
    });

    it('should return the first match on duplicate ids', () => {
      const duplicated: TaskRecord[] = [
        { id: 5, title: 'First copy' },
        { id: 5, title: 'Second copy' }
      ];

      expect(findTaskById(duplicated, 5)?.title).toBe('First copy');
    });

    it('should find id 0', () => {
      expect(findTaskById([{ id: 0, title: 'Zero' }], 0)?.title).toBe('Zero');
    });

    it('should return null when absent', () => {
      expect(findTaskById(tasks, 99)).toBeNull();
    });
  });

  describe('toTaskDetail', () => {
    it('should apply defaults for absent fields', () => {
      expect(toTaskDetail({ id: 2, title: 'B' })).toEqual({
        id: 2,
        title: 'B',
        passes: false,
        description: '',
        acceptanceCriteria: ''
      });
    });

    it('should coerce mistyped fields to text', () => {
      expect(toTaskDetail({ id: 3, title: null, description: 42, acceptanceCriteria: ['Given x'], passes: 1 })).toEqual({
        id: 3,
        title: '',
        passes: true,
        description: '42',
        acceptanceCriteria: '["Given x"]'
      });
    });

    it('should keep present fields', () => {
      expect(toTaskDetail({
        id: 1,
        title: 'A',
        passes: true,
        description: 'Adds a thing',
        acceptanceCriteria: 'Given x\nThen y',
        owner: 'qa'
      })).toEqual({
        id: 1,
        title: 'A',
        passes: true,
        description: 'Adds a thing',
        acceptanceCriteria: 'Given x\nThen y'
      });
    });
  });

  describe('parseTaskId', () => {
    it('should report a missing argument', () => {
      expect(parseTaskId()).toEqual({ kind: 'missing' });
      expect(parseTaskId(undefined)).toEqual({ kind: 'missing' });
    });

    it('should parse integers', () => {
      expect(parseTaskId('2')).toEqual({ kind: 'id', id: 2 });
      expect(parseTaskId(' 42 ')).toEqual({ kind: 'id', id: 42 });
      expect(parseTaskId('-3')).toEqual({ kind: 'id', id: -3 });
      expect(parseTaskId('007')).toEqual({ kind: 'id', id: 7 });
    });

    it('should treat 0 as an id', () => {
      expect(parseTaskId('0')).toEqual({ kind: 'id', id: 0 });
      expect(parseTaskId('-0')).toEqual({ kind: 'id', id: 0 });
    });

    it('should reject non-integer text', () => {
      expect(parseTaskId('abc')).toEqual({ kind: 'invalid', raw: 'abc' });
      expect(parseTaskId('1.5')).toEqual({ kind: 'invalid', raw: '1.5' });
      expect(parseTaskId('')).toEqual({ kind: 'invalid', raw: '' });
      expect(parseTaskId('12abc')).toEqual({ kind: 'invalid', raw: '12abc' });
    });

    it('should reject integers beyond the safe range', () => {
      expect(parseTaskId('99999999999999999999')).toEqual({ kind: 'invalid', raw: '99999999999999999999' });
    });
  });

  describe('formatSummary', () => {
    it('should print counts and the next task', () => {
      expect(formatSummary(summarizeTasks(tasks))).toEqual([
        'Total: 2',
        'Passing: 1',
        'Remaining: 1',
        '',
        'Next not-passing task:',
        '  ID: 2',
        '  Title: B'
      ]);
    });

    it('should print the all-passing message for an empty list', () => {
      expect(formatSummary(summarizeTasks([]))).toEqual([
        'Total: 0',
        'Passing: 0',
        'Remaining: 0',
        '',
        'All tasks are passing!'
      ]);
    });

    it('should print an empty title when the next task has none', () => {
      const lines = formatSummary(summarizeTasks([{ id: 8 }]));

      expect(lines.slice(4)).toEqual(['Next not-passing task:', '  ID: 8', '  Title: ']);
    });
  });

  describe('formatRemainingTasks', () => {
    it('should list remaining tasks with right-aligned ids', () => {
      const summary = summarizeTasks([
        { id: 1, title: 'Done', passes: true },
        { id: 7, title: 'Seven' },
        { id: 12, title: 'Twelve', passes: false },
        { id: 130, title: 'Long id' }
      ]);

      expect(formatRemainingTasks(summary)).toEqual([
        '',
        'Remaining (passes=false):',
        '  # 7  Seven',
        '  #12  Twelve',
        '  #130  Long id'
      ]);
    });

    it('should print only the heading when nothing remains', () => {
      expect(formatRemainingTasks(summarizeTasks([{ id: 1, passes: true }]))).toEqual([
        '',
        'Remaining (passes=false):'
      ]);
    });
  });

  describe('formatNextTaskId', () => {
    it('should print the first remaining id', () => {
      expect(formatNextTaskId(summarizeTasks(tasks))).toBe('2');
    });

    it('should print an empty line when everything passes', () => {
      expect(formatNextTaskId(summarizeTasks([{ id: 1, passes: true }]))).toBe('');
      expect(formatNextTaskId(summarizeTasks([]))).toBe('');
    });
  });

  describe('formatTaskDetail', () => {
    it('should print header, flag and both sections', () => {
      expect(formatTaskDetail(toTaskDetail({ id: 2, title: 'B' }))).toEqual([
        '# 2: B',
        'passes: false',
        '',
        'Description:',
        '',
        '',
        'Acceptance criteria (Gherkin):',
        ''
      ]);
    });

    it('should print text fields verbatim', () => {
      const lines = formatTaskDetail(toTaskDetail({
        id: 1,
        title: 'A',
        passes: true,
        description: 'Line one\nLine two',
        acceptanceCriteria: 'Scenario: done\n  Given a task\n  Then it passes'
      }));

      expect(lines).toEqual([
        '# 1: A',
        'passes: true',
        '',
        'Description:',
        'Line one\nLine two',
        '',
        'Acceptance criteria (Gherkin):',
        'Scenario: done\n  Given a task\n  Then it passes'
      ]);
    });
  });
});
