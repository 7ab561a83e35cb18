import { ModelError, TransactionError } from '../../errors/errors';
import { Project } from '../../model/project';
import type { TransactionScope } from '../project_store';
import { MemoryProjectStore } from './memory_project_store';

function buildProject(name = 'Backend', organization: string | null = 'Acme'): Project {
  const project = new Project({ name, organization, description: 'Core Services' });
  const loc = project.addMetric({ name: 'Lines Of Code', valueKind: 'Integer' });
  const cost = project.addMetric({ name: 'Cost', valueKind: 'Decimal' });
  const language = project.addMetric({ name: 'Language', valueKind: 'String', allowedValues: ['SQL', 'TypeScript'] });
  const time = project.addMetric({ name: 'Time Spent', valueKind: 'Duration' });

  const task = project.addTask('Task 1', 'First');
  task.record(loc, 5);
  task.record(loc, 10);
  task.recordText(cost, '12.50');
  task.record(language, 'SQL');
  task.recordText(time, '1:30');
  task.recordText(time, '45 mins');
  project.addTask('Task 2');
  return project;
}

describe('MemoryProjectStore', () => {
  let store: MemoryProjectStore;

  beforeEach(() => {
    store = new MemoryProjectStore();
  });

  // ─────────────────────────────────────────────────────────
  // save / read
  // ─────────────────────────────────────────────────────────

  describe('save', () => {
    it('should lower-case identity fields and keep the description', () => {
      const project = buildProject();

      store.save(project);

      expect(project.qualifiedName).toBe('acme/backend');
      expect(store.getByQualifiedName('acme/backend')?.description).toBe('Core Services');
    });

    it('should find projects ignoring case', () => {
      store.save(buildProject());

      expect(store.getByQualifiedName('ACME/Backend')?.qualifiedName).toBe('acme/backend');
      expect(store.getByQualifiedName('backend')).toBeNull();
    });

    it('should rebuild the whole aggregate', () => {
      const original = buildProject();
      store.save(original);

      const loaded = store.getByQualifiedName('acme/backend');
      if (!loaded) throw new Error('project not stored');

      expect(loaded).not.toBe(original);
      expect(loaded.id).toBe(original.id);
      expect(loaded.metricList().map(metric => metric.name)).toEqual([
        'Lines Of Code',
        'Cost',
        'Language',
        'Time Spent',
      ]);
      expect(loaded.requireMetric('Language').allowedValues).toEqual(['SQL', 'TypeScript']);

      const task = loaded.task('Task 1');
      if (!task) throw new Error('task not stored');
      expect(task.id).toBe(original.task('Task 1')?.id);
      expect(task.description).toBe('First');
      expect(task.total(loaded.requireMetric('Lines Of Code'))).toBe(15);
      expect(String(task.total(loaded.requireMetric('Cost')))).toBe('12.5');
      expect(task.total(loaded.requireMetric('Language'))).toBe('SQL');
      expect(task.dataPoints(loaded.requireMetric('Time Spent'))).toHaveLength(2);
      expect(String(task.total(loaded.requireMetric('Time Spent')))).toBe('8100');
      expect(loaded.taskList().map(t => t.name)).toEqual(['Task 1', 'Task 2']);
    });

    it('should return detached copies', () => {
      store.save(buildProject());

      const copy = store.getByQualifiedName('acme/backend');
      copy?.addTask('Task 3');

      expect(store.getByQualifiedName('acme/backend')?.task('Task 3')).toBeNull();
    });

    it('should delete rows removed from the aggregate', () => {
      const project = buildProject();
      store.save(project);

      project.removeMetric('Time Spent');
      project.removeTask('Task 2');
      store.save(project);

      expect(store.rowCounts()).toEqual({ projects: 1, metrics: 3, tasks: 1, dataPoints: 3 });
    });

    it('should refuse a different project under a stored name', () => {
      store.save(buildProject());

      expect(() => store.save(new Project({ name: 'BACKEND', organization: 'acme' }))).toThrow(ModelError);
      expect(store.size()).toBe(1);
    });

    it('should not rename the aggregate when the save is refused', () => {
      store.save(buildProject());
      const intruder = new Project({ name: 'Backend', organization: 'Acme' });

      expect(() => store.save(intruder)).toThrow('Another project is already stored as acme/backend');
      expect(intruder.qualifiedName).toBe('Acme/Backend');
    });

    it('should not rename the aggregate when it cannot be packed', () => {
      const project = new Project({ name: 'Backend', organization: 'Acme' });
      const points = project.addMetric({ name: 'Points', valueKind: 'Integer' });
      project.restoreTask({
        name: 'Task 1',
        dataPoints: [{ kind: 'scalar', metricId: points.id, value: 'five', timestamp: new Date('2024-05-01T10:00:00.000Z') }],
      });

      expect(() => store.save(project)).toThrow(ModelError);
      expect(project.qualifiedName).toBe('Acme/Backend');
      expect(store.size()).toBe(0);
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      store.save(new Project({ name: 'web', organization: 'acme' }));
      store.save(new Project({ name: 'api', organization: 'acme' }));
      store.save(new Project({ name: 'tools' }));
    });

    it('should list projects by qualified name', () => {
      expect(store.listAll().map(project => project.qualifiedName)).toEqual(['acme/api', 'acme/web', 'tools']);
    });

    it('should complete partial names', () => {
      expect(store.matchingName('ACME/')).toEqual(['acme/api', 'acme/web']);
      expect(store.matchingName('to')).toEqual(['tools']);
      expect(store.matchingName('x')).toEqual([]);
    });

    it('should return the named projects that exist, in request order', () => {
      expect(store.allNamed('tools', 'missing', 'acme/web').map(project => project.qualifiedName)).toEqual([
        'tools',
        'acme/web',
      ]);
    });
  });

  // ─────────────────────────────────────────────────────────
  // delete
  // ─────────────────────────────────────────────────────────

  describe('delete', () => {
    it('should remove the project with its whole graph', () => {
      const project = buildProject();
      const other = new Project({ name: 'tools' });
      store.save(project);
      store.save(other);

      store.delete(project);

      expect(store.rowCounts()).toEqual({ projects: 1, metrics: 0, tasks: 0, dataPoints: 0 });
      expect(store.getByQualifiedName('acme/backend')).toBeNull();
    });

    it('should ignore projects that were never stored', () => {
      store.delete(new Project({ name: 'ghost' }));

      expect(store.size()).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────
  // scopedTransaction
  // ─────────────────────────────────────────────────────────

  describe('scopedTransaction', () => {
    it('should commit all writes when the work returns', () => {
      const result = store.scopedTransaction(() => {
        store.save(new Project({ name: 'one' }));
        store.save(new Project({ name: 'two' }));
        return 'done';
      });

      expect(result).toBe('done');
      expect(store.size()).toBe(2);
    });

    it('should see staged writes inside the scope', () => {
      store.scopedTransaction(() => {
        store.save(new Project({ name: 'one' }));
        expect(store.getByQualifiedName('one')).not.toBeNull();
      });
    });

    it('should roll back and rethrow when the work throws', () => {
      store.save(new Project({ name: 'kept' }));
      const failure = new Error('boom');

      let caught: unknown;
      try {
        store.scopedTransaction(() => {
          store.save(new Project({ name: 'lost' }));
          store.delete(...store.allNamed('kept'));
          throw failure;
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBe(failure);
      expect(store.listAll().map(project => project.qualifiedName)).toEqual(['kept']);
    });

    it('should roll back when the scope is aborted', () => {
      store.scopedTransaction(scope => {
        store.save(new Project({ name: 'lost' }));
        scope.abort();
        expect(scope.aborted).toBe(true);
      });

      expect(store.size()).toBe(0);
    });

    it('should reject nested scopes', () => {
      expect(() =>
        store.scopedTransaction(() => {
          store.save(new Project({ name: 'lost' }));
          store.scopedTransaction(() => undefined);
        })
      ).toThrow(TransactionError);
      expect(store.size()).toBe(0);
    });

    it('should reject asynchronous work', () => {
      expect(() =>
        store.scopedTransaction(async () => {
          store.save(new Project({ name: 'lost' }));
        })
      ).toThrow('Transaction work must be synchronous');
      expect(store.size()).toBe(0);
    });

    it('should refuse to abort a closed scope', () => {
      const leaked: TransactionScope[] = [];
      store.scopedTransaction(scope => {
        leaked.push(scope);
      });

      expect(() => leaked[0]?.abort()).toThrow('Transaction scope is already closed');
    });

    it('should restore the previous state when the commit fails', () => {
      let failNext = false;
      const failing = new MemoryProjectStore({
        onCommit: () => {
          if (failNext) throw new Error('disk full');
        },
      });
      failing.save(new Project({ name: 'kept' }));
      failNext = true;

      expect(() => failing.save(new Project({ name: 'lost' }))).toThrow(
        'Failed to commit project store: disk full'
      );
      expect(failing.listAll().map(project => project.qualifiedName)).toEqual(['kept']);
    });
  });

  describe('test helpers', () => {
    it('should seed, count and clear projects', () => {
      const seeded = new MemoryProjectStore({ initial: [new Project({ name: 'a' }), new Project({ name: 'b' })] });

      expect(seeded.size()).toBe(2);
      seeded.clear();
      expect(seeded.size()).toBe(0);
    });
  });
});
