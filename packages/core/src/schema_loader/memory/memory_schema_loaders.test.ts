import { ConfigError } from '../../errors/errors';
import { Project } from '../../model/project';
import { DocumentSchemaLoader } from './document_schema_loader';
import { FactorySchemaLoader } from './factory_schema_loader';

describe('DocumentSchemaLoader', () => {
  it('should parse the wrapped document on each load', () => {
    const loader = new DocumentSchemaLoader({
      projects: [{ name: 'backend', metrics: [{ name: 'Story Points', metric_type: 'Integer' }] }],
    });

    const first = loader.load();
    const second = loader.load();

    expect(loader.source).toBe('<document>');
    expect(first[0]?.requireMetric('Story Points').valueKind).toBe('Integer');
    expect(second[0]).not.toBe(first[0]);
  });

  it('should use the given source in errors', () => {
    const loader = new DocumentSchemaLoader({ projects: 'none' }, 'api-request');

    expect(() => loader.load()).toThrow(expect.objectContaining({ source: 'api-request' }));
  });
});

describe('FactorySchemaLoader', () => {
  it('should return the projects built by the factory', () => {
    const loader = new FactorySchemaLoader(() => {
      const project = new Project({ name: 'backend' });
      project.addMetric({ name: 'Time Spent', valueKind: 'Duration' });
      return [project];
    }, 'conf.ts');

    const [project] = loader.load();

    expect(loader.source).toBe('conf.ts');
    expect(project?.metricList().map(metric => metric.name)).toEqual(['Time Spent']);
  });

  it('should reject projects that already carry tasks', () => {
    const loader = new FactorySchemaLoader(() => {
      const project = new Project({ name: 'backend' });
      project.addTask('Task 1');
      return [project];
    });

    expect(() => loader.load()).toThrow(
      'Project factory returned backend with tasks; only definitions can be imported'
    );
  });

  it('should reject values that are not projects', () => {
    const untyped: () => unknown = () => [{ name: 'backend' }];
    const loader = new FactorySchemaLoader(() => {
      const output = untyped();
      return Array.isArray(output) ? output : [];
    });

    expect(() => loader.load()).toThrow(ConfigError);
    expect(() => loader.load()).toThrow('non-project at index 0');
  });
});
