import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, DetailedValidationError } from '../../errors/errors';
import { FileSchemaLoader } from './file_schema_loader';

describe('FileSchemaLoader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'schema-loader-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it('should load YAML definitions', () => {
    const filePath = write(
      'projects.yaml',
      [
        'projects:',
        '  - name: backend',
        '    organization: acme',
        '    metrics:',
        '      - name: Story Points',
        '        metric_type: Integer',
        '        value_range: [1, 2, 3, 5, 8]',
        '      - name: Estimate',
        '        metric_type: Duration',
        '        default_value: 1:30',
        '',
      ].join('\n')
    );

    const [project] = new FileSchemaLoader(filePath).load();

    expect(project?.qualifiedName).toBe('acme/backend');
    expect(project?.requireMetric('Story Points').allowedValues).toEqual([1, 2, 3, 5, 8]);
    expect(String(project?.requireMetric('Estimate').defaultValue)).toBe('5400');
  });

  it('should accept the .yml extension in any case', () => {
    const filePath = write('projects.YML', 'projects:\n  - name: tools\n');

    expect(new FileSchemaLoader(filePath).load().map(project => project.name)).toEqual(['tools']);
  });

  it('should load JSON definitions', () => {
    const filePath = write(
      'projects.json',
      JSON.stringify({ projects: [{ name: 'backend', metrics: [{ name: 'Cost', metric_type: 'Decimal' }] }] })
    );

    const [project] = new FileSchemaLoader(filePath).load();

    expect(project?.requireMetric('Cost').valueKind).toBe('Decimal');
  });

  it('should report the source on every project', () => {
    const filePath = write('projects.json', '{"projects": []}');

    const loader = new FileSchemaLoader(filePath);

    expect(loader.source).toBe(filePath);
    expect(loader.load()).toEqual([]);
  });

  it('should reject a missing file', () => {
    const filePath = path.join(tempDir, 'missing.yaml');

    expect(() => new FileSchemaLoader(filePath).load()).toThrow(`Definition file not found: ${filePath}`);
  });

  it('should reject unsupported extensions', () => {
    const filePath = write('projects.toml', 'projects = []');

    expect(() => new FileSchemaLoader(filePath).load()).toThrow('Unsupported definition file type ".toml"');
  });

  it('should reject content that cannot be decoded', () => {
    const yamlPath = write('broken.yaml', 'projects: [unclosed');
    const jsonPath = write('broken.json', '{ "projects": ');

    expect(() => new FileSchemaLoader(yamlPath).load()).toThrow(ConfigError);
    expect(() => new FileSchemaLoader(jsonPath).load()).toThrow('Cannot decode definition file');
  });

  it('should reject an empty file as invalid definitions', () => {
    const filePath = write('empty.yaml', '');

    expect(() => new FileSchemaLoader(filePath).load()).toThrow(DetailedValidationError);
  });
});
