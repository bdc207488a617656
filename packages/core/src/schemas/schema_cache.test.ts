import { SchemaValidationCache, formatSchemaErrors, getSchemaPath } from './schema_cache';

describe('SchemaValidationCache', () => {
  beforeEach(() => {
    SchemaValidationCache.clearCache();
  });

  afterEach(() => {
    SchemaValidationCache.clearCache();
  });

  it('should cache validators and avoid recompilation', () => {
    const first = SchemaValidationCache.getSchemaValidator('counters');
    const second = SchemaValidationCache.getSchemaValidator('counters');

    expect(second).toBe(first);
    expect(SchemaValidationCache.getCacheStats()).toEqual({
      cachedSchemas: 1,
      schemasLoaded: [getSchemaPath('counters')],
    });
  });

  it('should handle multiple different schemas', () => {
    const counters = SchemaValidationCache.getSchemaValidator('counters');
    const config = SchemaValidationCache.getSchemaValidator('config');

    expect(counters).not.toBe(config);
    expect(SchemaValidationCache.getCacheStats().cachedSchemas).toBe(2);
  });

  describe('counters schema', () => {
    it('should accept non-negative integer counters', () => {
      const validate = SchemaValidationCache.getSchemaValidator('counters');
      expect(validate({ spec_number: 0, standalone_task_number: 12 })).toBe(true);
    });

    it('should reject negative, fractional and missing fields', () => {
      const validate = SchemaValidationCache.getSchemaValidator('counters');
      expect(validate({ spec_number: -1, standalone_task_number: 0 })).toBe(false);
      expect(validate({ spec_number: 1.5, standalone_task_number: 0 })).toBe(false);
      expect(validate({ spec_number: 1 })).toBe(false);
    });
  });

  describe('sync state schema', () => {
    it('should accept a freshly initialized state', () => {
      const validate = SchemaValidationCache.getSchemaValidator('syncState');
      expect(validate({
        branch_name: 'task-sync',
        tasks_file: '.tasksync/tasks.jsonl',
        remote_name: 'origin',
        initialized: true,
        last_commit_sha: 'a'.repeat(40),
        last_sync_at: '2026-01-02T03:04:05.000Z',
        last_push_at: null,
        last_push_sha: null,
      })).toBe(true);
    });

    it('should reject malformed timestamps and shas', () => {
      const validate = SchemaValidationCache.getSchemaValidator('syncState');
      expect(validate({
        branch_name: 'task-sync',
        tasks_file: '.tasksync/tasks.jsonl',
        remote_name: 'origin',
        initialized: true,
        last_commit_sha: 'not-a-sha',
        last_sync_at: 'yesterday',
      })).toBe(false);
    });
  });

  describe('config schema', () => {
    it('should accept a partial sync section', () => {
      const validate = SchemaValidationCache.getSchemaValidator('config');
      expect(validate({ projectName: 'demo', sync: { branch: 'shared-state', maxRetries: 3 } })).toBe(true);
    });

    it('should reject unknown keys', () => {
      const validate = SchemaValidationCache.getSchemaValidator('config');
      expect(validate({ sync: { retries: 3 } })).toBe(false);
    });
  });

  describe('formatSchemaErrors', () => {
    it('should join AJV errors with their instance paths', () => {
      const validate = SchemaValidationCache.getSchemaValidator('counters');
      validate({ spec_number: -1, standalone_task_number: 0 });

      expect(formatSchemaErrors(validate.errors)).toBe('/spec_number must be >= 0');
    });

    it('should describe an empty error list', () => {
      expect(formatSchemaErrors(null)).toBe('unknown schema violation');
    });
  });
});
