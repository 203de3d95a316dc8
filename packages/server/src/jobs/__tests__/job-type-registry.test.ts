import { describe, it, expect } from 'vitest';
import { JobTypeRegistry } from '../job-type-registry.js';
import { DuplicateJobTypeError, UnknownJobTypeError } from '../job-errors.js';
import { createTestJobType } from '../../__tests__/test-utils.js';

describe('JobTypeRegistry', () => {
  it('should register and look up job types by label', () => {
    const registry = new JobTypeRegistry();
    const jobType = createTestJobType();

    registry.register(jobType);

    expect(registry.has('test:job')).toBe(true);
    expect(registry.get('test:job')).toBe(jobType);
    expect(registry.labels).toEqual(['test:job']);
    expect(registry.all()).toEqual([jobType]);
  });

  it('should reject a duplicate label', () => {
    const registry = new JobTypeRegistry();
    registry.register(createTestJobType());

    expect(() => registry.register(createTestJobType())).toThrow(DuplicateJobTypeError);
    expect(() => registry.register(createTestJobType())).toThrow(
      'Job type already registered: test:job'
    );
  });

  it('should throw for an unknown label', () => {
    const registry = new JobTypeRegistry();

    expect(registry.has('missing:job')).toBe(false);
    expect(() => registry.get('missing:job')).toThrow(UnknownJobTypeError);
    expect(() => registry.get('missing:job')).toThrow(
      'No job type registered for label: missing:job'
    );
  });
});
