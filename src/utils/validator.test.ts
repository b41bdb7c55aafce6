import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

describe('validator', () => {
  it('returns the parsed value for a matching schema', async () => {
    const schema = z.object({ message: z.string() });
    const [err, parsed] = await validator({ message: 'hi' }, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual({ message: 'hi' });
  });

  it('applies schema transforms to the output', async () => {
    const schema = z.object({ count: z.coerce.number() });
    const [err, parsed] = await validator({ count: '3' }, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual({ count: 3 });
  });

  it('returns a ValidationError with issues for a mismatch', async () => {
    const schema = z.object({ message: z.string() });
    const [err, parsed] = await validator({ message: 1 }, schema);

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect((err as ValidationError).issues).toHaveLength(1);
    expect((err as ValidationError).issues[0].path).toEqual(['message']);
  });

  it('returns error when sync validation throws', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: () => {
          throw new Error('oops');
        },
      },
    };

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating on validation start; issues: []');
    expect((err?.cause as Error).message).toBe('oops');
  });

  it('returns error when async validation rejects', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: () => Promise.reject(new Error('oops')),
      },
    };

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating async data; issues: []');
  });

  it('resolves async validation results', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: (input) => Promise.resolve({ value: String(input) }),
      },
    };

    const [err, value] = await validator('test', schema);

    expect(err).toBeNull();
    expect(value).toBe('test');
  });
});
