import { describe, it, expect } from 'vitest';
import { ZodError, z } from 'zod';
import { ERROR_CODES } from '../src/constants/errors';
import {
  AnimationErrorFactory,
  DuplicateKeyError,
  DuplicateKeyframeError,
  isAnimationError,
  NotFoundError,
  SchemaValidationError,
} from '../src/errors';

describe('errors', () => {
  it('describes missing entities', () => {
    const error = new NotFoundError('layer', 'arm', { timeline: 'walk' });

    expect(error.message).toBe('No layer with the identifier "arm" was found');
    expect(error._tag).toBe('NotFoundError');
    expect(error.code).toBe(ERROR_CODES.NOT_FOUND);
    expect(error.name).toBe('NotFoundError');
    expect(error.context).toEqual({ entity: 'layer', key: 'arm', timeline: 'walk' });
  });

  it('treats duplicate keyframes as duplicate keys', () => {
    const error = new DuplicateKeyframeError('height', 1.5);

    expect(error).toBeInstanceOf(DuplicateKeyError);
    expect(error.key).toBe('height');
    expect(error.position).toBe(1.5);
    expect(error.message).toBe('Channel "height" has more than one keyframe at 1.5s');
  });

  it('recognizes its own errors', () => {
    expect(isAnimationError(AnimationErrorFactory.capacityExceeded('full', 128))).toBe(true);
    expect(isAnimationError(new Error('other'))).toBe(false);
    expect(isAnimationError('oops')).toBe(false);
  });

  it('exposes details for logging', () => {
    const details = AnimationErrorFactory.invalidArgument('bad delta', 'delta').getDetails();

    expect(details.code).toBe(ERROR_CODES.INVALID_ARGUMENT);
    expect(details.tag).toBe('InvalidArgumentError');
    expect(details.context).toEqual({ argument: 'delta' });
  });

  it('formats schema issues', () => {
    const result = z.object({ name: z.string() }).safeParse({ name: 1 });
    expect(result.success).toBe(false);
    if (!result.success) {
      const error = AnimationErrorFactory.schemaError('invalid', 'timeline', result.error);
      expect(error).toBeInstanceOf(SchemaValidationError);
      expect(error.zodError).toBeInstanceOf(ZodError);
      expect(error.getValidationIssues()).toHaveLength(1);
      expect(error.getFormattedErrors()).toEqual(['name: Expected string, received number']);
    }
  });
});
