import { describe, expect, it } from 'vitest';
import { ValidationError } from './utils/errors.js';
import { parsePlaceholderValues } from './templates-cli.js';

describe('parsePlaceholderValues', () => {
  it('splits pairs at the first equals sign', () => {
    expect(
      parsePlaceholderValues(['topic=tides', ' age =10', 'code=a = b'])
    ).toEqual({ topic: 'tides', age: '10', code: 'a = b' });
  });

  it('rejects pairs without a name', () => {
    expect(() => parsePlaceholderValues(['=tides'])).toThrow(ValidationError);
    expect(() => parsePlaceholderValues(['tides'])).toThrow(
      'Invalid placeholder value "tides". Use the form `name=value`.'
    );
  });
});
