import { describe, test, expect } from '@jest/globals';
import {
  DecodeError,
  DuplicateEndpointError,
  InvalidModeError,
  ModeConflictError,
  isEndpointConfigError,
  toSerializableError,
} from '../../../types/Error.types.js';

describe('endpoint config errors', () => {
  test('carry a code and a name', () => {
    const errors = [
      new DecodeError(['[0]: bad']),
      new InvalidModeError('loose'),
      new ModeConflictError('g1'),
      new DuplicateEndpointError('a:1'),
    ];

    expect(errors.map((e) => [e.name, e.code])).toEqual([
      ['DecodeError', 'DECODE_ERROR'],
      ['InvalidModeError', 'INVALID_MODE'],
      ['ModeConflictError', 'MODE_CONFLICT'],
      ['DuplicateEndpointError', 'DUPLICATE_ENDPOINT'],
    ]);
    expect(errors.every((e) => e instanceof Error && isEndpointConfigError(e))).toBe(true);
  });

  test('DecodeError joins its issues', () => {
    expect(new DecodeError(['[0]: one', '[1]: two']).message).toBe(
      'invalid endpoint config document: [0]: one; [1]: two',
    );
  });

  test('ModeConflictError names the group only when it has a name', () => {
    expect(new ModeConflictError('g1').message).toBe('no sd-files allowed in strict mode (group "g1")');
    expect(new ModeConflictError('').message).toBe('no sd-files allowed in strict mode');
  });

  test('isEndpointConfigError rejects other errors', () => {
    expect(isEndpointConfigError(new Error('x'))).toBe(false);
    expect(isEndpointConfigError('x')).toBe(false);
  });
});

describe('toSerializableError', () => {
  test('includes the offending value of endpoint config errors', () => {
    expect(toSerializableError(new DuplicateEndpointError('a:1'))).toEqual({
      name: 'DuplicateEndpointError',
      message: 'a:1 endpoint provided more than once',
      code: 'DUPLICATE_ENDPOINT',
      address: 'a:1',
    });
    expect(toSerializableError(new InvalidModeError('loose'))).toMatchObject({ mode: 'loose' });
    expect(toSerializableError(new ModeConflictError('g1'))).toMatchObject({ groupName: 'g1' });
    expect(toSerializableError(new DecodeError(['x']))).toMatchObject({ issues: ['x'] });
  });

  test('handles plain errors, strings and other values', () => {
    expect(toSerializableError(new TypeError('boom'))).toMatchObject({ name: 'TypeError', message: 'boom' });
    expect(toSerializableError('boom')).toEqual({ name: 'Error', message: 'boom' });
    expect(toSerializableError({ message: 'boom', code: 7 })).toEqual({ name: 'Error', message: 'boom', code: 7 });
    expect(toSerializableError(undefined)).toEqual({ name: 'UnknownError', message: 'Unknown error' });
  });
});
