// Copyright (C) 2026 The Android Open Source Project
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//      http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import {getErrorMessage} from './errors';
import {
  ErrorDetails,
  addErrorHandler,
  assertExists,
  assertFalse,
  assertTrue,
  parseStack,
  reportError,
} from './logging';

describe('assertExists', () => {
  test('returns value when not null or undefined', () => {
    expect(assertExists(42)).toBe(42);
    expect(assertExists(0)).toBe(0);
    expect(assertExists('')).toBe('');
    expect(assertExists(false)).toBe(false);
  });

  test('throws on null and undefined', () => {
    expect(() => assertExists(null)).toThrow("Value doesn't exist");
    expect(() => assertExists(undefined, 'no node')).toThrow('no node');
  });
});

describe('assertTrue / assertFalse', () => {
  test('pass', () => {
    expect(() => assertTrue(true)).not.toThrow();
    expect(() => assertFalse(false)).not.toThrow();
  });

  test('fail with message', () => {
    expect(() => assertTrue(false)).toThrow('Failed assertion');
    expect(() => assertFalse(true, 'self loop')).toThrow('self loop');
  });
});

describe('parseStack', () => {
  test('normalizes chrome and firefox formats', () => {
    // The first line repeats the message and is dropped.
    const stack = [
      'Error: boom',
      '    at renderScene (https://example.test/bundle.js:10:5)',
      'redraw@https://example.test/bundle.js:20:7',
      '    at https://example.test/bundle.js:30:1',
    ].join('\n');
    expect(parseStack('Error: boom', stack)).toEqual([
      {name: 'renderScene', location: 'https://example.test/bundle.js:10:5'},
      {name: 'redraw', location: 'https://example.test/bundle.js:20:7'},
      {name: '', location: 'https://example.test/bundle.js:30:1'},
    ]);
  });

  test('no stack', () => {
    expect(parseStack('boom', undefined)).toEqual([]);
  });
});

describe('reportError', () => {
  test('forwards details to the registered handlers', () => {
    const received: ErrorDetails[] = [];
    const registration = addErrorHandler((err) => received.push(err));
    try {
      reportError(new Error('canvas exploded'));
    } finally {
      registration.dispose();
    }
    expect(received.length).toBe(1);
    expect(received[0].message).toBe('canvas exploded');
  });

  test('falls back to the console without handlers', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => {});
    try {
      reportError('plain string');
      expect(spy).toHaveBeenCalledWith(
        'Unhandled editor error:',
        'plain string',
      );
    } finally {
      spy.mockRestore();
    }
  });
});

describe('getErrorMessage', () => {
  test('error objects', () => {
    expect(getErrorMessage(new Error('bad'))).toBe('bad');
    expect(getErrorMessage({error: {message: 'wrapped'}})).toBe('wrapped');
  });

  test('other values', () => {
    expect(getErrorMessage('text')).toBe('text');
    expect(getErrorMessage({code: 3})).toBe('{"code":3}');
    expect(getErrorMessage(undefined)).toBe('undefined');
  });
});
