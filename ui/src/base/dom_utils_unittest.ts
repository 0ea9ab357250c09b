/**
 * @jest-environment jsdom
 */

// Copyright (C) 2025 The Android Open Source Project
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

import {
  bindDocumentListener,
  bindEventListener,
  bindWindowListener,
  elementIsEditable,
  offsetRelativeTo,
} from './dom_utils';

describe('bindEventListener', () => {
  test('element listeners are removed on dispose', () => {
    const div = document.createElement('div');
    const clicks: number[] = [];
    const binding = bindEventListener(div, 'click', (e) => {
      clicks.push(e.clientX);
    });
    div.dispatchEvent(new MouseEvent('click', {clientX: 7}));
    binding.dispose();
    div.dispatchEvent(new MouseEvent('click', {clientX: 9}));
    expect(clicks).toEqual([7]);
  });

  test('document listeners', () => {
    const keys: string[] = [];
    const binding = bindDocumentListener(document, 'keydown', (e) => {
      keys.push(e.key);
    });
    document.dispatchEvent(new KeyboardEvent('keydown', {key: 'Delete'}));
    binding.dispose();
    document.dispatchEvent(new KeyboardEvent('keydown', {key: 'Escape'}));
    expect(keys).toEqual(['Delete']);
  });

  test('window listeners', () => {
    const onBlur = jest.fn();
    const binding = bindWindowListener(window, 'blur', onBlur);
    window.dispatchEvent(new FocusEvent('blur'));
    binding.dispose();
    window.dispatchEvent(new FocusEvent('blur'));
    expect(onBlur).toHaveBeenCalledTimes(1);
  });
});

describe('elementIsEditable', () => {
  test('text inputs and textareas', () => {
    expect(elementIsEditable(document.createElement('textarea'))).toBe(true);
    const text = document.createElement('input');
    text.type = 'text';
    expect(elementIsEditable(text)).toBe(true);
  });

  test('checkboxes and plain elements', () => {
    const checkbox = document.createElement('input');
    checkbox.type = 'checkbox';
    expect(elementIsEditable(checkbox)).toBe(false);
    expect(elementIsEditable(document.createElement('canvas'))).toBe(false);
    expect(elementIsEditable(null)).toBe(false);
  });
});

test('offsetRelativeTo', () => {
  const canvas = document.createElement('canvas');
  canvas.getBoundingClientRect = () => ({
    x: 10,
    y: 20,
    left: 10,
    top: 20,
    right: 110,
    bottom: 70,
    width: 100,
    height: 50,
    toJSON: () => ({}),
  });
  const e = new MouseEvent('pointermove', {clientX: 35, clientY: 45});
  expect(offsetRelativeTo(canvas, e)).toMatchObject({x: 25, y: 25});
});
