// Copyright (C) 2023 The Android Open Source Project
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

import {DisposableStack} from './disposable';

describe('DisposableStack', () => {
  test('disposes resources in LIFO order', () => {
    const order: string[] = [];
    const trash = new DisposableStack();
    trash.use({dispose: () => order.push('a')});
    trash.defer(() => order.push('b'));
    trash.use({dispose: () => order.push('c')});
    expect(trash.size).toBe(3);

    trash.dispose();
    expect(order).toEqual(['c', 'b', 'a']);
    expect(trash.size).toBe(0);
  });

  test('use returns the resource', () => {
    const trash = new DisposableStack();
    const resource = {dispose: jest.fn()};
    expect(trash.use(resource)).toBe(resource);
    trash.dispose();
    expect(resource.dispose).toHaveBeenCalledTimes(1);
  });

  test('disposing twice only disposes once', () => {
    const trash = new DisposableStack();
    const onDispose = jest.fn();
    trash.defer(onDispose);
    trash.dispose();
    trash.dispose();
    expect(onDispose).toHaveBeenCalledTimes(1);
  });
});
