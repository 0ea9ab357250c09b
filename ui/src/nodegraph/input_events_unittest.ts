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

import {pointerButtonFromDom, zoomDirectionFromWheel} from './input_events';

test('pointerButtonFromDom', () => {
  expect(pointerButtonFromDom(0)).toBe('left');
  expect(pointerButtonFromDom(1)).toBe('middle');
  expect(pointerButtonFromDom(2)).toBe('right');
  expect(pointerButtonFromDom(3)).toBeUndefined();
});

test('zoomDirectionFromWheel', () => {
  expect(zoomDirectionFromWheel(-120)).toBe('in');
  expect(zoomDirectionFromWheel(120)).toBe('out');
  expect(zoomDirectionFromWheel(0)).toBe('out');
});
