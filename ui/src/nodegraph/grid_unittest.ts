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

import {Rect2D} from '../base/geom';
import {computeGridLines} from './grid';

describe('computeGridLines', () => {
  test('vertical lines first, then horizontal', () => {
    const visible = new Rect2D({left: 0, top: 0, right: 100, bottom: 40});
    const lines = computeGridLines(visible, 20, 5);
    expect(lines.map((l) => [l.from.x, l.from.y, l.to.x, l.to.y])).toEqual([
      [0, 0, 0, 40],
      [20, 0, 20, 40],
      [40, 0, 40, 40],
      [60, 0, 60, 40],
      [80, 0, 80, 40],
      [0, 0, 100, 0],
      [0, 20, 100, 20],
    ]);
    expect(lines.map((l) => l.major)).toEqual([
      true,
      false,
      false,
      false,
      false,
      true,
      false,
    ]);
  });

  test('lines align to the world origin', () => {
    const visible = new Rect2D({left: -100, top: -20, right: 0, bottom: 0});
    const lines = computeGridLines(visible, 20, 5);
    expect(lines.map((l) => l.from.x).slice(0, 5)).toEqual([
      -100, -80, -60, -40, -20,
    ]);
    expect(lines[0].major).toBe(true);
    expect(lines.length).toBe(6);
    expect(lines[5]).toMatchObject({from: {x: -100, y: -20}, major: false});
  });

  test('a partially visible cell', () => {
    const visible = new Rect2D({left: 5, top: 5, right: 30, bottom: 10});
    const lines = computeGridLines(visible, 20, 5);
    // x = 0 lies left of the visible area but its cell is partly visible.
    expect(lines.map((l) => l.from.x)).toEqual([0, 20, 5]);
  });
});
