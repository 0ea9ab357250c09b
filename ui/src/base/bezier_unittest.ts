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
  CubicBezier,
  cubicBezierAt,
  distanceToCubicBezier,
  flattenCubicBezier,
} from './bezier';

// A straight line from (0, 0) to (30, 0) expressed as a cubic.
const STRAIGHT: CubicBezier = {
  start: {x: 0, y: 0},
  control1: {x: 10, y: 0},
  control2: {x: 20, y: 0},
  end: {x: 30, y: 0},
};

describe('cubicBezierAt', () => {
  test('endpoints', () => {
    expect(cubicBezierAt(STRAIGHT, 0)).toMatchObject({x: 0, y: 0});
    expect(cubicBezierAt(STRAIGHT, 1)).toMatchObject({x: 30, y: 0});
  });

  test('midpoint of an S-curve', () => {
    const curve: CubicBezier = {
      start: {x: 0, y: 0},
      control1: {x: 50, y: 0},
      control2: {x: 50, y: 100},
      end: {x: 100, y: 100},
    };
    const mid = cubicBezierAt(curve, 0.5);
    expect(mid.x).toBeCloseTo(50);
    expect(mid.y).toBeCloseTo(50);
  });
});

describe('flattenCubicBezier', () => {
  test('returns segments + 1 points', () => {
    const points = flattenCubicBezier(STRAIGHT, 4);
    expect(points.length).toBe(5);
    expect(points[2].x).toBeCloseTo(15);
  });
});

describe('distanceToCubicBezier', () => {
  test('point above a straight curve', () => {
    expect(distanceToCubicBezier(STRAIGHT, {x: 15, y: 7})).toBeCloseTo(7);
  });

  test('point beyond the end', () => {
    expect(distanceToCubicBezier(STRAIGHT, {x: 34, y: 3})).toBeCloseTo(5);
  });

  test('point on the curve', () => {
    expect(distanceToCubicBezier(STRAIGHT, {x: 12, y: 0})).toBeCloseTo(0);
  });
});
