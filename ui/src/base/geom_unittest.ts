// Copyright (C) 2024 The Android Open Source Project
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

import {Rect2D, Vector2D, distanceBetween} from './geom';

describe('Vector2D', () => {
  test('add', () => {
    const vector1 = new Vector2D({x: 1, y: 2});
    const vector2 = new Vector2D({x: 3, y: 4});
    const result = vector1.add(vector2);
    expect(result.x).toBe(4);
    expect(result.y).toBe(6);
  });

  test('sub', () => {
    const vector1 = new Vector2D({x: 5, y: 7});
    const vector2 = new Vector2D({x: 2, y: 3});
    const result = vector1.sub(vector2);
    expect(result.x).toBe(3);
    expect(result.y).toBe(4);
  });

  test('scale', () => {
    const vector = new Vector2D({x: 2, y: 3});
    const result = vector.scale(2);
    expect(result.x).toBe(4);
    expect(result.y).toBe(6);
  });

  test('lengths', () => {
    const vector = new Vector2D({x: -3, y: 4});
    expect(vector.manhattanDistance).toBe(7);
    expect(vector.magnitude).toBe(5);
  });

  test('equals', () => {
    const vector = new Vector2D({x: 1, y: 2});
    expect(vector.equals({x: 1, y: 2})).toBe(true);
    expect(vector.equals({x: 2, y: 1})).toBe(false);
  });
});

describe('distanceBetween', () => {
  test('manhattan', () => {
    expect(distanceBetween({x: 0, y: 0}, {x: 3, y: -4}, 'manhattan')).toBe(7);
  });

  test('euclidean by default', () => {
    expect(distanceBetween({x: 0, y: 0}, {x: 3, y: -4})).toBe(5);
  });
});

describe('Rect2D', () => {
  test('asPoint', () => {
    const rect = new Rect2D({left: 1, top: 2, right: 3, bottom: 4});
    expect(rect).toMatchObject({x: 1, y: 2});
  });

  test('asSize', () => {
    const rect = new Rect2D({left: 1, top: 2, right: 3, bottom: 8});
    expect(rect).toMatchObject({width: 2, height: 6});
  });

  test('translate', () => {
    const rect = new Rect2D({left: 2, top: 2, right: 5, bottom: 5});
    const result = rect.translate({x: 3, y: 4});
    expect(result).toMatchObject({left: 5, top: 6, right: 8, bottom: 9});
  });

  test('fromPointAndSize', () => {
    const rect = Rect2D.fromPointAndSize({
      x: 10,
      y: 20,
      width: 100,
      height: 50,
    });
    expect(rect).toMatchObject({left: 10, top: 20, right: 110, bottom: 70});
  });

  test('fromPoints reversed', () => {
    const rect = Rect2D.fromPoints({x: 100, y: 100}, {x: 0, y: 0});
    expect(rect).toMatchObject({left: 0, top: 0, right: 100, bottom: 100});
  });

  test('overlaps', () => {
    const rect = new Rect2D({left: 0, top: 0, right: 10, bottom: 10});
    expect(rect.overlaps({left: 5, top: 5, right: 15, bottom: 15})).toBe(true);
    // Touching edges do not overlap.
    expect(rect.overlaps({left: 10, top: 0, right: 20, bottom: 10})).toBe(
      false,
    );
  });

  describe('containsPoint', () => {
    let rect: Rect2D;

    beforeEach(() => {
      rect = new Rect2D({left: 10, top: 20, right: 110, bottom: 70});
    });

    test('inside the rectangle', () => {
      expect(rect.containsPoint({x: 50, y: 50})).toBe(true);
    });

    test('outside the rectangle', () => {
      expect(rect.containsPoint({x: 5, y: 50})).toBe(false); // Left of rect
      expect(rect.containsPoint({x: 50, y: 75})).toBe(false); // Below rect
      expect(rect.containsPoint({x: 150, y: 50})).toBe(false); // Right of rect
      expect(rect.containsPoint({x: 50, y: 15})).toBe(false); // Above rect
    });

    test('edges are inside', () => {
      expect(rect.containsPoint({x: 10, y: 20})).toBe(true);
      expect(rect.containsPoint({x: 110, y: 20})).toBe(true);
      expect(rect.containsPoint({x: 10, y: 70})).toBe(true);
    });
  });
});
