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

import {Point2D, Vector2D} from './geom';

// Number of straight segments used to approximate a curve when measuring
// distances to it.
const DEFAULT_SEGMENTS = 32;

export interface CubicBezier {
  readonly start: Point2D;
  readonly control1: Point2D;
  readonly control2: Point2D;
  readonly end: Point2D;
}

/**
 * Evaluates the curve at parameter t in [0, 1].
 */
export function cubicBezierAt(curve: CubicBezier, t: number): Vector2D {
  const mt = 1 - t;
  const a = mt * mt * mt;
  const b = 3 * mt * mt * t;
  const c = 3 * mt * t * t;
  const d = t * t * t;
  const {start, control1, control2, end} = curve;
  return new Vector2D({
    x: a * start.x + b * control1.x + c * control2.x + d * end.x,
    y: a * start.y + b * control1.y + c * control2.y + d * end.y,
  });
}

/**
 * Approximates the curve with a polyline of `segments` pieces.
 */
export function flattenCubicBezier(
  curve: CubicBezier,
  segments = DEFAULT_SEGMENTS,
): Vector2D[] {
  const points: Vector2D[] = [];
  for (let i = 0; i <= segments; ++i) {
    points.push(cubicBezierAt(curve, i / segments));
  }
  return points;
}

/**
 * Euclidean distance from `point` to the closest point of the curve, measured
 * against its flattened approximation.
 */
export function distanceToCubicBezier(
  curve: CubicBezier,
  point: Point2D,
  segments = DEFAULT_SEGMENTS,
): number {
  const points = flattenCubicBezier(curve, segments);
  let best = Infinity;
  for (let i = 1; i < points.length; ++i) {
    best = Math.min(best, distanceToSegment(point, points[i - 1], points[i]));
  }
  return best;
}

function distanceToSegment(p: Point2D, a: Vector2D, b: Vector2D): number {
  const ab = b.sub(a);
  const lengthSq = ab.x * ab.x + ab.y * ab.y;
  if (lengthSq === 0) {
    return a.sub(p).magnitude;
  }
  const ap = new Vector2D(p).sub(a);
  const t = Math.max(0, Math.min(1, (ap.x * ab.x + ap.y * ab.y) / lengthSq));
  return a.add(ab.scale(t)).sub(p).magnitude;
}
