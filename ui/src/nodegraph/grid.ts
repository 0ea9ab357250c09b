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

import {Rect2D, Vector2D} from '../base/geom';

export interface GridLine {
  readonly from: Vector2D;
  readonly to: Vector2D;
  readonly major: boolean;
}

/**
 * Computes the background grid lines crossing |visible| (world space): first
 * the vertical lines from left to right, then the horizontal lines from top
 * to bottom. Lines sit on multiples of |cellSize|; every |majorEvery|-th line
 * counted from the world origin is major.
 */
export function computeGridLines(
  visible: Rect2D,
  cellSize: number,
  majorEvery: number,
): GridLine[] {
  const lines: GridLine[] = [];

  for (let i = Math.floor(visible.left / cellSize); ; ++i) {
    const x = i * cellSize;
    if (x >= visible.right) break;
    lines.push({
      from: new Vector2D({x, y: visible.top}),
      to: new Vector2D({x, y: visible.bottom}),
      major: isMajor(i, majorEvery),
    });
  }

  for (let i = Math.floor(visible.top / cellSize); ; ++i) {
    const y = i * cellSize;
    if (y >= visible.bottom) break;
    lines.push({
      from: new Vector2D({x: visible.left, y}),
      to: new Vector2D({x: visible.right, y}),
      major: isMajor(i, majorEvery),
    });
  }

  return lines;
}

// -5 % 5 is -0 in JS, which still compares equal to 0.
function isMajor(index: number, majorEvery: number): boolean {
  return index % majorEvery === 0;
}
