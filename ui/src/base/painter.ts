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

import {CubicBezier} from './bezier';
import {Disposable} from './disposable';
import {Point2D, Rect2D} from './geom';

// A uniform scale followed by a translation:
//   screen = world * scale + offset
export interface Transform2D {
  readonly offsetX: number;
  readonly offsetY: number;
  readonly scale: number;
}

export interface StrokeStyle {
  readonly color: string;
  // Line width in the units of the current transform.
  readonly width: number;
  // Optional dash pattern, in the units of the current transform.
  readonly dash?: ReadonlyArray<number>;
}

export interface ShapeStyle {
  readonly fill: string;
  readonly stroke: StrokeStyle;
}

// Interface for the 2D primitive drawing operations the editor emits during a
// redraw. The backend that owns pixel output (Canvas2D, a test recorder...)
// implements this.
export interface Painter {
  // Fill the whole surface with a color, ignoring the current transform.
  clear(color: string): void;

  // Push a transform onto the stack. Offsets add, scales multiply.
  // Returns a disposable that restores the previous transform when disposed.
  pushTransform(transform: Transform2D): Disposable;

  drawLine(from: Point2D, to: Point2D, stroke: StrokeStyle): void;

  drawBezier(curve: CubicBezier, stroke: StrokeStyle): void;

  drawRect(rect: Rect2D, style: ShapeStyle): void;

  drawRoundedRect(rect: Rect2D, radius: number, style: ShapeStyle): void;

  drawCircle(center: Point2D, radius: number, style: ShapeStyle): void;
}
