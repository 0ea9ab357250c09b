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

// A Painter which records draw calls instead of producing pixels. Used by
// tests to check what a redraw emits and in which order.

import {CubicBezier} from '../base/bezier';
import {Disposable} from '../base/disposable';
import {Point2D, Rect2D} from '../base/geom';
import {Painter, ShapeStyle, StrokeStyle, Transform2D} from '../base/painter';

export type DrawCall =
  | {readonly op: 'clear'; readonly color: string}
  | {readonly op: 'pushTransform'; readonly transform: Transform2D}
  | {readonly op: 'popTransform'}
  | {
      readonly op: 'line';
      readonly from: Point2D;
      readonly to: Point2D;
      readonly stroke: StrokeStyle;
    }
  | {
      readonly op: 'bezier';
      readonly curve: CubicBezier;
      readonly stroke: StrokeStyle;
    }
  | {readonly op: 'rect'; readonly rect: Rect2D; readonly style: ShapeStyle}
  | {
      readonly op: 'roundedRect';
      readonly rect: Rect2D;
      readonly radius: number;
      readonly style: ShapeStyle;
    }
  | {
      readonly op: 'circle';
      readonly center: Point2D;
      readonly radius: number;
      readonly style: ShapeStyle;
    };

export type DrawOp = DrawCall['op'];

export class RecordingPainter implements Painter {
  readonly calls: DrawCall[] = [];

  clear(color: string): void {
    this.calls.push({op: 'clear', color});
  }

  pushTransform(transform: Transform2D): Disposable {
    this.calls.push({op: 'pushTransform', transform});
    return {
      dispose: () => this.calls.push({op: 'popTransform'}),
    };
  }

  drawLine(from: Point2D, to: Point2D, stroke: StrokeStyle): void {
    this.calls.push({op: 'line', from, to, stroke});
  }

  drawBezier(curve: CubicBezier, stroke: StrokeStyle): void {
    this.calls.push({op: 'bezier', curve, stroke});
  }

  drawRect(rect: Rect2D, style: ShapeStyle): void {
    this.calls.push({op: 'rect', rect, style});
  }

  drawRoundedRect(rect: Rect2D, radius: number, style: ShapeStyle): void {
    this.calls.push({op: 'roundedRect', rect, radius, style});
  }

  drawCircle(center: Point2D, radius: number, style: ShapeStyle): void {
    this.calls.push({op: 'circle', center, radius, style});
  }

  // The sequence of operations, without their arguments.
  get ops(): DrawOp[] {
    return this.calls.map((c) => c.op);
  }

  callsOf<K extends DrawOp>(op: K): Array<Extract<DrawCall, {op: K}>> {
    return this.calls.filter(
      (c): c is Extract<DrawCall, {op: K}> => c.op === op,
    );
  }

  reset(): void {
    this.calls.length = 0;
  }
}
