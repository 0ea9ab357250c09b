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

// Canvas 2D implementation of Painter. Transforms are applied via the canvas
// context's transform matrix (translate/scale), so draw methods use world
// coordinates directly.

import {CubicBezier} from './bezier';
import {Disposable} from './disposable';
import {Point2D, Rect2D} from './geom';
import {Painter, ShapeStyle, StrokeStyle, Transform2D} from './painter';

// The subset of CanvasRenderingContext2D the painter draws with.
export type Canvas2DContext = Pick<
  CanvasRenderingContext2D,
  | 'save'
  | 'restore'
  | 'setTransform'
  | 'translate'
  | 'scale'
  | 'fillRect'
  | 'beginPath'
  | 'moveTo'
  | 'lineTo'
  | 'bezierCurveTo'
  | 'rect'
  | 'roundRect'
  | 'arc'
  | 'fill'
  | 'stroke'
  | 'setLineDash'
  | 'fillStyle'
  | 'strokeStyle'
  | 'lineWidth'
> & {
  readonly canvas: {readonly width: number; readonly height: number};
};

export class Canvas2DPainter implements Painter {
  private readonly ctx: Canvas2DContext;

  // |pixelRatio| maps CSS pixels to device pixels so the drawing stays sharp
  // on high DPI displays.
  constructor(ctx: Canvas2DContext, pixelRatio = 1) {
    this.ctx = ctx;
    ctx.setTransform(pixelRatio, 0, 0, pixelRatio, 0, 0);
  }

  clear(color: string): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.setTransform(1, 0, 0, 1, 0, 0);
    ctx.fillStyle = color;
    ctx.fillRect(0, 0, ctx.canvas.width, ctx.canvas.height);
    ctx.restore();
  }

  pushTransform(t: Transform2D): Disposable {
    const ctx = this.ctx;
    ctx.save();
    ctx.translate(t.offsetX, t.offsetY);
    ctx.scale(t.scale, t.scale);

    return {
      dispose: () => ctx.restore(),
    };
  }

  drawLine(from: Point2D, to: Point2D, stroke: StrokeStyle): void {
    const ctx = this.ctx;
    ctx.beginPath();
    ctx.moveTo(from.x, from.y);
    ctx.lineTo(to.x, to.y);
    this.stroke(stroke);
  }

  drawBezier(curve: CubicBezier, stroke: StrokeStyle): void {
    const ctx = this.ctx;
    const {start, control1, control2, end} = curve;
    ctx.beginPath();
    ctx.moveTo(start.x, start.y);
    ctx.bezierCurveTo(
      control1.x,
      control1.y,
      control2.x,
      control2.y,
      end.x,
      end.y,
    );
    this.stroke(stroke);
  }

  drawRect(rect: Rect2D, style: ShapeStyle): void {
    const ctx = this.ctx;
    ctx.beginPath();
    ctx.rect(rect.x, rect.y, rect.width, rect.height);
    this.fillAndStroke(style);
  }

  drawRoundedRect(rect: Rect2D, radius: number, style: ShapeStyle): void {
    const ctx = this.ctx;
    ctx.beginPath();
    ctx.roundRect(rect.x, rect.y, rect.width, rect.height, radius);
    this.fillAndStroke(style);
  }

  drawCircle(center: Point2D, radius: number, style: ShapeStyle): void {
    const ctx = this.ctx;
    ctx.beginPath();
    ctx.arc(center.x, center.y, radius, 0, 2 * Math.PI);
    this.fillAndStroke(style);
  }

  private fillAndStroke(style: ShapeStyle) {
    this.ctx.fillStyle = style.fill;
    this.ctx.fill();
    this.stroke(style.stroke);
  }

  private stroke({color, width, dash = []}: StrokeStyle) {
    const ctx = this.ctx;
    ctx.strokeStyle = color;
    ctx.lineWidth = width;
    ctx.setLineDash([...dash]);
    ctx.stroke();
  }
}
