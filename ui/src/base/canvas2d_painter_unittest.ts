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
import {Canvas2DContext, Canvas2DPainter} from './canvas2d_painter';

// A context which logs every call as 'name(arg, ...)'.
function createContext(log: string[]): Canvas2DContext {
  const record =
    (name: string) =>
    (...args: unknown[]) => {
      log.push(`${name}(${args.join(', ')})`);
    };
  return {
    canvas: {width: 300, height: 150},
    fillStyle: '',
    strokeStyle: '',
    lineWidth: 1,
    save: record('save'),
    restore: record('restore'),
    setTransform: record('setTransform'),
    translate: record('translate'),
    scale: record('scale'),
    fillRect: record('fillRect'),
    beginPath: record('beginPath'),
    moveTo: record('moveTo'),
    lineTo: record('lineTo'),
    bezierCurveTo: record('bezierCurveTo'),
    rect: record('rect'),
    roundRect: record('roundRect'),
    arc: record('arc'),
    fill: record('fill'),
    stroke: record('stroke'),
    setLineDash: record('setLineDash'),
  };
}

describe('Canvas2DPainter', () => {
  test('scales by the pixel ratio', () => {
    const log: string[] = [];
    new Canvas2DPainter(createContext(log), 2);
    expect(log).toEqual(['setTransform(2, 0, 0, 2, 0, 0)']);
  });

  test('transforms map onto save and restore', () => {
    const log: string[] = [];
    const painter = new Canvas2DPainter(createContext(log));
    log.length = 0;

    const transform = painter.pushTransform({
      offsetX: 10,
      offsetY: 20,
      scale: 1.5,
    });
    expect(log).toEqual(['save()', 'translate(10, 20)', 'scale(1.5, 1.5)']);
    transform.dispose();
    expect(log[log.length - 1]).toBe('restore()');
  });

  test('clear ignores the current transform', () => {
    const log: string[] = [];
    const ctx = createContext(log);
    const painter = new Canvas2DPainter(ctx);
    log.length = 0;

    painter.clear('rgb(240, 240, 240)');
    expect(log).toEqual([
      'save()',
      'setTransform(1, 0, 0, 1, 0, 0)',
      'fillRect(0, 0, 300, 150)',
      'restore()',
    ]);
    expect(ctx.fillStyle).toBe('rgb(240, 240, 240)');
  });

  test('dashed line', () => {
    const log: string[] = [];
    const ctx = createContext(log);
    const painter = new Canvas2DPainter(ctx);
    log.length = 0;

    painter.drawLine({x: 0, y: 0}, {x: 5, y: 5}, {
      color: 'blue',
      width: 3,
      dash: [8, 4],
    });
    expect(log).toEqual([
      'beginPath()',
      'moveTo(0, 0)',
      'lineTo(5, 5)',
      'setLineDash(8,4)',
      'stroke()',
    ]);
    expect(ctx.strokeStyle).toBe('blue');
    expect(ctx.lineWidth).toBe(3);
  });
});
