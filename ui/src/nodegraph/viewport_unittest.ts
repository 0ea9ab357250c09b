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

import {Viewport} from './viewport';

function createViewport(): Viewport {
  return new Viewport({minZoom: 0.25, maxZoom: 4, zoomInFactor: 1.25});
}

describe('Viewport', () => {
  test('starts at identity', () => {
    const viewport = createViewport();
    expect(viewport.transform).toEqual({offsetX: 0, offsetY: 0, scale: 1});
    expect(viewport.toWorld({x: 12, y: 34})).toMatchObject({x: 12, y: 34});
  });

  test('zoom in stops below the upper bound', () => {
    const viewport = createViewport();
    const origin = {x: 0, y: 0};
    for (let i = 0; i < 6; ++i) {
      expect(viewport.zoom('in', origin)).toBe(true);
    }
    expect(viewport.scale).toBe(3.814697265625);

    // 1.25^7 would exceed 4: ignored, not clamped.
    expect(viewport.zoom('in', origin)).toBe(false);
    expect(viewport.zoom('in', origin)).toBe(false);
    expect(viewport.scale).toBe(3.814697265625);
  });

  test('zoom out stops above the lower bound', () => {
    const viewport = createViewport();
    const origin = {x: 0, y: 0};
    let steps = 0;
    while (viewport.zoom('out', origin)) ++steps;
    expect(steps).toBe(6);
    expect(viewport.scale).toBeCloseTo(0.262144);
  });

  test('zoom in then out returns to the start', () => {
    const viewport = createViewport();
    viewport.zoom('in', {x: 40, y: 40});
    viewport.zoom('out', {x: 40, y: 40});
    expect(viewport.scale).toBeCloseTo(1);
    expect(viewport.offset.x).toBeCloseTo(0);
    expect(viewport.offset.y).toBeCloseTo(0);
  });

  test('zoom keeps the point under the pointer fixed', () => {
    const viewport = createViewport();
    const anchor = {x: 100, y: 50};
    viewport.zoom('in', anchor);
    expect(viewport.scale).toBe(1.25);
    expect(viewport.offset).toMatchObject({x: -25, y: -12.5});
    expect(viewport.toWorld(anchor)).toMatchObject({x: 100, y: 50});
  });

  test('pan moves the content with the pointer', () => {
    const viewport = createViewport();
    viewport.beginPan({x: 10, y: 10});
    expect(viewport.isPanning).toBe(true);
    viewport.updatePan({x: 30, y: 15});
    viewport.endPan();
    expect(viewport.isPanning).toBe(false);

    expect(viewport.offset).toMatchObject({x: 20, y: 5});
    expect(viewport.toWorld({x: 20, y: 5})).toMatchObject({x: 0, y: 0});
    expect(viewport.toScreen({x: 1, y: 1})).toMatchObject({x: 21, y: 6});

    // Not panning anymore.
    viewport.updatePan({x: 100, y: 100});
    expect(viewport.offset).toMatchObject({x: 20, y: 5});
  });

  test('visibleWorldRect', () => {
    const viewport = createViewport();
    viewport.setSize({width: 200, height: 100});
    viewport.beginPan({x: 0, y: 0});
    viewport.updatePan({x: 20, y: 5});
    expect(viewport.visibleWorldRect()).toMatchObject({
      left: -20,
      top: -5,
      right: 180,
      bottom: 95,
    });
  });

  test('onChange', () => {
    const viewport = createViewport();
    const onChange = jest.fn();
    viewport.onChange.addListener(onChange);

    viewport.setSize({width: 10, height: 10});
    viewport.setSize({width: 10, height: 10});
    expect(onChange).toHaveBeenCalledTimes(1);

    viewport.beginPan({x: 0, y: 0});
    viewport.updatePan({x: 0, y: 0});
    expect(onChange).toHaveBeenCalledTimes(1);
    viewport.updatePan({x: 1, y: 0});
    expect(onChange).toHaveBeenCalledTimes(2);
    viewport.endPan();

    viewport.zoom('in', {x: 0, y: 0});
    expect(onChange).toHaveBeenCalledTimes(3);
  });
});
