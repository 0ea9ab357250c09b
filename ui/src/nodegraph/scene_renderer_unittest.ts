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
import {DEFAULT_EDITOR_CONFIG} from './config';
import {GraphScene} from './graph_scene';
import {RecordingPainter} from './recording_painter';
import {renderScene} from './scene_renderer';
import {DEFAULT_EDITOR_STYLE} from './style';
import {Viewport} from './viewport';

function setup() {
  const painter = new RecordingPainter();
  const scene = new GraphScene(DEFAULT_EDITOR_CONFIG);
  const viewport = new Viewport(DEFAULT_EDITOR_CONFIG);
  // Small enough for two vertical and one horizontal grid line.
  viewport.setSize({width: 40, height: 20});
  scene.addNode({x: 0, y: 0}, {id: 'a'});
  scene.addNode({x: 300, y: 0}, {id: 'b'});
  scene.connect('a', 'b');
  const render = () =>
    renderScene({
      painter,
      scene,
      viewport,
      style: DEFAULT_EDITOR_STYLE,
      config: DEFAULT_EDITOR_CONFIG,
    });
  return {painter, scene, viewport, render};
}

describe('renderScene', () => {
  test('draws back to front', () => {
    const {painter, render} = setup();
    render();
    expect(painter.ops).toEqual([
      'clear',
      'pushTransform',
      'line',
      'line',
      'line',
      'bezier',
      'roundedRect',
      'circle',
      'circle',
      'roundedRect',
      'circle',
      'circle',
      'popTransform',
    ]);
    expect(painter.calls[0]).toEqual({op: 'clear', color: 'rgb(240, 240, 240)'});
  });

  test('grid lines', () => {
    const {painter, render} = setup();
    render();
    const lines = painter.callsOf('line');
    expect(lines.map((l) => l.stroke)).toEqual([
      {color: 'rgb(200, 200, 200)', width: 1},
      {color: 'rgb(230, 230, 230)', width: 1},
      {color: 'rgb(200, 200, 200)', width: 1},
    ]);
    expect(lines[1].from).toMatchObject({x: 20, y: 0});
    expect(lines[1].to).toMatchObject({x: 20, y: 20});
  });

  test('nodes and ports', () => {
    const {painter, scene, render} = setup();
    scene.select('b');
    render();
    const bodies = painter.callsOf('roundedRect');
    expect(bodies[0].rect).toMatchObject({x: 0, y: 0, width: 150, height: 100});
    expect(bodies[0].radius).toBe(10);
    expect(bodies[0].style).toBe(DEFAULT_EDITOR_STYLE.nodeDefault);
    expect(bodies[1].style).toBe(DEFAULT_EDITOR_STYLE.nodeSelected);

    const ports = painter.callsOf('circle');
    expect(ports.map((c) => [c.center.x, c.center.y, c.radius])).toEqual([
      [0, 50, 6],
      [150, 50, 6],
      [300, 50, 6],
      [450, 50, 6],
    ]);
  });

  test('connection path', () => {
    const {painter, render} = setup();
    render();
    const [bezier] = painter.callsOf('bezier');
    expect(bezier.curve.start).toMatchObject({x: 150, y: 50});
    expect(bezier.curve.end).toMatchObject({x: 300, y: 50});
    expect(bezier.stroke).toBe(DEFAULT_EDITOR_STYLE.connection);
  });

  test('pending connection is drawn above the nodes', () => {
    const {painter, scene, render} = setup();
    scene.handlePointerDown({
      position: {x: 150, y: 50},
      button: 'left',
      shiftKey: false,
    });
    scene.handlePointerMove({
      position: {x: 200, y: 80},
      button: 'left',
      shiftKey: false,
    });
    render();
    const ops = painter.ops;
    expect(ops[ops.length - 2]).toBe('line');
    const lines = painter.callsOf('line');
    const pending = lines[lines.length - 1];
    expect(pending.from).toMatchObject({x: 150, y: 50});
    expect(pending.to).toMatchObject({x: 200, y: 80});
    expect(pending.stroke).toBe(DEFAULT_EDITOR_STYLE.pendingConnection);
  });

  test('selection area keeps a one pixel outline when zoomed', () => {
    const {painter, scene, viewport, render} = setup();
    viewport.zoom('in', {x: 0, y: 0});
    scene.handlePointerDown({
      position: {x: 500, y: 500},
      button: 'left',
      shiftKey: false,
    });
    scene.handlePointerMove({
      position: {x: 520, y: 530},
      button: 'left',
      shiftKey: false,
    });
    render();
    const [area] = painter.callsOf('rect');
    expect(area.rect).toMatchObject({x: 500, y: 500, width: 20, height: 30});
    expect(area.style.fill).toBe('rgba(0, 120, 215, 0.15)');
    expect(area.style.stroke.width).toBeCloseTo(0.8);
    expect(painter.calls[1]).toEqual({
      op: 'pushTransform',
      transform: {offsetX: 0, offsetY: 0, scale: 1.25},
    });
  });
});
