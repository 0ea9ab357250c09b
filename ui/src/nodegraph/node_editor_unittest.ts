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
import {seededRandom} from '../base/rand';
import {EditorPointerEvent, PointerButton} from './input_events';
import {NodeEditor} from './node_editor';
import {RecordingPainter} from './recording_painter';

function pointer(
  x: number,
  y: number,
  button: PointerButton = 'left',
): EditorPointerEvent {
  return {position: {x, y}, button, shiftKey: false};
}

describe('NodeEditor', () => {
  test('invalid config', () => {
    expect(() => new NodeEditor({config: {gridSize: 0}})).toThrow(
      /^Invalid editor config: gridSize/,
    );
  });

  test('right button pans', () => {
    const editor = new NodeEditor();
    const onRedraw = jest.fn();
    editor.onRedraw.addListener(onRedraw);

    editor.handlePointerDown(pointer(10, 10, 'right'));
    editor.handlePointerMove(pointer(30, 20, 'right'));
    editor.handlePointerUp(pointer(30, 20, 'right'));

    expect(editor.viewport.offset).toMatchObject({x: 20, y: 10});
    expect(editor.viewport.isPanning).toBe(false);
    expect(onRedraw).toHaveBeenCalledTimes(1);
    expect(editor.scene.state.kind).toBe('idle');
  });

  test('left button events reach the scene in world space', () => {
    const editor = new NodeEditor();
    editor.handlePointerDown(pointer(0, 0, 'right'));
    editor.handlePointerMove(pointer(20, 10, 'right'));
    editor.handlePointerUp(pointer(20, 10, 'right'));

    const a = editor.addNode({x: 0, y: 0});
    const b = editor.addNode({x: 300, y: 0});
    // a's output port, (150, 50) in world space.
    editor.handlePointerDown(pointer(170, 60));
    expect(editor.scene.state.kind).toBe('drawingConnection');
    editor.handlePointerMove(pointer(250, 60));
    editor.handlePointerUp(pointer(318, 60));

    const [connection] = editor.scene.connections;
    expect(connection.sourceId).toBe(a.id);
    expect(connection.targetId).toBe(b.id);
  });

  test('wheel zooms under the pointer', () => {
    const editor = new NodeEditor();
    editor.handleWheel({position: {x: 100, y: 50}, deltaY: -100});
    expect(editor.viewport.scale).toBe(1.25);
    expect(editor.viewport.toWorld({x: 100, y: 50})).toMatchObject({
      x: 100,
      y: 50,
    });
    editor.handleWheel({position: {x: 100, y: 50}, deltaY: 100});
    expect(editor.viewport.scale).toBeCloseTo(1);
  });

  test('zoom bounds come from the config', () => {
    const editor = new NodeEditor({config: {maxZoom: 2}});
    for (let i = 0; i < 10; ++i) {
      editor.handleWheel({position: {x: 0, y: 0}, deltaY: -1});
    }
    expect(editor.viewport.scale).toBe(1.953125);
  });

  test('addNode without a position', () => {
    const editor = new NodeEditor({random: () => 0.5});
    const node = editor.addNode();
    expect(node.position).toMatchObject({x: 250, y: 100});
  });

  test('random placement stays inside the placement area', () => {
    const editor = new NodeEditor({random: seededRandom(1)});
    for (let i = 0; i < 50; ++i) {
      const {x, y} = editor.addNode().position;
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThanOrEqual(500);
      expect(y).toBeGreaterThanOrEqual(0);
      expect(y).toBeLessThanOrEqual(200);
    }
    expect(editor.scene.nodes.length).toBe(50);
  });

  test('delete removes the selected nodes', () => {
    const editor = new NodeEditor();
    const a = editor.addNode({x: 0, y: 0});
    const b = editor.addNode({x: 300, y: 0});
    editor.scene.connect(a.id, b.id);

    expect(editor.handleKeyDown({key: 'Delete'})).toBe(false);
    editor.scene.select(a.id);
    expect(editor.handleKeyDown({key: 'Backspace'})).toBe(true);
    expect(editor.scene.nodes).toEqual([b]);
    expect(editor.scene.connections).toEqual([]);
  });

  test('escape cancels the gesture', () => {
    const editor = new NodeEditor();
    editor.addNode({x: 0, y: 0});
    editor.handlePointerDown(pointer(150, 50));
    expect(editor.handleKeyDown({key: 'Escape'})).toBe(true);
    expect(editor.scene.state.kind).toBe('idle');
    expect(editor.handleKeyDown({key: 'a'})).toBe(false);
  });

  test('render', () => {
    const editor = new NodeEditor();
    const painter = new RecordingPainter();
    editor.render(painter);
    expect(painter.ops).toEqual(['clear', 'pushTransform', 'popTransform']);
  });

  test('no redraws after dispose', () => {
    const editor = new NodeEditor();
    const onRedraw = jest.fn();
    editor.onRedraw.addListener(onRedraw);
    editor.addNode({x: 0, y: 0});
    expect(onRedraw).toHaveBeenCalledTimes(1);
    editor.dispose();
    editor.addNode({x: 10, y: 10});
    editor.viewport.setSize({width: 10, height: 10});
    expect(onRedraw).toHaveBeenCalledTimes(1);
  });
});
