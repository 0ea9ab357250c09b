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
import {Point2D} from '../base/geom';
import {DEFAULT_EDITOR_CONFIG} from './config';
import {GraphScene} from './graph_scene';
import {EditorPointerEvent} from './input_events';

function left(x: number, y: number, shiftKey = false): EditorPointerEvent {
  return {position: {x, y}, button: 'left', shiftKey};
}

// Two default sized (150x100) nodes side by side: a's output port is at
// (150, 50) and b's input port at (300, 50).
function createScene(): GraphScene {
  const scene = new GraphScene(DEFAULT_EDITOR_CONFIG);
  scene.addNode({x: 0, y: 0}, {id: 'a'});
  scene.addNode({x: 300, y: 0}, {id: 'b'});
  return scene;
}

function drag(scene: GraphScene, from: Point2D, to: Point2D, shift = false) {
  scene.handlePointerDown(left(from.x, from.y, shift));
  scene.handlePointerMove(left(to.x, to.y, shift));
  scene.handlePointerUp(left(to.x, to.y, shift));
}

describe('GraphScene', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
  });

  describe('drawing connections', () => {
    test('output port to input port', () => {
      const scene = createScene();
      scene.handlePointerDown(left(150, 50));
      expect(scene.state.kind).toBe('drawingConnection');
      expect(scene.pendingConnection).toMatchObject({
        sourceId: 'a',
        start: {x: 150, y: 50},
        end: {x: 150, y: 50},
      });

      scene.handlePointerMove(left(250, 60));
      expect(scene.pendingConnection?.end).toMatchObject({x: 250, y: 60});

      scene.handlePointerUp(left(298, 50));
      expect(scene.state.kind).toBe('idle');
      expect(scene.pendingConnection).toBeUndefined();
      expect(scene.connections.length).toBe(1);

      const connection = scene.connections[0];
      expect(connection.sourceId).toBe('a');
      expect(connection.targetId).toBe('b');
      expect(scene.getNode('a')?.connectionIds).toEqual([connection.id]);
      expect(scene.getNode('b')?.connectionIds).toEqual([connection.id]);
      expect(connection.path.start).toMatchObject({x: 150, y: 50});
      expect(connection.path.end).toMatchObject({x: 300, y: 50});
    });

    test('released over empty canvas', () => {
      const scene = createScene();
      const onChange = jest.fn();
      scene.onChange.addListener(onChange);
      drag(scene, {x: 150, y: 50}, {x: 600, y: 600});
      expect(scene.connections.length).toBe(0);
      expect(scene.state.kind).toBe('idle');
      // Start, move and the removal of the pending line.
      expect(onChange).toHaveBeenCalledTimes(3);
    });

    test('released on a node away from its input port', () => {
      const scene = createScene();
      drag(scene, {x: 150, y: 50}, {x: 375, y: 50});
      expect(scene.connections.length).toBe(0);
    });

    test('released on its own input port', () => {
      const scene = createScene();
      drag(scene, {x: 150, y: 50}, {x: 2, y: 50});
      expect(scene.connections.length).toBe(0);
      expect(scene.getNode('a')?.connectionIds).toEqual([]);
    });

    test('an input port does not start a connection', () => {
      const scene = createScene();
      scene.handlePointerDown(left(300, 50));
      expect(scene.state.kind).toBe('draggingNodes');
      expect(scene.pendingConnection).toBeUndefined();
    });

    test('port hit threshold', () => {
      const scene = createScene();
      // Manhattan distance 14 from the output port.
      scene.handlePointerDown(left(154, 60));
      expect(scene.state.kind).toBe('drawingConnection');
      scene.cancelGesture();

      // Manhattan distance 15: a plain press on the node.
      scene.handlePointerDown(left(150, 65));
      expect(scene.state.kind).toBe('draggingNodes');
    });

    test('cancelGesture drops the pending line', () => {
      const scene = createScene();
      scene.handlePointerDown(left(150, 50));
      scene.cancelGesture();
      expect(scene.state.kind).toBe('idle');
      scene.handlePointerUp(left(298, 50));
      expect(scene.connections.length).toBe(0);
    });

    test('removing the source node ends the gesture', () => {
      const scene = createScene();
      scene.handlePointerDown(left(150, 50));
      scene.removeNode('a');
      expect(scene.state.kind).toBe('idle');
    });

    test('only the left button draws', () => {
      const scene = createScene();
      scene.handlePointerDown({
        position: {x: 150, y: 50},
        button: 'middle',
        shiftKey: false,
      });
      expect(scene.state.kind).toBe('idle');
    });
  });

  describe('connect', () => {
    test('self loops are refused', () => {
      const scene = createScene();
      expect(scene.connect('a', 'a')).toBeUndefined();
      expect(scene.connections.length).toBe(0);
      expect(warn).not.toHaveBeenCalled();
    });

    test('unknown nodes are refused with a warning', () => {
      const scene = createScene();
      expect(scene.connect('a', 'nope')).toBeUndefined();
      expect(warn).toHaveBeenCalledWith('connect: unknown node in a -> nope');
    });

    test('duplicate connections are kept', () => {
      const scene = createScene();
      const first = scene.connect('a', 'b');
      const second = scene.connect('a', 'b');
      expect(first).toBeDefined();
      expect(second).toBeDefined();
      expect(scene.connections.length).toBe(2);
      expect(scene.getNode('a')?.connectionIds.length).toBe(2);
    });

    test('removeConnection detaches both ends', () => {
      const scene = createScene();
      const connection = scene.connect('a', 'b');
      expect(connection).toBeDefined();
      if (connection === undefined) return;
      expect(scene.removeConnection(connection.id)).toBe(true);
      expect(scene.connections.length).toBe(0);
      expect(scene.getNode('a')?.connectionIds).toEqual([]);
      expect(scene.getNode('b')?.connectionIds).toEqual([]);
      expect(scene.removeConnection(connection.id)).toBe(false);
    });
  });

  describe('nodes', () => {
    test('duplicate ids are an error', () => {
      const scene = createScene();
      expect(() => scene.addNode({x: 0, y: 0}, {id: 'a'})).toThrow(
        'Duplicate node id a',
      );
    });

    test('removeNode removes attached connections', () => {
      const scene = createScene();
      scene.addNode({x: 600, y: 0}, {id: 'c'});
      scene.connect('a', 'b');
      const kept = scene.connect('b', 'c');
      scene.removeNode('a');

      expect(scene.getNode('a')).toBeUndefined();
      expect(scene.connections).toEqual([kept]);
      expect(scene.getNode('b')?.connectionIds).toEqual([kept?.id]);
    });

    test('removeNode of an unknown id', () => {
      const scene = createScene();
      expect(scene.removeNode('nope')).toBe(false);
      expect(warn).toHaveBeenCalledWith('removeNode: no node nope');
    });

    test('moving a node refreshes its connections', () => {
      const scene = createScene();
      const connection = scene.connect('a', 'b');
      const onChange = jest.fn();
      scene.onChange.addListener(onChange);

      scene.getNode('b')?.move({x: 300, y: 200});
      expect(connection?.path.end).toMatchObject({x: 300, y: 250});
      expect(connection?.path.control2).toMatchObject({x: 225, y: 250});
      expect(onChange).toHaveBeenCalledTimes(1);
    });

    test('removed nodes are no longer observed', () => {
      const scene = createScene();
      const a = scene.getNode('a');
      scene.removeNode('a');
      const onChange = jest.fn();
      scene.onChange.addListener(onChange);
      a?.move({x: 1, y: 1});
      expect(onChange).not.toHaveBeenCalled();
    });
  });

  describe('hit testing', () => {
    test('the most recently added node is on top', () => {
      const scene = createScene();
      scene.addNode({x: 50, y: 0}, {id: 'c'});
      const item = scene.itemAt({x: 100, y: 50});
      expect(item?.kind).toBe('node');
      expect(item?.kind === 'node' && item.node.id).toBe('c');
      expect(scene.itemsAt({x: 100, y: 50}).length).toBe(2);
    });

    test('nodes are above connections', () => {
      const scene = createScene();
      scene.connect('a', 'b');
      scene.addNode({x: 200, y: 0}, {id: 'c'});
      const kinds = scene.itemsAt({x: 225, y: 50}).map((i) => i.kind);
      expect(kinds).toEqual(['node', 'connection']);
    });

    test('connections can be hit away from nodes', () => {
      const scene = new GraphScene(DEFAULT_EDITOR_CONFIG);
      scene.addNode({x: 0, y: 0}, {id: 'a'});
      scene.addNode({x: 400, y: 0}, {id: 'b'});
      scene.connect('a', 'b');
      expect(scene.itemAt({x: 275, y: 54})?.kind).toBe('connection');
      expect(scene.itemAt({x: 275, y: 56})).toBeUndefined();
    });

    test('port overhang is part of the node', () => {
      const scene = createScene();
      expect(scene.itemAt({x: 155, y: 50})?.kind).toBe('node');
      expect(scene.itemAt({x: 157, y: 50})).toBeUndefined();
    });
  });

  describe('selection and dragging', () => {
    test('pressing a node selects and drags it', () => {
      const scene = createScene();
      const connection = scene.connect('a', 'b');
      drag(scene, {x: 75, y: 50}, {x: 85, y: 70});

      const a = scene.getNode('a');
      expect(a?.selected).toBe(true);
      expect(a?.position).toMatchObject({x: 10, y: 20});
      expect(scene.getNode('b')?.position).toMatchObject({x: 300, y: 0});
      expect(connection?.path.start).toMatchObject({x: 160, y: 70});
      expect(connection?.path.end).toMatchObject({x: 300, y: 50});
      expect(scene.state.kind).toBe('idle');
    });

    test('pressing another node replaces the selection', () => {
      const scene = createScene();
      drag(scene, {x: 75, y: 50}, {x: 75, y: 50});
      drag(scene, {x: 375, y: 50}, {x: 375, y: 50});
      expect(scene.selectedNodes.map((n) => n.id)).toEqual(['b']);
    });

    test('shift extends the selection and drags all of it', () => {
      const scene = createScene();
      drag(scene, {x: 75, y: 50}, {x: 75, y: 50});
      drag(scene, {x: 375, y: 50}, {x: 385, y: 50}, true);
      expect(scene.selectedNodes.map((n) => n.id)).toEqual(['a', 'b']);
      expect(scene.getNode('a')?.position).toMatchObject({x: 10, y: 0});
      expect(scene.getNode('b')?.position).toMatchObject({x: 310, y: 0});
    });

    test('shift on a selected node deselects it', () => {
      const scene = createScene();
      scene.select('a');
      scene.handlePointerDown(left(75, 50, true));
      expect(scene.getNode('a')?.selected).toBe(false);
      expect(scene.state.kind).toBe('idle');
    });

    test('rubber band selects overlapping nodes', () => {
      const scene = createScene();
      scene.handlePointerDown(left(-50, -50));
      expect(scene.state.kind).toBe('selectingArea');
      scene.handlePointerMove(left(100, 20));
      expect(scene.selectionArea).toMatchObject({
        left: -50,
        top: -50,
        right: 100,
        bottom: 20,
      });
      scene.handlePointerUp(left(100, 20));
      expect(scene.selectionArea).toBeUndefined();
      expect(scene.selectedNodes.map((n) => n.id)).toEqual(['a']);
    });

    test('clicking empty canvas clears the selection', () => {
      const scene = createScene();
      scene.select('a');
      drag(scene, {x: 700, y: 700}, {x: 700, y: 700});
      expect(scene.selectedNodes).toEqual([]);
    });

    test('removeSelected', () => {
      const scene = createScene();
      scene.connect('a', 'b');
      scene.select('a');
      expect(scene.removeSelected()).toBe(1);
      expect(scene.nodes.map((n) => n.id)).toEqual(['b']);
      expect(scene.connections).toEqual([]);
      expect(scene.removeSelected()).toBe(0);
    });
  });
});
