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

import {GraphNode, NodeMoveEvent} from './node';

function createNode(): GraphNode {
  return new GraphNode({
    id: 'a',
    position: {x: 10, y: 20},
    size: {width: 150, height: 100},
    portRadius: 6,
  });
}

describe('GraphNode', () => {
  test('ports sit at the middle of the left and right edges', () => {
    const node = createNode();
    expect(node.inputOffset).toMatchObject({x: 0, y: 50});
    expect(node.outputOffset).toMatchObject({x: 150, y: 50});
    expect(node.inputPortPosition()).toMatchObject({x: 10, y: 70});
    expect(node.outputPortPosition()).toMatchObject({x: 160, y: 70});
  });

  test('bounding box includes the port overhang', () => {
    const node = createNode();
    expect(node.boundingBox()).toMatchObject({
      left: -6,
      top: 0,
      right: 156,
      bottom: 100,
    });
    expect(node.sceneBoundingBox()).toMatchObject({
      left: 4,
      top: 20,
      right: 166,
      bottom: 120,
    });
    expect(node.bodyRect()).toMatchObject({
      left: 10,
      top: 20,
      right: 160,
      bottom: 120,
    });
  });

  test('isNearPort is strict', () => {
    const node = createNode();
    expect(node.isNearPort('output', {x: 170, y: 74}, 15, 'manhattan')).toBe(
      true,
    );
    expect(node.isNearPort('output', {x: 170, y: 75}, 15, 'manhattan')).toBe(
      false,
    );
    expect(node.isNearPort('output', {x: 170, y: 75}, 15, 'euclidean')).toBe(
      true,
    );
    expect(node.isNearPort('input', {x: 10, y: 70}, 15, 'manhattan')).toBe(
      true,
    );
  });

  test('move notifies with the old and new position', () => {
    const node = createNode();
    const events: NodeMoveEvent[] = [];
    node.onMove.addListener((e) => events.push(e));

    node.move({x: 50, y: 60});
    node.move({x: 50, y: 60});
    node.moveBy({x: -5, y: 5});

    expect(events.length).toBe(2);
    expect(events[0].from).toMatchObject({x: 10, y: 20});
    expect(events[0].to).toMatchObject({x: 50, y: 60});
    expect(events[1].to).toMatchObject({x: 45, y: 65});
    expect(node.position).toMatchObject({x: 45, y: 65});
    expect(node.outputPortPosition()).toMatchObject({x: 195, y: 115});
  });

  test('attached connections', () => {
    const node = createNode();
    node.attach('c1');
    node.attach('c2');
    node.attach('c1');
    expect(node.connectionIds).toEqual(['c1', 'c2']);
    node.detach('c1');
    expect(node.connectionIds).toEqual(['c2']);
  });

  test('generated ids', () => {
    const node = new GraphNode({
      position: {x: 0, y: 0},
      size: {width: 1, height: 1},
      portRadius: 0,
    });
    expect(node.id).toMatch(/^node-[0-9a-f-]{36}$/);
  });
});
