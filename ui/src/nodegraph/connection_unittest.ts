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

import {Connection, NodeLookup, connectionCurve} from './connection';
import {GraphNode, NodeId} from './node';

function createLookup(...nodes: GraphNode[]): NodeLookup & {
  remove(id: NodeId): void;
} {
  const byId = new Map(nodes.map((n): [NodeId, GraphNode] => [n.id, n]));
  return {
    getNode: (id) => byId.get(id),
    remove: (id) => byId.delete(id),
  };
}

function createNode(id: NodeId, x: number, y: number): GraphNode {
  return new GraphNode({
    id,
    position: {x, y},
    size: {width: 150, height: 100},
    portRadius: 6,
  });
}

describe('connectionCurve', () => {
  test('control points sit halfway across', () => {
    const curve = connectionCurve({x: 0, y: 0}, {x: 100, y: 100});
    expect(curve.control1).toMatchObject({x: 50, y: 0});
    expect(curve.control2).toMatchObject({x: 50, y: 100});
    expect(curve.end).toMatchObject({x: 100, y: 100});
  });

  test('target left of the source', () => {
    const curve = connectionCurve({x: 100, y: 0}, {x: 0, y: 50});
    expect(curve.control1).toMatchObject({x: 50, y: 0});
    expect(curve.control2).toMatchObject({x: 50, y: 50});
  });
});

describe('Connection', () => {
  test('path runs from output port to input port', () => {
    const a = createNode('a', 0, 0);
    const b = createNode('b', 300, 0);
    const connection = new Connection({
      id: 'c',
      sourceId: 'a',
      targetId: 'b',
      nodes: createLookup(a, b),
    });
    expect(connection.path.start).toMatchObject({x: 150, y: 50});
    expect(connection.path.control1).toMatchObject({x: 225, y: 50});
    expect(connection.path.control2).toMatchObject({x: 225, y: 50});
    expect(connection.path.end).toMatchObject({x: 300, y: 50});
    expect(connection.source).toBe(a);
    expect(connection.target).toBe(b);
  });

  test('recomputePath follows moved nodes', () => {
    const a = createNode('a', 0, 0);
    const b = createNode('b', 300, 0);
    const connection = new Connection({
      sourceId: 'a',
      targetId: 'b',
      nodes: createLookup(a, b),
    });
    b.move({x: 300, y: 100});
    // Paths are only refreshed on request.
    expect(connection.path.end).toMatchObject({x: 300, y: 50});
    connection.recomputePath();
    expect(connection.path.end).toMatchObject({x: 300, y: 150});
    expect(connection.path.control2).toMatchObject({x: 225, y: 150});
    expect(connection.id).toMatch(/^connection-/);
  });

  test('distanceTo', () => {
    const a = createNode('a', 0, 0);
    const b = createNode('b', 300, 0);
    const connection = new Connection({
      sourceId: 'a',
      targetId: 'b',
      nodes: createLookup(a, b),
    });
    expect(connection.distanceTo({x: 200, y: 53})).toBeCloseTo(3);
  });

  test('self loops are rejected', () => {
    const a = createNode('a', 0, 0);
    const nodes = createLookup(a);
    expect(
      () => new Connection({sourceId: 'a', targetId: 'a', nodes}),
    ).toThrow('Connection from a to itself is not allowed');
  });

  test('a missing endpoint is an error', () => {
    const a = createNode('a', 0, 0);
    const b = createNode('b', 300, 0);
    const lookup = createLookup(a, b);
    const connection = new Connection({
      id: 'c',
      sourceId: 'a',
      targetId: 'b',
      nodes: lookup,
    });
    lookup.remove('b');
    expect(() => connection.target).toThrow(
      'Connection c lost its target node b',
    );
  });
});
