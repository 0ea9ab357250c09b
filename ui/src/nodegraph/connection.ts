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

import {CubicBezier, distanceToCubicBezier} from '../base/bezier';
import {Point2D, Vector2D} from '../base/geom';
import {assertExists, assertFalse} from '../base/logging';
import {itemId} from '../base/uuid';
import {ConnectionId, GraphNode, NodeId} from './node';

// Resolves node ids to live nodes. Implemented by the scene.
export interface NodeLookup {
  getNode(id: NodeId): GraphNode | undefined;
}

export interface ConnectionArgs {
  readonly id?: ConnectionId;
  readonly sourceId: NodeId;
  readonly targetId: NodeId;
  readonly nodes: NodeLookup;
}

/**
 * Builds the S-shaped curve between an output port at |start| and an input
 * port at |end|: both control points sit halfway across horizontally, one at
 * the start's height and one at the end's.
 */
export function connectionCurve(start: Point2D, end: Point2D): CubicBezier {
  const midX = start.x + (end.x - start.x) * 0.5;
  return {
    start: new Vector2D(start),
    control1: new Vector2D({x: midX, y: start.y}),
    control2: new Vector2D({x: midX, y: end.y}),
    end: new Vector2D(end),
  };
}

/**
 * A directed edge from one node's output port to another node's input port.
 *
 * The rendered path is derived from the live port positions and has to be
 * recomputed whenever either endpoint moves.
 */
export class Connection {
  readonly id: ConnectionId;
  readonly sourceId: NodeId;
  readonly targetId: NodeId;
  private readonly nodes: NodeLookup;
  private _path: CubicBezier;

  constructor({id, sourceId, targetId, nodes}: ConnectionArgs) {
    assertFalse(
      sourceId === targetId,
      `Connection from ${sourceId} to itself is not allowed`,
    );
    this.id = id ?? itemId('connection');
    this.sourceId = sourceId;
    this.targetId = targetId;
    this.nodes = nodes;
    this._path = this.computePath();
  }

  get path(): CubicBezier {
    return this._path;
  }

  get source(): GraphNode {
    return assertExists(
      this.nodes.getNode(this.sourceId),
      `Connection ${this.id} lost its source node ${this.sourceId}`,
    );
  }

  get target(): GraphNode {
    return assertExists(
      this.nodes.getNode(this.targetId),
      `Connection ${this.id} lost its target node ${this.targetId}`,
    );
  }

  recomputePath(): CubicBezier {
    this._path = this.computePath();
    return this._path;
  }

  // Distance from |point| to the rendered curve.
  distanceTo(point: Point2D): number {
    return distanceToCubicBezier(this._path, point);
  }

  private computePath(): CubicBezier {
    return connectionCurve(
      this.source.outputPortPosition(),
      this.target.inputPortPosition(),
    );
  }
}
