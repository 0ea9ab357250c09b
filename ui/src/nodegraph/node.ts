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

import {EvtSource} from '../base/events';
import {
  DistanceMetric,
  Point2D,
  Rect2D,
  Size2D,
  Vector2D,
  distanceBetween,
} from '../base/geom';
import {itemId} from '../base/uuid';

export type NodeId = string;
export type ConnectionId = string;
export type PortKind = 'input' | 'output';

export interface NodeMoveEvent {
  readonly node: GraphNode;
  readonly from: Vector2D;
  readonly to: Vector2D;
}

export interface GraphNodeArgs {
  readonly id?: NodeId;
  readonly position: Point2D;
  readonly size: Size2D;
  readonly portRadius: number;
}

/**
 * A rectangular graph vertex with an input port at its left-mid and an output
 * port at its right-mid.
 *
 * A node only knows the ids of the connections attached to it; the scene owns
 * the connections themselves.
 */
export class GraphNode {
  readonly id: NodeId;
  readonly size: Size2D;
  readonly portRadius: number;
  // Port anchors in node-local space. These never change after construction.
  readonly inputOffset: Vector2D;
  readonly outputOffset: Vector2D;

  // Fired synchronously after every committed position change.
  readonly onMove = new EvtSource<NodeMoveEvent>();

  selected = false;

  private _position: Vector2D;
  // Insertion ordered.
  private readonly _connectionIds = new Set<ConnectionId>();

  constructor({id, position, size, portRadius}: GraphNodeArgs) {
    this.id = id ?? itemId('node');
    this.size = {width: size.width, height: size.height};
    this.portRadius = portRadius;
    this.inputOffset = new Vector2D({x: 0, y: size.height / 2});
    this.outputOffset = new Vector2D({x: size.width, y: size.height / 2});
    this._position = new Vector2D(position);
  }

  get position(): Vector2D {
    return this._position;
  }

  get connectionIds(): ReadonlyArray<ConnectionId> {
    return Array.from(this._connectionIds);
  }

  // The node's local rectangle, widened by the port radius at both sides so
  // that the port circles are part of the node for hit-testing and redraws.
  boundingBox(): Rect2D {
    const r = this.portRadius;
    return new Rect2D({
      left: -r,
      top: 0,
      right: this.size.width + r,
      bottom: this.size.height,
    });
  }

  sceneBoundingBox(): Rect2D {
    return this.boundingBox().translate(this._position);
  }

  // The body without the port overhang, in world space.
  bodyRect(): Rect2D {
    return Rect2D.fromPointAndSize({...this.size, ...this._position});
  }

  portPosition(port: PortKind): Vector2D {
    const offset = port === 'input' ? this.inputOffset : this.outputOffset;
    return this._position.add(offset);
  }

  inputPortPosition(): Vector2D {
    return this.portPosition('input');
  }

  outputPortPosition(): Vector2D {
    return this.portPosition('output');
  }

  // Whether |point| (world space) is strictly closer than |threshold| to the
  // given port.
  isNearPort(
    port: PortKind,
    point: Point2D,
    threshold: number,
    metric: DistanceMetric,
  ): boolean {
    return distanceBetween(point, this.portPosition(port), metric) < threshold;
  }

  move(newPosition: Point2D): void {
    const from = this._position;
    const to = new Vector2D(newPosition);
    if (from.equals(to)) return;
    this._position = to;
    this.onMove.notify({node: this, from, to});
  }

  moveBy(delta: Point2D): void {
    this.move(this._position.add(delta));
  }

  attach(connectionId: ConnectionId): void {
    this._connectionIds.add(connectionId);
  }

  detach(connectionId: ConnectionId): void {
    this._connectionIds.delete(connectionId);
  }
}
