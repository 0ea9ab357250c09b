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

/**
 * The authoritative collection of nodes and connections, plus the pointer
 * interaction state machine operating on them.
 *
 * States:
 * - idle
 * - drawingConnection: dragging a line out of a node's output port.
 * - draggingNodes: moving the selected nodes.
 * - selectingArea: rubber-band selection on empty canvas.
 *
 * All positions handled here are in world space. Gestures that cannot
 * complete (e.g. a connection released over empty canvas) are silently
 * dropped.
 */

import {Disposable} from '../base/disposable';
import {EvtSource} from '../base/events';
import {Point2D, Rect2D, Size2D, Vector2D} from '../base/geom';
import {assertUnreachable} from '../base/logging';
import {EditorConfig} from './config';
import {Connection, NodeLookup} from './connection';
import {EditorPointerEvent} from './input_events';
import {ConnectionId, GraphNode, NodeId} from './node';

// Relative depth of each item kind. Connections always draw beneath nodes.
export const NODE_DEPTH = 0;
export const CONNECTION_DEPTH = -1;

export type SceneItem =
  | {readonly kind: 'node'; readonly node: GraphNode}
  | {readonly kind: 'connection'; readonly connection: Connection};

export function isNodeItem(
  item: SceneItem | undefined,
): item is {readonly kind: 'node'; readonly node: GraphNode} {
  return item?.kind === 'node';
}

// The in-progress line from the source port to the pointer.
export interface PendingConnection {
  readonly sourceId: NodeId;
  readonly start: Vector2D;
  readonly end: Vector2D;
}

export type InteractionState =
  | {readonly kind: 'idle'}
  | ({readonly kind: 'drawingConnection'} & PendingConnection)
  | {readonly kind: 'draggingNodes'; readonly last: Vector2D}
  | {
      readonly kind: 'selectingArea';
      readonly start: Vector2D;
      readonly current: Vector2D;
    };

const IDLE: InteractionState = {kind: 'idle'};

export type SceneConfig = Pick<
  EditorConfig,
  | 'nodeWidth'
  | 'nodeHeight'
  | 'portRadius'
  | 'portHitThreshold'
  | 'portHitMetric'
  | 'connectionHitTolerance'
>;

export interface AddNodeOptions {
  readonly id?: NodeId;
  readonly size?: Size2D;
}

interface SceneEntry<T> {
  readonly item: T;
  // Global insertion sequence number, used to order items of equal depth.
  readonly seq: number;
}

export class GraphScene implements NodeLookup, Disposable {
  // Fired after every change that affects what is drawn.
  readonly onChange = new EvtSource<void>();

  private readonly config: SceneConfig;
  private readonly connectionWidth: number;
  private readonly nodeEntries = new Map<NodeId, SceneEntry<GraphNode>>();
  // Insertion order is draw order.
  private readonly connectionEntries = new Map<
    ConnectionId,
    SceneEntry<Connection>
  >();
  private readonly nodeSubscriptions = new Map<NodeId, Disposable>();
  private nextSeq = 0;
  private _state: InteractionState = IDLE;

  // |connectionWidth| is the stroke width of rendered connections, which
  // makes up part of their hit area.
  constructor(config: SceneConfig, connectionWidth = 2) {
    this.config = config;
    this.connectionWidth = connectionWidth;
  }

  get state(): InteractionState {
    return this._state;
  }

  get pendingConnection(): PendingConnection | undefined {
    const state = this._state;
    if (state.kind !== 'drawingConnection') return undefined;
    return {sourceId: state.sourceId, start: state.start, end: state.end};
  }

  get selectionArea(): Rect2D | undefined {
    const state = this._state;
    if (state.kind !== 'selectingArea') return undefined;
    return Rect2D.fromPoints(state.start, state.current);
  }

  get nodes(): ReadonlyArray<GraphNode> {
    return Array.from(this.nodeEntries.values(), (e) => e.item);
  }

  // In draw order.
  get connections(): ReadonlyArray<Connection> {
    return Array.from(this.connectionEntries.values(), (e) => e.item);
  }

  get selectedNodes(): ReadonlyArray<GraphNode> {
    return this.nodes.filter((n) => n.selected);
  }

  getNode(id: NodeId): GraphNode | undefined {
    return this.nodeEntries.get(id)?.item;
  }

  getConnection(id: ConnectionId): Connection | undefined {
    return this.connectionEntries.get(id)?.item;
  }

  addNode(position: Point2D, opts: AddNodeOptions = {}): GraphNode {
    const {nodeWidth, nodeHeight, portRadius} = this.config;
    const node = new GraphNode({
      id: opts.id,
      position,
      size: opts.size ?? {width: nodeWidth, height: nodeHeight},
      portRadius,
    });
    if (this.nodeEntries.has(node.id)) {
      throw new Error(`Duplicate node id ${node.id}`);
    }
    this.nodeEntries.set(node.id, {item: node, seq: this.nextSeq++});
    this.nodeSubscriptions.set(
      node.id,
      node.onMove.addListener(({node}) => this.onNodeMoved(node)),
    );
    this.onChange.notify();
    return node;
  }

  // Removes the node and every connection attached to it.
  removeNode(id: NodeId): boolean {
    const node = this.getNode(id);
    if (node === undefined) {
      console.warn(`removeNode: no node ${id}`);
      return false;
    }
    for (const connectionId of node.connectionIds) {
      this.detachConnection(connectionId);
    }
    this.nodeSubscriptions.get(id)?.dispose();
    this.nodeSubscriptions.delete(id);
    this.nodeEntries.delete(id);
    if (
      this._state.kind === 'drawingConnection' &&
      this._state.sourceId === id
    ) {
      this._state = IDLE;
    }
    this.onChange.notify();
    return true;
  }

  /**
   * Commits a connection from |sourceId|'s output to |targetId|'s input.
   *
   * @returns the new connection, or undefined if the two ids are the same
   * node or either node doesn't exist.
   */
  connect(sourceId: NodeId, targetId: NodeId): Connection | undefined {
    if (sourceId === targetId) return undefined;
    const source = this.getNode(sourceId);
    const target = this.getNode(targetId);
    if (source === undefined || target === undefined) {
      console.warn(`connect: unknown node in ${sourceId} -> ${targetId}`);
      return undefined;
    }
    const connection = new Connection({sourceId, targetId, nodes: this});
    this.connectionEntries.set(connection.id, {
      item: connection,
      seq: this.nextSeq++,
    });
    source.attach(connection.id);
    target.attach(connection.id);
    this.onChange.notify();
    return connection;
  }

  removeConnection(id: ConnectionId): boolean {
    if (!this.detachConnection(id)) {
      console.warn(`removeConnection: no connection ${id}`);
      return false;
    }
    this.onChange.notify();
    return true;
  }

  /**
   * Every item under |point|, topmost first: higher depth wins, then the more
   * recently added item.
   */
  itemsAt(point: Point2D): SceneItem[] {
    const hits: Array<{item: SceneItem; depth: number; seq: number}> = [];
    for (const {item: node, seq} of this.nodeEntries.values()) {
      if (node.sceneBoundingBox().containsPoint(point)) {
        hits.push({item: {kind: 'node', node}, depth: NODE_DEPTH, seq});
      }
    }
    const reach = this.config.connectionHitTolerance + this.connectionWidth / 2;
    for (const {item: connection, seq} of this.connectionEntries.values()) {
      if (connection.distanceTo(point) <= reach) {
        hits.push({
          item: {kind: 'connection', connection},
          depth: CONNECTION_DEPTH,
          seq,
        });
      }
    }
    hits.sort((a, b) => b.depth - a.depth || b.seq - a.seq);
    return hits.map((h) => h.item);
  }

  itemAt(point: Point2D): SceneItem | undefined {
    return this.itemsAt(point)[0];
  }

  // Makes |id| the only selected node, or toggles it when |additive|.
  select(id: NodeId, additive = false): void {
    const node = this.getNode(id);
    if (node === undefined) return;
    if (additive) {
      node.selected = !node.selected;
    } else {
      for (const other of this.nodes) {
        other.selected = other === node;
      }
    }
    this.onChange.notify();
  }

  clearSelection(): void {
    let changed = false;
    for (const node of this.nodes) {
      changed = changed || node.selected;
      node.selected = false;
    }
    if (changed) this.onChange.notify();
  }

  // Removes every selected node, along with their connections.
  removeSelected(): number {
    const selected = this.selectedNodes;
    for (const node of selected) {
      this.removeNode(node.id);
    }
    return selected.length;
  }

  handlePointerDown(e: EditorPointerEvent): void {
    if (e.button !== 'left' || this._state.kind !== 'idle') return;
    const point = new Vector2D(e.position);
    const item = this.itemAt(point);

    if (isNodeItem(item)) {
      const node = item.node;
      if (this.isNearPort(node, 'output', point)) {
        const start = node.outputPortPosition();
        this._state = {
          kind: 'drawingConnection',
          sourceId: node.id,
          start,
          end: start,
        };
        this.onChange.notify();
        return;
      }

      if (e.shiftKey) {
        this.select(node.id, true);
        if (!node.selected) return;
      } else if (!node.selected) {
        this.select(node.id);
      }
      this._state = {kind: 'draggingNodes', last: point};
      return;
    }

    if (!e.shiftKey) {
      this.clearSelection();
    }
    this._state = {kind: 'selectingArea', start: point, current: point};
    this.onChange.notify();
  }

  handlePointerMove(e: EditorPointerEvent): void {
    const point = new Vector2D(e.position);
    const state = this._state;
    switch (state.kind) {
      case 'idle':
        return;
      case 'drawingConnection':
        this._state = {...state, end: point};
        this.onChange.notify();
        return;
      case 'draggingNodes': {
        const delta = point.sub(state.last);
        this._state = {kind: 'draggingNodes', last: point};
        for (const node of this.selectedNodes) {
          node.moveBy(delta);
        }
        return;
      }
      case 'selectingArea':
        this._state = {...state, current: point};
        this.onChange.notify();
        return;
      default:
        assertUnreachable(state);
    }
  }

  handlePointerUp(e: EditorPointerEvent): void {
    if (e.button !== 'left') return;
    const point = new Vector2D(e.position);
    const state = this._state;
    this._state = IDLE;
    switch (state.kind) {
      case 'idle':
        return;
      case 'drawingConnection':
        this.finishConnection(state.sourceId, point);
        return;
      case 'draggingNodes':
        return;
      case 'selectingArea':
        this.finishSelection(Rect2D.fromPoints(state.start, point));
        return;
      default:
        assertUnreachable(state);
    }
  }

  // Abandons the current gesture. A connection being drawn is discarded.
  cancelGesture(): void {
    if (this._state.kind === 'idle') return;
    this._state = IDLE;
    this.onChange.notify();
  }

  dispose(): void {
    for (const subscription of this.nodeSubscriptions.values()) {
      subscription.dispose();
    }
    this.nodeSubscriptions.clear();
  }

  private finishConnection(sourceId: NodeId, point: Vector2D) {
    // The pending line is gone whatever happens next.
    const item = this.itemAt(point);
    if (
      isNodeItem(item) &&
      item.node.id !== sourceId &&
      this.isNearPort(item.node, 'input', point)
    ) {
      this.connect(sourceId, item.node.id);
      return;
    }
    this.onChange.notify();
  }

  private finishSelection(area: Rect2D) {
    for (const node of this.nodes) {
      if (node.sceneBoundingBox().overlaps(area)) {
        node.selected = true;
      }
    }
    this.onChange.notify();
  }

  private isNearPort(
    node: GraphNode,
    port: 'input' | 'output',
    point: Point2D,
  ): boolean {
    const {portHitThreshold, portHitMetric} = this.config;
    return node.isNearPort(port, point, portHitThreshold, portHitMetric);
  }

  private onNodeMoved(node: GraphNode) {
    for (const connectionId of node.connectionIds) {
      this.getConnection(connectionId)?.recomputePath();
    }
    this.onChange.notify();
  }

  // Unregisters a connection from the scene and both endpoints.
  private detachConnection(id: ConnectionId): boolean {
    const connection = this.getConnection(id);
    if (connection === undefined) return false;
    this.getNode(connection.sourceId)?.detach(id);
    this.getNode(connection.targetId)?.detach(id);
    this.connectionEntries.delete(id);
    return true;
  }
}
