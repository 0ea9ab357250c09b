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
 * The editor's camera: a uniform scale followed by a pan offset.
 *
 *   screen = world * scale + offset
 *
 * Zooming is anchored under the pointer and bounded by [minZoom, maxZoom];
 * requests that would leave the bounds are ignored rather than clamped, so
 * the scale only ever takes values reachable by whole zoom steps.
 */

import {EvtSource} from '../base/events';
import {Point2D, Rect2D, Size2D, Vector2D} from '../base/geom';
import {Transform2D} from '../base/painter';
import {ZoomDirection} from './input_events';

// Slack for floating point error when comparing against the zoom bounds.
const ZOOM_EPSILON = 1e-9;

export interface ViewportOptions {
  readonly minZoom: number;
  readonly maxZoom: number;
  readonly zoomInFactor: number;
}

export class Viewport {
  // Fired after every change to the transform or the viewport size. Any
  // change invalidates the whole viewport.
  readonly onChange = new EvtSource<void>();

  private readonly minZoom: number;
  private readonly maxZoom: number;
  private readonly zoomInFactor: number;
  private _scale = 1;
  private _offset = Vector2D.ZERO;
  private _size: Size2D = {width: 0, height: 0};
  private lastPanPoint?: Vector2D;

  constructor({minZoom, maxZoom, zoomInFactor}: ViewportOptions) {
    this.minZoom = minZoom;
    this.maxZoom = maxZoom;
    this.zoomInFactor = zoomInFactor;
  }

  get scale(): number {
    return this._scale;
  }

  get offset(): Vector2D {
    return this._offset;
  }

  get size(): Size2D {
    return this._size;
  }

  get isPanning(): boolean {
    return this.lastPanPoint !== undefined;
  }

  get transform(): Transform2D {
    return {
      offsetX: this._offset.x,
      offsetY: this._offset.y,
      scale: this._scale,
    };
  }

  setSize(size: Size2D): void {
    if (size.width === this._size.width && size.height === this._size.height) {
      return;
    }
    this._size = {width: size.width, height: size.height};
    this.onChange.notify();
  }

  /**
   * Zooms one step in or out, keeping the world point under |anchor| fixed
   * on screen.
   *
   * @param anchor - Screen position of the pointer.
   * @returns false, leaving the viewport untouched, if the step would take the
   * scale outside [minZoom, maxZoom].
   */
  zoom(direction: ZoomDirection, anchor: Point2D): boolean {
    const factor =
      direction === 'in' ? this.zoomInFactor : 1 / this.zoomInFactor;
    const newScale = this._scale * factor;
    if (direction === 'in' && newScale > this.maxZoom + ZOOM_EPSILON) {
      return false;
    }
    if (direction === 'out' && newScale < this.minZoom - ZOOM_EPSILON) {
      return false;
    }

    const anchorWorld = this.toWorld(anchor);
    this._scale = newScale;
    // Solve anchor = anchorWorld * newScale + offset for the new offset.
    this._offset = new Vector2D(anchor).sub(anchorWorld.scale(newScale));
    this.onChange.notify();
    return true;
  }

  beginPan(screenPoint: Point2D): void {
    this.lastPanPoint = new Vector2D(screenPoint);
  }

  // Scrolls by the screen distance moved since the previous update, so the
  // canvas content follows the pointer.
  updatePan(screenPoint: Point2D): void {
    if (this.lastPanPoint === undefined) return;
    const current = new Vector2D(screenPoint);
    const delta = current.sub(this.lastPanPoint);
    this.lastPanPoint = current;
    if (delta.x === 0 && delta.y === 0) return;
    this._offset = this._offset.add(delta);
    this.onChange.notify();
  }

  endPan(): void {
    this.lastPanPoint = undefined;
  }

  toWorld(screenPoint: Point2D): Vector2D {
    return new Vector2D({
      x: (screenPoint.x - this._offset.x) / this._scale,
      y: (screenPoint.y - this._offset.y) / this._scale,
    });
  }

  toScreen(worldPoint: Point2D): Vector2D {
    return new Vector2D(worldPoint).scale(this._scale).add(this._offset);
  }

  // The part of the world currently visible through the viewport.
  visibleWorldRect(): Rect2D {
    return Rect2D.fromPoints(
      this.toWorld({x: 0, y: 0}),
      this.toWorld({x: this._size.width, y: this._size.height}),
    );
  }
}
