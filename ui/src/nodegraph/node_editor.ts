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
 * Ties a Viewport and a GraphScene together behind a toolkit independent
 * event surface.
 *
 * Screen-space pointer events come in; the right button pans the viewport,
 * everything else is mapped to world space and handed to the scene. Any
 * change to either side raises onRedraw, upon which the host repaints the
 * whole viewport through render().
 *
 * Minimal example:
 *
 * ```typescript
 * const editor = new NodeEditor({config: {maxZoom: 2}});
 * editor.onRedraw.addListener(() => editor.render(painter));
 * editor.viewport.setSize({width: 800, height: 600});
 * const a = editor.addNode({x: 0, y: 0});
 * const b = editor.addNode({x: 300, y: 0});
 * editor.scene.connect(a.id, b.id);
 * ```
 */

import {Disposable, DisposableStack} from '../base/disposable';
import {EvtSource} from '../base/events';
import {Point2D} from '../base/geom';
import {Painter} from '../base/painter';
import {RandomSource, randomInt} from '../base/rand';
import {EditorConfig, EditorConfigInput, parseEditorConfig} from './config';
import {GraphScene} from './graph_scene';
import {
  EditorKeyEvent,
  EditorPointerEvent,
  EditorWheelEvent,
  zoomDirectionFromWheel,
} from './input_events';
import {GraphNode} from './node';
import {renderScene} from './scene_renderer';
import {DEFAULT_EDITOR_STYLE, EditorStyle} from './style';
import {Viewport} from './viewport';

export interface NodeEditorArgs {
  readonly config?: EditorConfigInput;
  readonly style?: EditorStyle;
  // Used to place nodes added without a position. Default: Math.random.
  readonly random?: RandomSource;
}

export class NodeEditor implements Disposable {
  // Fired whenever the viewport has to be repainted in full.
  readonly onRedraw = new EvtSource<void>();

  readonly config: EditorConfig;
  readonly style: EditorStyle;
  readonly viewport: Viewport;
  readonly scene: GraphScene;

  private readonly random: RandomSource;
  private readonly trash = new DisposableStack();

  constructor({config, style, random}: NodeEditorArgs = {}) {
    this.config = parseEditorConfig(config);
    this.style = style ?? DEFAULT_EDITOR_STYLE;
    this.random = random ?? Math.random;
    this.viewport = new Viewport(this.config);
    this.scene = new GraphScene(this.config, this.style.connection.width);
    this.trash.use(this.scene);
    const requestRedraw = () => this.onRedraw.notify();
    this.trash.use(this.viewport.onChange.addListener(requestRedraw));
    this.trash.use(this.scene.onChange.addListener(requestRedraw));
  }

  /**
   * The "add node" action. Without a position the node lands at a random
   * whole-unit position inside the configured placement area.
   */
  addNode(position?: Point2D): GraphNode {
    const {width, height} = this.config.placementArea;
    const pos = position ?? {
      x: randomInt(0, width, this.random),
      y: randomInt(0, height, this.random),
    };
    return this.scene.addNode(pos);
  }

  handlePointerDown(e: EditorPointerEvent): void {
    if (e.button === 'right') {
      this.viewport.beginPan(e.position);
      return;
    }
    this.scene.handlePointerDown(this.toWorldEvent(e));
  }

  handlePointerMove(e: EditorPointerEvent): void {
    if (this.viewport.isPanning) {
      this.viewport.updatePan(e.position);
      return;
    }
    this.scene.handlePointerMove(this.toWorldEvent(e));
  }

  handlePointerUp(e: EditorPointerEvent): void {
    if (e.button === 'right') {
      this.viewport.endPan();
      return;
    }
    this.scene.handlePointerUp(this.toWorldEvent(e));
  }

  handleWheel(e: EditorWheelEvent): void {
    this.viewport.zoom(zoomDirectionFromWheel(e.deltaY), e.position);
  }

  // Returns true if the key was handled.
  handleKeyDown(e: EditorKeyEvent): boolean {
    switch (e.key) {
      case 'Delete':
      case 'Backspace':
        return this.scene.removeSelected() > 0;
      case 'Escape':
        this.viewport.endPan();
        this.scene.cancelGesture();
        return true;
      default:
        return false;
    }
  }

  render(painter: Painter): void {
    renderScene({
      painter,
      scene: this.scene,
      viewport: this.viewport,
      style: this.style,
      config: this.config,
    });
  }

  dispose(): void {
    this.trash.dispose();
  }

  private toWorldEvent(e: EditorPointerEvent): EditorPointerEvent {
    return {...e, position: this.viewport.toWorld(e.position)};
  }
}
