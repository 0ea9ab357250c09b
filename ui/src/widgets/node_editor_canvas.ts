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
 * A canvas hosting a NodeEditor.
 *
 * Features:
 * - Pan with the right mouse button, zoom with the wheel (anchored under the
 *   pointer).
 * - Drag nodes, rubber-band select, shift-click to toggle selection.
 * - Drag from an output port to another node's input port to connect them.
 * - Delete/Backspace removes the selected nodes, Escape cancels a gesture.
 *
 * Minimal example:
 *
 * ```typescript
 * let api: NodeEditorCanvasApi | undefined;
 *
 * m('.toolbar', m('button', {onclick: () => api?.addNode()}, 'Add Node'));
 * m(NodeEditorCanvas, {
 *   config: {maxZoom: 4},
 *   onReady: (readyApi) => (api = readyApi),
 * });
 * ```
 */

import m from 'mithril';
import {Canvas2DPainter} from '../base/canvas2d_painter';
import {DisposableStack} from '../base/disposable';
import {
  CSSCursor,
  bindDocumentListener,
  bindEventListener,
  bindWindowListener,
  elementIsEditable,
  offsetRelativeTo,
} from '../base/dom_utils';
import {reportError} from '../base/logging';
import {EditorConfigInput} from '../nodegraph/config';
import {
  EditorPointerEvent,
  pointerButtonFromDom,
} from '../nodegraph/input_events';
import {GraphNode} from '../nodegraph/node';
import {NodeEditor} from '../nodegraph/node_editor';

export interface NodeEditorCanvasApi {
  readonly editor: NodeEditor;
  // The toolbar's "add node" action: adds a node at a random position.
  addNode(): GraphNode;
}

export interface NodeEditorCanvasAttrs {
  // Editor to host. When omitted one is created from |config| and disposed of
  // together with the component.
  readonly editor?: NodeEditor;
  readonly config?: EditorConfigInput;
  readonly className?: string;
  readonly onReady?: (api: NodeEditorCanvasApi) => void;
}

export class NodeEditorCanvas
  implements m.ClassComponent<NodeEditorCanvasAttrs>
{
  private readonly trash = new DisposableStack();
  private canvas?: HTMLCanvasElement;
  private editor?: NodeEditor;

  view({attrs}: m.CVnode<NodeEditorCanvasAttrs>) {
    return m('canvas.node-editor', {
      className: attrs.className,
      tabindex: 0,
      style: {display: 'block', width: '100%', height: '100%'},
    });
  }

  oncreate({dom, attrs}: m.CVnodeDOM<NodeEditorCanvasAttrs>) {
    if (!(dom instanceof HTMLCanvasElement)) {
      throw new Error('NodeEditorCanvas must render a <canvas>');
    }
    const canvas = dom;
    this.canvas = canvas;

    let editor = attrs.editor;
    if (editor === undefined) {
      editor = this.trash.use(new NodeEditor({config: attrs.config}));
    }
    this.editor = editor;
    const hosted = editor;

    const pointerEvent = (e: PointerEvent): EditorPointerEvent | undefined => {
      const button = pointerButtonFromDom(e.button);
      if (button === undefined) return undefined;
      return {
        position: offsetRelativeTo(canvas, e),
        button,
        shiftKey: e.shiftKey,
      };
    };

    this.trash.use(
      bindEventListener(canvas, 'pointerdown', (e) => {
        const ev = pointerEvent(e);
        if (ev === undefined) return;
        canvas.focus();
        if (ev.button === 'right') this.setCursor('grabbing');
        hosted.handlePointerDown(ev);
      }),
    );
    this.trash.use(
      bindDocumentListener(document, 'pointermove', (e) => {
        // Moves carry no button of their own (e.button is -1).
        hosted.handlePointerMove({
          position: offsetRelativeTo(canvas, e),
          button: 'left',
          shiftKey: e.shiftKey,
        });
      }),
    );
    this.trash.use(
      bindDocumentListener(document, 'pointerup', (e) => {
        const ev = pointerEvent(e);
        if (ev === undefined) return;
        if (ev.button === 'right') this.setCursor('default');
        hosted.handlePointerUp(ev);
      }),
    );
    this.trash.use(
      bindEventListener(
        canvas,
        'wheel',
        (e) => {
          e.preventDefault();
          hosted.handleWheel({
            position: offsetRelativeTo(canvas, e),
            deltaY: e.deltaY,
          });
        },
        {passive: false},
      ),
    );
    this.trash.use(
      bindEventListener(canvas, 'keydown', (e) => {
        if (elementIsEditable(e.target)) return;
        if (hosted.handleKeyDown({key: e.key})) {
          e.preventDefault();
        }
      }),
    );
    // The right button pans, so the browser menu would only get in the way.
    this.trash.use(
      bindEventListener(canvas, 'contextmenu', (e) => e.preventDefault()),
    );
    this.trash.use(
      bindWindowListener(window, 'blur', () => {
        hosted.handleKeyDown({key: 'Escape'});
        this.setCursor('default');
      }),
    );

    const resizeObserver = new ResizeObserver(() => this.resize());
    resizeObserver.observe(canvas);
    this.trash.defer(() => resizeObserver.disconnect());

    this.trash.use(hosted.onRedraw.addListener(() => this.redraw()));
    this.resize();

    attrs.onReady?.({
      editor: hosted,
      addNode: () => hosted.addNode(),
    });
  }

  onremove() {
    this.trash.dispose();
    this.canvas = undefined;
    this.editor = undefined;
  }

  private resize() {
    const canvas = this.canvas;
    const editor = this.editor;
    if (canvas === undefined || editor === undefined) return;
    const dpr = window.devicePixelRatio;
    const width = canvas.clientWidth;
    const height = canvas.clientHeight;
    canvas.width = Math.round(width * dpr);
    canvas.height = Math.round(height * dpr);
    // Resizing the backing store wipes the canvas, so always paint afterwards
    // even if the viewport's logical size is unchanged.
    editor.viewport.setSize({width, height});
    this.redraw();
  }

  // Repaints the entire viewport. Partial invalidation leaves trails behind
  // dragged items.
  private redraw() {
    const canvas = this.canvas;
    const editor = this.editor;
    if (canvas === undefined || editor === undefined) return;
    const ctx = canvas.getContext('2d');
    if (ctx === null) {
      reportError(new Error('Canvas 2D context unavailable'));
      return;
    }
    try {
      editor.render(new Canvas2DPainter(ctx, window.devicePixelRatio));
    } catch (e) {
      reportError(e);
    }
  }

  private setCursor(cursor: CSSCursor) {
    if (this.canvas !== undefined) {
      this.canvas.style.cursor = cursor;
    }
  }
}
