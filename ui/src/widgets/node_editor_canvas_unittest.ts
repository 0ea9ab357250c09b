/**
 * @jest-environment jsdom
 */

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

import m from 'mithril';
import {ErrorDetails, addErrorHandler} from '../base/logging';
import {NodeEditorCanvas, NodeEditorCanvasApi} from './node_editor_canvas';

class FakeResizeObserver implements ResizeObserver {
  observe(): void {}
  unobserve(): void {}
  disconnect(): void {}
}

describe('NodeEditorCanvas', () => {
  let root: HTMLElement;
  const errors: ErrorDetails[] = [];
  const errorHandler = addErrorHandler((err) => errors.push(err));

  beforeAll(() => {
    window.ResizeObserver = FakeResizeObserver;
  });

  afterAll(() => {
    errorHandler.dispose();
  });

  beforeEach(() => {
    errors.length = 0;
    root = document.createElement('div');
    document.body.appendChild(root);
  });

  afterEach(() => {
    m.render(root, null);
    root.remove();
  });

  test('renders a canvas and exposes the editor', () => {
    let api: NodeEditorCanvasApi | undefined;
    m.render(
      root,
      m(NodeEditorCanvas, {
        config: {maxZoom: 2},
        onReady: (readyApi: NodeEditorCanvasApi) => (api = readyApi),
      }),
    );

    expect(root.querySelector('canvas.node-editor')).not.toBeNull();
    expect(api?.editor.config.maxZoom).toBe(2);

    api?.addNode();
    expect(api?.editor.scene.nodes.length).toBe(1);
  });

  test('painting failures are reported', () => {
    // jsdom has no 2D context.
    m.render(root, m(NodeEditorCanvas, {}));
    expect(errors.length).toBeGreaterThan(0);
    expect(errors[0].message).toBe('Canvas 2D context unavailable');
  });
});
