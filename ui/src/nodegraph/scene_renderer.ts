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

import {Painter} from '../base/painter';
import {EditorConfig} from './config';
import {GraphScene} from './graph_scene';
import {computeGridLines} from './grid';
import {GraphNode} from './node';
import {EditorStyle} from './style';
import {Viewport} from './viewport';

export type RenderConfig = Pick<
  EditorConfig,
  'gridSize' | 'majorLineEvery' | 'cornerRadius'
>;

export interface RenderArgs {
  readonly painter: Painter;
  readonly scene: GraphScene;
  readonly viewport: Viewport;
  readonly style: EditorStyle;
  readonly config: RenderConfig;
}

/**
 * Redraws the whole viewport, back to front: background, grid, connections,
 * nodes, then the transient gesture feedback (in-progress connection line and
 * rubber-band rectangle).
 */
export function renderScene(args: RenderArgs): void {
  const {painter, scene, viewport, style, config} = args;
  painter.clear(style.background);

  const transform = painter.pushTransform(viewport.transform);
  try {
    // Grid lines stay one screen pixel wide whatever the zoom.
    const hairline = 1 / viewport.scale;
    const gridLines = computeGridLines(
      viewport.visibleWorldRect(),
      config.gridSize,
      config.majorLineEvery,
    );
    for (const line of gridLines) {
      painter.drawLine(line.from, line.to, {
        color: line.major ? style.gridMajor : style.gridMinor,
        width: hairline,
      });
    }

    for (const connection of scene.connections) {
      painter.drawBezier(connection.path, style.connection);
    }

    for (const node of scene.nodes) {
      renderNode(painter, node, style, config.cornerRadius);
    }

    const pending = scene.pendingConnection;
    if (pending !== undefined) {
      painter.drawLine(pending.start, pending.end, style.pendingConnection);
    }

    const area = scene.selectionArea;
    if (area !== undefined) {
      const {fill, stroke} = style.selectionArea;
      painter.drawRect(area, {fill, stroke: {...stroke, width: hairline}});
    }
  } finally {
    transform.dispose();
  }
}

function renderNode(
  painter: Painter,
  node: GraphNode,
  style: EditorStyle,
  cornerRadius: number,
) {
  const body = node.selected ? style.nodeSelected : style.nodeDefault;
  painter.drawRoundedRect(node.bodyRect(), cornerRadius, body);
  painter.drawCircle(node.inputPortPosition(), node.portRadius, style.port);
  painter.drawCircle(node.outputPortPosition(), node.portRadius, style.port);
}
