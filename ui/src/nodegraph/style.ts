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

import {ShapeStyle, StrokeStyle} from '../base/painter';

export interface EditorStyle {
  readonly background: string;
  readonly gridMinor: string;
  readonly gridMajor: string;
  readonly nodeDefault: ShapeStyle;
  readonly nodeSelected: ShapeStyle;
  readonly port: ShapeStyle;
  readonly connection: StrokeStyle;
  readonly pendingConnection: StrokeStyle;
  readonly selectionArea: ShapeStyle;
}

const NODE_OUTLINE: StrokeStyle = {color: 'rgb(0, 0, 0)', width: 2};

export const DEFAULT_EDITOR_STYLE: EditorStyle = {
  background: 'rgb(240, 240, 240)',
  gridMinor: 'rgb(230, 230, 230)',
  gridMajor: 'rgb(200, 200, 200)',
  nodeDefault: {fill: 'rgb(240, 255, 240)', stroke: NODE_OUTLINE},
  nodeSelected: {
    fill: 'rgb(255, 235, 180)',
    stroke: {color: 'rgb(255, 165, 0)', width: 5},
  },
  port: {fill: 'rgb(25, 180, 0)', stroke: NODE_OUTLINE},
  connection: {color: 'rgb(20, 20, 20)', width: 2},
  pendingConnection: {color: 'rgb(0, 128, 0)', width: 2, dash: [8, 4]},
  selectionArea: {
    fill: 'rgba(0, 120, 215, 0.15)',
    stroke: {color: 'rgb(0, 120, 215)', width: 1},
  },
};
