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

import {DEFAULT_EDITOR_CONFIG, parseEditorConfig} from './config';

describe('parseEditorConfig', () => {
  test('defaults', () => {
    expect(DEFAULT_EDITOR_CONFIG).toEqual({
      minZoom: 0.25,
      maxZoom: 4,
      zoomInFactor: 1.25,
      gridSize: 20,
      majorLineEvery: 5,
      nodeWidth: 150,
      nodeHeight: 100,
      portRadius: 6,
      cornerRadius: 10,
      portHitThreshold: 15,
      portHitMetric: 'manhattan',
      connectionHitTolerance: 4,
      placementArea: {width: 500, height: 200},
    });
    expect(Object.isFrozen(DEFAULT_EDITOR_CONFIG)).toBe(true);
  });

  test('overrides keep the other defaults', () => {
    const config = parseEditorConfig({gridSize: 40, portHitMetric: 'euclidean'});
    expect(config.gridSize).toBe(40);
    expect(config.portHitMetric).toBe('euclidean');
    expect(config.nodeWidth).toBe(150);
  });

  test('rejects invalid fields', () => {
    expect(() => parseEditorConfig({gridSize: -1})).toThrow(
      /^Invalid editor config: gridSize: /,
    );
    expect(() => parseEditorConfig({zoomInFactor: 1})).toThrow(
      /^Invalid editor config: zoomInFactor: /,
    );
  });

  test('rejects inverted zoom bounds', () => {
    expect(() => parseEditorConfig({minZoom: 2, maxZoom: 1})).toThrow(
      'Invalid editor config: minZoom: minZoom must not exceed maxZoom',
    );
  });
});
