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

import {z} from 'zod';

export const EDITOR_CONFIG_SCHEMA = z
  .object({
    // Bounds of the viewport scale factor (0.25 = 25%, 4 = 400%).
    minZoom: z.number().positive().default(0.25),
    maxZoom: z.number().positive().default(4.0),
    // Scale multiplier for one zoom-in step. Zooming out uses its reciprocal.
    zoomInFactor: z.number().gt(1).default(1.25),

    // Background grid cell size in world units, and how often a line is
    // emphasized.
    gridSize: z.number().positive().default(20),
    majorLineEvery: z.number().int().positive().default(5),

    nodeWidth: z.number().positive().default(150),
    nodeHeight: z.number().positive().default(100),
    portRadius: z.number().nonnegative().default(6),
    cornerRadius: z.number().nonnegative().default(10),

    // A pointer closer than this to a port is considered to be on it. The
    // distance is measured in world units and does not scale with zoom.
    portHitThreshold: z.number().positive().default(15),
    portHitMetric: z.enum(['manhattan', 'euclidean']).default('manhattan'),

    // Extra slack, on top of half the stroke width, for hitting a connection.
    connectionHitTolerance: z.number().nonnegative().default(4),

    // Area (from the world origin) in which nodes without an explicit
    // position are placed at random.
    placementArea: z
      .object({
        width: z.number().int().nonnegative(),
        height: z.number().int().nonnegative(),
      })
      .default({width: 500, height: 200}),
  })
  .refine((config) => config.minZoom <= config.maxZoom, {
    message: 'minZoom must not exceed maxZoom',
    path: ['minZoom'],
  });

export type EditorConfigInput = z.input<typeof EDITOR_CONFIG_SCHEMA>;
export type EditorConfig = Readonly<z.output<typeof EDITOR_CONFIG_SCHEMA>>;

/**
 * Validates a (possibly partial) config and fills in the defaults.
 *
 * @throws Error listing every invalid field.
 */
export function parseEditorConfig(input: EditorConfigInput = {}): EditorConfig {
  const result = EDITOR_CONFIG_SCHEMA.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new Error(`Invalid editor config: ${problems.join('; ')}`);
  }
  return Object.freeze(result.data);
}

export const DEFAULT_EDITOR_CONFIG: EditorConfig = parseEditorConfig();
