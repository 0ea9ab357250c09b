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

// Toolkit independent input events. The host translates its native events
// (DOM, test harness...) into these before handing them to the editor.

import {Point2D} from '../base/geom';

export type PointerButton = 'left' | 'middle' | 'right';

export type ZoomDirection = 'in' | 'out';

export interface EditorPointerEvent {
  // Screen space for the editor, world space once forwarded to the scene.
  readonly position: Point2D;
  readonly button: PointerButton;
  readonly shiftKey: boolean;
}

export interface EditorWheelEvent {
  // Location of the pointer in screen space.
  readonly position: Point2D;
  // Wheel deltaY as reported by the DOM: negative when scrolling up.
  readonly deltaY: number;
}

export interface EditorKeyEvent {
  // KeyboardEvent.key, e.g. 'Delete' or 'Escape'.
  readonly key: string;
}

// Maps MouseEvent.button to a PointerButton. Back/forward buttons are not
// used by the editor.
export function pointerButtonFromDom(button: number): PointerButton | undefined {
  switch (button) {
    case 0:
      return 'left';
    case 1:
      return 'middle';
    case 2:
      return 'right';
    default:
      return undefined;
  }
}

// Scrolling up zooms in; anything else (including a zero delta) zooms out.
export function zoomDirectionFromWheel(deltaY: number): ZoomDirection {
  return deltaY < 0 ? 'in' : 'out';
}
