// Copyright (C) 2023 The Android Open Source Project
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

import {Disposable} from './disposable';
import {Vector2D} from './geom';

export type CSSCursor = 'default' | 'grabbing' | 'crosshair' | 'move';

// Return true if EventTarget is or is inside an editable element.
// Editable elements incluce: <input type="text">, <textarea>, or elements with
// the |contenteditable| attribute set.
export function elementIsEditable(target: EventTarget | null): boolean {
  if (target === null) {
    return false;
  }

  if (!(target instanceof Element)) {
    return false;
  }

  const editable = target.closest('input, textarea, [contenteditable=true]');

  if (editable === null) {
    return false;
  }

  if (editable instanceof HTMLInputElement) {
    if (['radio', 'checkbox', 'button'].includes(editable.type)) {
      return false;
    }
  }

  return true;
}

// Returns the pointer position of |e| relative to the top-left corner of
// |element|, which does not need to be the event's target (pointer-move and
// pointer-up are listened for on the whole document).
export function offsetRelativeTo(element: Element, e: MouseEvent): Vector2D {
  const rect = element.getBoundingClientRect();
  return new Vector2D({x: e.clientX - rect.left, y: e.clientY - rect.top});
}

// Adds an event listener and returns a Disposable which removes it again.
export function bindEventListener<K extends keyof HTMLElementEventMap>(
  element: HTMLElement,
  event: K,
  handler: (event: HTMLElementEventMap[K]) => void,
  options?: AddEventListenerOptions,
): Disposable {
  element.addEventListener(event, handler, options);
  return {
    dispose() {
      element.removeEventListener(event, handler, options);
    },
  };
}

// Like bindEventListener(), for events delivered to the whole document.
export function bindDocumentListener<K extends keyof DocumentEventMap>(
  doc: Document,
  event: K,
  handler: (event: DocumentEventMap[K]) => void,
  options?: AddEventListenerOptions,
): Disposable {
  doc.addEventListener(event, handler, options);
  return {
    dispose() {
      doc.removeEventListener(event, handler, options);
    },
  };
}

// Like bindEventListener(), for window events such as blur.
export function bindWindowListener<K extends keyof WindowEventMap>(
  win: Window,
  event: K,
  handler: (event: WindowEventMap[K]) => void,
  options?: AddEventListenerOptions,
): Disposable {
  win.addEventListener(event, handler, options);
  return {
    dispose() {
      win.removeEventListener(event, handler, options);
    },
  };
}
