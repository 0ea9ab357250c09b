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

// Minimal stand-in for the ESnext explicit resource management types. The
// editor core runs both in the browser and under Node test runners, so it
// relies on a plain dispose() method rather than Symbol.dispose.

// Represents an object that should be disposed of to release listeners or
// restore some state (e.g. a canvas transform).
export interface Disposable {
  dispose(): void;
}

// A collection of Disposables, disposed LIFO.
// Resources are added during the lifecycle of an object (e.g. a component)
// and all released at once when the object is torn down.
export class DisposableStack implements Disposable {
  private readonly resources: Disposable[] = [];

  use<T extends Disposable>(d: T): T {
    this.resources.push(d);
    return d;
  }

  defer(onDispose: () => void): void {
    this.use({dispose: onDispose});
  }

  get size(): number {
    return this.resources.length;
  }

  dispose(): void {
    while (true) {
      const d = this.resources.pop();
      if (d === undefined) {
        break;
      }
      d.dispose();
    }
  }
}
