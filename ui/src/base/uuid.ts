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

import {v4} from 'uuid';

export const uuidv4 = v4;

/**
 * Get a new id for a scene item, e.g. 'node-1b9d6bcd-...'.
 * @param kind The kind of item the id is for, used as the prefix.
 */
export function itemId(kind: 'node' | 'connection'): string {
  return `${kind}-${uuidv4()}`;
}
