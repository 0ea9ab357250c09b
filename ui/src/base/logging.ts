// Copyright (C) 2018 The Android Open Source Project
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

import {getErrorMessage} from './errors';
import {Disposable} from './disposable';

export interface ErrorStackEntry {
  name: string; // e.g. renderScene
  location: string; // e.g. editor_bundle.js:12:3
}

export interface ErrorDetails {
  message: string; // e.g. Cannot read properties of undefined
  stack: ErrorStackEntry[];
}

export type ErrorHandler = (err: ErrorDetails) => void;
const errorHandlers: ErrorHandler[] = [];

export function assertExists<A>(
  value: A | null | undefined,
  optMsg?: string,
): A {
  if (value === null || value === undefined) {
    throw new Error(optMsg ?? "Value doesn't exist");
  }
  return value;
}

export function assertTrue(value: boolean, optMsg?: string): void {
  if (!value) {
    throw new Error(optMsg ?? 'Failed assertion');
  }
}

export function assertFalse(value: boolean, optMsg?: string): void {
  assertTrue(!value, optMsg);
}

// Registers a handler invoked by reportError(). Returns a Disposable that
// unregisters it.
export function addErrorHandler(handler: ErrorHandler): Disposable {
  if (!errorHandlers.includes(handler)) {
    errorHandlers.push(handler);
  }
  return {
    dispose() {
      const pos = errorHandlers.indexOf(handler);
      if (pos >= 0) errorHandlers.splice(pos, 1);
    },
  };
}

// Parses a stack trace into entries. Chrome prefixes entries with '  at ' and
// uses the format function(url:line:col), while Firefox and Safari use
// function@url:line:col. Chrome's format is normalized into the latter before
// splitting on the last '@'.
export function parseStack(
  message: string,
  stack: string | undefined,
): ErrorStackEntry[] {
  const entries: ErrorStackEntry[] = [];
  if (stack === undefined) return entries;
  for (let line of stack.replace(/\r/g, '').split('\n')) {
    if (line.trim() === '' || message.includes(line.trim())) continue;
    line = line.replace(/^\s*at\s*/, '');
    line = line.replace(/\s*\(([^)]+)\)$/, '@$1');
    const lastAt = line.lastIndexOf('@');
    if (lastAt >= 0) {
      entries.push({
        name: line.substring(0, lastAt),
        location: line.substring(lastAt + 1),
      });
    } else {
      entries.push({name: '', location: line});
    }
  }
  return entries;
}

// Reports an error that escaped an event callback or a redraw. Handlers
// registered through addErrorHandler() receive the details; without any
// handler the error is written to the console.
export function reportError(err: unknown): void {
  let message = getErrorMessage(err);
  // Remove the "Uncaught Error:" or "Error:" prefixes which add no value.
  message = message.replace(/^Uncaught Error:/, '');
  message = message.replace(/^Error:/, '');
  message = message.trim();

  const stack = parseStack(
    message,
    err instanceof Error ? err.stack : undefined,
  );

  if (errorHandlers.length === 0) {
    console.error('Unhandled editor error:', message);
    return;
  }
  for (const handler of errorHandlers) {
    handler({message, stack});
  }
}

// This function serves two purposes.
// 1) A runtime check - if we are ever called, we throw an exception.
// This is useful for checking that code we suspect should never be reached is
// actually never reached.
// 2) A compile time check where typescript asserts that the value passed can be
// cast to the "never" type.
// This is useful for ensuring we exhastively check union types.
export function assertUnreachable(value: never): never {
  throw new Error(`This code should not be reachable ${value as unknown}`);
}
