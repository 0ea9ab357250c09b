// Copyright (C) 2022 The Android Open Source Project
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

// Errors in JavaScript are (sadly) extremely free form. Three common
// cases are:
// - the error is a string
// - the error object itself has a 'message' field (normally because
//   its an instance of Error or a subclass of Error).
// - the outer object wraps an error under the 'error' key.
interface ErrorLikeObject {
  message?: unknown;
  error?: {message?: unknown};
}

function exists<T>(value: T): value is NonNullable<T> {
  return value !== undefined && value !== null;
}

// Attempt to coerce an error object into a string message.
export function getErrorMessage(e: unknown): string {
  if (exists(e) && typeof e === 'object') {
    const errorObject = e as ErrorLikeObject;
    if (exists(errorObject.message)) {
      return String(errorObject.message);
    } else if (exists(errorObject.error) && exists(errorObject.error.message)) {
      return String(errorObject.error.message);
    }
  }
  const asString = String(e);
  if (asString === '[object Object]') {
    try {
      return JSON.stringify(e);
    } catch {
      // Circular structures can't be stringified; the generic text is all we
      // can offer.
      return asString;
    }
  }
  return asString;
}
