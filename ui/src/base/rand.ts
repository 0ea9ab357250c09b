// Copyright (C) 2024 The Android Open Source Project
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

// Match C++ minstd_rand behaviour.
const MODULUS = 2 ** 31 - 1;
const MULTIPLIER = 48271;
const INCREMENT = 1;

// A source of uniformly distributed numbers in [0, 1), like Math.random.
export type RandomSource = () => number;

// Allow callers to have a private sequence.
export interface RandState {
  seed: number;
}

// Like Math.random(), but yields a repeatable sequence (matters for tests).
export function pseudoRand(state: RandState): number {
  state.seed = (MULTIPLIER * state.seed + INCREMENT) % MODULUS;
  return state.seed / MODULUS;
}

// Returns a RandomSource backed by a private pseudoRand() sequence.
export function seededRandom(seed: number): RandomSource {
  const state: RandState = {seed};
  return () => pseudoRand(state);
}

// Returns an integer in [min, max], both ends inclusive.
export function randomInt(
  min: number,
  max: number,
  random: RandomSource = Math.random,
): number {
  return min + Math.floor(random() * (max - min + 1));
}
