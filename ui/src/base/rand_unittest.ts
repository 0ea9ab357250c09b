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

import {RandState, pseudoRand, randomInt, seededRandom} from './rand';

describe('pseudoRand', () => {
  test('advances the state', () => {
    const state: RandState = {seed: 1};
    expect(pseudoRand(state)).toBe(48272 / (2 ** 31 - 1));
    expect(state.seed).toBe(48272);
  });

  test('same seed, same sequence', () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    for (let i = 0; i < 10; ++i) {
      expect(a()).toBe(b());
    }
  });

  test('stays in [0, 1)', () => {
    const rand = seededRandom(7);
    for (let i = 0; i < 1000; ++i) {
      const x = rand();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });
});

describe('randomInt', () => {
  test('both ends are reachable', () => {
    expect(randomInt(0, 500, () => 0)).toBe(0);
    expect(randomInt(0, 500, () => 0.9999999)).toBe(500);
    expect(randomInt(0, 500, () => 0.5)).toBe(250);
  });

  test('respects the range', () => {
    const rand = seededRandom(3);
    for (let i = 0; i < 200; ++i) {
      const n = randomInt(10, 20, rand);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(10);
      expect(n).toBeLessThanOrEqual(20);
    }
  });
});
