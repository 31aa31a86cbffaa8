// Infrastructure layer: Dice rolling RNG implementation
// Every resolution call receives one of these, built from the request's roll input

import type { DiceRoller } from '@/domain/combat/types.js';
import { ValidationError } from '@/utils/errors.js';

export type { DiceRoller };

/**
 * Where the dice for a request come from. `fixed` replays values the client
 * (usually the DM's table) already rolled; `seeded` is reproducible;
 * `server` rolls fresh values, which end up in the fight history.
 */
export type RollInput =
  | { kind: 'fixed'; values: number[] }
  | { kind: 'seeded'; seed: number }
  | { kind: 'server' };

function assertSides(sides: number): void {
  if (!Number.isInteger(sides) || sides < 2) {
    throw new ValidationError(`Dice must have at least 2 sides, got: ${sides}`);
  }
  if (sides > 1000) {
    throw new ValidationError(`Dice cannot have more than 1000 sides, got: ${sides}`);
  }
}

/**
 * Standard random dice roller using Math.random()
 */
export class RandomDiceRoller implements DiceRoller {
  roll(sides: number): number {
    assertSides(sides);
    return Math.floor(Math.random() * sides) + 1;
  }
}

/**
 * Returns predetermined values in order
 */
export class FixedDiceRoller implements DiceRoller {
  private values: number[];

  constructor(values: number[]) {
    this.values = [...values];
  }

  roll(sides: number): number {
    assertSides(sides);
    const value = this.values.shift();
    if (value === undefined) {
      throw new ValidationError(`Not enough dice supplied: needed another d${sides}`, { sides });
    }
    if (!Number.isInteger(value) || value < 1 || value > sides) {
      throw new ValidationError(`Die value ${value} out of range for d${sides}`, { value, sides });
    }
    return value;
  }

  get remaining(): number {
    return this.values.length;
  }
}

/**
 * Seeded dice roller for reproducible rolls
 * Uses a simple Linear Congruential Generator
 */
export class SeededDiceRoller implements DiceRoller {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = seed | 0;
  }

  roll(sides: number): number {
    assertSides(sides);
    // LCG parameters from glibc
    this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
    return (this.state % sides) + 1;
  }
}

export function createDiceRoller(input: RollInput): DiceRoller {
  switch (input.kind) {
    case 'fixed':
      return new FixedDiceRoller(input.values);
    case 'seeded':
      return new SeededDiceRoller(input.seed);
    case 'server':
      return new RandomDiceRoller();
  }
}
