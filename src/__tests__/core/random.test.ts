import { describe, it, expect } from 'vitest';
import { Possibility, mathRandom, seededRandom } from '../../core/random.js';
import { scriptedRandom } from '../helpers.js';

describe('random sources', () => {
  it('mathRandom stays inside [min, max)', () => {
    for (let i = 0; i < 200; i++) {
      const n = mathRandom.nextInt(3, 6);
      expect(n).toBeGreaterThanOrEqual(3);
      expect(n).toBeLessThan(6);
    }
  });

  it('rejects an empty range', () => {
    expect(() => mathRandom.nextInt(2, 2)).toThrow('max must be greater than min');
  });

  it('seededRandom repeats for the same seed', () => {
    const a = seededRandom(99);
    const b = seededRandom(99);
    const first = Array.from({ length: 10 }, () => a.nextInt(0, 1000));
    const second = Array.from({ length: 10 }, () => b.nextInt(0, 1000));
    expect(first).toEqual(second);
  });
});

describe('Possibility', () => {
  it('defaults to 100/50', () => {
    const possibility = new Possibility();
    expect(possibility.upperLimit).toBe(100);
    expect(possibility.step).toBe(50);
  });

  it('rolls in [1, upperLimit] and compares against step', () => {
    const random = scriptedRandom(50, 51);
    const possibility = new Possibility(random);

    expect(possibility.determine()).toBe(false);
    expect(possibility.determine()).toBe(true);
    expect(random.calls).toEqual([
      [1, 101],
      [1, 101],
    ]);
  });

  it('bound() halves the limit unless a step is given', () => {
    const possibility = new Possibility();
    possibility.bound(10);
    expect(possibility.step).toBe(5);
    possibility.bound(1);
    expect(possibility.step).toBe(1);
    possibility.bound(10, 9);
    expect(possibility.step).toBe(9);
  });

  it('bound() validates its arguments', () => {
    const possibility = new Possibility();
    expect(() => possibility.bound(0)).toThrow('upperLimit must be an integer greater than 0');
    expect(() => possibility.bound(10, 0)).toThrow('step must be an integer greater than 0');
    expect(() => possibility.bound(5, 6)).toThrow('upperLimit must be greater than or equal to step');
  });

  it('a step equal to the limit never downloads', () => {
    const possibility = new Possibility(seededRandom(1), 4, 4);
    for (let i = 0; i < 50; i++) {
      expect(possibility.determine()).toBe(false);
    }
  });

  it('reset() restores the defaults', () => {
    const possibility = new Possibility(mathRandom, 8);
    possibility.reset();
    expect(possibility.upperLimit).toBe(100);
    expect(possibility.step).toBe(50);
  });
});
