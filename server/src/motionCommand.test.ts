import { describe, expect, it } from 'vitest';
import { clamp, sameMotion, toMotionCommand } from './motionCommand';

describe('toMotionCommand', () => {
  it('clamps out-of-range speed and steering', () => {
    expect(toMotionCommand({ cmd: 'move', direction: 'forward', speed: 1.5, steering: -3 })).toEqual({
      direction: 'forward',
      speed: 1,
      steering: -1,
    });
  });

  it('clamps negative speed to zero and keeps backward direction', () => {
    expect(toMotionCommand({ cmd: 'move', direction: 'backward', speed: -0.4, steering: 0.25 })).toEqual({
      direction: 'backward',
      speed: 0,
      steering: 0.25,
    });
  });

  it('fills defaults for absent fields', () => {
    expect(toMotionCommand({ cmd: 'move' })).toEqual({ direction: 'stop', speed: 0, steering: 0 });
    expect(toMotionCommand({ cmd: 'move', direction: 'forward' })).toEqual({
      direction: 'forward',
      speed: 0,
      steering: 0,
    });
  });

  it('accepts numeric strings and defaults non-numeric values', () => {
    expect(toMotionCommand({ cmd: 'move', direction: 'forward', speed: '0.5', steering: 'left' })).toEqual({
      direction: 'forward',
      speed: 0.5,
      steering: 0,
    });
  });

  it('treats unknown directions as stop', () => {
    expect(toMotionCommand({ cmd: 'move', direction: 'sideways', speed: 0.8, steering: 0.3 })).toEqual({
      direction: 'stop',
      speed: 0,
      steering: 0,
    });
  });

  it('maps stop to the zero command whatever else is present', () => {
    expect(toMotionCommand({ cmd: 'stop', direction: 'forward', speed: 1, steering: 1 })).toEqual({
      direction: 'stop',
      speed: 0,
      steering: 0,
    });
  });

  it('always stays within range', () => {
    const samples: unknown[] = [-1e9, -2, -1, -0.5, 0, 0.3, 1, 1.0001, 7, 1e9, Infinity, -Infinity, NaN, null, 'abc', true, {}];
    for (const speed of samples) {
      for (const steering of samples) {
        for (const direction of ['forward', 'backward', 'stop', 42]) {
          const command = toMotionCommand({ cmd: 'move', direction, speed, steering });
          expect(command.speed).toBeGreaterThanOrEqual(0);
          expect(command.speed).toBeLessThanOrEqual(1);
          expect(command.steering).toBeGreaterThanOrEqual(-1);
          expect(command.steering).toBeLessThanOrEqual(1);
        }
      }
    }
  });
});

describe('clamp', () => {
  it('maps NaN to the neutral value inside the range', () => {
    expect(clamp(NaN, -1, 1)).toBe(0);
    expect(clamp(NaN, 0, 1)).toBe(0);
  });
});

describe('sameMotion', () => {
  it('compares all three fields', () => {
    const a = { direction: 'forward' as const, speed: 0.5, steering: 0 };
    expect(sameMotion(a, { ...a })).toBe(true);
    expect(sameMotion(a, { ...a, steering: 0.1 })).toBe(false);
  });
});
