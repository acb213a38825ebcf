import { describe, expect, it, vi } from 'vitest';
import { IdleControlSource, KeyboardControlSource } from './controlSource';

describe('KeyboardControlSource', () => {
  it('steps throttle by 10% per W repeat up to full power', () => {
    const keys = new KeyboardControlSource();
    keys.handleKey('w', 0);
    expect(keys.read(0)).toEqual({ direction: 'forward', speed: 0.1, steering: 0 });

    for (let t = 1; t <= 12; t++) keys.handleKey('w', t * 50);
    expect(keys.read(600)).toEqual({ direction: 'forward', speed: 1, steering: 0 });
  });

  it('restarts at the first step when switching to reverse', () => {
    const keys = new KeyboardControlSource();
    keys.handleKey('w', 0);
    keys.handleKey('w', 50);
    keys.handleKey('S', 100);
    expect(keys.read(100)).toEqual({ direction: 'backward', speed: 0.1, steering: 0 });
  });

  it('steers while a throttle key is held', () => {
    const keys = new KeyboardControlSource();
    keys.handleKey('w', 0);
    keys.handleKey('a', 0);
    expect(keys.read(10)).toEqual({ direction: 'forward', speed: 0.1, steering: -1 });
    keys.handleKey('d', 20);
    expect(keys.read(30)).toEqual({ direction: 'forward', speed: 0.1, steering: 1 });
  });

  it('releases keys that stop repeating', () => {
    const keys = new KeyboardControlSource();
    keys.handleKey('w', 0);
    keys.handleKey('d', 200);
    expect(keys.read(250)).toEqual({ direction: 'forward', speed: 0.1, steering: 1 });
    expect(keys.read(251)).toEqual({ direction: 'stop', speed: 0, steering: 0 });
  });

  it('stops on space and asks to quit on q', () => {
    const onQuit = vi.fn();
    const keys = new KeyboardControlSource(onQuit);
    keys.handleKey('w', 0);
    keys.handleKey('space', 10);
    expect(keys.read(20)).toEqual({ direction: 'stop', speed: 0, steering: 0 });

    keys.handleKey('x', 30);
    expect(onQuit).not.toHaveBeenCalled();
    keys.handleKey('q', 40);
    expect(onQuit).toHaveBeenCalledTimes(1);
  });
});

describe('IdleControlSource', () => {
  it('always holds the vehicle still', () => {
    expect(new IdleControlSource().read()).toEqual({ direction: 'stop', speed: 0, steering: 0 });
  });
});
