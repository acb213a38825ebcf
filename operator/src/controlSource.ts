import readline from 'readline';
import { ZERO_MOTION, type MotionCommand } from '../../shared/src/models';
import { KEY_DECAY_MS, THROTTLE_STEPS } from './config';

/** Something the CommandSender can poll for the operator's current intent. */
export interface ControlSource {
  readonly name: string;
  read(now: number): MotionCommand;
  close(): void;
}

/** No input device: the vehicle is held still. */
export class IdleControlSource implements ControlSource {
  readonly name = 'idle';

  read(): MotionCommand {
    return { ...ZERO_MOTION };
  }

  close(): void {}
}

type Throttle = { direction: 'forward' | 'backward'; steps: number; lastKeyAt: number };
type Steering = { value: -1 | 1; lastKeyAt: number };

/**
 * W/S throttle and A/D steering from a terminal. Terminals report key repeats,
 * not key releases, so a key counts as released once no repeat has arrived for
 * KEY_DECAY_MS. Each W (or S) repeat adds one 10% step up to full power;
 * switching between W and S restarts at the first step.
 */
export class KeyboardControlSource implements ControlSource {
  readonly name = 'keyboard';
  private throttle: Throttle | null = null;
  private steering: Steering | null = null;
  private detach: () => void = () => undefined;

  constructor(private readonly onQuit: () => void = () => undefined) {}

  /** Start listening for keypresses on a TTY stream (usually stdin). */
  attach(input: NodeJS.ReadStream, clock: () => number = Date.now): void {
    readline.emitKeypressEvents(input);
    const raw = input.isTTY === true;
    if (raw) input.setRawMode(true);
    const onKeypress = (text: string | undefined, key: { name?: string; ctrl?: boolean } | undefined): void => {
      if (key?.ctrl && key.name === 'c') {
        this.onQuit();
        return;
      }
      const name = key?.name ?? text;
      if (name) this.handleKey(name, clock());
    };
    input.on('keypress', onKeypress);
    input.resume();
    this.detach = () => {
      input.off('keypress', onKeypress);
      if (raw) input.setRawMode(false);
      input.pause();
    };
  }

  handleKey(name: string, now: number): void {
    switch (name.toLowerCase()) {
      case 'w':
        this.accelerate('forward', now);
        break;
      case 's':
        this.accelerate('backward', now);
        break;
      case 'a':
        this.steering = { value: -1, lastKeyAt: now };
        break;
      case 'd':
        this.steering = { value: 1, lastKeyAt: now };
        break;
      case 'space':
      case ' ':
        this.throttle = null;
        this.steering = null;
        break;
      case 'q':
        this.onQuit();
        break;
    }
  }

  read(now: number): MotionCommand {
    if (this.throttle && now - this.throttle.lastKeyAt > KEY_DECAY_MS) {
      this.throttle = null;
    }
    if (this.steering && now - this.steering.lastKeyAt > KEY_DECAY_MS) {
      this.steering = null;
    }
    if (!this.throttle) {
      // Steering alone cannot move the vehicle; the vehicle zeroes it on stop anyway.
      return { ...ZERO_MOTION };
    }
    return {
      direction: this.throttle.direction,
      speed: this.throttle.steps / THROTTLE_STEPS,
      steering: this.steering?.value ?? 0,
    };
  }

  close(): void {
    this.detach();
    this.detach = () => undefined;
  }

  private accelerate(direction: Throttle['direction'], now: number): void {
    if (!this.throttle || this.throttle.direction !== direction) {
      this.throttle = { direction, steps: 1, lastKeyAt: now };
      return;
    }
    this.throttle = { direction, steps: Math.min(THROTTLE_STEPS, this.throttle.steps + 1), lastKeyAt: now };
  }
}
