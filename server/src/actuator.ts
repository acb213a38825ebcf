import type { MotionCommand, VehicleState } from '../../shared/src/models';
import { motorLog } from '../../shared/src/logger';
import { clamp, zeroMotion } from './motionCommand';

/**
 * Actuation capability. The dispatcher is the only writer; the status path
 * reads `snapshot()`.
 */
export interface Actuator {
  readonly kind: string;
  apply(command: MotionCommand): void;
  stop(): void;
  snapshot(): VehicleState;
  close(): Promise<void>;
}

export abstract class BaseActuator implements Actuator {
  abstract readonly kind: string;
  private state: VehicleState = Object.freeze(zeroMotion());

  apply(command: MotionCommand): void {
    const next: VehicleState = Object.freeze({
      direction: command.direction,
      speed: clamp(command.speed, 0, 1),
      steering: clamp(command.steering, -1, 1),
    });
    this.state = next;
    this.drive(next);
  }

  stop(): void {
    this.apply(zeroMotion());
  }

  snapshot(): VehicleState {
    return this.state;
  }

  async close(): Promise<void> {
    this.stop();
  }

  /** Push the new state to whatever moves the wheels. */
  protected abstract drive(state: VehicleState): void;
}

/** Logs motion instead of driving motors; the default off-vehicle. */
export class SimulatedActuator extends BaseActuator {
  readonly kind = 'sim';

  protected drive(state: VehicleState): void {
    motorLog.info(
      `(sim) ${state.direction} speed=${state.speed.toFixed(2)} steering=${state.steering.toFixed(2)}`
    );
  }
}
