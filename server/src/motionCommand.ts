import { z } from 'zod';
import { directionSchema, type Message, type MotionCommand, ZERO_MOTION } from '../../shared/src/models';

// Absent or unusable fields fall back instead of failing: the validator always
// produces a command the actuator can apply.
const moveFieldsSchema = z.object({
  direction: directionSchema.catch('stop'),
  speed: z.coerce.number().catch(0),
  steering: z.coerce.number().catch(0),
});

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min < 0 && max > 0 ? 0 : min;
  return Math.max(min, Math.min(max, value));
}

export function zeroMotion(): MotionCommand {
  return { ...ZERO_MOTION };
}

/**
 * Canonical motion intent for a `move` or `stop` message.
 *
 * Out-of-range values are clamped silently (speed to [0,1], steering to [-1,1]).
 * `stop`, and `move` with direction `stop` or an unknown direction, map to the
 * zero command regardless of other fields.
 */
export function toMotionCommand(message: Message): MotionCommand {
  if (message.cmd !== 'move') {
    return zeroMotion();
  }
  const parsed = moveFieldsSchema.safeParse(message);
  if (!parsed.success || parsed.data.direction === 'stop') {
    return zeroMotion();
  }
  return {
    direction: parsed.data.direction,
    speed: clamp(parsed.data.speed, 0, 1),
    steering: clamp(parsed.data.steering, -1, 1),
  };
}

export function sameMotion(a: MotionCommand, b: MotionCommand): boolean {
  return a.direction === b.direction && a.speed === b.speed && a.steering === b.steering;
}
