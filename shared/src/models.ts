import { z } from 'zod';

// ---- Command channel envelope ----

/** Any framed unit: an object with a non-empty `cmd` tag plus tag-specific fields. */
export const messageSchema = z.object({ cmd: z.string().min(1) }).passthrough();
export type Message = z.infer<typeof messageSchema>;

export const commandTagSchema = z.enum(['register_video', 'move', 'stop', 'status', 'quit']);
export type CommandTag = z.infer<typeof commandTagSchema>;

export const directionSchema = z.enum(['forward', 'backward', 'stop']);
export type Direction = z.infer<typeof directionSchema>;

export const MIN_VIDEO_PORT = 1;
export const MAX_VIDEO_PORT = 65535;

// ---- Operator -> vehicle ----

export type RegisterVideoMessage = { cmd: 'register_video'; video_port: number };
export type MoveMessage = { cmd: 'move'; direction: Direction; speed: number; steering: number };

export type OperatorMessage =
  | RegisterVideoMessage
  | MoveMessage
  | { cmd: 'stop' }
  | { cmd: 'status' }
  | { cmd: 'quit' };

// ---- Vehicle -> operator ----

export const STATUS_REPORT_CMD = 'status_report';

// Older vehicles answer `status` with a bare object, so `cmd` stays optional here.
export const statusReportSchema = z.object({
  cmd: z.string().optional(),
  battery: z.number(),
  speed: z.number(),
  steering: z.number(),
});
export type StatusReport = z.infer<typeof statusReportSchema>;

export type ErrorReply = { cmd: 'error'; error: string; detail?: string };

export type VehicleMessage = (StatusReport & { cmd: typeof STATUS_REPORT_CMD }) | ErrorReply;

// ---- Motion ----

export interface MotionCommand {
  direction: Direction;
  speed: number;    // [0..1]
  steering: number; // [-1..1], negative steers left
}

export const ZERO_MOTION: Readonly<MotionCommand> = Object.freeze({
  direction: 'stop',
  speed: 0,
  steering: 0,
});

/** Last applied actuation values; mirrors the most recently dispatched MotionCommand. */
export type VehicleState = Readonly<MotionCommand>;

// ---- Media ----

export interface VideoTarget {
  readonly host: string;
  readonly port: number;
}

export function formatTarget(target: VideoTarget | null): string {
  if (!target) return 'none';
  return target.host.includes(':') ? `[${target.host}]:${target.port}` : `${target.host}:${target.port}`;
}
