import { z } from 'zod';
import type { Direction, VehicleState, VideoTarget } from '../../shared/src/models';

// ---- Motor board link (ws) ----

export type DeviceOutbound =
  | { kind: 'hello'; serverTime: number }
  | { kind: 'drive'; seq: number; direction: Direction; speed: number; steering: number }
  | { kind: 'ping'; t: number };

export const deviceInboundSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('hello'), boardId: z.string(), fw: z.string() }),
  z.object({ kind: z.literal('ack'), seq: z.number().int() }),
  z.object({ kind: z.literal('error'), seq: z.number().int().optional(), message: z.string() }),
  z.object({ kind: z.literal('pong'), t: z.number() }),
]);
export type DeviceInbound = z.infer<typeof deviceInboundSchema>;

export interface DeviceLinkStatus {
  connected: boolean;
  lastHello?: string;
  lastAckSeq: number | null;
  pending: boolean;
}

// ---- Diagnostics ----

export interface RelayStats {
  running: boolean;
  framesSent: number;
  sendFailures: number;
  encodeFailures: number;
  captureFailures: number;
  lastSendAt: number | null;
}

export interface VehicleStatus {
  state: VehicleState;
  battery: number;
  target: VideoTarget | null;
  sessions: number;
  relay: RelayStats;
  device?: DeviceLinkStatus;
}

export const videoTargetSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
});
