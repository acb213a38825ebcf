import { z } from 'zod';
import { loadConfig, type FlagSpec } from '../../shared/src/cli';

// Command pacing: a move goes out on a real change or at least every SEND_INTERVAL_MS.
export const CONTROL_TICK_MS = 10;
export const SEND_INTERVAL_MS = 50;
export const CHANGE_THRESHOLD = 0.05;
export const STATUS_INTERVAL_MS = 1000;

// Keyboard input
export const THROTTLE_STEPS = 10;
export const KEY_DECAY_MS = 250;

// Shutdown: each context gets this long to wind down.
export const JOIN_TIMEOUT_MS = 1000;

const portSchema = z.coerce.number().int().min(0).max(65535);

const operatorConfigSchema = z
  .object({
    'server-ip': z.string({ required_error: 'required (--server-ip or SERVER_IP)' }).min(1),
    'server-port': portSchema.refine((port) => port > 0, 'must be between 1 and 65535'),
    'video-port': portSchema.refine((port) => port > 0, 'must be between 1 and 65535'),
    'viewer-port': portSchema,
    input: z.enum(['keyboard', 'none']),
  })
  .transform((raw) => ({
    serverHost: raw['server-ip'],
    serverPort: raw['server-port'],
    videoPort: raw['video-port'],
    viewerPort: raw['viewer-port'],
    input: raw.input,
  }));

export type OperatorConfig = z.infer<typeof operatorConfigSchema>;
export type InputKind = OperatorConfig['input'];

const OPERATOR_FLAGS: FlagSpec = {
  'server-ip': { env: 'SERVER_IP' },
  'server-port': { env: 'SERVER_PORT', default: '5051' },
  'video-port': { env: 'VIDEO_PORT', default: '6000' },
  'viewer-port': { env: 'VIEWER_PORT', default: '8081' },
  input: { env: 'INPUT', default: 'keyboard' },
};

export function loadOperatorConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): OperatorConfig {
  return loadConfig(operatorConfigSchema, OPERATOR_FLAGS, argv, env);
}
