import { z } from 'zod';
import { loadConfig, type FlagSpec } from '../../shared/src/cli';

// Media pipeline: frames leave the vehicle as 320x240 JPEG, one per datagram.
export const FRAME_WIDTH = 320;
export const FRAME_HEIGHT = 240;
export const JPEG_QUALITY = 50;
export const NO_TARGET_BACKOFF_MS = 500;

// Status replies carry a constant until a battery sensor is wired in.
export const PLACEHOLDER_BATTERY = 100;

// Shutdown: each subordinate context gets this long to wind down.
export const JOIN_TIMEOUT_MS = 1000;

// Motor board link (ws) on the diagnostics HTTP server
export const DEVICE_WS_PATH = '/motor';
export const DEVICE_HEARTBEAT_MS = 15000;
export const DEVICE_MAX_PAYLOAD = 16 * 1024;

const portSchema = z.coerce.number().int().min(0).max(65535);

const vehicleConfigSchema = z
  .object({
    host: z.string().min(1),
    port: portSchema,
    fps: z.coerce.number().positive().max(120),
    'http-port': portSchema,
    actuator: z.enum(['sim', 'device']),
    capture: z.enum(['pattern', 'ffmpeg', 'none']),
    camera: z.string().min(1),
  })
  .refine((raw) => raw.actuator !== 'device' || raw['http-port'] > 0, {
    message: 'the device actuator needs the HTTP server (--http-port > 0) for its board link',
    path: ['actuator'],
  })
  .transform((raw) => ({
    host: raw.host,
    port: raw.port,
    frameRate: raw.fps,
    httpPort: raw['http-port'],
    actuator: raw.actuator,
    capture: raw.capture,
    cameraDevice: raw.camera,
  }));

export type VehicleConfig = z.infer<typeof vehicleConfigSchema>;
export type ActuatorKind = VehicleConfig['actuator'];
export type CaptureKind = VehicleConfig['capture'];

const VEHICLE_FLAGS: FlagSpec = {
  host: { env: 'HOST', default: '0.0.0.0' },
  port: { env: 'PORT', default: '5051' },
  fps: { env: 'FPS', default: '20' },
  'http-port': { env: 'HTTP_PORT', default: '8080' },
  actuator: { env: 'ACTUATOR', default: 'sim' },
  capture: { env: 'CAPTURE', default: 'pattern' },
  camera: { env: 'CAMERA_DEVICE', default: '/dev/video0' },
};

export function loadVehicleConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): VehicleConfig {
  return loadConfig(vehicleConfigSchema, VEHICLE_FLAGS, argv, env);
}
