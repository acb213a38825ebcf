import http from 'http';
import { describeError, ResourceUnavailableError } from '../../shared/src/errors';
import { httpLog, logger, mediaLog } from '../../shared/src/logger';
import { type Actuator, SimulatedActuator } from './actuator';
import { createApp } from './api';
import { type FrameSource, FfmpegCaptureSource, NullFrameSource, TestPatternSource } from './capture';
import { ClientTargetRegistry } from './clientTargetRegistry';
import { CommandChannel } from './commandChannel';
import type { DispatchContext } from './commandSession';
import { JOIN_TIMEOUT_MS, PLACEHOLDER_BATTERY, type VehicleConfig } from './config';
import { DeviceLink, DeviceLinkActuator } from './deviceLink';
import { type FrameEncoder, SharpJpegEncoder } from './frameEncoder';
import { MediaRelay } from './mediaRelay';
import { type MediaSink, UdpMediaSink } from './mediaSink';
import { type JoinOutcome, ShutdownCoordinator } from '../../shared/src/shutdown';

/** Collaborators a caller may swap out, mainly for tests. */
export interface VehicleOverrides {
  source?: FrameSource;
  encoder?: FrameEncoder;
  sink?: MediaSink;
  actuator?: Actuator;
}

export interface VehicleAddresses {
  commandPort: number;
  httpPort: number | null;
}

export function createFrameSource(config: VehicleConfig): FrameSource {
  switch (config.capture) {
    case 'pattern':
      return new TestPatternSource();
    case 'ffmpeg':
      return new FfmpegCaptureSource(config.cameraDevice);
    case 'none':
      return new NullFrameSource();
  }
}

/**
 * The vehicle endpoint: command channel, media relay, actuation and the
 * optional diagnostics server, all tied to one ShutdownCoordinator.
 */
export class Vehicle {
  readonly coordinator = new ShutdownCoordinator();
  readonly registry = new ClientTargetRegistry();
  readonly actuator: Actuator;
  readonly relay: MediaRelay;
  readonly channel: CommandChannel;
  private readonly sink: MediaSink;
  private readonly httpServer?: http.Server;
  private readonly deviceLink?: DeviceLink;

  constructor(
    private readonly config: VehicleConfig,
    overrides: VehicleOverrides = {}
  ) {
    if (config.httpPort > 0) {
      this.httpServer = http.createServer();
      if (config.actuator === 'device') {
        this.deviceLink = new DeviceLink(this.httpServer);
      }
    }
    this.actuator =
      overrides.actuator ?? (this.deviceLink ? new DeviceLinkActuator(this.deviceLink) : new SimulatedActuator());
    this.sink = overrides.sink ?? new UdpMediaSink();
    this.relay = new MediaRelay(
      this.registry,
      overrides.source ?? createFrameSource(config),
      overrides.encoder ?? new SharpJpegEncoder(),
      this.sink,
      { frameRate: config.frameRate }
    );
    this.channel = new CommandChannel(this.dispatchContext, {
      host: config.host,
      port: config.port,
      signal: this.coordinator.signal,
    });

    this.coordinator.register({
      name: 'command-channel',
      stop: () => this.channel.close(),
      done: () => this.channel.done(),
    });
    this.coordinator.register({
      name: 'media-relay',
      stop: () => this.relay.stop(),
      done: () => this.relay.done(),
    });
  }

  get dispatchContext(): DispatchContext {
    return {
      registry: this.registry,
      actuator: this.actuator,
      shutdown: this.coordinator,
      battery: () => PLACEHOLDER_BATTERY,
    };
  }

  async start(): Promise<VehicleAddresses> {
    const command = await this.channel.listen();

    this.relay.start().catch((err: unknown) => {
      mediaLog.error('Relay loop crashed', describeError(err));
    });

    let httpPort: number | null = null;
    if (this.httpServer) {
      try {
        httpPort = await this.startHttp(this.httpServer);
      } catch (err) {
        // The board link rides on this server; without it there is no actuation.
        if (this.deviceLink) throw err;
        httpLog.warn('Diagnostics disabled', describeError(err));
      }
    }
    return { commandPort: command.port, httpPort };
  }

  /**
   * Wait for a shutdown request, give every context its bounded chance to
   * exit, then release sockets and motors.
   */
  async waitForExit(timeoutMs = JOIN_TIMEOUT_MS): Promise<JoinOutcome[]> {
    const reason = await this.coordinator.waitForShutdown();
    logger.info('[SHUTDOWN]', `Stopping vehicle (${reason})`);
    const outcomes = await this.coordinator.join(timeoutMs);
    await this.actuator.close();
    await this.sink.close();
    if (this.deviceLink) {
      await this.deviceLink.close();
    }
    return outcomes;
  }

  private async startHttp(server: http.Server): Promise<number> {
    server.on(
      'request',
      createApp({
        registry: this.registry,
        actuator: this.actuator,
        relay: this.relay,
        channel: this.channel,
        battery: () => PLACEHOLDER_BATTERY,
        deviceLink: this.deviceLink,
      })
    );
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        reject(
          new ResourceUnavailableError('http', `cannot listen on ${this.config.host}:${this.config.httpPort}: ${err.message}`, {
            cause: err,
          })
        );
      };
      server.once('error', onError);
      server.listen(this.config.httpPort, this.config.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    const closed = new Promise<void>((resolve) => server.once('close', () => resolve()));
    this.coordinator.register({
      name: 'http',
      stop: () => {
        server.close();
        server.closeAllConnections();
      },
      done: () => closed,
    });
    const address = server.address();
    const port = address && typeof address !== 'string' ? address.port : this.config.httpPort;
    httpLog.info(`Diagnostics on http://${this.config.host}:${port}/vehicle/status`);
    return port;
  }
}
