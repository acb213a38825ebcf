import { describeError, ResourceUnavailableError } from '../../shared/src/errors';
import { mediaLog, operatorLog } from '../../shared/src/logger';
import { type JoinOutcome, ShutdownCoordinator } from '../../shared/src/shutdown';
import { CommandSender, type CommandSenderOptions } from './commandSender';
import { JOIN_TIMEOUT_MS, type OperatorConfig } from './config';
import { type ControlSource, IdleControlSource, KeyboardControlSource } from './controlSource';
import { type ImageProbe, SharpImageProbe } from './imageProbe';
import { type FrameRenderer, MediaReceiver } from './mediaReceiver';
import { OperatorLink } from './operatorLink';
import { MjpegViewer, NullRenderer } from './viewer';

export interface OperatorOverrides {
  source?: ControlSource;
  probe?: ImageProbe;
  renderer?: FrameRenderer;
  sender?: CommandSenderOptions;
  /** Interface the UDP video socket binds to. */
  videoHost?: string;
}

export interface OperatorAddresses {
  videoPort: number;
  viewerPort: number | null;
}

/**
 * The operator endpoint: one command link shared by the sender, the status
 * poller and the final quit, plus the video receiver and its renderer.
 */
export class Operator {
  readonly coordinator = new ShutdownCoordinator();
  readonly link: OperatorLink;
  readonly sender: CommandSender;
  readonly receiver: MediaReceiver;
  readonly source: ControlSource;
  private readonly renderer: FrameRenderer;
  private linkClosed: Promise<void> = Promise.resolve();

  constructor(
    private readonly config: OperatorConfig,
    overrides: OperatorOverrides = {}
  ) {
    this.link = new OperatorLink({ host: config.serverHost, port: config.serverPort });
    this.source = overrides.source ?? this.createControlSource();
    this.sender = new CommandSender(this.link, this.source, overrides.sender);
    this.renderer = overrides.renderer ?? (config.viewerPort > 0 ? new MjpegViewer(config.viewerPort) : new NullRenderer());
    this.receiver = new MediaReceiver(overrides.probe ?? new SharpImageProbe(), this.renderer, {
      host: overrides.videoHost,
      port: config.videoPort,
    });

    this.coordinator.register({
      name: 'command-link',
      stop: () => {
        this.linkClosed = this.closeLink();
        return this.linkClosed;
      },
      done: () => this.linkClosed,
    });
    this.coordinator.register({
      name: 'media-receiver',
      stop: () => this.receiver.stop(),
      done: () => this.receiver.done(),
    });
  }

  async start(): Promise<OperatorAddresses> {
    this.link.onStatus((report) => {
      operatorLog.info(`Status: battery ${report.battery}% speed ${report.speed} steering ${report.steering}`);
    });
    this.link.onReply((reply) => {
      operatorLog.warn('Vehicle replied', reply);
    });
    this.link.onClosed(() => this.coordinator.requestShutdown('vehicle closed the connection'));
    await this.link.connect();

    let videoPort = this.config.videoPort;
    try {
      videoPort = await this.receiver.start();
    } catch (err) {
      // Driving still works without video.
      mediaLog.warn('Video disabled', describeError(err));
    }

    let viewerPort: number | null = null;
    if (this.renderer instanceof MjpegViewer) {
      try {
        viewerPort = await this.renderer.listen();
      } catch (err) {
        const unavailable = new ResourceUnavailableError('display', `viewer not started: ${describeError(err)}`, {
          cause: err,
        });
        mediaLog.warn('Display disabled', unavailable.message);
      }
    }

    await this.link.send({ cmd: 'register_video', video_port: videoPort });
    operatorLog.info(`Requested video on UDP port ${videoPort}`);
    this.sender.start();
    return { videoPort, viewerPort };
  }

  requestShutdown(reason: string): void {
    this.coordinator.requestShutdown(reason);
  }

  async waitForExit(timeoutMs = JOIN_TIMEOUT_MS): Promise<JoinOutcome[]> {
    const reason = await this.coordinator.waitForShutdown();
    operatorLog.info(`Shutting down (${reason})`);
    const outcomes = await this.coordinator.join(timeoutMs);
    this.source.close();
    await this.renderer.close();
    return outcomes;
  }

  private createControlSource(): ControlSource {
    if (this.config.input === 'none') {
      return new IdleControlSource();
    }
    const keyboard = new KeyboardControlSource(() => this.requestShutdown('quit key'));
    if (process.stdin.isTTY) {
      keyboard.attach(process.stdin);
      operatorLog.info('Keys: W/S throttle, A/D steer, Space stop, Q quit');
    } else {
      operatorLog.warn('stdin is not a terminal; keyboard input disabled');
    }
    return keyboard;
  }

  /** Final stop, then quit, then close: all on the same ordered link. */
  private async closeLink(): Promise<void> {
    const open = this.link.isOpen;
    await this.sender.stop(open);
    if (open) {
      try {
        await this.link.send({ cmd: 'quit' });
      } catch (err) {
        operatorLog.warn('Could not send quit', describeError(err));
      }
    }
    await this.link.close();
  }
}
