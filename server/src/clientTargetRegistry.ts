import { formatTarget, type VideoTarget } from '../../shared/src/models';
import { mediaLog } from '../../shared/src/logger';

/** Identity of the connection that registered a target. */
export type OwnerId = string;

interface Registration {
  readonly target: VideoTarget;
  readonly owner: OwnerId | null;
}

/**
 * Single slot holding the current media destination.
 *
 * Every operation is one synchronous read or replace of `slot`, so on the
 * event loop they are mutually exclusive and a reader sees either the old or
 * the new registration, never a mix. Stored targets are frozen copies.
 */
export class ClientTargetRegistry {
  private slot: Registration | null = null;

  /** Install `target`, displacing whatever was registered before. */
  set(target: VideoTarget, owner: OwnerId | null = null): void {
    const previous = this.slot;
    this.slot = Object.freeze({
      target: Object.freeze({ host: target.host, port: target.port }),
      owner,
    });
    if (previous && previous.owner !== owner) {
      mediaLog.debug(`Target ${formatTarget(previous.target)} displaced by ${formatTarget(target)}`);
    }
  }

  get(): VideoTarget | null {
    return this.slot?.target ?? null;
  }

  owner(): OwnerId | null {
    return this.slot?.owner ?? null;
  }

  clear(): void {
    this.slot = null;
  }

  /**
   * Clear the target only if `owner` registered it. Returns whether it did;
   * a connection that was displaced leaves the newer registration alone.
   */
  releaseOwner(owner: OwnerId): boolean {
    if (this.slot === null || this.slot.owner !== owner) {
      return false;
    }
    this.slot = null;
    return true;
  }
}
