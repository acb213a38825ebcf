import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../shared/src/errors';
import { loadOperatorConfig } from './config';

describe('loadOperatorConfig', () => {
  it('needs the vehicle address and defaults the rest', () => {
    expect(loadOperatorConfig([], { SERVER_IP: '192.168.1.20' })).toEqual({
      serverHost: '192.168.1.20',
      serverPort: 5051,
      videoPort: 6000,
      viewerPort: 8081,
      input: 'keyboard',
    });
  });

  it('reports a missing vehicle address', () => {
    try {
      loadOperatorConfig([], {});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual(['server-ip: required (--server-ip or SERVER_IP)']);
      }
    }
  });

  it('prefers flags over environment variables', () => {
    const config = loadOperatorConfig(
      ['--server-ip', '10.0.0.2', '--video-port', '6100', '--viewer-port', '0', '--input', 'none'],
      { SERVER_IP: '10.0.0.9', VIDEO_PORT: '7000' }
    );
    expect(config).toMatchObject({ serverHost: '10.0.0.2', videoPort: 6100, viewerPort: 0, input: 'none' });
  });

  it('rejects a zero video port and unknown input sources', () => {
    expect(() => loadOperatorConfig(['--server-ip', 'rover', '--video-port', '0'], {})).toThrow(ConfigError);
    expect(() => loadOperatorConfig(['--server-ip', 'rover', '--input', 'gamepad'], {})).toThrow(ConfigError);
  });
});
