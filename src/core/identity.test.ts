import { describe, expect, it } from 'vitest';
import { resolveConfig } from '../config/config.js';
import { buildHeaders, buildUserAgent, currentPlatform, type PlatformInfo } from './identity.js';

const platform: PlatformInfo = { osType: 'Linux', osRelease: '6.8.0-test', nodeVersion: '20.11.1' };

describe('buildUserAgent', () => {
  it('appends platform and runtime with telemetry enabled', () => {
    expect(buildUserAgent({ telemetry: true }, platform)).toBe('Traceix/0.0.0.1 (Linux 6.8.0-test; node 20.11.1)');
  });

  it('is only product and version with telemetry disabled', () => {
    expect(buildUserAgent({ telemetry: false }, platform)).toBe('Traceix/0.0.0.1');
  });

  it('follows the opt-out environment flag', () => {
    const optedOut = resolveConfig({ apiKey: 'test-key' }, { TRACEIX_DISABLE_TELEMETRY: '1' });
    const optedIn = resolveConfig({ apiKey: 'test-key' }, { TRACEIX_DISABLE_TELEMETRY: 'yes' });

    expect(buildUserAgent(optedOut)).toBe('Traceix/0.0.0.1');
    expect(buildUserAgent(optedIn)).toMatch(/^Traceix\/0\.0\.0\.1 \(.+; node \d+\.\d+\.\d+\)$/);
  });

  it('reports the running node version', () => {
    expect(currentPlatform().nodeVersion).toBe(process.versions.node);
  });
});

describe('buildHeaders', () => {
  it('carries the API key and identifier', () => {
    const config = resolveConfig({ apiKey: 'test-key', telemetry: false });

    expect(buildHeaders(config)).toEqual({
      'x-api-key': 'test-key',
      'user-agent': 'Traceix/0.0.0.1',
    });
  });

  it('uses a prebuilt identifier when given', () => {
    const config = resolveConfig({ apiKey: 'test-key' });

    expect(buildHeaders(config, 'Traceix/0.0.0.1 (custom)')['user-agent']).toBe('Traceix/0.0.0.1 (custom)');
  });
});
