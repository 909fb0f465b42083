import { release, type } from 'node:os';
import { type ClientConfig, PRODUCT_NAME, SDK_VERSION } from '../config/config.js';

/** Header carrying the API key. */
export const API_KEY_HEADER = 'x-api-key';

/** Header carrying the client identifier. */
export const USER_AGENT_HEADER = 'user-agent';

/** Host details reported in the client identifier when telemetry is enabled. */
export interface PlatformInfo {
  osType: string;
  osRelease: string;
  nodeVersion: string;
}

/** Reads {@link PlatformInfo} from the running process. */
export function currentPlatform(): PlatformInfo {
  return {
    osType: type(),
    osRelease: release(),
    nodeVersion: process.versions.node,
  };
}

/**
 * Builds the identifier sent as `user-agent`, e.g. `Traceix/0.0.0.1 (Linux 6.8.0; node 20.11.1)`.
 * Platform and runtime details are left out when telemetry is disabled.
 */
export function buildUserAgent(
  config: Pick<ClientConfig, 'telemetry'>,
  platform: PlatformInfo = currentPlatform(),
): string {
  const userAgent = `${PRODUCT_NAME}/${SDK_VERSION}`;
  if (!config.telemetry) {
    return userAgent;
  }

  return `${userAgent} (${platform.osType} ${platform.osRelease}; node ${platform.nodeVersion})`;
}

/**
 * Builds the headers sent with every request: API key and client identifier.
 */
export function buildHeaders(config: ClientConfig, userAgent: string = buildUserAgent(config)): Record<string, string> {
  return {
    [API_KEY_HEADER]: config.apiKey,
    [USER_AGENT_HEADER]: userAgent,
  };
}
