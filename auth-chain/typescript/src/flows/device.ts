/**
 * Device Authorization Flow
 *
 * RFC 8628 - OAuth 2.0 Device Authorization Grant, as served by GitHub.
 */

import {
  DEFAULT_DEVICE_CODE_EXPIRES_IN_SECONDS,
  DEFAULT_GITHUB_BASE_URL,
  DEFAULT_POLL_INTERVAL_SECONDS,
  MAX_POLL_ATTEMPTS,
  SLOW_DOWN_INTERVAL_SECONDS,
} from '../config/index.js';
import { sleep as defaultSleep, throwIfAborted, type Sleeper } from '../core/sleep.js';
import { parseJsonObject, type HttpTransport } from '../core/transport.js';
import { AuthError, AuthErrorKind, httpFailure, truncateBody } from '../errors/index.js';
import { noOpLogger, type Logger } from '../telemetry/index.js';

export const DEVICE_CODE_GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:device_code';

/**
 * Device authorization session returned by the device code endpoint.
 */
export interface DeviceSession {
  deviceCode: string;
  userCode: string;
  verificationUri: string;
  verificationUriComplete?: string;
  /** Seconds until the device code expires */
  expiresIn: number;
  /** Seconds between polls */
  interval: number;
}

/**
 * Access token issued at the end of the flow.
 */
export interface DeviceTokenResponse {
  accessToken: string;
  tokenType?: string;
  scope?: string;
}

/**
 * Classified token endpoint response.
 */
export type DevicePollResult =
  | { status: 'success'; token: DeviceTokenResponse }
  | { status: 'pending' }
  | { status: 'slow_down'; interval?: number }
  | { status: 'expired'; description?: string }
  | { status: 'denied'; description?: string }
  | { status: 'error'; error: string; description?: string };

/**
 * Shows the user code and verification URI to the user.
 */
export interface DevicePrompt {
  display(session: DeviceSession): void | Promise<void>;
}

/**
 * Prompt that writes the code and URI to stderr.
 */
export const consoleDevicePrompt: DevicePrompt = {
  display(session: DeviceSession): void {
    const uri = session.verificationUriComplete ?? session.verificationUri;
    process.stderr.write(`\nOpen ${uri} and enter code: ${session.userCode}\n\n`);
  },
};

/**
 * Device flow client options.
 */
export interface DeviceFlowOptions {
  clientId: string;
  /** Defaults to https://github.com */
  baseUrl?: string;
  transport: HttpTransport;
  logger?: Logger;
}

/**
 * Polling options.
 */
export interface AwaitAuthorizationOptions {
  signal?: AbortSignal;
  sleep?: Sleeper;
  maxAttempts?: number;
}

const FORM_HEADERS: Record<string, string> = {
  'content-type': 'application/x-www-form-urlencoded',
  accept: 'application/json',
};

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function positiveNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined;
}

/**
 * Builds the terminal failure for a device flow error code. The upstream
 * code stays verbatim in the message.
 */
function deviceFlowFailure(code: string, description: string | undefined): AuthError {
  const detail = description ? `: ${description}` : '';
  return new AuthError(
    AuthErrorKind.AuthenticationFailed,
    `device authorization failed: ${code}${detail}`,
    { context: { error: code } }
  );
}

/**
 * Device Authorization Flow client.
 */
export class DeviceFlowClient {
  private readonly clientId: string;
  private readonly baseUrl: string;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(options: DeviceFlowOptions) {
    this.clientId = options.clientId;
    this.baseUrl = (options.baseUrl ?? DEFAULT_GITHUB_BASE_URL).replace(/\/+$/, '');
    this.transport = options.transport;
    this.logger = options.logger ?? noOpLogger;
  }

  get deviceCodeEndpoint(): string {
    return `${this.baseUrl}/login/device/code`;
  }

  get tokenEndpoint(): string {
    return `${this.baseUrl}/login/oauth/access_token`;
  }

  /**
   * Request device and user codes.
   */
  async requestDeviceCode(scopes: string[], signal?: AbortSignal): Promise<DeviceSession> {
    const body = new URLSearchParams();
    body.set('client_id', this.clientId);
    if (scopes.length > 0) {
      body.set('scope', scopes.join(' '));
    }

    const endpoint = this.deviceCodeEndpoint;
    this.logger.debug('Requesting device code', { endpoint });

    const response = await this.transport.send({
      method: 'POST',
      url: endpoint,
      headers: FORM_HEADERS,
      body: body.toString(),
      signal,
    });

    const json = parseJsonObject(response.body);
    const errorCode = optionalString(json?.['error']);
    if (errorCode) {
      throw deviceFlowFailure(errorCode, optionalString(json?.['error_description']));
    }
    if (response.status < 200 || response.status >= 300) {
      throw httpFailure('device code request', endpoint, response.status, response.body);
    }
    if (!json) {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        `device code request failed: ${endpoint} returned a non-JSON body: ${truncateBody(response.body)}`
      );
    }

    const deviceCode = optionalString(json['device_code']);
    const userCode = optionalString(json['user_code']);
    const verificationUri = optionalString(json['verification_uri']);
    if (!deviceCode || !userCode || !verificationUri) {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        'device code response is missing device_code, user_code or verification_uri'
      );
    }

    return {
      deviceCode,
      userCode,
      verificationUri,
      verificationUriComplete: optionalString(json['verification_uri_complete']),
      expiresIn: positiveNumber(json['expires_in']) ?? DEFAULT_DEVICE_CODE_EXPIRES_IN_SECONDS,
      interval: positiveNumber(json['interval']) ?? DEFAULT_POLL_INTERVAL_SECONDS,
    };
  }

  /**
   * Poll the token endpoint once.
   */
  async pollToken(deviceCode: string, signal?: AbortSignal): Promise<DevicePollResult> {
    const body = new URLSearchParams();
    body.set('client_id', this.clientId);
    body.set('device_code', deviceCode);
    body.set('grant_type', DEVICE_CODE_GRANT_TYPE);

    const endpoint = this.tokenEndpoint;
    const response = await this.transport.send({
      method: 'POST',
      url: endpoint,
      headers: FORM_HEADERS,
      body: body.toString(),
      signal,
    });

    const json = parseJsonObject(response.body);
    if (!json) {
      if (response.status < 200 || response.status >= 300) {
        throw httpFailure('device token poll', endpoint, response.status, response.body);
      }
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        `device token poll failed: ${endpoint} returned a non-JSON body: ${truncateBody(response.body)}`
      );
    }

    const accessToken = optionalString(json['access_token']);
    if (accessToken) {
      return {
        status: 'success',
        token: {
          accessToken,
          tokenType: optionalString(json['token_type']),
          scope: optionalString(json['scope']),
        },
      };
    }

    const errorCode = optionalString(json['error']);
    const description = optionalString(json['error_description']);
    if (!errorCode) {
      if (response.status < 200 || response.status >= 300) {
        throw httpFailure('device token poll', endpoint, response.status, response.body);
      }
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        'device token response has neither access_token nor error'
      );
    }

    switch (errorCode) {
      case 'authorization_pending':
        return { status: 'pending' };
      case 'slow_down':
        return { status: 'slow_down', interval: positiveNumber(json['interval']) };
      case 'expired_token':
        return { status: 'expired', description };
      case 'access_denied':
        return { status: 'denied', description };
      default:
        return { status: 'error', error: errorCode, description };
    }
  }

  /**
   * Await authorization by polling until success, failure or the attempt
   * ceiling.
   */
  async awaitAuthorization(
    session: DeviceSession,
    options: AwaitAuthorizationOptions = {}
  ): Promise<DeviceTokenResponse> {
    const sleeper = options.sleep ?? defaultSleep;
    const maxAttempts = options.maxAttempts ?? MAX_POLL_ATTEMPTS;
    const signal = options.signal;
    let interval = session.interval > 0 ? session.interval : DEFAULT_POLL_INTERVAL_SECONDS;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfAborted(signal, 'device authorization');
      await sleeper(interval * 1000, signal);
      throwIfAborted(signal, 'device authorization');

      const result = await this.pollToken(session.deviceCode, signal);

      switch (result.status) {
        case 'success':
          this.logger.debug('Device authorization succeeded', { attempt });
          return result.token;

        case 'pending':
          this.logger.trace('Authorization pending', { attempt });
          continue;

        case 'slow_down':
          interval = result.interval ?? Math.max(SLOW_DOWN_INTERVAL_SECONDS, interval + 5);
          this.logger.debug('Slowing down device polling', { attempt, intervalSeconds: interval });
          continue;

        case 'expired':
          throw deviceFlowFailure(
            'expired_token',
            result.description ?? 'the device code has expired'
          );

        case 'denied':
          throw deviceFlowFailure(
            'access_denied',
            result.description ?? 'the user denied the authorization request'
          );

        case 'error':
          throw deviceFlowFailure(result.error, result.description);
      }
    }

    throw new AuthError(
      AuthErrorKind.AuthenticationFailed,
      `device authorization timed out after ${maxAttempts} attempts`
    );
  }
}
