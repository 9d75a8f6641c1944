/**
 * Collaborators injected into providers and identities.
 * @module providers/types
 */

import type { AuthEnvironment } from '../config/index.js';
import type { Sleeper } from '../core/sleep.js';
import type { HttpTransport } from '../core/transport.js';
import type { DevicePrompt } from '../flows/index.js';
import type { Keychain } from '../store/index.js';
import type { StsClientFactory } from '../sts/index.js';
import type { Logger } from '../telemetry/index.js';

export interface AuthDependencies {
  transport?: HttpTransport;
  /** Defaults to a snapshot of `process.env` */
  environment?: AuthEnvironment;
  logger?: Logger;
  keychain?: Keychain;
  prompt?: DevicePrompt;
  sleep?: Sleeper;
  stsFactory?: StsClientFactory;
  clock?: () => Date;
}
