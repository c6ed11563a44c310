import { EventEmitter } from 'events';

import { componentLogger } from '../../core/logger/index.js';
import type { ProviderErrorKind } from '../email-providers/email-provider.js';
import type { EmailAccount } from './email-account.js';

export interface ProvisioningFailure {
  kind: ProviderErrorKind;
  message: string;
}

export interface EmailAccountEventMap {
  created: [account: EmailAccount];
  /** The plaintext password never leaves the process through this event. */
  provisioned: [account: EmailAccount, password: string];
  provisioning_failed: [account: EmailAccount, failure: ProvisioningFailure];
  suspended: [account: EmailAccount];
  reactivated: [account: EmailAccount];
  deleted: [account: EmailAccount];
}

export type EmailAccountEventName = keyof EmailAccountEventMap;

const log = componentLogger('email-accounts');

/**
 * Typed lifecycle notifications. A throwing subscriber is logged and does not
 * affect the operation that published the event.
 */
export class EmailAccountEvents {
  private readonly emitter = new EventEmitter();

  on<K extends EmailAccountEventName>(event: K, listener: (...args: EmailAccountEventMap[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  publish<K extends EmailAccountEventName>(event: K, ...args: EmailAccountEventMap[K]): void {
    try {
      this.emitter.emit(event, ...args);
    } catch (error) {
      log.error({ err: error, event }, 'Email account event listener failed');
    }
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
