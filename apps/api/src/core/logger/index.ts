import { createRequire } from 'module';

import pino, { type TransportSingleOptions } from 'pino';

import { env } from '../../config/env.js';

let transport: TransportSingleOptions | undefined;

if (env.NODE_ENV === 'development') {
  try {
    const require = createRequire(import.meta.url);
    require.resolve('pino-pretty');
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
      },
    };
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn('pino-pretty is not installed; falling back to JSON logs.', error);
  }
}

export const logger = pino({
  name: 'mailbox-provisioning-api',
  level: env.LOG_LEVEL,
  transport,
  redact: ['password', 'newPassword', '*.password', '*.newPassword', 'token', '*.clientSecret'],
});

export type Logger = typeof logger;

/**
 * Component-scoped logger; every line carries `component` so sinks can filter per subsystem.
 */
export const componentLogger = (component: string): Logger => logger.child({ component });
