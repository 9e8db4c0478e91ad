import type pino from 'pino';
import { getEnvironment } from '../config/environment';
const STDERR_DESTINATION = 2;

export function getTransport(): pino.TransportSingleOptions | undefined {
  const env = getEnvironment();

  // Worker-thread transports would outlive a Jest run
  if (env.NODE_ENV === 'test') {
    return undefined;
  }

  const isDevelopment = env.NODE_ENV === 'development';
  let pinoPrettyResolved: boolean;
  try {
    // Only try to use pino-pretty in development when it's actually available
    require.resolve('pino-pretty');
    pinoPrettyResolved = true;
  } catch {
    pinoPrettyResolved = false;
  }

  if (pinoPrettyResolved && isDevelopment) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: STDERR_DESTINATION, // Use stderr
      },
    };
  } else {
    return { target: 'pino/file', options: { destination: STDERR_DESTINATION } };
  }
}
