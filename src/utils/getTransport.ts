import pino from 'pino';
import { getEnvironment } from '../config/environment';
const STDERR_DESTINATION = 2;

export function getTransport(): pino.TransportSingleOptions | undefined {
  const env = getEnvironment();
  if (env.NODE_ENV === 'test') {
    // Transports run on a worker thread that would outlive the test process
    return undefined;
  }

  let pinoPrettyResolved: boolean;
  try {
    // Only try to use pino-pretty in development when it's actually available
    require.resolve('pino-pretty');
    pinoPrettyResolved = true;
  } catch {
    pinoPrettyResolved = false;
  }

  if (pinoPrettyResolved && env.NODE_ENV === 'development') {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: STDERR_DESTINATION, // Use stderr
      },
    };
  }
  // stdout carries the scrape result
  return { target: 'pino/file', options: { destination: STDERR_DESTINATION } };
}
