import pino from 'pino';

const root = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: undefined,
});

/**
 * Child logger tagged with the component name
 */
export function createLogger(component: string): pino.Logger {
  return root.child({ component });
}
