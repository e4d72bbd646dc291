import pino from 'pino';

const level = process.env.LOG_LEVEL ?? 'info';
const plainOutput = process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test';

export const logger = pino({
  level,
  transport: plainOutput
    ? undefined
    : {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
        },
      },
});

export type ComponentName = 'codec' | 'session' | 'audio' | 'transport';

export function componentLogger(component: ComponentName) {
  return logger.child({ component });
}
