// Keep pino quiet and on the synchronous destination during Vitest runs.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
