// Loaded before every spec file (vitest setupFiles), before the logger module.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
