/**
 * test/setup-env.ts
 *
 * Runs before every spec file (vitest setupFiles), before the spec's imports
 * are evaluated, so the root logger picks these up.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
