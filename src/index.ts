/**
 * ABC Drill
 *
 * Staged recall drills over A–Z knowledge sets: a practice walkthrough, an
 * adaptive quiz that raises the bar on repeated failure, and a strict final
 * review, with a timed lockout after three wrong answers in a row.
 *
 * Entry points:
 * - src/api/server.ts - HTTP API
 * - src/cli/index.ts - terminal drill and set management
 *
 * This module re-exports the pieces for programmatic use.
 */

export * from './core/models';
export * from './core/quiz';
export * from './core/knowledge';
export * from './core/suggestions';
export * from './core/session';
export { createApp, createDependencies, type AppOptions, type ApiDependencies } from './api';
export * from './storage';
export * from './llm';
