import { performance } from 'node:perf_hooks';
import { isTruthyFlag } from './settings.js';

// Debug logging
export let DEBUG = false;

export function setDebug(value: boolean) {
  DEBUG = value;
}

export function dp(...args: unknown[]) {
  if (DEBUG) {
    console.error('[DEBUG]', ...args);
  }
}

// Profiling. Enable with: ABC_PROFILE=1 or ABC_PROFILE=true
export let PROFILE = isTruthyFlag(process.env.ABC_PROFILE);

export function setProfile(value: boolean) {
  PROFILE = value;
}

export function time<T>(label: string, fn: () => T): T {
  if (!PROFILE) return fn();
  const start = performance.now();
  try {
    return fn();
  } finally {
    const ms = performance.now() - start;
    console.error(`[ABC_PROFILE] ${label}: ${ms.toFixed(2)}ms`);
  }
}
