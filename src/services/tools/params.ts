// Argument readers for tool implementations

import type { ToolArgs } from './types.js';

export function readStringArg(args: ToolArgs, key: string): string {
  const value = args[key];
  return typeof value === 'string' ? value : '';
}

export function readIntegerArg(args: ToolArgs, key: string, fallback: number): number {
  const value = args[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
  return Math.trunc(value);
}

export function clampInteger(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
