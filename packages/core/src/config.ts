import { AnimationError } from './errors';
import type { LogLevel } from './logger';

export interface EngineConfig {
  /** Target ticks per second for the realtime clock. */
  frameRate: number;
  /** Coalesce property writes and flush them once per tick. */
  batchWrites: boolean;
  /** Overrides the process-wide log level when set. */
  logLevel?: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  frameRate: 60,
  batchWrites: true,
});

export function assertFrameRate(frameRate: number, operation: string): void {
  if (!Number.isFinite(frameRate) || frameRate <= 0) {
    throw new AnimationError(
      'InvalidConfig',
      `${operation}: frameRate must be a finite number > 0 (got ${frameRate})`
    );
  }
}

export function resolveEngineConfig(
  partial: Partial<EngineConfig> = {}
): EngineConfig {
  const config: EngineConfig = {
    frameRate: partial.frameRate ?? DEFAULT_ENGINE_CONFIG.frameRate,
    batchWrites: partial.batchWrites ?? DEFAULT_ENGINE_CONFIG.batchWrites,
  };
  if (partial.logLevel !== undefined) config.logLevel = partial.logLevel;

  assertFrameRate(config.frameRate, 'resolveEngineConfig()');
  return config;
}
