import { logger } from './logger.js';
import { recordTemperatureClamp } from './metrics.js';
import type { AutonomyConfig, AutonomyLevel, TemperatureBand } from './runtime-config.js';

const AUTONOMY_RANK: Record<AutonomyLevel, number> = {
  read_only: 0,
  supervised: 1,
  full: 2
};

export function minAutonomyLevel(a: AutonomyLevel, b: AutonomyLevel): AutonomyLevel {
  return AUTONOMY_RANK[a] <= AUTONOMY_RANK[b] ? a : b;
}

/**
 * A staged rollout can only lower the configured level, never raise it.
 */
export function effectiveAutonomyLevel(config: Pick<AutonomyConfig, 'level' | 'rollout'>): AutonomyLevel {
  if (!config.rollout.enabled || config.rollout.stage === '') return config.level;
  return minAutonomyLevel(config.level, config.rollout.stage);
}

export function selectedTemperatureBand(
  config: Pick<AutonomyConfig, 'level' | 'rollout' | 'temperatureBands'>
): TemperatureBand {
  return config.temperatureBands[effectiveAutonomyLevel(config)];
}

export function clampTemperature(value: number, band: TemperatureBand): number {
  // Non-finite requests fall to the conservative end of the band
  if (!Number.isFinite(value)) return band.min;
  return Math.min(Math.max(value, band.min), band.max);
}

export interface TemperaturePolicy {
  effectiveAutonomyLevel(): AutonomyLevel;
  selectedTemperatureBand(): TemperatureBand;
}

export type TemperatureDecision = {
  requested: number;
  temperature: number;
  clamped: boolean;
  autonomyLevel: AutonomyLevel;
  band: TemperatureBand;
};

export function clampTemperatureForTurn(requested: number, policy: TemperaturePolicy): TemperatureDecision {
  const autonomyLevel = policy.effectiveAutonomyLevel();
  const band = policy.selectedTemperatureBand();
  const temperature = clampTemperature(requested, band);
  const clamped = temperature !== requested;
  if (clamped) {
    logger.info({
      autonomy_level: autonomyLevel,
      requested_temperature: requested,
      clamped_temperature: temperature,
      band_min: band.min,
      band_max: band.max
    }, 'temperature clamped to autonomy band');
    recordTemperatureClamp(autonomyLevel);
  }
  return { requested, temperature, clamped, autonomyLevel, band };
}
