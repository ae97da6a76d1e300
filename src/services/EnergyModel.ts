// src/services/EnergyModel.ts
import fs from 'fs-extra';
import { z } from 'zod';

import {
  ConfigurationMissingError,
  errorMessage,
  MissingModelInputError,
  ValidationError,
} from 'App/errors/CustomError';
import type {
  AggregatedRow,
  EnergyAnnotatedRow,
  EnergyAnnotation,
  ScenarioSummary,
} from 'App/types/experiment';

/*
 Power model of one radio site:
   P_tot = P_idle + alpha * D_proc + beta * N_active_ue + gamma * P_tx_w
 With the optional `extended` group, P_idle, alpha and beta grow linearly with P_tx_w.
*/

const nonNegative = z.number().finite().nonnegative();

export const energyConfigSchema = z
  .object({
    general: z.object({
      idle_power_w: nonNegative.default(0),
      alpha: nonNegative.default(0),
      beta: nonNegative.default(0),
      gamma: nonNegative.default(0),
      sim_time_s: z.number().finite().positive().default(20),
      delay_ref_ms: z.number().finite().positive().default(10),
    }),
    limits: z
      .object({
        min_power_w: nonNegative.optional(),
        max_power_w: nonNegative.optional(),
      })
      .default({}),
    extended: z
      .object({
        k_idle: z.number().finite().default(0),
        k_alpha: z.number().finite().default(0),
        k_beta: z.number().finite().default(0),
      })
      .optional(),
  })
  .refine(
    c =>
      c.limits.min_power_w === undefined ||
      c.limits.max_power_w === undefined ||
      c.limits.min_power_w <= c.limits.max_power_w,
    { message: 'limits.min_power_w must not exceed limits.max_power_w', path: ['limits'] },
  );

export type EnergyConfig = z.infer<typeof energyConfigSchema>;
export type EnergyConfigInput = z.input<typeof energyConfigSchema>;

export function parseEnergyConfig(raw: unknown, source = 'energy config'): EnergyConfig {
  const parsed = energyConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${source}`,
      parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}

export async function loadEnergyConfig(filePath: string): Promise<EnergyConfig> {
  if (!(await fs.pathExists(filePath))) {
    throw new ConfigurationMissingError(`energy config file ${filePath}`);
  }
  let raw: unknown;
  try {
    raw = await fs.readJSON(filePath);
  } catch (e) {
    throw new ValidationError(`Energy config ${filePath} is not valid JSON: ${errorMessage(e)}`);
  }
  return parseEnergyConfig(raw, `energy config ${filePath}`);
}

/** P[W] = 10^(dBm/10) / 1000 */
export function dbmToWatts(dbm: number): number {
  return 10 ** (dbm / 10) / 1000;
}

export function clampPower(
  powerW: number,
  limits: EnergyConfig['limits'],
): { powerW: number; clamped: EnergyAnnotation['clamped'] } {
  if (limits.min_power_w !== undefined && powerW < limits.min_power_w) {
    return { powerW: limits.min_power_w, clamped: 'min' };
  }
  if (limits.max_power_w !== undefined && powerW > limits.max_power_w) {
    return { powerW: limits.max_power_w, clamped: 'max' };
  }
  return { powerW, clamped: null };
}

/**
 * Annotates one aggregated row. Throws MissingModelInputError when processing demand,
 * active UE count or throughput is absent.
 */
export function model(
  row: AggregatedRow,
  txPowerDbm: number,
  config: EnergyConfig,
): EnergyAnnotatedRow {
  const { procDemand, activeUes, throughput, delay } = row.metrics;
  const missing: string[] = [];
  if (procDemand === undefined) missing.push('procDemand');
  if (activeUes === undefined) missing.push('activeUes');
  if (throughput === undefined) missing.push('throughput');
  if (procDemand === undefined || activeUes === undefined || throughput === undefined) {
    throw new MissingModelInputError(missing);
  }

  const g = config.general;
  const txPowerW = dbmToWatts(txPowerDbm);
  const ext = config.extended;
  const idle = g.idle_power_w + (ext ? ext.k_idle * txPowerW : 0);
  const alpha = g.alpha + (ext ? ext.k_alpha * txPowerW : 0);
  const beta = g.beta + (ext ? ext.k_beta * txPowerW : 0);

  const breakdown = {
    idleW: idle,
    processingW: alpha * procDemand,
    ueW: beta * activeUes,
    txW: g.gamma * txPowerW,
  };
  const raw = breakdown.idleW + breakdown.processingW + breakdown.ueW + breakdown.txW;
  const { powerW, clamped } = clampPower(raw, config.limits);

  const energyJ = powerW * g.sim_time_s;
  const delayPenalty = delay === undefined ? 1 : 1 / (1 + Math.max(delay, 0) / g.delay_ref_ms);
  const energy: EnergyAnnotation = {
    txPowerW,
    powerW,
    energyJ,
    energyWh: energyJ / 3600,
    energyKwh: energyJ / 3_600_000,
    efficiency: throughput / Math.max(powerW, 1e-12),
    efficiencyIndex: (throughput / Math.max(energyJ, 1e-12)) * delayPenalty,
    clamped,
    breakdown,
  };
  return { ...row, energy };
}

/**
 * Annotates every row whose inputs are complete; the others pass through unchanged.
 * The swept parameter is the transmit power in dBm.
 */
export function annotateSummary(
  summary: ScenarioSummary,
  config: EnergyConfig,
): ScenarioSummary {
  const rows = summary.rows.map(row => {
    try {
      const annotated = model(row, row.parameterValue, config);
      if (annotated.energy?.clamped) {
        console.warn(
          `[Energy] ${summary.scenarioId}@${row.parameterValue}: total power clamped to ${annotated.energy.clamped} limit (${annotated.energy.powerW} W)`,
        );
      }
      return annotated;
    } catch (e) {
      if (e instanceof MissingModelInputError) {
        console.warn(
          `[Energy] ${summary.scenarioId}@${row.parameterValue}: ${e.message}; row left unannotated`,
        );
        return row;
      }
      throw e;
    }
  });
  return { ...summary, rows };
}
