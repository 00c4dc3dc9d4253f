/**
 * Process Model
 *
 * Instantaneous rates of change of the five tanks from mass balance and
 * Torricelli discharge. Pure: no state is kept between calls.
 *
 * Utility tanks are drained by the pumps that draw from them, so the
 * outflow of A is the sum of the water pump flows and the outflow of B the
 * sum of the brine pump flows.
 */

import type {
  ConicalTankSpec,
  ControlChannels,
  CylindricalTankSpec,
  PlantConfig,
  ProcessRates,
  ProcessState,
  ProcessTankId,
  UtilityTankId,
} from './types.js';
import { PROCESS_TANK_IDS } from './types.js';

// =============================================================================
// Geometry
// =============================================================================

export function radiusAt(spec: ConicalTankSpec, level: number): number {
  return spec.baseRadius + ((spec.topRadius - spec.baseRadius) * level) / spec.maxLevel;
}

export function crossSectionArea(spec: CylindricalTankSpec | ConicalTankSpec, level: number): number {
  if (spec.geometry === 'cylindrical') {
    return Math.PI * spec.radius ** 2;
  }
  return Math.PI * radiusAt(spec, level) ** 2;
}

export function liquidVolume(spec: CylindricalTankSpec | ConicalTankSpec, level: number): number {
  if (spec.geometry === 'cylindrical') {
    return Math.PI * spec.radius ** 2 * level;
  }
  const rb = spec.baseRadius;
  const rh = radiusAt(spec, level);
  return (Math.PI * level * (rb * rb + rb * rh + rh * rh)) / 3;
}

// =============================================================================
// Flows
// =============================================================================

export interface ProcessTankFlows {
  water: number;   // m³/s in from A
  brine: number;   // m³/s in from B
  outlet: number;  // m³/s out through the valve
}

export interface UtilityTankFlows {
  supply: number;  // m³/s in
  demand: number;  // m³/s drawn by pumps
}

export type PlantFlows = Record<UtilityTankId, UtilityTankFlows> & Record<ProcessTankId, ProcessTankFlows>;

/**
 * Torricelli discharge through an opening valve, zero for an empty tank
 */
export function dischargeFlow(
  spec: ConicalTankSpec,
  valve: number,
  level: number,
  gravity: number
): number {
  if (level <= 0) return 0;
  return valve * spec.dischargeCoefficient * Math.sqrt(2 * gravity * level);
}

export function computeFlows(
  state: ProcessState,
  controls: ControlChannels,
  plant: PlantConfig
): PlantFlows {
  const processFlows = (id: ProcessTankId): ProcessTankFlows => {
    const spec = plant.tanks[id];
    const channels = controls[id];
    return {
      water: spec.waterPumpGain * channels.waterPump,
      brine: spec.brinePumpGain * channels.brinePump,
      outlet: dischargeFlow(spec, channels.outletValve, state.levels[id], plant.gravity),
    };
  };

  const C = processFlows('C');
  const D = processFlows('D');
  const E = processFlows('E');

  return {
    A: {
      supply: plant.tanks.A.supplyGain * controls.A.supplyValve,
      demand: C.water + D.water + E.water,
    },
    B: {
      supply: plant.tanks.B.supplyGain * controls.B.supplyValve,
      demand: C.brine + D.brine + E.brine,
    },
    C,
    D,
    E,
  };
}

// =============================================================================
// Rates
// =============================================================================

/**
 * d(level)/dt for every tank and d(concentration)/dt for C, D and E.
 *
 * Concentration follows d(V·c)/dt = Σ Qin·cin − Qout·c, solved for dc/dt
 * with the quotient rule: dc/dt = (d(V·c)/dt − c·dV/dt) / V.
 */
export function computeRates(
  state: ProcessState,
  controls: ControlChannels,
  plant: PlantConfig
): ProcessRates {
  const flows = computeFlows(state, controls, plant);

  const rates: ProcessRates = {
    levels: {
      A: (flows.A.supply - flows.A.demand) / crossSectionArea(plant.tanks.A, state.levels.A),
      B: (flows.B.supply - flows.B.demand) / crossSectionArea(plant.tanks.B, state.levels.B),
      C: 0,
      D: 0,
      E: 0,
    },
    concentrations: { C: 0, D: 0, E: 0 },
  };

  for (const id of PROCESS_TANK_IDS) {
    const spec = plant.tanks[id];
    const level = state.levels[id];
    const { water, brine, outlet } = flows[id];

    const area = crossSectionArea(spec, Math.max(level, 0));
    const dLevel = (water + brine - outlet) / area;
    rates.levels[id] = dLevel;

    if (level < plant.levelEpsilon) {
      rates.concentrations[id] = 0;
      continue;
    }

    const concentration = state.concentrations[id];
    const volume = liquidVolume(spec, level);
    const dVolume = area * dLevel;
    const dSalt =
      water * plant.waterConcentration + brine * plant.brineConcentration - outlet * concentration;

    rates.concentrations[id] = (dSalt - concentration * dVolume) / volume;
  }

  return rates;
}
