/**
 * First-order Thermal Plant
 *
 * Explicit-Euler discretization of a room exchanging heat with its
 * surroundings while an actuator heats or cools it:
 *
 *   y[k+1] = y[k] + alpha * ( -(y[k] - ambient[k]) + beta * u[k] ) + w[k]
 *
 * -(y - ambient) is passive exchange toward ambient, beta * u the actuator's
 * forcing term, w an optional disturbance sample.
 */

import type { PlantParameters, PlantState } from './types';

/**
 * Advance the plant by one sample
 *
 * @param state - Measured value and ambient acting during this step
 * @param control - Actuator command u[k]
 * @param params - alpha and beta
 * @param noise - Disturbance sample w[k] (default: 0)
 * @returns y[k+1]
 */
export function advancePlant(
  state: PlantState,
  control: number,
  params: PlantParameters,
  noise = 0
): number {
  const passiveExchange = -(state.value - state.ambient);
  const forcing = params.beta * control;
  return state.value + params.alpha * (passiveExchange + forcing) + noise;
}

/**
 * Equilibrium of the plant under a constant command
 *
 * Solves 0 = -(y - ambient) + beta * u for y.
 */
export function equilibriumValue(ambient: number, control: number, beta: number): number {
  return ambient + beta * control;
}

export class ThermalPlant {
  private readonly params: PlantParameters;
  private state: PlantState;

  constructor(params: PlantParameters, initial: PlantState) {
    this.params = { ...params };
    this.state = { ...initial };
  }

  /**
   * Apply one control sample and return the new measured value
   */
  advance(control: number, noise = 0): number {
    this.state = {
      value: advancePlant(this.state, control, this.params, noise),
      ambient: this.state.ambient,
    };
    return this.state.value;
  }

  /**
   * Change the ambient value from this step onward
   */
  setAmbient(ambient: number): void {
    this.state = { ...this.state, ambient };
  }

  get value(): number {
    return this.state.value;
  }

  get ambient(): number {
    return this.state.ambient;
  }
}
