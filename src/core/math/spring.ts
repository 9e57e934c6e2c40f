/**
 * Damped Harmonic Oscillator
 *
 * Closed-form step of a damped spring over a fixed time step. The four
 * coefficients depend only on (angularFrequency, dampingRatio, dt), so they
 * are computed once per channel and each step is two multiply-adds.
 *
 * - dampingRatio < 1: under-damped, overshoots and rings before settling
 * - dampingRatio = 1: critically damped, fastest approach without overshoot
 * - dampingRatio > 1: over-damped, slow approach without overshoot
 *
 * Reference: Ryan Juckett, "Damped Springs" (2012)
 */

import type { SpringParameters, SpringState } from '../models/types';

export interface Spring {
  readonly params: SpringParameters;
  readonly posPosCoef: number;
  readonly posVelCoef: number;
  readonly velPosCoef: number;
  readonly velVelCoef: number;
}

const EPSILON = Number.EPSILON;

export function createSpring(params: SpringParameters): Spring {
  const omega = Math.max(0, params.angularFrequency);
  const zeta = Math.max(0, params.dampingRatio);
  const dt = 1 / params.sampleRate;

  if (omega < EPSILON) {
    return Object.freeze({ params, posPosCoef: 1, posVelCoef: 0, velPosCoef: 0, velVelCoef: 1 });
  }

  if (zeta > 1 + EPSILON) {
    const za = -omega * zeta;
    const zb = omega * Math.sqrt(zeta * zeta - 1);
    const z1 = za - zb;
    const z2 = za + zb;
    const e1 = Math.exp(z1 * dt);
    const e2 = Math.exp(z2 * dt);

    const invTwoZb = 1 / (2 * zb);
    const e1OverTwoZb = e1 * invTwoZb;
    const e2OverTwoZb = e2 * invTwoZb;
    const z1e1OverTwoZb = z1 * e1OverTwoZb;
    const z2e2OverTwoZb = z2 * e2OverTwoZb;

    return Object.freeze({
      params,
      posPosCoef: e1OverTwoZb * z2 - z2e2OverTwoZb + e2,
      posVelCoef: -e1OverTwoZb + e2OverTwoZb,
      velPosCoef: (z1e1OverTwoZb - z2e2OverTwoZb + e2) * z2,
      velVelCoef: -z1e1OverTwoZb + z2e2OverTwoZb,
    });
  }

  if (zeta < 1 - EPSILON) {
    const omegaZeta = omega * zeta;
    const alpha = omega * Math.sqrt(1 - zeta * zeta);

    const expTerm = Math.exp(-omegaZeta * dt);
    const cosTerm = Math.cos(alpha * dt);
    const sinTerm = Math.sin(alpha * dt);
    const invAlpha = 1 / alpha;

    const expSin = expTerm * sinTerm;
    const expCos = expTerm * cosTerm;
    const expOmegaZetaSinOverAlpha = expTerm * omegaZeta * sinTerm * invAlpha;

    return Object.freeze({
      params,
      posPosCoef: expCos + expOmegaZetaSinOverAlpha,
      posVelCoef: expSin * invAlpha,
      velPosCoef: -expSin * alpha - omegaZeta * expOmegaZetaSinOverAlpha,
      velVelCoef: expCos - expOmegaZetaSinOverAlpha,
    });
  }

  // critically damped
  const expTerm = Math.exp(-omega * dt);
  const timeExp = dt * expTerm;
  const timeExpFreq = timeExp * omega;

  return Object.freeze({
    params,
    posPosCoef: timeExpFreq + expTerm,
    posVelCoef: timeExp,
    velPosCoef: -omega * timeExpFreq,
    velVelCoef: -timeExpFreq + expTerm,
  });
}

/**
 * Advance one time step (1 / sampleRate seconds) toward state.target.
 * Inputs are not validated: NaN and Infinity propagate.
 */
export function stepSpring(state: SpringState, spring: Spring): SpringState {
  const offset = state.position - state.target;

  return {
    position: offset * spring.posPosCoef + state.velocity * spring.posVelCoef + state.target,
    velocity: offset * spring.velPosCoef + state.velocity * spring.velVelCoef,
    target: state.target,
  };
}

export function isSettled(state: SpringState, threshold: number): boolean {
  return Math.abs(state.position - state.target) < threshold && Math.abs(state.velocity) < threshold;
}

export function restingSpring(target = 0): SpringState {
  return { position: 0, velocity: 0, target };
}

export function validateSpringParameters(params: SpringParameters): string | null {
  if (!Number.isFinite(params.angularFrequency) || params.angularFrequency <= 0) {
    return `angularFrequency must be a positive number (got ${params.angularFrequency})`;
  }
  if (!Number.isFinite(params.dampingRatio) || params.dampingRatio < 0) {
    return `dampingRatio must be >= 0 (got ${params.dampingRatio})`;
  }
  if (!Number.isFinite(params.sampleRate) || params.sampleRate <= 0) {
    return `sampleRate must be a positive number (got ${params.sampleRate})`;
  }
  return null;
}
