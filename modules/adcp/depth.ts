import {
  BinDepthInput,
  BinDepthPd8Input,
  type TBinDepthInput,
  type TBinDepthPd8Input,
} from "../../shared/adcp-schema";
import {
  centimetersToMeters,
  decapascalsToDecibars,
  decibarsToMetersApprox,
} from "../../shared/adcp-units";
import { ADCP_DBAR_TO_M } from "../core/env";
import { OCEAN_CONSTANTS, SPECIFIC_VOLUME_SSO_0 as V } from "../core/ocean-constants";
import { parseInput } from "./validate";

const SSO = OCEAN_CONSTANTS.SSO;
const SQRT_SSO = Math.sqrt(SSO);

// Polynomial terms at SA = SSO, CT = 0 °C; fixed for the process lifetime.
const a0 = V.v21 + SSO * (V.v26 + V.v36 * SSO + V.v31 * SQRT_SSO);
const a1 = V.v37 + V.v41 * SSO;
const a2 = V.v43;
const a3 = V.v47;
const b0 = V.v01 + SSO * (V.v05 + V.v08 * SQRT_SSO);
const b1 = 0.5 * (V.v12 + V.v15 * SSO);
const b2 = V.v17 + V.v20 * SSO;
const b1sq = b1 * b1;
const sqrtDisc = Math.sqrt(b1sq - b0 * b2);
const N = a0 + (2 * a3 * b0 * b1 / b2 - a2 * b0) / b2;
const M = a1 + (4 * a3 * b1sq / b2 - a3 * b0 - 2 * a2 * b1) / b2;
const A = b1 - sqrtDisc;
const B = b1 + sqrtDisc;
const PART = (N * b2 - M * b1) / (b2 * (B - A));

/**
 * Specific enthalpy (J/kg) of seawater at Standard Ocean Reference Salinity
 * and 0 °C conservative temperature, as a function of sea pressure (dbar).
 */
export const enthalpySso0P = (p: number): number =>
  OCEAN_CONSTANTS.DBAR_TO_PA *
  ((p * (a2 - 2 * a3 * b1 / b2 + 0.5 * a3 * p)) / b2 +
    (M / (2 * b2)) * Math.log(1 + (p * (2 * b1 + b2 * p)) / b0) +
    PART * Math.log(1 + (b2 * p * (B - A)) / (A * (B + b2 * p))));

export const gravityAtLatitude = (latDeg: number): number => {
  const x = Math.sin(latDeg * OCEAN_CONSTANTS.DEG_TO_RAD);
  const sin2 = x * x;
  return (
    OCEAN_CONSTANTS.GRAVITY_G0 *
    (1 + (OCEAN_CONSTANTS.GRAVITY_G1 + OCEAN_CONSTANTS.GRAVITY_G2 * sin2) * sin2)
  );
};

/**
 * Height (m) from sea pressure (dbar) and latitude; negative below the surface.
 * `geoStrfDynHeight` is the dynamic height anomaly (m²/s²), zero for the
 * standard ocean.
 */
export const zFromP = (p: number, latDeg: number, geoStrfDynHeight = 0): number => {
  const g = gravityAtLatitude(latDeg);
  const a = -0.5 * OCEAN_CONSTANTS.GRAVITY_GAMMA * g;
  const c = enthalpySso0P(p) - geoStrfDynHeight;
  return (-2 * c) / (g + Math.sqrt(g * g - 4 * a * c));
};

/** Approximate depth (m) from a pressure reading in daPa. */
export const pressureToDepthApprox = (daPa: number, factor = ADCP_DBAR_TO_M): number =>
  decibarsToMetersApprox(decapascalsToDecibars(daPa), factor);

const binOffsets = (distFirstBinCm: number, binSizeCm: number, numBins: number): Float64Array => {
  const first = centimetersToMeters(distFirstBinCm);
  const size = centimetersToMeters(binSizeCm);
  const offsets = new Float64Array(numBins);
  for (let k = 0; k < numBins; k += 1) {
    offsets[k] = first + size * k;
  }
  return offsets;
};

const applyOffsets = (sensorDepth: number, offsets: Float64Array, orientation: 0 | 1) =>
  offsets.map((offset) => (orientation === 1 ? sensorDepth - offset : sensorDepth + offset));

/**
 * Bin-centre depths (m, positive down) for PD0/PD12 output, where the
 * ensemble carries pressure (daPa) rather than depth.
 */
export const binDepths = (input: TBinDepthInput): Float64Array => {
  const { distFirstBin, binSize, numBins, pressure, orientation, latitude } = parseInput(
    BinDepthInput,
    input,
    "bin-depths",
  );
  const sensorDepth = -zFromP(decapascalsToDecibars(pressure), latitude);
  return applyOffsets(sensorDepth, binOffsets(distFirstBin, binSize, numBins), orientation);
};

/** Bin-centre depths (m, positive down) for PD8 output, which reports sensor depth directly. */
export const binDepthsPd8 = (input: TBinDepthPd8Input): Float64Array => {
  const { distFirstBin, binSize, numBins, sensorDepth, orientation } = parseInput(
    BinDepthPd8Input,
    input,
    "bin-depths-pd8",
  );
  return applyOffsets(Math.abs(sensorDepth), binOffsets(distFirstBin, binSize, numBins), orientation);
};
