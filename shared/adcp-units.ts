/**
 * Instrument telemetry units and the conversions into physical units.
 *
 * Velocities arrive in mm/s, attitude in centidegrees, pressure in daPa,
 * bin geometry in cm. Data products leave in m/s and metres.
 */

export const CDEG_PER_DEG = 100;
export const DAPA_PER_DBAR = 1000;
export const MM_PER_M = 1000;
export const CM_PER_M = 100;

// Fresh-water style approximation used for the declination lookup depth (m per dbar).
export const DBAR_TO_M_APPROX = 1.019716;

export const centidegreesToDegrees = (value: number) => value / CDEG_PER_DEG;

export const decapascalsToDecibars = (value: number) => value / DAPA_PER_DBAR;

export const millimetersToMeters = (value: number) => value / MM_PER_M;

export const centimetersToMeters = (value: number) => value / CM_PER_M;

export const decibarsToMetersApprox = (dbar: number, factor = DBAR_TO_M_APPROX) =>
  dbar * factor;
