import type { ProfileBatch, ProfileInput, SeriesInput } from "../../shared/adcp-schema";
import { OCEAN_CONSTANTS } from "../core/ocean-constants";
import {
  assertSameShape,
  batchMatMul,
  createMatrixBatch,
  seriesFor,
  stackProfiles,
  toProfileBatch,
  toSeries,
  unstackProfiles,
  type MatrixBatch,
} from "./batch";
import { shapeOf, traceStage } from "./trace";

/** Earth-frame velocities: east, north, up. */
export interface EarthVelocity {
  u: ProfileBatch;
  v: ProfileBatch;
  w: ProfileBatch;
}

/** Per-sample attitude in degrees; orientation 1 = upward looking. */
export interface AttitudeSeries {
  heading: SeriesInput;
  pitch: SeriesInput;
  roll: SeriesInput;
  orientation: SeriesInput;
}

const STAGE = "instrument-to-earth";
const { DEG_TO_RAD } = OCEAN_CONSTANTS;

// The pressure-case tilt sensor reads pitch in a frame that rolls with the
// instrument; project it back onto the gimballed frame. Degrees in, radians out.
export const correctedPitchRad = (pitchDeg: number, rollDeg: number): number =>
  Math.atan(Math.tan(pitchDeg * DEG_TO_RAD) * Math.cos(rollDeg * DEG_TO_RAD));

// Upward-looking heads are flipped about the roll axis. Degrees in and out.
export const effectiveRoll = (rollDeg: number, orientation: number): number =>
  rollDeg + (orientation === 1 ? 180 : 0);

/**
 * Combined heading · pitch · roll rotation, one 3×3 slice per sample.
 * `samples` defaults to the longest attitude series; length-1 series broadcast.
 */
export const attitudeRotation = (
  attitude: AttitudeSeries,
  samples?: number,
): MatrixBatch => {
  const n =
    samples ??
    Math.max(
      toSeries(attitude.heading).length,
      toSeries(attitude.pitch).length,
      toSeries(attitude.roll).length,
      toSeries(attitude.orientation).length,
    );
  const heading = seriesFor(attitude.heading, n, "heading", STAGE);
  const pitch = seriesFor(attitude.pitch, n, "pitch", STAGE);
  const roll = seriesFor(attitude.roll, n, "roll", STAGE);
  const orientation = seriesFor(attitude.orientation, n, "orientation", STAGE);

  const m1 = createMatrixBatch(n, 3, 3);
  const m2 = createMatrixBatch(n, 3, 3);
  const m3 = createMatrixBatch(n, 3, 3);
  for (let h = 0; h < n; h += 1) {
    const H = heading[h] * DEG_TO_RAD;
    const P = correctedPitchRad(pitch[h], roll[h]);
    const R = effectiveRoll(roll[h], orientation[h]) * DEG_TO_RAD;
    const cosH = Math.cos(H);
    const sinH = Math.sin(H);
    const cosP = Math.cos(P);
    const sinP = Math.sin(P);
    const cosR = Math.cos(R);
    const sinR = Math.sin(R);
    const o = h * 9;

    // heading, about the vertical axis
    m1.data.set([cosH, sinH, 0, -sinH, cosH, 0, 0, 0, 1], o);
    // pitch, about the transverse axis
    m2.data.set([1, 0, 0, 0, cosP, -sinP, 0, sinP, cosP], o);
    // roll, about the longitudinal axis
    m3.data.set([cosR, 0, sinR, 0, 1, 0, -sinR, 0, cosR], o);
  }

  // Order is fixed: M1 · M2 · M3.
  return batchMatMul(batchMatMul(m1, m2, STAGE), m3, STAGE);
};

export const instrumentToEarth = (
  u: ProfileInput,
  v: ProfileInput,
  w: ProfileInput,
  attitude: AttitudeSeries,
): EarthVelocity => {
  const pu = toProfileBatch(u, "u", STAGE);
  const pv = toProfileBatch(v, "v", STAGE);
  const pw = toProfileBatch(w, "w", STAGE);
  assertSameShape(STAGE, [
    ["u", pu],
    ["v", pv],
    ["w", pw],
  ]);

  const rotation = attitudeRotation(attitude, pu.samples);
  const earth = batchMatMul(rotation, stackProfiles([pu, pv, pw]), STAGE);
  const [uu, vv, ww] = unstackProfiles(earth);

  traceStage(STAGE, { shape: shapeOf(pu) });
  return { u: uu, v: vv, w: ww };
};
