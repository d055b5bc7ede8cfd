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

export interface HorizontalVelocity {
  u: ProfileBatch;
  v: ProfileBatch;
}

const STAGE = "magnetic-correction";

/**
 * 2×2 rotation per sample, θ in degrees (east-positive declination):
 * [ cosθ  sinθ ]
 * [-sinθ  cosθ ]
 */
export const declinationRotation = (theta: SeriesInput, samples?: number): MatrixBatch => {
  const n = samples ?? toSeries(theta).length;
  const angles = seriesFor(theta, n, "declination", STAGE);
  const m = createMatrixBatch(n, 2, 2);
  for (let h = 0; h < n; h += 1) {
    const t = angles[h] * OCEAN_CONSTANTS.DEG_TO_RAD;
    const cosT = Math.cos(t);
    const sinT = Math.sin(t);
    m.data.set([cosT, sinT, -sinT, cosT], h * 4);
  }
  return m;
};

/** Rotate magnetic-referenced east/north velocities onto true north. */
export const magneticCorrection = (
  theta: SeriesInput,
  u: ProfileInput,
  v: ProfileInput,
): HorizontalVelocity => {
  const pu = toProfileBatch(u, "u", STAGE);
  const pv = toProfileBatch(v, "v", STAGE);
  assertSameShape(STAGE, [
    ["u", pu],
    ["v", pv],
  ]);

  const rotation = declinationRotation(theta, pu.samples);
  const corrected = batchMatMul(rotation, stackProfiles([pu, pv]), STAGE);
  const [uCor, vCor] = unstackProfiles(corrected);

  traceStage(STAGE, { shape: shapeOf(pu) });
  return { u: uCor, v: vCor };
};
