import type { ProfileBatch, ProfileInput } from "../../shared/adcp-schema";
import { OCEAN_CONSTANTS } from "../core/ocean-constants";
import { assertSameShape, createProfileBatch, toProfileBatch } from "./batch";
import { UnsupportedConfigurationError } from "./errors";
import { shapeOf, traceStage } from "./trace";

export type TransducerHead = "convex" | "concave";

export interface BeamTransformOptions {
  transducerHead?: TransducerHead;
}

/** Instrument-frame velocities (mm/s): u, v, w along the body axes, e the error velocity. */
export interface InstrumentVelocity {
  u: ProfileBatch;
  v: ProfileBatch;
  w: ProfileBatch;
  e: ProfileBatch;
}

export interface FiveBeamInstrumentVelocity extends InstrumentVelocity {
  /** Fifth (vertical) beam, passed through unchanged. */
  vertical?: ProfileBatch;
}

const STAGE = "beam-to-instrument";

const THETA = (OCEAN_CONSTANTS.BEAM_ANGLE_DEG / 180) * Math.PI;
const A = 1 / (2 * Math.sin(THETA));

/** Janus 4-beam transform coefficients for the 20° beam angle. */
export const BEAM_COEFFICIENTS = {
  a: A,
  b: 1 / (4 * Math.cos(THETA)),
  d: A / Math.sqrt(2),
} as const;

const HEAD_SIGN: Record<"convex", number> = { convex: 1 };

const resolveHeadSign = (head: TransducerHead): number => {
  if (head !== "convex") {
    throw new UnsupportedConfigurationError(STAGE, "transducer head", head);
  }
  return HEAD_SIGN[head];
};

export const beamToInstrument = (
  b1: ProfileInput,
  b2: ProfileInput,
  b3: ProfileInput,
  b4: ProfileInput,
  options: BeamTransformOptions = {},
): InstrumentVelocity => {
  const c = resolveHeadSign(options.transducerHead ?? "convex");
  const p1 = toProfileBatch(b1, "beam1", STAGE);
  const p2 = toProfileBatch(b2, "beam2", STAGE);
  const p3 = toProfileBatch(b3, "beam3", STAGE);
  const p4 = toProfileBatch(b4, "beam4", STAGE);
  assertSameShape(STAGE, [
    ["beam1", p1],
    ["beam2", p2],
    ["beam3", p3],
    ["beam4", p4],
  ]);

  const { a, b, d } = BEAM_COEFFICIENTS;
  const u = createProfileBatch(p1.samples, p1.bins);
  const v = createProfileBatch(p1.samples, p1.bins);
  const w = createProfileBatch(p1.samples, p1.bins);
  const e = createProfileBatch(p1.samples, p1.bins);
  for (let k = 0; k < p1.data.length; k += 1) {
    const x1 = p1.data[k];
    const x2 = p2.data[k];
    const x3 = p3.data[k];
    const x4 = p4.data[k];
    u.data[k] = c * a * (x1 - x2);
    v.data[k] = c * a * (x4 - x3);
    w.data[k] = b * (x1 + x2 + x3 + x4);
    e.data[k] = d * (x1 + x2 - x3 - x4);
  }

  traceStage(STAGE, { shape: shapeOf(p1) });
  return { u, v, w, e };
};

/**
 * Four- or five-beam entry point. Beams 1-4 go through the Janus transform;
 * a fifth beam is validated against them and returned as `vertical`.
 */
export const beamsToInstrument = (
  beams: ProfileInput[],
  options: BeamTransformOptions = {},
): FiveBeamInstrumentVelocity => {
  if (beams.length !== 4 && beams.length !== 5) {
    throw new UnsupportedConfigurationError(STAGE, "beam count", beams.length);
  }
  const result = beamToInstrument(beams[0], beams[1], beams[2], beams[3], options);
  if (beams.length === 4) return result;

  const vertical = toProfileBatch(beams[4], "beam5", STAGE);
  assertSameShape(STAGE, [
    ["beam1", result.u],
    ["beam5", vertical],
  ]);
  return { ...result, vertical };
};
