import {
  BeamAttitudeInput,
  BeamVelocityInput,
  EarthVelocityInput,
  FiveBeamAttitudeInput,
  type ProfileBatch,
  type ProfileInput,
  type TBeamAttitudeInput,
  type TBeamVelocityInput,
  type TEarthVelocityInput,
  type TFiveBeamAttitudeInput,
} from "../../shared/adcp-schema";
import { centidegreesToDegrees, millimetersToMeters } from "../../shared/adcp-units";
import { assertSameShape, broadcastSeries, mapProfile, seriesFor, toProfileBatch } from "./batch";
import { beamToInstrument } from "./beam-to-instrument";
import { pressureToDepthApprox } from "./depth";
import { instrumentToEarth, type AttitudeSeries, type EarthVelocity } from "./instrument-to-earth";
import { magneticCorrection, type HorizontalVelocity } from "./magnetic-correction";
import { shapeOf, traceStage } from "./trace";
import { parseInput } from "./validate";

/** All four VELPROF L1 products for one batch, m/s. */
export interface VelocityProducts {
  eastward: ProfileBatch;
  northward: ProfileBatch;
  vertical: ProfileBatch;
  error: ProfileBatch;
}

type TGeoreference = Pick<
  TBeamVelocityInput,
  "latitude" | "longitude" | "pressure" | "timestamp" | "declination"
>;

const toMetersPerSecond = (batch: ProfileBatch) => mapProfile(batch, millimetersToMeters);

const attitudeDegrees = (
  input: TBeamAttitudeInput,
  samples: number,
  stage: string,
): AttitudeSeries => ({
  heading: seriesFor(input.heading, samples, "heading", stage).map(centidegreesToDegrees),
  pitch: seriesFor(input.pitch, samples, "pitch", stage).map(centidegreesToDegrees),
  roll: seriesFor(input.roll, samples, "roll", stage).map(centidegreesToDegrees),
  orientation: seriesFor(input.orientation, samples, "orientation", stage),
});

/** One provider call per batch; the result is broadcast or checked against N. */
const lookupDeclination = (
  input: TGeoreference,
  samples: number,
  stage: string,
): Float64Array => {
  const theta = input.declination({
    latitude: seriesFor(input.latitude, samples, "latitude", stage),
    longitude: seriesFor(input.longitude, samples, "longitude", stage),
    timestamp: seriesFor(input.timestamp, samples, "timestamp", stage),
    depth: seriesFor(input.pressure, samples, "pressure", stage).map((daPa) =>
      pressureToDepthApprox(daPa),
    ),
  });
  return broadcastSeries(theta, samples, "declination", stage);
};

const earthFromBeams = (
  input: TBeamAttitudeInput,
  stage: string,
): { earth: EarthVelocity; error: ProfileBatch } => {
  const ins = beamToInstrument(input.b1, input.b2, input.b3, input.b4);
  const attitude = attitudeDegrees(input, ins.u.samples, stage);
  return { earth: instrumentToEarth(ins.u, ins.v, ins.w, attitude), error: ins.e };
};

const trueNorthFromBeams = (input: TBeamVelocityInput, stage: string): HorizontalVelocity => {
  const { earth } = earthFromBeams(input, stage);
  const theta = lookupDeclination(input, earth.u.samples, stage);
  return magneticCorrection(theta, earth.u, earth.v);
};

const trueNorthFromEarth = (input: TEarthVelocityInput, stage: string): HorizontalVelocity => {
  const u = toProfileBatch(input.u, "u", stage);
  const theta = lookupDeclination(input, u.samples, stage);
  return magneticCorrection(theta, u, input.v);
};

// ===== Beam-coordinate instruments (four beams) =====

/** VELPROF-VLE from beam coordinates. */
export const adcpBeamEastward = (input: TBeamVelocityInput): ProfileBatch => {
  const stage = "adcp-beam-eastward";
  const parsed = parseInput(BeamVelocityInput, input, stage);
  const { u } = trueNorthFromBeams(parsed, stage);
  traceStage(stage, { shape: shapeOf(u) });
  return toMetersPerSecond(u);
};

/** VELPROF-VLN from beam coordinates. */
export const adcpBeamNorthward = (input: TBeamVelocityInput): ProfileBatch => {
  const stage = "adcp-beam-northward";
  const parsed = parseInput(BeamVelocityInput, input, stage);
  const { v } = trueNorthFromBeams(parsed, stage);
  traceStage(stage, { shape: shapeOf(v) });
  return toMetersPerSecond(v);
};

/** VELPROF-VLU from beam coordinates. No declination: the vertical axis is unaffected. */
export const adcpBeamVertical = (input: TBeamAttitudeInput): ProfileBatch => {
  const stage = "adcp-beam-vertical";
  const parsed = parseInput(BeamAttitudeInput, input, stage);
  const { earth } = earthFromBeams(parsed, stage);
  traceStage(stage, { shape: shapeOf(earth.w) });
  return toMetersPerSecond(earth.w);
};

/** VELPROF-ERR from beam coordinates. */
export const adcpBeamError = (
  b1: ProfileInput,
  b2: ProfileInput,
  b3: ProfileInput,
  b4: ProfileInput,
): ProfileBatch => toMetersPerSecond(beamToInstrument(b1, b2, b3, b4).e);

/**
 * All four products in one pass: a single beam transform, rotation and
 * declination lookup.
 */
export const adcpBeamVelocities = (input: TBeamVelocityInput): VelocityProducts => {
  const stage = "adcp-beam-velocities";
  const parsed = parseInput(BeamVelocityInput, input, stage);
  const { earth, error } = earthFromBeams(parsed, stage);
  const theta = lookupDeclination(parsed, earth.u.samples, stage);
  const horizontal = magneticCorrection(theta, earth.u, earth.v);
  traceStage(stage, { shape: shapeOf(error) });
  return {
    eastward: toMetersPerSecond(horizontal.u),
    northward: toMetersPerSecond(horizontal.v),
    vertical: toMetersPerSecond(earth.w),
    error: toMetersPerSecond(error),
  };
};

// ===== Earth-coordinate instruments =====

/** VELPROF-VLE from Earth coordinates: declination correction and scaling only. */
export const adcpEarthEastward = (input: TEarthVelocityInput): ProfileBatch => {
  const stage = "adcp-earth-eastward";
  const parsed = parseInput(EarthVelocityInput, input, stage);
  return toMetersPerSecond(trueNorthFromEarth(parsed, stage).u);
};

/** VELPROF-VLN from Earth coordinates. */
export const adcpEarthNorthward = (input: TEarthVelocityInput): ProfileBatch => {
  const stage = "adcp-earth-northward";
  const parsed = parseInput(EarthVelocityInput, input, stage);
  return toMetersPerSecond(trueNorthFromEarth(parsed, stage).v);
};

export const adcpEarthVertical = (w: ProfileInput): ProfileBatch =>
  toMetersPerSecond(toProfileBatch(w, "w", "adcp-earth-vertical"));

export const adcpEarthError = (e: ProfileInput): ProfileBatch =>
  toMetersPerSecond(toProfileBatch(e, "e", "adcp-earth-error"));

// ===== Five-beam VADCP (VELTURB) =====

export const vadcpBeamEastward = adcpBeamEastward;
export const vadcpBeamNorthward = adcpBeamNorthward;
export const vadcpBeamError = adcpBeamError;

/** VELTURB-VLU estimated from the four slant beams. */
export const vadcpBeamVerticalEst = (input: TBeamAttitudeInput): ProfileBatch => {
  const stage = "vadcp-beam-vertical-est";
  const parsed = parseInput(BeamAttitudeInput, input, stage);
  const { earth } = earthFromBeams(parsed, stage);
  return toMetersPerSecond(earth.w);
};

/**
 * VELTURB-VLU with the fifth (vertical) beam standing in for the four-beam w
 * before the attitude rotation.
 */
export const vadcpBeamVerticalTrue = (input: TFiveBeamAttitudeInput): ProfileBatch => {
  const stage = "vadcp-beam-vertical-true";
  const parsed = parseInput(FiveBeamAttitudeInput, input, stage);
  const ins = beamToInstrument(parsed.b1, parsed.b2, parsed.b3, parsed.b4);
  const vertical = toProfileBatch(parsed.b5, "beam5", stage);
  assertSameShape(stage, [
    ["beam1", ins.u],
    ["beam5", vertical],
  ]);
  const attitude = attitudeDegrees(parsed, ins.u.samples, stage);
  const earth = instrumentToEarth(ins.u, ins.v, vertical, attitude);
  traceStage(stage, { shape: shapeOf(earth.w) });
  return toMetersPerSecond(earth.w);
};
