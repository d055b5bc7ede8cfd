/**
 * ADCP velocity-profile transforms.
 *
 * beam → instrument → Earth → true north, plus the bin-depth and echo
 * intensity products. Inputs in instrument units, products in SI.
 */

export {
  createProfileBatch,
  createMatrixBatch,
  toProfileBatch,
  toSeries,
  broadcastSeries,
  assertSameShape,
  batchMatMul,
  stackProfiles,
  unstackProfiles,
  mapProfile,
  matrixAt,
  setMatrix,
  profileToRows,
  type MatrixBatch,
} from "./batch";

export {
  BEAM_COEFFICIENTS,
  beamToInstrument,
  beamsToInstrument,
  type BeamTransformOptions,
  type FiveBeamInstrumentVelocity,
  type InstrumentVelocity,
  type TransducerHead,
} from "./beam-to-instrument";

export {
  attitudeRotation,
  correctedPitchRad,
  effectiveRoll,
  instrumentToEarth,
  type AttitudeSeries,
  type EarthVelocity,
} from "./instrument-to-earth";

export {
  declinationRotation,
  magneticCorrection,
  type HorizontalVelocity,
} from "./magnetic-correction";

export {
  GEOMAGNETIC_POLE,
  NTP_UNIX_OFFSET_S,
  declinationFromModel,
  dipoleDeclination,
  dipoleDeclinationDeg,
  ntpSecondsToDate,
  type PointDeclinationModel,
} from "./declination";

export {
  binDepths,
  binDepthsPd8,
  enthalpySso0P,
  gravityAtLatitude,
  pressureToDepthApprox,
  zFromP,
} from "./depth";

export { adcpBackscatter } from "./backscatter";

export {
  adcpBeamEastward,
  adcpBeamNorthward,
  adcpBeamVertical,
  adcpBeamError,
  adcpBeamVelocities,
  adcpEarthEastward,
  adcpEarthNorthward,
  adcpEarthVertical,
  adcpEarthError,
  vadcpBeamEastward,
  vadcpBeamNorthward,
  vadcpBeamVerticalEst,
  vadcpBeamVerticalTrue,
  vadcpBeamError,
  type VelocityProducts,
} from "./velprof";

export {
  AdcpInputError,
  ShapeMismatchError,
  UnsupportedConfigurationError,
  type ShapeDimension,
} from "./errors";

export type {
  DeclinationProvider,
  DeclinationQuery,
  ProfileBatch,
  ProfileInput,
  SeriesInput,
} from "../../shared/adcp-schema";
