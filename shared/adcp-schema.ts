import { z } from "zod";

/**
 * ADCP profile batch: N samples (ensembles) × M bins, row-major.
 * `data[i * bins + j]` is bin j of sample i.
 */
export interface ProfileBatch {
  samples: number;
  bins: number;
  data: Float64Array;
}

/** Anything a caller may hand in as a profile array. A 1-D input is one sample. */
export type ProfileInput = number[] | number[][] | Float64Array | ProfileBatch;

/** Per-sample scalar attribute; a bare number is a length-1 series. */
export type SeriesInput = number | number[] | Float64Array;

export interface DeclinationQuery {
  latitude: Float64Array;
  longitude: Float64Array;
  /** Seconds since 1900-01-01T00:00:00Z. */
  timestamp: Float64Array;
  /** Metres, positive down. */
  depth: Float64Array;
}

/** Magnetic declination in degrees, east-positive, one value per sample (or one for all). */
export type DeclinationProvider = (query: DeclinationQuery) => Float64Array;

const isNumberRow = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "number");

export const isProfileInput = (value: unknown): value is ProfileInput => {
  if (value instanceof Float64Array) return true;
  if (Array.isArray(value)) {
    return isNumberRow(value) || value.every((row) => isNumberRow(row));
  }
  if (!value || typeof value !== "object") return false;
  return (
    "data" in value &&
    value.data instanceof Float64Array &&
    "samples" in value &&
    typeof value.samples === "number" &&
    "bins" in value &&
    typeof value.bins === "number"
  );
};

export const ProfileArray = z.custom<ProfileInput>(isProfileInput, {
  message: "Expected a profile array (number[], number[][], Float64Array or ProfileBatch).",
});

// NaN is allowed through: degenerate samples propagate rather than fail.
const Numeric = z.union([z.number(), z.nan()]);

export const Series = z.union([Numeric, z.array(Numeric), z.instanceof(Float64Array)]);
export type TSeries = z.infer<typeof Series>;

const seriesValues = (value: TSeries): Iterable<number> =>
  typeof value === "number" ? [value] : value;

const seriesWithin = (min: number, max: number, label: string) =>
  Series.refine(
    (value) => {
      for (const v of seriesValues(value)) {
        if (Number.isFinite(v) && (v < min || v > max)) return false;
      }
      return true;
    },
    { message: `${label} must lie within [${min}, ${max}]` },
  );

export const LatitudeSeries = seriesWithin(-90, 90, "latitude");
export const LongitudeSeries = seriesWithin(-180, 360, "longitude");
export const PressureSeries = seriesWithin(0, Number.POSITIVE_INFINITY, "pressure");

export const OrientationSeries = Series.refine(
  (value) => {
    for (const v of seriesValues(value)) {
      if (v !== 0 && v !== 1) return false;
    }
    return true;
  },
  { message: "orientation must be 0 (downward looking) or 1 (upward looking)" },
);

export const DeclinationSource = z.custom<DeclinationProvider>(
  (value) => typeof value === "function",
  { message: "declination must be a provider function" },
);

/** Beams 1-4 plus attitude in instrument units (centidegrees). */
export const BeamAttitudeInput = z.object({
  b1: ProfileArray,
  b2: ProfileArray,
  b3: ProfileArray,
  b4: ProfileArray,
  heading: Series,
  pitch: Series,
  roll: Series,
  orientation: OrientationSeries,
});

export type TBeamAttitudeInput = z.infer<typeof BeamAttitudeInput>;

/** Position, time, pressure (daPa) and the provider for the declination lookup. */
const Georeference = z.object({
  latitude: LatitudeSeries,
  longitude: LongitudeSeries,
  pressure: PressureSeries,
  timestamp: Series,
  declination: DeclinationSource,
});

export const BeamVelocityInput = BeamAttitudeInput.merge(Georeference);
export type TBeamVelocityInput = z.infer<typeof BeamVelocityInput>;

export const FiveBeamAttitudeInput = BeamAttitudeInput.extend({
  b5: ProfileArray,
});
export type TFiveBeamAttitudeInput = z.infer<typeof FiveBeamAttitudeInput>;

export const EarthVelocityInput = z
  .object({
    u: ProfileArray,
    v: ProfileArray,
  })
  .merge(Georeference);
export type TEarthVelocityInput = z.infer<typeof EarthVelocityInput>;

const BinLayout = z.object({
  /** Distance to the centre of the first bin (cm). */
  distFirstBin: z.number().finite(),
  /** Bin size (cm). */
  binSize: z.number().finite(),
  numBins: z.number().int().nonnegative(),
  orientation: z.union([z.literal(0), z.literal(1)]),
});

export const BinDepthInput = BinLayout.extend({
  /** Sensor pressure (daPa). */
  pressure: z.number().finite().nonnegative(),
  latitude: z.number().min(-90).max(90),
});
export type TBinDepthInput = z.infer<typeof BinDepthInput>;

export const BinDepthPd8Input = BinLayout.extend({
  /** Sensor depth (m); the sign is ignored. */
  sensorDepth: z.number().finite(),
});
export type TBinDepthPd8Input = z.infer<typeof BinDepthPd8Input>;
