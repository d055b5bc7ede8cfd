import type { DeclinationProvider, DeclinationQuery } from "../../shared/adcp-schema";
import { OCEAN_CONSTANTS } from "../core/ocean-constants";
import { broadcastSeries } from "./batch";

const { DEG_TO_RAD, RAD_TO_DEG } = OCEAN_CONSTANTS;

// Seconds between 1900-01-01 and 1970-01-01.
export const NTP_UNIX_OFFSET_S = 2_208_988_800;

export const ntpSecondsToDate = (seconds: number): Date =>
  new Date((seconds - NTP_UNIX_OFFSET_S) * 1000);

/**
 * Geomagnetic North Pole (WMM 2025 epoch).
 */
export const GEOMAGNETIC_POLE = { latDeg: 80.7, lonDeg: -72.7 } as const;

/**
 * Declination from a centred dipole, degrees, positive east.
 * Accuracy is a few degrees over most of the ocean.
 */
export const dipoleDeclinationDeg = (latDeg: number, lonDeg: number): number => {
  const poleLat = GEOMAGNETIC_POLE.latDeg * DEG_TO_RAD;
  const poleLon = GEOMAGNETIC_POLE.lonDeg * DEG_TO_RAD;
  const lat = latDeg * DEG_TO_RAD;
  const lon = lonDeg * DEG_TO_RAD;

  const num = Math.sin(poleLon - lon) * Math.cos(poleLat);
  const den =
    Math.cos(lat) * Math.sin(poleLat) -
    Math.sin(lat) * Math.cos(poleLat) * Math.cos(poleLon - lon);

  return Math.atan2(num, den) * RAD_TO_DEG;
};

/**
 * Per-position geomagnetic model: declination in degrees (east-positive) at a
 * calendar date and a height above sea level in metres.
 */
export type PointDeclinationModel = (
  latDeg: number,
  lonDeg: number,
  date: Date,
  altitudeM: number,
) => number;

/**
 * Adapts a per-position model (a World Magnetic Model lookup, say) to the
 * batch provider shape. Telemetry timestamps become dates and depths become
 * negative altitudes; length-1 query series broadcast.
 */
export const declinationFromModel =
  (model: PointDeclinationModel): DeclinationProvider =>
  (query: DeclinationQuery) => {
    const n = Math.max(
      query.latitude.length,
      query.longitude.length,
      query.timestamp.length,
      query.depth.length,
    );
    const lat = broadcastSeries(query.latitude, n, "latitude", "declination");
    const lon = broadcastSeries(query.longitude, n, "longitude", "declination");
    const time = broadcastSeries(query.timestamp, n, "timestamp", "declination");
    const depth = broadcastSeries(query.depth, n, "depth", "declination");
    const out = new Float64Array(n);
    for (let i = 0; i < n; i += 1) {
      out[i] = model(lat[i], lon[i], ntpSecondsToDate(time[i]), -depth[i]);
    }
    return out;
  };

/**
 * Centred-dipole provider. It has no secular variation and ignores depth, so
 * it is only ever used when a caller passes it explicitly.
 */
export const dipoleDeclination: DeclinationProvider = declinationFromModel((latDeg, lonDeg) =>
  dipoleDeclinationDeg(latDeg, lonDeg),
);
