import type { ProfileBatch, ProfileInput, SeriesInput } from "../../shared/adcp-schema";
import { mapProfile, seriesFor, toProfileBatch } from "./batch";

const STAGE = "backscatter";

/**
 * Echo intensity (ECHOINT L1, dB) from raw counts. The scale factor is a
 * single value or one value per sample, applied across that sample's bins.
 */
export const adcpBackscatter = (raw: ProfileInput, scaleFactor: SeriesInput): ProfileBatch => {
  const counts = toProfileBatch(raw, "raw", STAGE);
  const factor = seriesFor(scaleFactor, counts.samples, "scaleFactor", STAGE);
  return mapProfile(counts, (value, sample) => value * factor[sample]);
};
