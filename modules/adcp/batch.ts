import type { ProfileBatch, ProfileInput, SeriesInput } from "../../shared/adcp-schema";
import { ShapeMismatchError } from "./errors";

/**
 * N stacked r×c matrices, row-major within each slice:
 * element (i, k) of slice h lives at `data[(h * rows + i) * cols + k]`.
 */
export interface MatrixBatch {
  count: number;
  rows: number;
  cols: number;
  data: Float64Array;
}

export const createProfileBatch = (samples: number, bins: number): ProfileBatch => ({
  samples,
  bins,
  data: new Float64Array(samples * bins),
});

export const createMatrixBatch = (count: number, rows: number, cols: number): MatrixBatch => ({
  count,
  rows,
  cols,
  data: new Float64Array(count * rows * cols),
});

const isRows = (input: number[] | number[][]): input is number[][] =>
  input.length > 0 && Array.isArray(input[0]);

export const toProfileBatch = (
  input: ProfileInput,
  label = "profile",
  stage = "input",
): ProfileBatch => {
  if (input instanceof Float64Array) {
    return { samples: 1, bins: input.length, data: input };
  }
  if (!Array.isArray(input)) {
    const expected = input.samples * input.bins;
    if (input.data.length !== expected) {
      throw new ShapeMismatchError({
        stage,
        input: label,
        dimension: "bins",
        expected,
        actual: input.data.length,
      });
    }
    return input;
  }
  if (!isRows(input)) {
    return { samples: 1, bins: input.length, data: Float64Array.from(input) };
  }
  const bins = input[0].length;
  const batch = createProfileBatch(input.length, bins);
  input.forEach((row, i) => {
    if (row.length !== bins) {
      throw new ShapeMismatchError({
        stage,
        input: `${label}[${i}]`,
        dimension: "bins",
        expected: bins,
        actual: row.length,
      });
    }
    batch.data.set(row, i * bins);
  });
  return batch;
};

export const toSeries = (input: SeriesInput): Float64Array => {
  if (typeof input === "number") return Float64Array.of(input);
  if (input instanceof Float64Array) return input;
  return Float64Array.from(input);
};

/** Expand a length-1 series to `samples`, or check it already has that length. */
export const broadcastSeries = (
  series: Float64Array,
  samples: number,
  label: string,
  stage: string,
): Float64Array => {
  if (series.length === samples) return series;
  if (series.length === 1) return new Float64Array(samples).fill(series[0]);
  throw new ShapeMismatchError({
    stage,
    input: label,
    dimension: "samples",
    expected: samples,
    actual: series.length,
  });
};

export const seriesFor = (
  input: SeriesInput,
  samples: number,
  label: string,
  stage: string,
): Float64Array => broadcastSeries(toSeries(input), samples, label, stage);

export const assertSameShape = (
  stage: string,
  entries: ReadonlyArray<readonly [string, ProfileBatch]>,
): void => {
  if (!entries.length) return;
  const [, reference] = entries[0];
  for (const [label, batch] of entries) {
    if (batch.samples !== reference.samples) {
      throw new ShapeMismatchError({
        stage,
        input: label,
        dimension: "samples",
        expected: reference.samples,
        actual: batch.samples,
      });
    }
    if (batch.bins !== reference.bins) {
      throw new ShapeMismatchError({
        stage,
        input: label,
        dimension: "bins",
        expected: reference.bins,
        actual: batch.bins,
      });
    }
  }
};

export const setMatrix = (batch: MatrixBatch, h: number, values: number[][]): void => {
  const base = h * batch.rows * batch.cols;
  for (let i = 0; i < batch.rows; i += 1) {
    for (let k = 0; k < batch.cols; k += 1) {
      batch.data[base + i * batch.cols + k] = values[i][k];
    }
  }
};

export const matrixAt = (batch: MatrixBatch, h: number): number[][] => {
  const base = h * batch.rows * batch.cols;
  const out: number[][] = [];
  for (let i = 0; i < batch.rows; i += 1) {
    out.push(Array.from(batch.data.subarray(base + i * batch.cols, base + (i + 1) * batch.cols)));
  }
  return out;
};

/**
 * Per-slice product: (N, r, k) × (N, k, c) → (N, r, c).
 * Each slice is multiplied independently; nothing is pooled across slices.
 */
export const batchMatMul = (
  a: MatrixBatch,
  b: MatrixBatch,
  stage = "batch-matmul",
): MatrixBatch => {
  if (a.count !== b.count) {
    throw new ShapeMismatchError({
      stage,
      input: "right operand",
      dimension: "samples",
      expected: a.count,
      actual: b.count,
    });
  }
  if (a.cols !== b.rows) {
    throw new ShapeMismatchError({
      stage,
      input: "right operand",
      dimension: "inner",
      expected: a.cols,
      actual: b.rows,
    });
  }
  const { rows, cols: inner } = a;
  const cols = b.cols;
  const out = createMatrixBatch(a.count, rows, cols);
  const A = a.data;
  const B = b.data;
  const C = out.data;
  for (let h = 0; h < a.count; h += 1) {
    const aBase = h * rows * inner;
    const bBase = h * inner * cols;
    const cBase = h * rows * cols;
    for (let i = 0; i < rows; i += 1) {
      const cRow = cBase + i * cols;
      for (let k = 0; k < inner; k += 1) {
        const aik = A[aBase + i * inner + k];
        const bRow = bBase + k * cols;
        for (let j = 0; j < cols; j += 1) {
          C[cRow + j] += aik * B[bRow + j];
        }
      }
    }
  }
  return out;
};

/** Pack K same-shaped profiles (N×M) into an (N, K, M) block batch. */
export const stackProfiles = (profiles: ProfileBatch[]): MatrixBatch => {
  const { samples, bins } = profiles[0];
  const k = profiles.length;
  const out = createMatrixBatch(samples, k, bins);
  for (let h = 0; h < samples; h += 1) {
    profiles.forEach((profile, row) => {
      out.data.set(
        profile.data.subarray(h * bins, (h + 1) * bins),
        (h * k + row) * bins,
      );
    });
  }
  return out;
};

/** Inverse of stackProfiles: row r of every slice becomes profile r. */
export const unstackProfiles = (block: MatrixBatch): ProfileBatch[] => {
  const { count: samples, rows, cols: bins } = block;
  const profiles = Array.from({ length: rows }, () => createProfileBatch(samples, bins));
  for (let h = 0; h < samples; h += 1) {
    for (let r = 0; r < rows; r += 1) {
      const start = (h * rows + r) * bins;
      profiles[r].data.set(block.data.subarray(start, start + bins), h * bins);
    }
  }
  return profiles;
};

export const mapProfile = (
  batch: ProfileBatch,
  fn: (value: number, sample: number, bin: number) => number,
): ProfileBatch => {
  const out = createProfileBatch(batch.samples, batch.bins);
  for (let i = 0; i < batch.samples; i += 1) {
    for (let j = 0; j < batch.bins; j += 1) {
      const idx = i * batch.bins + j;
      out.data[idx] = fn(batch.data[idx], i, j);
    }
  }
  return out;
};

export const profileToRows = (batch: ProfileBatch): number[][] =>
  Array.from({ length: batch.samples }, (_, i) =>
    Array.from(batch.data.subarray(i * batch.bins, (i + 1) * batch.bins)),
  );
