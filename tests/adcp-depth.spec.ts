import { describe, expect, it } from "vitest";
import {
  binDepths,
  binDepthsPd8,
  enthalpySso0P,
  gravityAtLatitude,
  pressureToDepthApprox,
  zFromP,
} from "../modules/adcp/depth";
import { AdcpInputError } from "../modules/adcp/errors";

describe("height from pressure", () => {
  it("is zero at the sea surface", () => {
    expect(zFromP(0, 45)).toBeCloseTo(0, 12);
    expect(enthalpySso0P(0)).toBeCloseTo(0, 12);
  });

  it("matches the standard-ocean equation of state", () => {
    expect(zFromP(10, 4)).toBeCloseTo(-9.944583133418758, 9);
    expect(zFromP(1000, 4)).toBeCloseTo(-992.0921779551201, 8);
    expect(enthalpySso0P(1000)).toBeCloseTo(9704.322969032506, 6);
  });

  it("is shallower for the same pressure toward the poles", () => {
    expect(zFromP(500, 0)).toBeCloseTo(-496.65335055463845, 8);
    expect(zFromP(500, 90)).toBeCloseTo(-494.03393203178433, 8);
    expect(gravityAtLatitude(90)).toBeGreaterThan(gravityAtLatitude(0));
  });

  it("raises the height when a dynamic height anomaly is supplied", () => {
    expect(zFromP(100, 45, 2)).toBeGreaterThan(zFromP(100, 45));
  });

  it("approximates depth from a daPa reading", () => {
    expect(pressureToDepthApprox(100_000)).toBeCloseTo(101.9716, 9);
    expect(pressureToDepthApprox(100_000, 1)).toBeCloseTo(100, 12);
  });
});

describe("bin depths from reported sensor depth (PD8)", () => {
  it("adds bin offsets below a downward-looking instrument", () => {
    const depths = binDepthsPd8({
      distFirstBin: 200,
      binSize: 100,
      numBins: 3,
      sensorDepth: 50,
      orientation: 0,
    });
    expect(Array.from(depths)).toEqual([52, 53, 54]);
  });

  it("subtracts bin offsets above an upward-looking instrument", () => {
    const depths = binDepthsPd8({
      distFirstBin: 200,
      binSize: 100,
      numBins: 3,
      sensorDepth: 50,
      orientation: 1,
    });
    expect(Array.from(depths)).toEqual([48, 47, 46]);
  });

  it("takes the magnitude of a negative sensor depth", () => {
    const depths = binDepthsPd8({
      distFirstBin: 200,
      binSize: 100,
      numBins: 2,
      sensorDepth: -50,
      orientation: 0,
    });
    expect(Array.from(depths)).toEqual([52, 53]);
  });

  it("returns an empty profile for zero bins", () => {
    const depths = binDepthsPd8({
      distFirstBin: 200,
      binSize: 100,
      numBins: 0,
      sensorDepth: 50,
      orientation: 0,
    });
    expect(depths.length).toBe(0);
  });

  it("rejects a fractional bin count", () => {
    expect(() =>
      binDepthsPd8({
        distFirstBin: 200,
        binSize: 100,
        numBins: 2.5,
        sensorDepth: 50,
        orientation: 0,
      }),
    ).toThrow(AdcpInputError);
  });
});

describe("bin depths from pressure (PD0/PD12)", () => {
  const layout = { distFirstBin: 500, binSize: 200, numBins: 3, pressure: 100_000, latitude: 45 };

  it("places bins above an upward-looking instrument", () => {
    const depths = binDepths({ ...layout, orientation: 1 });
    expect(depths.length).toBe(3);
    expect(depths[0]).toBeCloseTo(94.16434938452936, 8);
    expect(depths[1]).toBeCloseTo(92.16434938452936, 8);
    expect(depths[2]).toBeCloseTo(90.16434938452936, 8);
  });

  it("places bins below a downward-looking instrument", () => {
    const depths = binDepths({ ...layout, orientation: 0 });
    expect(depths[0]).toBeCloseTo(104.16434938452936, 8);
    expect(depths[2]).toBeCloseTo(108.16434938452936, 8);
  });

  it("rejects an out-of-range latitude with the offending field", () => {
    let caught: unknown;
    try {
      binDepths({ ...layout, latitude: 95, orientation: 0 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AdcpInputError);
    if (!(caught instanceof AdcpInputError)) return;
    expect(caught.stage).toBe("bin-depths");
    expect(caught.issues).toHaveLength(1);
    expect(caught.issues[0].startsWith("latitude: ")).toBe(true);
  });
});
