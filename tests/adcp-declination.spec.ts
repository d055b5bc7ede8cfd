import { describe, expect, it, vi } from "vitest";
import {
  GEOMAGNETIC_POLE,
  NTP_UNIX_OFFSET_S,
  declinationFromModel,
  dipoleDeclination,
  dipoleDeclinationDeg,
  ntpSecondsToDate,
  type PointDeclinationModel,
} from "../modules/adcp/declination";

describe("dipole declination", () => {
  it("vanishes on the geomagnetic pole meridian", () => {
    expect(dipoleDeclinationDeg(40, GEOMAGNETIC_POLE.lonDeg)).toBeCloseTo(0, 12);
    expect(dipoleDeclinationDeg(-30, GEOMAGNETIC_POLE.lonDeg)).toBeCloseTo(0, 12);
  });

  it("is antisymmetric about the pole meridian", () => {
    const east = dipoleDeclinationDeg(45, GEOMAGNETIC_POLE.lonDeg + 25);
    const west = dipoleDeclinationDeg(45, GEOMAGNETIC_POLE.lonDeg - 25);
    expect(east).toBeLessThan(0);
    expect(west).toBeCloseTo(-east, 12);
  });

  it("answers one value per sample and broadcasts a fixed position", () => {
    const theta = dipoleDeclination({
      latitude: new Float64Array([44.6, 44.6, 44.6]),
      longitude: new Float64Array([-124.1]),
      timestamp: new Float64Array([0, 1, 2]),
      depth: new Float64Array([80, 80, 80]),
    });
    expect(theta.length).toBe(3);
    expect(theta[1]).toBeCloseTo(dipoleDeclinationDeg(44.6, -124.1), 12);
    expect(theta[2]).toBe(theta[0]);
  });
});

describe("model-backed declination", () => {
  it("hands the model a calendar date and a height above sea level", () => {
    const model = vi.fn<PointDeclinationModel>(() => 15);
    const theta = declinationFromModel(model)({
      latitude: new Float64Array([44.6]),
      longitude: new Float64Array([-124.1, -124.2]),
      timestamp: new Float64Array([3_786_825_600, 3_786_825_660]),
      depth: new Float64Array([80]),
    });
    expect(Array.from(theta)).toEqual([15, 15]);
    expect(model).toHaveBeenCalledTimes(2);
    const [lat, lon, date, altitude] = model.mock.calls[1];
    expect(lat).toBe(44.6);
    expect(lon).toBe(-124.2);
    expect(date.toISOString()).toBe("2020-01-01T00:01:00.000Z");
    expect(altitude).toBe(-80);
  });

  it("follows the model through time", () => {
    const drifting = declinationFromModel((_lat, _lon, date) =>
      date.getUTCFullYear() < 2000 ? 18 : 15,
    );
    const theta = drifting({
      latitude: new Float64Array([44.6]),
      longitude: new Float64Array([-124.1]),
      timestamp: new Float64Array([2_840_140_800, 3_786_825_600]),
      depth: new Float64Array([0]),
    });
    expect(Array.from(theta)).toEqual([18, 15]);
  });

  it("fails on query series that cannot broadcast", () => {
    expect(() =>
      declinationFromModel(() => 0)({
        latitude: new Float64Array([1, 2, 3]),
        longitude: new Float64Array([1, 2]),
        timestamp: new Float64Array([0]),
        depth: new Float64Array([0]),
      }),
    ).toThrow("declination: longitude has 2 samples, expected 3");
  });
});

describe("telemetry timestamps", () => {
  it("converts seconds since 1900 to a Date", () => {
    expect(ntpSecondsToDate(NTP_UNIX_OFFSET_S).toISOString()).toBe("1970-01-01T00:00:00.000Z");
    expect(ntpSecondsToDate(3_786_825_600).toISOString()).toBe("2020-01-01T00:00:00.000Z");
  });
});
