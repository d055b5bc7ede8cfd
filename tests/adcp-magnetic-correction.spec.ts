import { describe, expect, it } from "vitest";
import { matrixAt } from "../modules/adcp/batch";
import { ShapeMismatchError } from "../modules/adcp/errors";
import { declinationRotation, magneticCorrection } from "../modules/adcp/magnetic-correction";

describe("magnetic declination correction", () => {
  it("rotates by the declination angle", () => {
    const east = magneticCorrection(90, [1], [0]);
    expect(east.u.data[0]).toBeCloseTo(0, 12);
    expect(east.v.data[0]).toBeCloseTo(-1, 12);

    const north = magneticCorrection(90, [0], [1]);
    expect(north.u.data[0]).toBeCloseTo(1, 12);
    expect(north.v.data[0]).toBeCloseTo(0, 12);
  });

  it("matches the closed form for a small easterly declination", () => {
    const { u, v } = magneticCorrection(10, [300], [-200]);
    expect(u.data[0]).toBeCloseTo(260.71269037027633, 9);
    expect(v.data[0]).toBeCloseTo(-249.0560039025207, 9);
  });

  it("returns the input after correcting by theta and then -theta", () => {
    const theta = [-180, -135, -90, -45, -12.5, 0, 7.25, 45, 90, 135, 180];
    const u = theta.map((_, i) => [10 * i - 40, 3.5, -i]);
    const v = theta.map((_, i) => [i * i - 20, -8, 0.25 * i]);
    const forward = magneticCorrection(theta, u, v);
    const back = magneticCorrection(
      theta.map((t) => -t),
      forward.u,
      forward.v,
    );
    theta.forEach((_, i) => {
      for (let j = 0; j < 3; j += 1) {
        expect(back.u.data[i * 3 + j]).toBeCloseTo(u[i][j], 9);
        expect(back.v.data[i * 3 + j]).toBeCloseTo(v[i][j], 9);
      }
    });
  });

  it("preserves horizontal speed", () => {
    const { u, v } = magneticCorrection([-17, 64], [[3], [-12]], [[4], [5]]);
    expect(Math.hypot(u.data[0], v.data[0])).toBeCloseTo(5, 12);
    expect(Math.hypot(u.data[1], v.data[1])).toBeCloseTo(13, 12);
  });

  it("broadcasts a single declination over every sample", () => {
    const { v } = magneticCorrection(90, [[1], [2]], [[0], [0]]);
    expect(v.data[0]).toBeCloseTo(-1, 12);
    expect(v.data[1]).toBeCloseTo(-2, 12);
  });

  it("fails when the declination series has the wrong length", () => {
    expect(() => magneticCorrection([1, 2, 3], [[1], [2]], [[1], [2]])).toThrow(
      "magnetic-correction: declination has 3 samples, expected 2",
    );
  });

  it("fails when u and v disagree in shape", () => {
    expect(() => magneticCorrection(0, [[1, 2]], [[1, 2, 3]])).toThrow(ShapeMismatchError);
  });
});

describe("declination rotation", () => {
  it("is orthogonal with unit determinant", () => {
    const rotation = declinationRotation([-170, -33.3, 0, 21, 179]);
    for (let h = 0; h < rotation.count; h += 1) {
      const [[a, b], [c, d]] = matrixAt(rotation, h);
      expect(a * a + b * b).toBeCloseTo(1, 12);
      expect(c * c + d * d).toBeCloseTo(1, 12);
      expect(a * c + b * d).toBeCloseTo(0, 12);
      expect(a * d - b * c).toBeCloseTo(1, 12);
    }
  });
});
