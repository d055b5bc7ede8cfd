import type { ZodError } from "zod";

export type ShapeDimension = "samples" | "bins" | "rows" | "inner";

export type ShapeMismatchDetails = {
  stage: string;
  input: string;
  dimension: ShapeDimension;
  expected: number;
  actual: number;
};

export class ShapeMismatchError extends Error {
  stage: string;
  input: string;
  dimension: ShapeDimension;
  expected: number;
  actual: number;

  constructor(details: ShapeMismatchDetails) {
    super(
      `${details.stage}: ${details.input} has ${details.actual} ${details.dimension}, expected ${details.expected}`,
    );
    this.stage = details.stage;
    this.input = details.input;
    this.dimension = details.dimension;
    this.expected = details.expected;
    this.actual = details.actual;
    this.name = "ShapeMismatchError";
  }
}

export class UnsupportedConfigurationError extends Error {
  stage: string;
  setting: string;
  value: string | number;

  constructor(stage: string, setting: string, value: string | number) {
    super(`${stage}: unsupported ${setting} ${JSON.stringify(value)}`);
    this.stage = stage;
    this.setting = setting;
    this.value = value;
    this.name = "UnsupportedConfigurationError";
  }
}

export class AdcpInputError extends Error {
  stage: string;
  issues: string[];

  constructor(stage: string, issues: string[]) {
    super(`${stage}: invalid input (${issues.join("; ")})`);
    this.stage = stage;
    this.issues = issues;
    this.name = "AdcpInputError";
  }

  static fromZod(stage: string, error: ZodError): AdcpInputError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    });
    return new AdcpInputError(stage, issues);
  }
}
