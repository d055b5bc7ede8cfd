import type { z } from "zod";
import { AdcpInputError } from "./errors";

export const parseInput = <T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  stage: string,
): z.infer<T> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw AdcpInputError.fromZod(stage, result.error);
  }
  return result.data;
};
