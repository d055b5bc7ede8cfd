import { ADCP_TRACE } from "../core/env";
import type { ProfileBatch } from "../../shared/adcp-schema";

export const shapeOf = (batch: ProfileBatch) => `${batch.samples}x${batch.bins}`;

export const traceStage = (stage: string, details: Record<string, unknown>): void => {
  if (!ADCP_TRACE) return;
  console.debug(`[adcp] ${stage}`, details);
};
