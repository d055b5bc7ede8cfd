// Centralized environment switches for the ADCP transforms
import { DBAR_TO_M_APPROX } from "../../shared/adcp-units";

const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const positiveNumber = (value: string | undefined, defaultValue: number): number => {
  if (value === undefined || value.trim() === "") return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
};

export const ADCP_TRACE = flagEnabled(process.env.ADCP_TRACE, false);
export const ADCP_DBAR_TO_M = positiveNumber(process.env.ADCP_DBAR_TO_M, DBAR_TO_M_APPROX);
