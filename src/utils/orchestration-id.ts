import { randomBytes } from "node:crypto";

const pad = (value: number): string => value.toString().padStart(2, "0");

const formatUtcTimestamp = (now: Date): string =>
  `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}T${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}Z`;

/** `YYYYMMDDTHHMMSSZ_<8 hex>`; sortable by start time. */
export const generateOrchestrationId = (now: Date = new Date(), suffix?: string): string => {
  const normalizedSuffix =
    suffix !== undefined
      ? suffix.toLowerCase().replace(/[^a-f0-9]/g, "").padEnd(8, "0").slice(0, 8)
      : randomBytes(4).toString("hex");
  return `${formatUtcTimestamp(now)}_${normalizedSuffix}`;
};
