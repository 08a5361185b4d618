import { randomBytes } from "node:crypto";

const pad = (value: number): string => value.toString().padStart(2, "0");

const normalizeSuffix = (value: string): string => {
  const normalized = value.toLowerCase().replace(/[^a-f0-9]/g, "");
  if (normalized.length === 0) {
    return "000000";
  }
  return normalized.length >= 6 ? normalized.slice(0, 6) : normalized.padEnd(6, "0");
};

const slugify = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 40);

export const formatUtcStamp = (now: Date): string =>
  `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}T${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}Z`;

/**
 * `<UTC stamp>_<6 hex>`, with `_<label>` appended when a label is given (batch runs name
 * each workflow after its requirement file).
 */
export const generateRunId = (
  now: Date = new Date(),
  options?: {
    suffix?: string;
    label?: string;
  }
): string => {
  const suffix =
    options?.suffix !== undefined
      ? normalizeSuffix(options.suffix)
      : randomBytes(3).toString("hex");
  const label = options?.label ? slugify(options.label) : "";
  return label ? `${formatUtcStamp(now)}_${suffix}_${label}` : `${formatUtcStamp(now)}_${suffix}`;
};
