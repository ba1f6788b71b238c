import { z } from "zod";
import { inputFailure } from "../errors";

export const zTimestamp = z.string().datetime({ offset: true });

/** RFC 3339 in UTC, truncated to the second: 2021-03-04T05:06:07Z */
export const formatTimestamp = (date: Date) => date.toISOString().replace(/\.\d{3}Z$/, "Z");

export function parseTimestamp(value: string): Date {
  const parsed = zTimestamp.safeParse(value);
  if (!parsed.success) throw inputFailure(`Malformed timestamp ${JSON.stringify(value)}`);
  return new Date(parsed.data);
}

export const startOfUtcYear = (year: number) => new Date(Date.UTC(year, 0, 1));
