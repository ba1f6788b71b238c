import { readFile, writeFile } from "fs/promises";
import stableStringify from "json-stable-stringify";
import { z } from "zod";
import { inputFailure } from "./errors";
import { createLogger } from "./logger";
import type { ContributionRecord } from "./types";
import { zTimestamp } from "./utils/timestamp";

const logger = createLogger("checkpoint");

export const zContributionRecord = z.record(z.string(), zTimestamp.array());

/** Overwrite `file` with the record as JSON, keys sorted. */
export async function saveContributionsCheckpoint(file: string, record: ContributionRecord) {
  const json = stableStringify(record) ?? "{}";
  await writeFile(file, json).catch((error: unknown) => {
    throw inputFailure(`Cannot write checkpoint ${file}`, error);
  });
  logger.info(`Saved ${Object.keys(record).length} contributors to ${file}`);
}

export async function loadContributionsCheckpoint(file: string): Promise<ContributionRecord> {
  const text = await readFile(file, "utf8").catch((error: unknown) => {
    throw inputFailure(`Cannot read checkpoint ${file}`, error);
  });
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw inputFailure(`Checkpoint ${file} is not valid JSON`, error);
  }
  const parsed = zContributionRecord.safeParse(json);
  if (!parsed.success) throw inputFailure(`Checkpoint ${file} is malformed`, parsed.error);
  logger.info(`Loaded ${Object.keys(parsed.data).length} contributors from ${file}`);
  return parsed.data;
}
