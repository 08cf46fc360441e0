import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import { JSONFilePreset } from 'lowdb/node';

import type { WorkflowResult, WorkflowStage } from './types';

export type RunRecord = {
  url: string;
  startedAt: string;
  finishedAt: string;
  success: boolean;
  businessName?: string;
  outputFile?: string;
  stage?: WorkflowStage;
  error?: string;
};

type Data = { runs: RunRecord[] };

const RUN_LOG_FILE = 'runs.json';
const ERROR_MAX = 500;

export const runLogPath = (outputDirectory: string) => path.join(outputDirectory, RUN_LOG_FILE);

export const getDb = async (outputDirectory: string) => {
  await mkdir(outputDirectory, { recursive: true });
  return JSONFilePreset<Data>(runLogPath(outputDirectory), { runs: [] });
};

export function toRunRecord(
  url: string,
  startedAt: Date,
  finishedAt: Date,
  result: WorkflowResult
): RunRecord {
  const base = { url, startedAt: startedAt.toISOString(), finishedAt: finishedAt.toISOString() };
  if (result.success) {
    return { ...base, success: true, businessName: result.businessName, outputFile: result.outputFile };
  }
  const error =
    result.error.length > ERROR_MAX
      ? result.error.slice(0, ERROR_MAX) + `...[truncated ${result.error.length - ERROR_MAX} chars]`
      : result.error;
  return { ...base, success: false, stage: result.stage, error };
}

/** Appends one run. Earlier records are never rewritten. */
export const recordRun = async (outputDirectory: string, record: RunRecord) => {
  const db = await getDb(outputDirectory);
  db.data.runs.push(record);
  await db.write();
};

/** Most recent runs last; `limit` keeps only the newest ones. */
export const getRuns = async (outputDirectory: string, limit?: number) => {
  const db = await getDb(outputDirectory);
  const all = db.data.runs;
  if (!limit || all.length <= limit) return all;
  return all.slice(all.length - limit);
};
