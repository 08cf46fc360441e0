import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { BusinessRecord } from './types';

const MAX_NAME_LENGTH = 30;
const MAX_SUFFIX = 100;
const REPORT_DIVIDER = '-------------------------';

const pad = (n: number) => String(n).padStart(2, '0');

/** Local time as "YYYY-MM-DD HH:MM:SS". */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function sanitizeName(businessName: string): string {
  return businessName.replace(/[^\p{L}\p{N}]/gu, '_').slice(0, MAX_NAME_LENGTH);
}

export function generateOutputFilename(businessName: string, date: Date, extension = 'txt'): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${sanitizeName(businessName)}_${stamp}.${extension}`;
}

export function buildReport(input: {
  business: BusinessRecord;
  summary: string;
  citations: Record<string, string>;
  generatedAt: Date;
}): string {
  const { business, summary, citations, generatedAt } = input;

  let content = `NAP CITATION REPORT FOR ${business.name}\n`;
  content += `Generated on: ${formatTimestamp(generatedAt)}\n\n`;
  content += 'BUSINESS INFORMATION:\n';
  content += `Name: ${business.name}\n`;
  content += `Address: ${business.address}\n`;
  content += `Phone: ${business.phone}\n`;
  content += `Source URL: ${business.sourceUrl}\n\n`;
  content += 'RESEARCH SUMMARY:\n';
  content += `${summary}\n\n`;
  content += 'CITATIONS:\n';
  for (const [directory, citation] of Object.entries(citations)) {
    content += `\n--- ${directory.toUpperCase()} CITATION ---\n`;
    content += `${citation}\n`;
    content += `${REPORT_DIVIDER}\n`;
  }
  return content;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Writes `content` under `directory`, never overwriting: a clashing name gets
 * `_2`, `_3`, ... before the extension. Returns the path written.
 */
export async function saveTextFile(content: string, filename: string, directory: string): Promise<string> {
  await mkdir(directory, { recursive: true });
  const { name, ext } = path.parse(filename);

  for (let attempt = 1; attempt <= MAX_SUFFIX; attempt += 1) {
    const candidate = attempt === 1 ? filename : `${name}_${attempt}${ext}`;
    const filepath = path.join(directory, candidate);
    try {
      await writeFile(filepath, content, { encoding: 'utf-8', flag: 'wx' });
      return filepath;
    } catch (e) {
      if (!isAlreadyExists(e)) throw e;
    }
  }

  throw new Error(`Could not find a free filename for ${filename} in ${directory}`);
}

export type ReportEntry = {
  filename: string;
  path: string;
  businessLabel: string;
  modified: Date;
};

export function reportLabel(filename: string): string {
  return filename
    .replace(/(_\d{8}_\d{6})?(_\d+)?\.txt$/, '')
    .replace(/_/g, ' ')
    .trim();
}

/** Reports in `directory`, newest first. A missing directory means no reports. */
export async function listReports(directory: string): Promise<ReportEntry[]> {
  let files: string[];
  try {
    files = await readdir(directory);
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return [];
    throw e;
  }

  const reports: ReportEntry[] = [];
  for (const filename of files.filter((f) => f.endsWith('.txt'))) {
    const filepath = path.join(directory, filename);
    const info = await stat(filepath);
    if (!info.isFile()) continue;
    reports.push({
      filename,
      path: filepath,
      businessLabel: reportLabel(filename),
      modified: info.mtime,
    });
  }

  reports.sort((a, b) => b.modified.getTime() - a.modified.getTime());
  return reports;
}

export async function readReport(directory: string, filename: string): Promise<string> {
  if (path.basename(filename) !== filename) {
    throw new Error(`Invalid report name: ${filename}`);
  }
  return readFile(path.join(directory, filename), 'utf-8');
}
