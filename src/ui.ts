import chalk from 'chalk';
import ora from 'ora';

import type { AppConfig } from './config';
import { directoryName } from './agents/directory';
import { formatTimestamp, type ReportEntry } from './reports';
import type { RunRecord } from './runLog';
import type { WorkflowFailure, WorkflowStage, WorkflowSuccess } from './types';

const STAGE_LABELS: Record<WorkflowStage, string> = {
  validation: 'Validation',
  extraction: 'Extraction',
  research: 'Research',
  citation_building: 'Citation building',
  summary: 'Summary',
  output: 'Output',
};

export const showLoader = (text: string) => {
  const spinner = ora({ text, color: 'cyan' }).start();

  return {
    update: (message: string, percent: number) => {
      spinner.text = `${chalk.dim(`[${String(percent).padStart(3)}%]`)} ${message}`;
    },
    succeed: (message: string) => spinner.succeed(message),
    fail: (message: string) => spinner.fail(message),
    stop: () => spinner.stop(),
  };
};

const formatDate = (d: Date) => formatTimestamp(d).slice(0, 16);

export function renderSuccess(result: WorkflowSuccess): string {
  const { business, stats } = result;
  const lines = [
    chalk.green(`Successfully processed ${result.businessName}`),
    '',
    chalk.bold('Business Information'),
    `  Name:    ${business.name}`,
    `  Address: ${business.address}`,
    `  Phone:   ${business.phone}`,
    `  Source:  ${business.sourceUrl}`,
    '',
    chalk.bold('Citation Statistics'),
    `  Directories checked: ${stats.directoriesChecked}`,
    `  Missing citations:   ${stats.directoriesMissing}`,
    `  Citations created:   ${stats.citationsCreated}`,
    '',
    chalk.bold('Directory Status'),
  ];

  for (const [id, check] of Object.entries(result.directoriesChecked)) {
    const status = check.exists ? chalk.green('Present') : chalk.red('Missing');
    const note = check.error ? chalk.dim(` (${check.error})`) : '';
    lines.push(`  ${directoryName(id).padEnd(24)} ${status}${note}`);
  }

  lines.push('', chalk.bold('Generated Citations'));
  for (const [id, citation] of Object.entries(result.citations)) {
    lines.push(chalk.cyan(`  ${directoryName(id)} Citation`));
    lines.push(...citation.split('\n').map((line) => `    ${line}`));
  }

  lines.push('', chalk.bold('Research Summary'), result.summary, '', `Report saved to ${result.outputFile}`);
  return lines.join('\n');
}

export function renderFailure(result: WorkflowFailure): string {
  return [
    chalk.red(`Workflow failed at stage: ${STAGE_LABELS[result.stage]} (${result.stage})`),
    chalk.red(`Error: ${result.error}`),
  ].join('\n');
}

export function renderReportList(reports: ReportEntry[]): string {
  if (reports.length === 0) return 'No previous reports found.';
  const rows = reports.map(
    (r, i) => `  ${String(i + 1).padStart(3)}. ${formatDate(r.modified)}  ${r.businessLabel.padEnd(32)} ${chalk.dim(r.filename)}`
  );
  return [chalk.bold('Processing History'), ...rows].join('\n');
}

export function renderRuns(runs: RunRecord[]): string {
  if (runs.length === 0) return 'No runs recorded.';
  return runs
    .map((run) => {
      const when = run.startedAt.slice(0, 19).replace('T', ' ');
      return run.success
        ? `${when}  ${chalk.green('ok    ')} ${run.businessName ?? ''}  ${chalk.dim(run.outputFile ?? '')}`
        : `${when}  ${chalk.red('failed')} [${run.stage}] ${run.error ?? ''}  ${chalk.dim(run.url)}`;
    })
    .join('\n');
}

export function renderSettings(config: AppConfig): string {
  const yesNo = (v: boolean) => (v ? 'yes' : 'no');
  return [
    chalk.bold('Settings'),
    chalk.dim('Read from the environment at start-up (see .env.example).'),
    '',
    'Business Directories to Check:',
    ...config.directories.map((d) => `  - ${d}`),
    '',
    `Page Load Timeout:        ${config.pageLoadTimeoutMs} ms`,
    `Element Wait Timeout:     ${config.elementWaitTimeoutMs} ms`,
    `Page Settle Delay:        ${config.pageSettleMs} ms`,
    `Request Timeout:          ${config.requestTimeoutMs} ms`,
    `Delay Between Requests:   ${config.requestDelayMs} ms + ${config.requestJitterMs.min}-${config.requestJitterMs.max} ms jitter`,
    `Output Directory:         ${config.outputDirectory}`,
    `Summary Word Count:       ${config.summaryWordCount.min}-${config.summaryWordCount.max}`,
    `Debug Mode:               ${yesNo(config.debug)}`,
    `User Agent Rotation:      ${yesNo(config.userAgentRotation)}`,
    `Use Proxies:              ${yesNo(config.useProxies)} (${config.proxyList.length} configured)`,
  ].join('\n');
}
