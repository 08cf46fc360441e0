import 'dotenv/config';
import { copyFile } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline/promises';

import { createAgentContext } from '../src/agents/context';
import { loadConfig, type AppConfig } from '../src/config';
import { createLogger, type Logger } from '../src/logger';
import { listReports, readReport } from '../src/reports';
import { getRuns, recordRun, toRunRecord } from '../src/runLog';
import {
  renderFailure,
  renderReportList,
  renderRuns,
  renderSettings,
  renderSuccess,
  showLoader,
} from '../src/ui';
import { runWorkflow } from '../src/workflow';

const USAGE = `Usage:
  tsx scripts/napCitationCli.ts run <map-listing-url>
  tsx scripts/napCitationCli.ts history [report-file] [--out <path>] [--runs]
  tsx scripts/napCitationCli.ts settings
  tsx scripts/napCitationCli.ts            (interactive menu)`;

async function processBusiness(url: string, config: AppConfig, logger: Logger): Promise<boolean> {
  if (!url.trim()) {
    console.error('Please enter a map listing URL.');
    return false;
  }

  const ctx = createAgentContext(config, logger);
  const loader = showLoader('Starting processing...');
  const startedAt = ctx.now();

  const result = await runWorkflow(url, ctx, (_stage, message, percent) => loader.update(message, percent));

  await recordRun(config.outputDirectory, toRunRecord(url, startedAt, ctx.now(), result)).catch(
    (e: unknown) => logger.warn({ error: String(e) }, 'could not record run')
  );

  if (result.success) {
    loader.succeed('Process completed successfully!');
    console.log(renderSuccess(result));
    return true;
  }

  loader.fail(`Failed at ${result.stage}`);
  console.error(renderFailure(result));
  return false;
}

async function showHistory(config: AppConfig, args: string[]) {
  if (args.includes('--runs')) {
    console.log(renderRuns(await getRuns(config.outputDirectory, 50)));
    return;
  }

  const outIdx = args.indexOf('--out');
  const out = outIdx !== -1 ? args[outIdx + 1] : undefined;
  const file = args.find((a, i) => !a.startsWith('--') && (outIdx === -1 || i !== outIdx + 1));

  if (!file) {
    console.log(renderReportList(await listReports(config.outputDirectory)));
    return;
  }

  const content = await readReport(config.outputDirectory, file);
  console.log(content);
  if (out) {
    await copyFile(path.join(config.outputDirectory, file), out);
    console.log(`Saved a copy to ${out}`);
  }
}

async function interactive(config: AppConfig, logger: Logger) {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    while (true) {
      console.log('\nNAP Citation Agent\n  1) Process new business\n  2) History\n  3) Settings\n  4) Quit');
      const choice = (await rl.question('> ')).trim();

      if (choice === '1') {
        const url = await rl.question('Map listing URL: ');
        await processBusiness(url, config, logger);
      } else if (choice === '2') {
        const reports = await listReports(config.outputDirectory);
        console.log(renderReportList(reports));
        if (reports.length === 0) continue;
        const pickAnswer = (await rl.question('Report number to view (enter to skip): ')).trim();
        const picked = reports[Number.parseInt(pickAnswer, 10) - 1];
        if (picked) console.log(await readReport(config.outputDirectory, picked.filename));
      } else if (choice === '3') {
        console.log(renderSettings(config));
      } else if (choice === '4' || choice === 'q') {
        return;
      }
    }
  } finally {
    rl.close();
  }
}

async function main() {
  const config = loadConfig();
  const logger = createLogger({ debug: config.debug });
  const [command, ...rest] = process.argv.slice(2);

  switch (command) {
    case undefined:
      await interactive(config, logger);
      break;
    case 'run': {
      const ok = await processBusiness(rest.join(' '), config, logger);
      if (!ok) process.exitCode = 1;
      break;
    }
    case 'history':
      await showHistory(config, rest);
      break;
    case 'settings':
      console.log(renderSettings(config));
      break;
    default:
      console.error(USAGE);
      process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
