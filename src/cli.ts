#!/usr/bin/env node
import { createWriteStream } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { toError } from './errors';
import { categoryLogger, LogCategory, logger } from './logger';
import { streamReportPdf } from './pdf/reportPdf';
import { createPipeline } from './pipeline';
import { createReviews } from './review';

const log = categoryLogger(LogCategory.CLI);

const USAGE = 'Usage: review-insights <reviews.json> [--out results.json] [--pdf report.pdf] [--title "Shop name"]';

type CliArgs = {
  input: string;
  out?: string;
  pdf?: string;
  title?: string;
};

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`Missing value for ${arg}.\n${USAGE}`);
      }
      flags[arg.slice(2)] = value;
      i += 1;
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new Error(USAGE);
  }
  return { input: positional[0], out: flags.out, pdf: flags.pdf, title: flags.title };
}

async function writePdf(path: string, render: (out: NodeJS.WritableStream) => void): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const out = createWriteStream(path);
    out.on('finish', resolve);
    out.on('error', reject);
    render(out);
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  dotenv.config();
  const config = loadConfig();
  logger.level = config.logLevel;
  const reviews = createReviews(JSON.parse(await readFile(args.input, 'utf8')));

  const pipeline = createPipeline(config);
  const controller = new AbortController();
  const onSigint = (): void => {
    log.warn('Interrupted; finishing with the reviews analyzed so far.');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const { report, results, cancelled } = await pipeline.analyzeBatch(reviews, {
    signal: controller.signal,
  });
  process.removeListener('SIGINT', onSigint);

  const output = JSON.stringify({ cancelled, report, results }, null, 2);
  if (args.out) {
    await writeFile(args.out, output, 'utf8');
    log.info(`Wrote ${results.length} results to ${args.out}`);
  } else {
    process.stdout.write(`${output}\n`);
  }

  if (args.pdf) {
    await writePdf(args.pdf, (out) => streamReportPdf(out, report, args.title));
    log.info(`Wrote PDF report to ${args.pdf}`);
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    log.error(toError(err).message);
    process.exitCode = 1;
  });
}
