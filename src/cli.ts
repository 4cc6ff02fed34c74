#!/usr/bin/env node

/**
 * regdoc CLI
 *
 * Runs the update pipeline, asks questions against the indexed documents and reports index status.
 * Results go to stdout; logs go to the log file and stderr.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { RegDocAssistant } from './assistant';
import { loadSettings } from './config/settings';
import { TriggerResult } from './startup/updateScheduler';
import { Citation, PipelineRun } from './shared/types';
import { getErrorMessage, toErrorResponse } from './utils/errorHandler';

interface GlobalOptions {
  format?: 'text' | 'json';
  help?: boolean;
  verbose?: boolean;
}

const PackageJsonSchema = z.object({ version: z.string() });

const args = process.argv.slice(2);
const commands = ['update', 'backfill', 'ask', 'status', 'stats', 'schedule', 'help'];

function readVersion(): string {
  const parsed = PackageJsonSchema.safeParse(
    JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'))
  );
  return parsed.success ? parsed.data.version : 'unknown';
}

// Parse global options
function parseGlobalOptions(args: string[]): { options: GlobalOptions; remaining: string[] } {
  const options: GlobalOptions = {};
  const remaining: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--json') {
      options.format = 'json';
    } else if (arg === '--format' && i + 1 < args.length) {
      options.format = args[++i] === 'json' ? 'json' : 'text';
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else {
      // Command-specific flags stay in remaining
      remaining.push(arg);
    }
  }

  return { options, remaining };
}

/**
 * Split `--name value` flags from positional arguments
 */
function parseCommandArgs(args: string[], valueFlags: string[]): { flags: Map<string, string>; positional: string[] } {
  const flags = new Map<string, string>();
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const name = arg.replace(/^--/, '');
    if (arg.startsWith('--') && valueFlags.includes(name)) {
      if (i + 1 >= args.length) {
        throw new Error(`${arg} needs a value`);
      }
      flags.set(name, args[++i]);
    } else if (arg.startsWith('--')) {
      flags.set(name, 'true');
    } else {
      positional.push(arg);
    }
  }

  return { flags, positional };
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseDate(value: string | undefined, label: string): string {
  if (!value || !/^\d{4}-\d{2}-\d{2}$/.test(value) || Number.isNaN(Date.parse(value))) {
    throw new Error(`${label} must be a date in YYYY-MM-DD form`);
  }
  return value;
}

/**
 * Display help information
 */
function showHelp(): void {
  console.log('📚 regdoc: regulatory document assistant');
  console.log('=========================================');
  console.log('');
  console.log('Indexes regulatory publications and answers questions about them with a local language model');
  console.log('');
  console.log('Usage:');
  console.log('  regdoc <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  update [--days N]        Fetch documents changed since the last update and index them');
  console.log('                           (--days re-indexes the last N days of publications instead)');
  console.log('  backfill START END       Index documents published between two dates (YYYY-MM-DD)');
  console.log('  ask <question>           Answer a question from the indexed documents');
  console.log('      [--stream]           Print the answer as it is generated');
  console.log('  status                   Checkpoint, last runs and language model reachability');
  console.log('  stats [--days N]         Document counts by type, agency and day');
  console.log('  schedule                 Run updates periodically until interrupted');
  console.log('  help                     Show this message');
  console.log('');
  console.log('Global options:');
  console.log('  --format text|json       Output format (default text), --json is short for json');
  console.log('  --verbose, -v            Debug logging');
  console.log('  --help, -h               Show this message');
  console.log('  --version                Show the version');
  console.log('');
  console.log('Configuration is read from environment variables, for example:');
  console.log('  DOCUMENT_API_URL, LLM_BASE_URL, LLM_MODEL, EMBEDDING_MODEL, REGDOC_DB_PATH, UPDATE_INTERVAL_HOURS');
}

function showVersion(): void {
  console.log(`regdoc v${readVersion()}`);
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value ?? null, null, 2));
}

function formatRun(run: PipelineRun): string {
  const window = run.windowStart ? `${run.windowStart} → ${run.windowEnd}` : `until ${run.windowEnd}`;
  const lines = [
    `${run.status === 'success' ? '✅' : run.status === 'partial' ? '⚠️' : '❌'} ${run.kind} run ${run.runId}: ${run.status}`,
    `   Window: ${window}`,
    `   Fetched ${run.documentsFetched}, unchanged ${run.documentsSkipped}, committed ${run.documentsCommitted}, failed ${run.documentsFailed}, page errors ${run.pageErrors}`,
  ];
  if (run.documentsAbandoned > 0) {
    lines.push(`   Gave up on ${run.documentsAbandoned} document(s) after repeated failures; backfill their dates to retry`);
  }
  if (run.errorMessage) {
    lines.push(`   Error: ${run.errorMessage}`);
  }
  return lines.join('\n');
}

function formatCitations(citations: readonly Citation[]): string {
  if (citations.length === 0) return '';
  const lines = citations.map(
    (citation, index) =>
      `  [${index + 1}] ${citation.title} (${citation.agency}, ${citation.documentType}, ${citation.publicationDate})${
        citation.url ? `\n      ${citation.url}` : ''
      }`
  );
  return ['', 'Sources:', ...lines].join('\n');
}

/**
 * Print a pipeline trigger result; true when the run did not fail
 */
function reportRun(result: TriggerResult, options: GlobalOptions): boolean {
  if (result.status === 'coalesced') {
    if (options.format === 'json') printJson(result);
    else console.log(`🔁 Another update is already running (${result.activeRunId ?? 'unknown run'})`);
    return true;
  }

  if (options.format === 'json') printJson(result.run);
  else console.log(formatRun(result.run));
  return result.run.status !== 'failed';
}

async function runAsk(assistant: RegDocAssistant, commandArgs: string[], options: GlobalOptions): Promise<boolean> {
  const { flags, positional } = parseCommandArgs(commandArgs, []);
  const question = positional.join(' ').trim();
  if (!question) {
    throw new Error('ask needs a question, for example: regdoc ask "What did EPA publish last week?"');
  }

  if (flags.has('stream') && options.format !== 'json') {
    let citations: Citation[] = [];
    for await (const event of assistant.engine.answerStream(question, { history: [] })) {
      switch (event.type) {
        case 'citations':
          citations = event.citations;
          break;
        case 'token':
          process.stdout.write(event.text);
          break;
        case 'done':
          process.stdout.write('\n');
          console.log(formatCitations(citations));
          break;
      }
    }
    return true;
  }

  const reply = await assistant.ask(question, 'cli');
  if (options.format === 'json') {
    printJson(reply);
  } else if (reply.ok) {
    console.log(reply.result.answer);
    console.log(formatCitations(reply.result.citations));
  } else {
    console.error(`❌ ${reply.message}`);
  }
  return reply.ok;
}

async function runStatus(assistant: RegDocAssistant, options: GlobalOptions): Promise<boolean> {
  const status = await assistant.getStatus();
  if (options.format === 'json') {
    printJson(status);
    return true;
  }

  const checkpoint = status.scheduler.checkpoint;
  console.log('📊 regdoc status');
  console.log(`  Database: ${status.databasePath}`);
  console.log(`  Documents: ${status.documents} (${status.chunks} chunks)`);
  console.log(`  Latest publication: ${status.latestPublicationDate ?? 'none'}`);
  if (status.staleDocuments > 0) {
    console.log(`  ⚠️ ${status.staleDocuments} documents use another embedding model; backfill their dates to re-index`);
  }
  console.log(
    `  Checkpoint: ${checkpoint ? `${checkpoint.cursor ?? 'none'} (${checkpoint.status}, ${checkpoint.documentsCommitted} committed)` : 'none'}`
  );
  console.log(`  Scheduler: ${status.scheduler.state}`);
  if (status.scheduler.resumable) {
    const stage = status.scheduler.resumable.lastCompletedStage ?? 'start';
    console.log(`  Unfinished run: ${status.scheduler.resumable.runId} (after ${stage})`);
  }
  console.log(`  Retry queue: ${status.scheduler.pendingRetries}`);
  console.log(`  Embedding model: ${status.embeddingModel}`);
  console.log(`  Language model: ${status.llm.model} ${status.llm.reachable ? '✅ reachable' : '❌ unreachable'}`);

  if (status.recentRuns.length > 0) {
    console.log('');
    console.log('Recent runs:');
    for (const run of status.recentRuns) {
      console.log(formatRun(run));
    }
  }
  return true;
}

function runStats(assistant: RegDocAssistant, commandArgs: string[], options: GlobalOptions): boolean {
  const { flags } = parseCommandArgs(commandArgs, ['days']);
  const days = flags.has('days') ? parsePositiveInt(flags.get('days') ?? '', '--days') : 30;
  const stats = assistant.getStats(days);
  if (options.format === 'json') {
    printJson(stats);
    return true;
  }

  console.log(`📈 ${stats.totalDocuments} documents, ${stats.totalChunks} chunks`);
  console.log('');
  console.log('Top document types:');
  for (const entry of stats.topDocumentTypes) {
    console.log(`  ${entry.documentType}: ${entry.count}`);
  }
  console.log('');
  console.log('Documents by agency:');
  for (const entry of stats.documentsByAgency) {
    console.log(`  ${entry.agency}: ${entry.count}`);
  }
  console.log('');
  console.log(`Publications in the last ${days} days:`);
  for (const entry of stats.recentActivity) {
    console.log(`  ${entry.date}: ${entry.count}`);
  }
  return true;
}

/**
 * Run the scheduler until SIGINT or SIGTERM
 */
async function runSchedule(assistant: RegDocAssistant): Promise<boolean> {
  assistant.scheduler.start({ runImmediately: true });
  console.log(`⏰ Updating every ${Math.round(assistant.settings.scheduler.intervalMs / 60000)} minutes; Ctrl+C to stop`);

  // The scheduler timer is unref'd; this handle keeps the process alive
  const keepAlive = setInterval(() => {}, 60 * 60 * 1000);
  await new Promise<void>(resolve => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
  clearInterval(keepAlive);
  console.log('⏹️ Stopping after the active run settles');
  return true;
}

async function executeCommand(command: string, commandArgs: string[], options: GlobalOptions): Promise<boolean> {
  if (options.verbose) {
    process.env.LOG_LEVEL = 'debug';
  }

  const assistant = RegDocAssistant.create(loadSettings(process.env));
  try {
    switch (command) {
      case 'update': {
        const { flags } = parseCommandArgs(commandArgs, ['days']);
        const days = flags.has('days') ? parsePositiveInt(flags.get('days') ?? '', '--days') : undefined;
        return reportRun(await assistant.update({ days }), options);
      }

      case 'backfill': {
        const { positional } = parseCommandArgs(commandArgs, []);
        const start = parseDate(positional[0], 'START');
        const end = parseDate(positional[1], 'END');
        if (start > end) {
          throw new Error('START must not be after END');
        }
        return reportRun(await assistant.backfill(start, end), options);
      }

      case 'ask':
        return await runAsk(assistant, commandArgs, options);

      case 'status':
        return await runStatus(assistant, options);

      case 'stats':
        return runStats(assistant, commandArgs, options);

      case 'schedule':
        return await runSchedule(assistant);

      default:
        throw new Error(`Unknown command: ${command}`);
    }
  } finally {
    await assistant.close();
  }
}

const { options: globalOptions, remaining } = parseGlobalOptions(args);

// Main CLI logic
async function main(): Promise<void> {
  if (globalOptions.help || remaining[0] === 'help' || remaining.length === 0) {
    showHelp();
    process.exit(0);
  } else if (remaining[0] === '--version') {
    showVersion();
    process.exit(0);
  } else if (commands.includes(remaining[0])) {
    const ok = await executeCommand(remaining[0], remaining.slice(1), globalOptions);
    process.exit(ok ? 0 : 1);
  } else {
    console.log('Unrecognized arguments. Use --help for usage information.\n');
    showHelp();
    process.exit(1);
  }
}

main().catch(error => {
  if (globalOptions.format === 'json') {
    printJson(toErrorResponse(error));
  } else {
    console.error('❌', getErrorMessage(error));
  }
  process.exit(1);
});
