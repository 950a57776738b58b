#!/usr/bin/env node

/**
 * repo-velocity CLI
 *
 * Usage:
 *   repo-velocity analyze --input data.json [--repository acme/api] [--save] [--config cfg.json]
 *   repo-velocity forecast --metric churn --values 120,140,180
 *   repo-velocity history --repository acme/api [--limit 10]
 *   repo-velocity status
 */

import { existsSync } from 'node:fs';
import { resolvePaths } from './config/paths.js';
import { runAnalyzeCommand } from './commands/analyze.js';
import { runForecastCommand } from './commands/forecast.js';
import { runHistoryCommand } from './commands/history.js';
import { describeError } from './errors.js';
import { log } from './logger.js';

const VERSION = '1.0.0';

// ─── Argument Parsing ───────────────────────────────────────

function parseArgs(argv: string[]): { command: string; flags: Record<string, string> } {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let flagStart = 1;

  // "help analyze" → "help-analyze"
  if (command === 'help' && args[1] && !args[1].startsWith('--')) {
    command = `help-${args[1]}`;
    flagStart = 2;
  }

  const flags: Record<string, string> = {};

  for (let i = flagStart; i < args.length; i++) {
    const arg = args[i];
    if (arg?.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      // Boolean flags (--save) vs value flags (--input file)
      if (next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = '';
      }
    }
  }

  return { command, flags };
}

// ─── Commands ───────────────────────────────────────────────

function runStatus(): string {
  const { home, configFile, historyDb } = resolvePaths();

  const lines: string[] = [];
  lines.push(`repo-velocity v${VERSION}`);
  lines.push('');
  lines.push(`Config dir:  ${home}`);
  lines.push(`Thresholds:  ${existsSync(configFile) ? configFile : 'defaults (no config.json)'}`);
  lines.push(`History:     ${existsSync(historyDb) ? historyDb : 'no snapshots saved yet'}`);
  return lines.join('\n');
}

function showHelp(topic?: string): string {
  if (topic) {
    const help = COMMAND_HELP[topic];
    return help ?? `Unknown command: ${topic}\n\n${MAIN_HELP}`;
  }
  return MAIN_HELP;
}

const MAIN_HELP = `repo-velocity - Repository analytics and forecasting

Usage:
  repo-velocity <command> [options]
  repo-velocity help <command>

Commands:
  analyze           Churn, risk, DORA metrics and forecasts for a JSON batch of records
  forecast          One-step forecast of a weekly churn or cycle-time series
  history           Saved report snapshots for a repository
  status            Show config directory, thresholds file and history database
  help [command]    Show help for a specific command

Examples:
  repo-velocity analyze --input week.json
  repo-velocity analyze --input week.json --repository acme/api --save
  repo-velocity forecast --metric cycle_time --values 30,26,22
  repo-velocity history --repository acme/api --limit 5

Environment Variables:
  REPO_VELOCITY_HOME       Config directory (default: ~/.repo-velocity)
  REPO_VELOCITY_LOG_LEVEL  debug | info | warn | error (default: info)`;

const COMMAND_HELP: Record<string, string> = {
  analyze: `repo-velocity analyze - Analyze a batch of records

  Input is a JSON file:
    { "commits": [...], "pullRequests": [...], "deployments": [...],
      "incidents": [...], "windowDays": 30 }
  Missing arrays count as empty; windowDays defaults to 30.
  Malformed records are skipped and reported as warnings on stderr.

  Options:
    --input <file>        JSON input file (required)
    --repository <name>   Compare against this repository's previous snapshot
    --save                Save a snapshot to the history database
    --config <file>       Threshold overrides (default: <config dir>/config.json)

  Output: { report, trends, snapshotId? } as JSON on stdout.`,

  forecast: `repo-velocity forecast - Forecast next week's value

  Options:
    --metric churn|cycle_time   Series kind (required)
    --values <list>             Comma-separated weekly values, oldest first
    --config <file>             Threshold overrides

  Fewer than two values yield a fallback (1000 lines / 24 hours) with low confidence.`,

  history: `repo-velocity history - List saved snapshots

  Options:
    --repository <name>   Repository name used with analyze --save (required)
    --limit <n>           Number of snapshots, newest first (default: 10)`,

  status: `repo-velocity status - Show configuration locations`,
};

async function main(): Promise<void> {
  const { command, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'analyze':
        output = runAnalyzeCommand(flags);
        break;
      case 'forecast':
        output = runForecastCommand(flags);
        break;
      case 'history':
        output = runHistoryCommand(flags);
        break;
      case 'status':
        output = runStatus();
        break;
      case 'help':
      case '--help':
      case '-h':
        output = showHelp();
        break;
      case '--version':
        output = VERSION;
        break;
      default:
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
    }

    console.log(output);
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  log('error', `Fatal error: ${describeError(error)}`);
  process.exit(1);
});
