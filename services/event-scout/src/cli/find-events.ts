import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import type { EventJson, SearchRequest } from '../types/events.js';
import { loadSearchSettings } from '../lib/config.js';
import { createEventSearchService, type EventSearchService, type SearchSuccess } from '../lib/search/event-search.js';
import { errorMessage } from '../lib/errors.js';

export const DEFAULT_OUTPUT = 'results/event_results.json';

export interface FindEventsOptions {
  location?: string;
  category?: string;
  calendar?: string;
  maxResults?: number;
  timeout?: number;
  output: string;
  persist?: boolean;
  config?: string;
}

export type SearchRunner = Pick<EventSearchService, 'searchEvents' | 'shutdown'>;

export function toSearchRequest(intent: string, options: FindEventsOptions): SearchRequest {
  return {
    intent,
    location: options.location,
    category: options.category,
    calendar: options.calendar,
    max_results: options.maxResults,
    timeout_seconds: options.timeout,
    persist: options.persist
  };
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export async function writeResults(path: string, events: EventJson[]): Promise<string> {
  const target = resolve(path);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, `${JSON.stringify(events, null, 2)}\n`, 'utf8');
  return target;
}

export function formatSummary(response: SearchSuccess): string[] {
  const lines: string[] = [];
  const status = response.partial ? chalk.yellow('partial') : chalk.green('complete');
  lines.push(chalk.bold.cyan(`Found ${response.events.length} event(s)`) + ` (${status}${response.scored ? '' : ', unscored'})`);

  response.events.forEach((event, index) => {
    const score = event.relevance_score === null ? chalk.gray('--') : chalk.green(String(event.relevance_score));
    lines.push(`${chalk.bold(`${index + 1}.`)} ${event.title} [${score}]`);
    lines.push(`   ${chalk.blue(event.url)}`);
    const details = [event.date, event.location].filter(Boolean).join(' · ');
    if (details) lines.push(`   ${details}`);
    if (event.speakers.length > 0) {
      lines.push(`   Speakers: ${event.speakers.map(speaker => speaker.name).join(', ')}`);
    }
    if (event.sponsors.length > 0) {
      lines.push(`   Sponsors: ${event.sponsors.map(sponsor => sponsor.name).join(', ')}`);
    }
  });

  for (const warning of response.warnings) {
    lines.push(chalk.yellow(`Warning: ${warning}`));
  }
  if (response.persisted) {
    lines.push(chalk.gray(`Target events: ${response.persisted.inserted} added, ${response.persisted.updated} updated`));
  }
  return lines;
}

/** Run one search and write its events; resolves to the process exit code. */
export async function runFindEvents(request: SearchRequest, output: string, runner: SearchRunner): Promise<number> {
  try {
    const response = await runner.searchEvents(request);
    if (!response.success) {
      console.error(chalk.red(response.error));
      return 1;
    }

    const written = await writeResults(output, response.events);
    formatSummary(response).forEach(line => console.log(line));
    console.log(chalk.gray(`Results written to ${written}`));
    return 0;
  } finally {
    await runner.shutdown();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('find-events')
    .description('Search the events platform for business-networking events matching an intent')
    .version('1.0.0')
    .argument('<intent>', 'What kind of event to look for')
    .option('-l, --location <location>', 'City or region to search in')
    .option('-c, --category <category>', 'Event category filter')
    .option('--calendar <calendar>', 'Restrict the search to a named calendar')
    .option('-n, --max-results <count>', 'Maximum number of events to return', parseInteger)
    .option('-t, --timeout <seconds>', 'Give up after this many seconds and return partial results', parseInteger)
    .option('-o, --output <path>', 'Where to write the JSON results', DEFAULT_OUTPUT)
    .option('--persist', 'Upsert the results into the target events CSV')
    .option('--config <path>', 'YAML settings file')
    .action(async (intent: string, options: FindEventsOptions) => {
      try {
        const settings = loadSearchSettings(options.config ? { ...process.env, EVENT_SCOUT_CONFIG: options.config } : process.env);
        const service = createEventSearchService(settings);
        process.exitCode = await runFindEvents(toSearchRequest(intent, options), options.output, service);
      } catch (error) {
        console.error(chalk.red('Search failed:'), errorMessage(error));
        process.exitCode = 1;
      }
    });

  return program;
}
