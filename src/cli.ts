#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Usage:
 *   reel-reposter run [pageId]     run every page, or one page
 *   reel-reposter list             list configured pages
 *   reel-reposter status [limit]   show recent run results
 *   reel-reposter schedule         show strategic slots and reservations
 *   reel-reposter check            verify the SocialBu token
 */

import 'dotenv/config';
import { ConfigurationError, errorMessage } from './lib/errors';
import { formatLocal } from './lib/time';
import { getAppConfig } from './lib/config';
import { closeDb } from './lib/db';
import type { WorkflowResult } from './lib/types';
import type { WorkflowControl } from './handlers/api';
import { createWorkflowOrchestrator } from './handlers/workflow';

const USAGE = `Usage: reel-reposter <command> [args]

Commands:
  run [pageId]     Run the workflow for every page, or a single page
  list             List configured pages
  status [limit]   Show recent run results (default 10)
  schedule         Show strategic times and reserved slots
  check            Test the SocialBu connection`;

/**
 * One-line summary of a page result
 */
export function formatResult(result: WorkflowResult, timeZone: string): string {
  const { counts } = result;
  const when = formatLocal(new Date(result.startedAt), timeZone);
  const mode = result.fetchMode === 'mock' ? ' [mock]' : '';
  return (
    `${when}  ${result.pageId}${mode}: ${counts.fetched} fetched, ${counts.ranked} ranked, ` +
    `${counts.uploaded} uploaded, ${counts.published} scheduled, ${counts.failed} failed`
  );
}

function printResult(result: WorkflowResult, timeZone: string): void {
  console.log(formatResult(result, timeZone));
  for (const outcome of result.outcomes) {
    const slot = outcome.slot ? formatLocal(new Date(outcome.slot), timeZone) : '-';
    const detail = outcome.success ? 'scheduled' : `${outcome.stage} failed: ${outcome.error ?? 'unknown error'}`;
    console.log(`    ${outcome.postUrl}  ${slot}  ${detail}`);
  }
  for (const error of result.errors) {
    console.log(`    ! ${error}`);
  }
}

function parseLimit(value: string | undefined): number | null {
  if (value === undefined) return 10;
  const limit = Number(value);
  return Number.isInteger(limit) && limit > 0 ? limit : null;
}

/**
 * Run a command and return the process exit code
 */
export async function runCli(
  args: string[],
  createOrchestrator: () => WorkflowControl = createWorkflowOrchestrator
): Promise<number> {
  const [command, arg] = args;

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    console.log(USAGE);
    return command ? 0 : 1;
  }

  const known = ['run', 'list', 'status', 'schedule', 'check'];
  if (!known.includes(command)) {
    console.error(`Unknown command "${command}"\n`);
    console.error(USAGE);
    return 1;
  }

  try {
    const orchestrator = createOrchestrator();
    const timeZone = getAppConfig().schedule.timezone;

    switch (command) {
      case 'run': {
        const results = await orchestrator.run(arg);
        console.log('');
        for (const result of results) {
          printResult(result, timeZone);
        }
        return 0;
      }

      case 'list': {
        const pages = orchestrator.listPages();
        console.log(`${pages.length} page(s):`);
        for (const page of pages) {
          const cap = page.maxTotalPostsToSchedule ? `, max ${page.maxTotalPostsToSchedule} per run` : '';
          console.log(`  ${page.id} (@${page.igAccountName}) -> SocialBu account ${page.socialbuAccountId}`);
          console.log(
            `    sources: ${page.sourceAccounts.map((s) => `@${s}`).join(', ')}; top ${page.topPostsCount} of ${page.maxPostsToFetch}${cap}`
          );
        }
        return 0;
      }

      case 'status': {
        const limit = parseLimit(arg);
        if (limit === null) {
          console.error(`Invalid limit "${arg}"`);
          return 1;
        }
        const results = await orchestrator.getRecentResults(limit);
        if (results.length === 0) {
          console.log('No runs recorded yet');
          return 0;
        }
        for (const result of results) {
          console.log(formatResult(result, timeZone));
        }
        return 0;
      }

      case 'schedule': {
        const info = orchestrator.getScheduleInfo();
        console.log(`Timezone: ${info.timezone}`);
        console.log(`Strategic times: ${info.strategicTimes.join(', ')}`);
        console.log(`Next available slot: ${formatLocal(new Date(info.nextAvailableSlot), info.timezone)}`);
        console.log(`Reserved slots: ${info.reservedSlots.length}`);
        for (const slot of info.reservedSlots) {
          console.log(`  ${formatLocal(new Date(slot), info.timezone)}`);
        }
        return 0;
      }

      case 'check': {
        orchestrator.assertRunnable();
        const accounts = await orchestrator.checkConnection();
        console.log(`SocialBu connected: ${accounts.length} account(s)`);
        for (const account of accounts) {
          console.log(`  ${account.id}  ${account.name} (${account.type})`);
        }
        return 0;
      }

      default:
        return 1;
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
    } else {
      console.error(`Error: ${errorMessage(error)}`);
    }
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      closeDb();
      process.exit(code);
    })
    .catch((error: unknown) => {
      console.error(error);
      closeDb();
      process.exit(1);
    });
}
