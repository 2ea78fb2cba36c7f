import { ConfigurationError, errorMessage } from '../lib/errors';
import type { PageConfig } from '../lib/types';
import type { WorkflowOrchestrator } from './workflow';

export type WorkflowControl = Pick<
  WorkflowOrchestrator,
  | 'isRunning'
  | 'assertRunnable'
  | 'run'
  | 'listPages'
  | 'getPage'
  | 'getRecentResults'
  | 'getScheduleInfo'
  | 'checkConnection'
>;

export interface ApiReply {
  status: number;
  body: Record<string, unknown>;
}

export interface ApiDeps {
  orchestrator: WorkflowControl;
  countProcessed: (pageId: string) => number;
  now?: () => number;
}

const DEFAULT_RUNS_LIMIT = 10;
const MAX_RUNS_LIMIT = 100;

/**
 * HTTP route logic, independent of the web framework
 */
export function createApiHandlers(deps: ApiDeps) {
  const { orchestrator } = deps;
  const now = deps.now ?? Date.now;

  async function health(): Promise<ApiReply> {
    try {
      const accounts = await orchestrator.checkConnection();
      return {
        status: 200,
        body: {
          status: 'ok',
          timestamp: now(),
          running: orchestrator.isRunning,
          socialbu: { connected: true, accounts: accounts.length },
        },
      };
    } catch (error) {
      return {
        status: 503,
        body: {
          status: 'degraded',
          timestamp: now(),
          running: orchestrator.isRunning,
          socialbu: { connected: false, error: errorMessage(error) },
        },
      };
    }
  }

  function listPages(): ApiReply {
    const pages = orchestrator.listPages().map((page) => ({
      id: page.id,
      igAccountName: page.igAccountName,
      sourceAccounts: page.sourceAccounts,
      maxPostsToFetch: page.maxPostsToFetch,
      topPostsCount: page.topPostsCount,
      maxTotalPostsToSchedule: page.maxTotalPostsToSchedule ?? null,
      socialbuAccountId: page.socialbuAccountId,
      processedPosts: deps.countProcessed(page.id),
    }));
    return { status: 200, body: { count: pages.length, pages } };
  }

  async function recentRuns(limitParam?: unknown): Promise<ApiReply> {
    let limit = DEFAULT_RUNS_LIMIT;
    if (limitParam !== undefined) {
      const parsed = typeof limitParam === 'string' ? Number(limitParam) : NaN;
      if (!Number.isInteger(parsed) || parsed < 1) {
        return { status: 400, body: { error: 'limit must be a positive integer' } };
      }
      limit = Math.min(parsed, MAX_RUNS_LIMIT);
    }

    try {
      const runs = await orchestrator.getRecentResults(limit);
      return { status: 200, body: { count: runs.length, runs } };
    } catch (error) {
      return { status: 500, body: { error: errorMessage(error) } };
    }
  }

  function schedule(): ApiReply {
    try {
      return { status: 200, body: { ...orchestrator.getScheduleInfo() } };
    } catch (error) {
      return { status: 500, body: { error: errorMessage(error) } };
    }
  }

  /**
   * Start a run in the background
   */
  function startRun(pageId?: string): ApiReply {
    if (pageId !== undefined && !orchestrator.getPage(pageId)) {
      return { status: 404, body: { error: `Unknown page "${pageId}"` } };
    }

    let pages: PageConfig[];
    try {
      pages = orchestrator.assertRunnable(pageId);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return { status: 500, body: { error: error.message } };
      }
      throw error;
    }

    if (orchestrator.isRunning) {
      return { status: 409, body: { error: 'A workflow run is already in progress' } };
    }

    orchestrator.run(pageId).catch((error: unknown) => {
      console.error('[server] Run failed:', errorMessage(error));
    });

    return { status: 202, body: { status: 'run_started', pages: pages.map((page) => page.id) } };
  }

  return { health, listPages, recentRuns, schedule, startRun };
}
