import { z } from 'zod';
import { getEnv } from '../lib/env';
import { errorMessage } from '../lib/errors';
import type { WorkflowResult } from '../lib/types';

const TELEGRAM_API = 'https://api.telegram.org/bot';

const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

/**
 * Whether run summaries can be sent
 */
export function isTelegramConfigured(): boolean {
  const env = getEnv();
  return Boolean(env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID);
}

/**
 * Send a message to Telegram
 */
async function sendMessage(chatId: string, text: string): Promise<boolean> {
  const env = getEnv();
  const response = await fetch(`${TELEGRAM_API}${env.TELEGRAM_BOT_TOKEN}/sendMessage`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      chat_id: chatId,
      text,
      disable_web_page_preview: true,
    }),
    signal: AbortSignal.timeout(10_000),
  });

  const result = TelegramResponseSchema.safeParse(await response.json().catch(() => null));

  if (!result.success || !result.data.ok) {
    console.error('[telegram] sendMessage failed:', result.success ? result.data.description : response.status);
    return false;
  }

  return true;
}

/**
 * Send a simple notification message. Failures are logged, never thrown.
 */
export async function sendNotification(message: string): Promise<boolean> {
  if (!isTelegramConfigured()) {
    return false;
  }

  const env = getEnv();
  try {
    return await sendMessage(env.TELEGRAM_CHAT_ID, message);
  } catch (error) {
    console.error('[telegram] Notification failed:', errorMessage(error));
    return false;
  }
}

/**
 * One-line summary of a run across pages
 */
export function formatRunSummary(results: WorkflowResult[]): string {
  const published = results.reduce((sum, r) => sum + r.counts.published, 0);
  const failed = results.reduce((sum, r) => sum + r.counts.failed, 0);
  const mock = results.some((r) => r.fetchMode === 'mock') ? ' [mock data]' : '';
  const pages = results.map((r) => `${r.pageId} ${r.counts.published}/${r.counts.published + r.counts.failed}`);

  return `Reposter run: ${published} scheduled, ${failed} failed across ${results.length} page(s)${mock}. ${pages.join(', ')}`;
}
