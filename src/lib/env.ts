/**
 * Environment configuration for the reposting workflow
 */

export interface Env {
  // Server config
  PORT: number;

  // Apify (competitor scraping). Empty token means mock mode.
  APIFY_API_TOKEN: string;
  APIFY_ACTOR_ID: string;
  APIFY_TIMEOUT_MS: number;

  // SocialBu (upload + scheduling)
  SOCIALBU_API_TOKEN: string;
  SOCIALBU_BASE_URL: string;
  SOCIALBU_TIMEOUT_MS: number;

  // Telegram Bot (run summaries, optional)
  TELEGRAM_BOT_TOKEN: string;
  TELEGRAM_CHAT_ID: string;

  // Storage
  DB_PATH: string;
  RESULTS_PATH: string;
  PAGES_PATH: string;

  // Scheduled runs
  WORKFLOW_CRON: string;

  // Environment info
  ENVIRONMENT?: 'development' | 'preview' | 'production';
}

const ENVIRONMENTS = ['development', 'preview', 'production'] as const;

function parseEnvironment(value: string | undefined): Env['ENVIRONMENT'] {
  return ENVIRONMENTS.find((e) => e === value) ?? 'development';
}

/**
 * Load environment from process.env
 */
export function loadEnv(): Env {
  return {
    PORT: parseInt(process.env.PORT || '3000', 10),

    APIFY_API_TOKEN: process.env.APIFY_API_TOKEN || '',
    APIFY_ACTOR_ID: process.env.APIFY_ACTOR_ID || 'apify/instagram-post-scraper',
    APIFY_TIMEOUT_MS: parseInt(process.env.APIFY_TIMEOUT_MS || '300000', 10),

    SOCIALBU_API_TOKEN: process.env.SOCIALBU_API_TOKEN || '',
    SOCIALBU_BASE_URL: process.env.SOCIALBU_BASE_URL || 'https://socialbu.com/api/v1',
    SOCIALBU_TIMEOUT_MS: parseInt(process.env.SOCIALBU_TIMEOUT_MS || '30000', 10),

    TELEGRAM_BOT_TOKEN: process.env.TELEGRAM_BOT_TOKEN || '',
    TELEGRAM_CHAT_ID: process.env.TELEGRAM_CHAT_ID || '',

    DB_PATH: process.env.DB_PATH || 'data/reposter.db',
    RESULTS_PATH: process.env.RESULTS_PATH || 'data/workflow_results.json',
    PAGES_PATH: process.env.PAGES_PATH || 'config/pages.json',

    WORKFLOW_CRON: process.env.WORKFLOW_CRON || '0 * * * *',

    ENVIRONMENT: parseEnvironment(process.env.ENVIRONMENT),
  };
}

/**
 * Check if required environment variables are set
 * Apify is optional - without it the workflow runs on mock data
 */
export function validateEnv(env: Env): { valid: boolean; missing: string[] } {
  const required: Array<keyof Env> = ['SOCIALBU_API_TOKEN'];

  const missing = required.filter((key) => !env[key]);

  return {
    valid: missing.length === 0,
    missing,
  };
}

// Singleton instance
let envInstance: Env | null = null;

/**
 * Get the environment configuration (loads once)
 */
export function getEnv(): Env {
  if (!envInstance) {
    envInstance = loadEnv();
  }
  return envInstance;
}
