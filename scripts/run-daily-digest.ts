#!/usr/bin/env tsx
/**
 * Run the daily paper digest
 * Ranks the crawler's papers against configured keywords, summarizes, and delivers
 *
 * Usage:
 *   npx tsx scripts/run-daily-digest.ts [--config config.yaml] [--date YYYY-MM-DD]
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

// Load .env.local for local development
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

import { loadSettings } from '../src/config/settings';
import { runDailyDigest } from '../src/lib/pipeline/digest';
import { configureLogger, logger } from '../src/lib/logger';

function parseArgs(args: string[]): { configPath?: string; date?: string } {
  const parsed: { configPath?: string; date?: string } = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--config' && args[i + 1]) {
      parsed.configPath = args[++i];
    } else if (arg === '--date' && args[i + 1]) {
      parsed.date = args[++i];
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (parsed.date && !/^\d{4}-\d{2}-\d{2}$/.test(parsed.date)) {
    throw new Error(`--date must be YYYY-MM-DD, got ${parsed.date}`);
  }

  return parsed;
}

async function main() {
  const { configPath, date } = parseArgs(process.argv.slice(2));
  const settings = loadSettings({ configPath });

  configureLogger({
    level: settings.logLevel,
    file: path.join(settings.logDir, 'paper_digest.log'),
  });

  const result = await runDailyDigest(settings, { date });

  console.log(`\n✓ Digest for ${result.date} complete`);
  console.log(`  Relevant papers: ${result.rankedCount}`);
  console.log(`  Emailed: ${result.delivered ? 'yes' : 'no'}`);
  if (result.savedTo) {
    console.log(`  Saved to: ${result.savedTo}`);
  }
}

main().catch((error) => {
  logger.error('[DIGEST-SCRIPT] Fatal error', error);
  console.error('\n✗ Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
