/**
 * Dump recently-reviewed vocabulary from WaniKani
 *
 * Usage:
 *   npx tsx scripts/dump-vocab.ts [-k TOKEN] [-m MINUTES] [-o out.txt|out.csv] [-s assignments|reviews]
 *
 * Requirements:
 *   - WANIKANI_API_TOKEN set in environment (or .env), unless -k is given
 */

import 'dotenv/config';
import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { isVocabError } from '../lib/errors';
import { DEFAULT_STRATEGY, isSubjectIdStrategy } from '../lib/subject-ids';
import { aggregateRecentVocab } from '../lib/vocab-aggregator';
import { formatForPath, formatVocabList } from '../lib/vocab-export';
import { WaniKaniClient, resolveApiToken } from '../lib/wanikani-client';

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      'api-token': { type: 'string', short: 'k' },
      minutes: { type: 'string', short: 'm', default: '30' },
      out: { type: 'string', short: 'o' },
      strategy: { type: 'string', short: 's', default: DEFAULT_STRATEGY },
    },
  });

  const minutes = Number(values.minutes);
  if (!Number.isInteger(minutes) || minutes < 0) {
    console.error(`--minutes must be a non-negative integer, got "${values.minutes}"`);
    return 2;
  }
  const strategy = values.strategy ?? DEFAULT_STRATEGY;
  if (!isSubjectIdStrategy(strategy)) {
    console.error(`--strategy must be "assignments" or "reviews", got "${strategy}"`);
    return 2;
  }

  const client = new WaniKaniClient({ token: resolveApiToken(values['api-token']) });
  const vocab = await aggregateRecentVocab(client, minutes, { strategy });

  if (!values.out) {
    process.stdout.write(`${formatVocabList(vocab, 'txt')}\n`);
    return 0;
  }
  await writeFile(values.out, formatVocabList(vocab, formatForPath(values.out)), 'utf8');
  console.error(`Wrote ${vocab.length} vocab => ${values.out}`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(isVocabError(error) ? error.message : error);
    process.exitCode = 1;
  });
