/**
 * Terminal review session
 *
 * Usage:
 *   npx tsx scripts/review-session.ts                 # write the pre-filled draft
 *   npx tsx scripts/review-session.ts --generate      # send the edited draft to the model
 *
 * Options:
 *   -d, --draft <file>    draft path (default: review-draft.md)
 *   -m, --minutes <n>     look-back window for the pre-fill (default: 1440)
 *
 * Requirements:
 *   - WANIKANI_API_TOKEN for the pre-fill
 *   - GROQ_API_KEY (REVIEW_MODEL_SPEED=fast) or DEEPINFRA_API_KEY (slow) for --generate
 */

import 'dotenv/config';
import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { isVocabError } from '../lib/errors';
import { createGenerationSource } from '../lib/generation';
import { createModelClient, getGenerationDefaults } from '../lib/model-config';
import {
  SESSION_LOOKBACK_MINUTES,
  buildDraft,
  buildVocabLinks,
  composeReviewPrompt,
  loadSessionVocab,
} from '../lib/review-session';
import { StreamMultiplexer } from '../lib/stream-multiplexer';
import { TerminalView } from '../lib/terminal-view';
import { WaniKaniClient, resolveApiToken } from '../lib/wanikani-client';

async function prepareDraft(path: string, minutes: number): Promise<void> {
  let vocab: string[] = [];
  try {
    const client = new WaniKaniClient({ token: resolveApiToken() });
    ({ vocab } = await loadSessionVocab(client, minutes));
  } catch (error) {
    // Missing token: start from an empty draft like any other aggregation failure.
    console.error('[review/session] vocab-unavailable', { error: isVocabError(error) ? error.message : error });
  }

  if (vocab.length > 0) {
    console.log(`Vocab links:\n${buildVocabLinks(vocab)}\n`);
  }
  await writeFile(path, buildDraft(vocab), 'utf8');
  console.log(`Draft with ${vocab.length} words written to ${path}. Add your sentences, then run with --generate.`);
}

async function generate(path: string): Promise<void> {
  const draft = await readFile(path, 'utf8');
  const prompt = composeReviewPrompt(draft);
  if (prompt === null) {
    console.error(`Draft ${path} is empty; nothing to review.`);
    process.exitCode = 1;
    return;
  }

  const { client, model, provider } = createModelClient();
  const { temperature, maxOutputTokens } = getGenerationDefaults();
  const source = createGenerationSource(client);
  const view = new TerminalView(process.stderr, process.stdout, process.stderr.isTTY === true);
  const multiplexer = new StreamMultiplexer(view.handlers);

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const t0 = Date.now();
  console.log('[review/stream] request-start', { provider, model, promptLen: prompt.length });
  const fragments = source.streamFragments({ model, prompt, temperature, maxOutputTokens }, controller.signal);
  for await (const increment of multiplexer.run(fragments)) {
    view.showAnswer(increment);
  }
  process.stdout.write('\n');
  console.log('[review/stream] done', {
    dt: Date.now() - t0,
    answerLen: multiplexer.answer.length,
    thoughtLen: multiplexer.thoughts.length,
  });
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      draft: { type: 'string', short: 'd', default: 'review-draft.md' },
      minutes: { type: 'string', short: 'm', default: String(SESSION_LOOKBACK_MINUTES) },
      generate: { type: 'boolean', short: 'g', default: false },
    },
  });
  const path = values.draft ?? 'review-draft.md';

  if (values.generate) {
    await generate(path);
    return;
  }
  const minutes = Number(values.minutes);
  if (!Number.isInteger(minutes) || minutes < 0) {
    console.error(`--minutes must be a non-negative integer, got "${values.minutes}"`);
    process.exitCode = 2;
    return;
  }
  await prepareDraft(path, minutes);
}

main().catch((error: unknown) => {
  console.error('[review/session] failed', isVocabError(error) ? error.message : error);
  process.exitCode = 1;
});
