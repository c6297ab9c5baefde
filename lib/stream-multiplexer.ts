/**
 * Stream Multiplexer
 *
 * Splits a generation stream into two channels:
 * - thoughts, pushed to `onThoughtUpdate` as the full text so far (for a live "thinking" panel)
 * - answer text, yielded increment by increment for the primary output
 *
 * The first answer fragment folds the thinking panel via `onFoldThoughts`. Folding is one-way:
 * thoughts arriving afterwards still accumulate and are reported, but never fold again.
 *
 * Use one instance per stream.
 */

import type { GenerationFragment, RenderState } from "@/types";

export interface MultiplexHandlers {
  onThoughtUpdate?: (thoughts: string) => void;
  onFoldThoughts?: (thoughts: string) => void;
}

export type FragmentStream = AsyncIterable<GenerationFragment> | Iterable<GenerationFragment>;

export class StreamMultiplexer {
  private readonly state: RenderState = { answerBuffer: "", thoughtBuffer: "", foldedOnce: false };
  private started = false;

  constructor(private readonly handlers: MultiplexHandlers = {}) {}

  get answer(): string {
    return this.state.answerBuffer;
  }

  get thoughts(): string {
    return this.state.thoughtBuffer;
  }

  get folded(): boolean {
    return this.state.foldedOnce;
  }

  snapshot(): RenderState {
    return { ...this.state };
  }

  /**
   * Feed one fragment; returns the answer text to emit, or null for thoughts and empty fragments.
   */
  push(fragment: GenerationFragment): string | null {
    const { text, isThought } = fragment;
    if (!text) return null;

    if (isThought) {
      this.state.thoughtBuffer += text;
      this.handlers.onThoughtUpdate?.(this.state.thoughtBuffer);
      return null;
    }

    if (!this.state.foldedOnce) {
      this.state.foldedOnce = true;
      this.handlers.onFoldThoughts?.(this.state.thoughtBuffer);
    }
    this.state.answerBuffer += text;
    return text;
  }

  async *run(fragments: FragmentStream): AsyncGenerator<string, RenderState, undefined> {
    if (this.started) {
      throw new Error("StreamMultiplexer instances are single-use; create a new one per stream");
    }
    this.started = true;

    // for-await forwards an early return() to the source, which releases the connection
    for await (const fragment of fragments) {
      const increment = this.push(fragment);
      if (increment !== null) {
        yield increment;
      }
    }
    return this.snapshot();
  }
}

export function multiplex(
  fragments: FragmentStream,
  handlers: MultiplexHandlers = {},
): AsyncGenerator<string, RenderState, undefined> {
  return new StreamMultiplexer(handlers).run(fragments);
}
