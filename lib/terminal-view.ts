import type { MultiplexHandlers } from "./stream-multiplexer";

export interface TextSink {
  write(text: string): unknown;
}

const DIM = "\u001b[2m";
const RESET = "\u001b[0m";

/**
 * Terminal stand-in for the thinking panel: thought updates arrive as full text,
 * so only the unseen suffix is written. Folding prints a one-line summary;
 * thoughts arriving after it are still written beneath the marker.
 */
export class TerminalView {
  private printedThoughts = 0;
  private folded = false;

  constructor(
    private readonly thoughtSink: TextSink,
    private readonly answerSink: TextSink,
    private readonly color = true,
  ) {}

  get handlers(): Required<MultiplexHandlers> {
    return {
      onThoughtUpdate: (thoughts) => this.showThoughts(thoughts),
      onFoldThoughts: (thoughts) => this.foldThoughts(thoughts),
    };
  }

  showThoughts(thoughts: string): void {
    const suffix = thoughts.slice(this.printedThoughts);
    if (!suffix) return;
    this.printedThoughts = thoughts.length;
    this.thoughtSink.write(this.color ? `${DIM}${suffix}${RESET}` : suffix);
  }

  foldThoughts(thoughts: string): void {
    if (this.folded) return;
    this.folded = true;
    const lead = this.printedThoughts > 0 ? "\n" : "";
    this.thoughtSink.write(`${lead}[thoughts folded: ${thoughts.length} chars]\n`);
  }

  showAnswer(increment: string): void {
    this.answerSink.write(increment);
  }
}
