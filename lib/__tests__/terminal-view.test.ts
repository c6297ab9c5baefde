import { describe, expect, it } from 'vitest';
import { multiplex } from '../stream-multiplexer';
import { TerminalView } from '../terminal-view';

function sink() {
  const writes: string[] = [];
  return { writes, write: (text: string) => writes.push(text) };
}

describe('TerminalView', () => {
  it('writes only the unseen part of each thought update', () => {
    const thoughts = sink();
    const view = new TerminalView(thoughts, sink(), false);

    view.showThoughts('The');
    view.showThoughts('The verb');
    view.showThoughts('The verb');

    expect(thoughts.writes).toEqual(['The', ' verb']);
  });

  it('folds once and keeps writing later thoughts under the marker', () => {
    const thoughts = sink();
    const view = new TerminalView(thoughts, sink(), false);

    view.showThoughts('ab');
    view.foldThoughts('ab');
    view.showThoughts('abc');
    view.foldThoughts('abc');

    expect(thoughts.writes).toEqual(['ab', '\n[thoughts folded: 2 chars]\n', 'c']);
  });

  it('dims thoughts when colour is on', () => {
    const thoughts = sink();
    new TerminalView(thoughts, sink()).showThoughts('x');

    expect(thoughts.writes).toEqual(['\u001b[2mx\u001b[0m']);
  });

  it('renders a multiplexed stream on two sinks', async () => {
    const thoughts = sink();
    const answers = sink();
    const view = new TerminalView(thoughts, answers, false);

    for await (const increment of multiplex([
      { text: 'a', isThought: true },
      { text: 'b', isThought: true },
      { text: 'X', isThought: false },
      { text: 'c', isThought: true },
      { text: 'Y', isThought: false },
    ], view.handlers)) {
      view.showAnswer(increment);
    }

    expect(thoughts.writes).toEqual(['a', 'b', '\n[thoughts folded: 2 chars]\n', 'c']);
    expect(answers.writes).toEqual(['X', 'Y']);
  });
});
