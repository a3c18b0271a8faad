import process from 'node:process';
import { createInterface } from 'node:readline/promises';

import type { Prompt } from './login.js';

export type TerminalPrompt = {
  readonly ask: Prompt;
  readonly close: () => void;
};

export type TerminalPromptOptions = {
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
};

export function createTerminalPrompt(options: TerminalPromptOptions = {}): TerminalPrompt {
  const rl = createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
  });

  return {
    ask: (question) => rl.question(question),
    close: () => rl.close(),
  };
}
