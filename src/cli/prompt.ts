// src/cli/prompt.ts
import * as readline from 'readline';

export interface ConfirmOptions {
  defaultValue?: boolean;
  /** Ask on stderr, leaving stdout to a JSON report */
  toStderr?: boolean;
  /** Called when the prompt is closed with Ctrl+C or end of input */
  onInterrupt?: () => void;
}

export type ConfirmPrompt = (question: string, options?: ConfirmOptions) => Promise<boolean>;

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  errorOutput: NodeJS.WritableStream;
  isInteractive: () => boolean;
}

/** Resolves null when the prompt is closed before an answer arrives. */
function ask(input: NodeJS.ReadableStream, output: NodeJS.WritableStream, question: string): Promise<string | null> {
  const rl = readline.createInterface({ input, output });
  return new Promise(resolve => {
    let answered = false;
    // readline swallows Ctrl+C while it owns the terminal
    rl.on('SIGINT', () => rl.close());
    rl.on('close', () => {
      if (!answered) {
        output.write('\n');
        resolve(null);
      }
    });
    rl.question(question, answer => {
      answered = true;
      resolve(answer.trim());
      rl.close();
    });
  });
}

export function parseAnswer(answer: string, defaultValue: boolean): boolean {
  if (!answer) {
    return defaultValue;
  }
  return ['y', 'yes', 'true', '1'].includes(answer.toLowerCase());
}

export function createConfirm(streams: PromptStreams): ConfirmPrompt {
  return async (question, options = {}) => {
    const defaultValue = options.defaultValue ?? false;

    // Without a terminal there is nobody to answer
    if (!streams.isInteractive()) {
      return defaultValue;
    }

    const hint = defaultValue ? 'Y/n' : 'y/N';
    const output = options.toStderr ? streams.errorOutput : streams.output;
    const answer = await ask(streams.input, output, `${question} [${hint}]: `);

    if (answer === null) {
      options.onInterrupt?.();
      return false;
    }
    return parseAnswer(answer, defaultValue);
  };
}

export const confirm: ConfirmPrompt = createConfirm({
  input: process.stdin,
  output: process.stdout,
  errorOutput: process.stderr,
  isInteractive: () => process.stdin.isTTY === true,
});
