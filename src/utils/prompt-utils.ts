import * as readline from 'readline';

export interface ConfirmOptions {
  defaultYes?: boolean;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Interpret a yes/no answer; an empty answer takes the default
 */
export function parseConfirmAnswer(answer: string, defaultYes: boolean): boolean {
  const input = answer.trim().toLowerCase();
  if (input === '') return defaultYes;
  return input === 'y' || input === 'yes';
}

/**
 * Prompt for yes/no confirmation on the terminal
 * Resolves with the default when the input ends without an answer.
 */
export function confirm(question: string, options: ConfirmOptions = {}): Promise<boolean> {
  const defaultYes = options.defaultYes ?? true;
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
  });

  const suffix = defaultYes ? '[Y/n]' : '[y/N]';

  return new Promise((resolve) => {
    let answered = false;
    rl.on('close', () => {
      if (!answered) resolve(defaultYes);
    });
    rl.question(`${question} ${suffix}: `, (answer) => {
      answered = true;
      rl.close();
      resolve(parseConfirmAnswer(answer, defaultYes));
    });
  });
}
