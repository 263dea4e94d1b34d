import * as readline from 'node:readline/promises';

/**
 * Source of console answers; tests script it
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private readonly rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  async ask(question: string): Promise<string> {
    return (await this.rl.question(question)).trim();
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Comma-separated answer as lowercase, trimmed, non-empty entries
 */
export function parseList(answer: string): string[] {
  return answer
    .split(',')
    .map((a) => a.trim().toLowerCase())
    .filter((a) => a.length > 0);
}
