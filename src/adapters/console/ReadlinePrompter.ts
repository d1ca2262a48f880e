import readline from 'readline';
import { Prompter } from '../../core/services/Prompter';

// Every line readline emits is queued; ask() takes from the queue before waiting for input.
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface;
  private closed = false;
  private lines: string[] = [];
  private pending?: (answer: string | null) => void;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on('line', (line) => {
      const resolve = this.pending;
      if (resolve) {
        this.pending = undefined;
        resolve(line);
      } else {
        this.lines.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      const resolve = this.pending;
      this.pending = undefined;
      resolve?.(null);
    });
    this.rl.on('SIGINT', () => this.rl.close());
  }

  ask(question: string): Promise<string | null> {
    this.output.write(question);

    const buffered = this.lines.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.pending = resolve;
    });
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}
