import readline from 'readline';
import { IUserInterface } from '../../Application/Interfaces/IUserInterface';

export interface ConsoleUserInterfaceOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  terminal?: boolean;
  /** Ctrl+C at a prompt; defaults to raising SIGINT on this process */
  onInterrupt?: () => void;
}

export class ConsoleUserInterface implements IUserInterface {
  private rl: readline.Interface | null = null;
  private rejectPending: ((error: Error) => void) | null = null;

  constructor(private readonly options: ConsoleUserInterfaceOptions = {}) {}

  // Opened lazily so commands that never prompt do not hold stdin open.
  private get readline(): readline.Interface {
    if (!this.rl) {
      const rl = readline.createInterface({
        input: this.options.input ?? process.stdin,
        output: this.options.output ?? process.stdout,
        terminal: this.options.terminal,
      });
      // In raw mode Ctrl+C arrives as a key, not as a process signal.
      rl.on('SIGINT', () => {
        if (this.options.onInterrupt) {
          this.options.onInterrupt();
        } else {
          process.kill(process.pid, 'SIGINT');
        }
      });
      rl.on('close', () => {
        if (this.rl === rl) this.rl = null;
        this.rejectPending?.(new Error('Input closed before an answer was given'));
        this.rejectPending = null;
      });
      this.rl = rl;
    }
    return this.rl;
  }

  async askQuestion(question: string): Promise<string> {
    const cleanQuestion = question
      .replace(/\n\n/g, '\n')
      .replace(/\n$/, '');

    return new Promise((resolve, reject) => {
      this.rejectPending = reject;
      this.readline.question(`${cleanQuestion} `, (answer) => {
        this.rejectPending = null;
        resolve(answer.trim());
      });
    });
  }

  async showMessage(message: string): Promise<void> {
    console.log(message);
  }

  async showLines(lines: string[]): Promise<void> {
    for (const line of lines) {
      console.log(line);
    }
  }

  async showTable(data: Record<string, string | number>): Promise<void> {
    console.log('\n📋 Run Summary:');
    console.log('─'.repeat(50));

    Object.entries(data).forEach(([key, value]) => {
      console.log(`  ${key}: ${value}`);
    });

    console.log('─'.repeat(50));
  }

  async close(): Promise<void> {
    if (this.rl) {
      this.rl.close();
      this.rl = null;
    }
  }
}
