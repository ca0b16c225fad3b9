import ora from 'ora';
import { logger } from './logger';

type Ora = ora.Ora;

export interface SpinnerOptions {
  text: string;
  color?: 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';
}

export class SpinnerManager {
  private spinner: Ora | null = null;

  start(options: SpinnerOptions): void {
    if (this.spinner) {
      this.stop();
    }

    this.spinner = ora({
      text: options.text,
      color: options.color || 'cyan',
      isSilent: logger.level === 'silent',
    }).start();
  }

  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    }
  }

  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    }
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * Runs `task` under a spinner, marking it failed if the task throws.
   */
  async wrap<T>(text: string, task: () => Promise<T>, doneText?: string): Promise<T> {
    this.start({ text });
    try {
      const value = await task();
      this.succeed(doneText ?? text);
      return value;
    } catch (error) {
      this.fail(text);
      throw error;
    }
  }
}

export const spinner = new SpinnerManager();
