import ora, { Ora } from 'ora';
import { logger } from './logger';

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

  update(text: string): void {
    if (this.spinner) {
      this.spinner.text = text;
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
}

export const spinner = new SpinnerManager();
