/**
 * Pull-style line reading over a readable stream.
 *
 * readline pushes 'line' events as fast as the input arrives; the wizard asks
 * one question at a time, so lines are queued here and handed out by read().
 */

import * as readline from 'readline';
import { InputReadError } from '../core/errors.js';

export interface LineSource {
  /** Next line without its terminator, or null once the input has ended. */
  read(): Promise<string | null>;
}

interface Waiter {
  resolve: (line: string | null) => void;
  reject: (err: InputReadError) => void;
}

export class LineReader implements LineSource {
  private readonly rl: readline.Interface;
  private readonly buffered: string[] = [];
  private readonly waiters: Waiter[] = [];
  private ended = false;
  private failure: InputReadError | null = null;

  constructor(input: NodeJS.ReadableStream) {
    this.rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

    this.rl.on('line', (line: string) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.resolve(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.rl.on('close', () => {
      this.ended = true;
      this.drain();
    });

    const onError = (err: Error): void => {
      if (!this.failure) {
        this.failure = new InputReadError(`read input: ${err.message}`, undefined, err);
      }
      this.drain();
    };
    input.on('error', onError);
    this.rl.on('error', onError);
  }

  read(): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): void {
    if (!this.ended) {
      this.rl.close();
    }
  }

  private drain(): void {
    // Buffered lines are never pending while waiters exist, so every waiter
    // here is owed either the failure or end-of-input.
    for (const waiter of this.waiters.splice(0)) {
      if (this.failure) {
        waiter.reject(this.failure);
      } else if (this.ended) {
        waiter.resolve(null);
      }
    }
  }
}
