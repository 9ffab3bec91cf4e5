// SPDX-License-Identifier: Apache-2.0

import {type ZTreeLogger} from '../../src/core/logging/ztree-logger.js';

/**
 * Keeps what a run shows to the user and logs, so tests can assert on it.
 */
export class RecordingLogger implements ZTreeLogger {
  public readonly shown: string[] = [];
  public readonly lists = new Map<string, string[]>();
  public readonly errors: unknown[] = [];
  public readonly logged: {level: string; message: string}[] = [];
  public level = 'debug';
  public developmentMode = false;

  public setDevMode(developmentMode: boolean): void {
    this.developmentMode = developmentMode;
  }

  public setLevel(logLevel: string): void {
    this.level = logLevel;
  }

  public nextTraceId(): void {}

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    return meta;
  }

  public showUser(message: unknown, ...arguments_: unknown[]): void {
    this.shown.push([message, ...arguments_].map(String).join(' '));
  }

  public showUserError(error: unknown): void {
    this.errors.push(error);
  }

  public error(message: unknown): void {
    this.logged.push({level: 'error', message: String(message)});
  }

  public warn(message: unknown): void {
    this.logged.push({level: 'warn', message: String(message)});
  }

  public info(message: unknown): void {
    this.logged.push({level: 'info', message: String(message)});
  }

  public debug(message: unknown): void {
    this.logged.push({level: 'debug', message: String(message)});
  }

  public showList(title: string, items: string[]): void {
    this.lists.set(title, items);
  }


  public messages(level: string): string[] {
    return this.logged.filter(entry => entry.level === level).map(entry => entry.message);
  }
}
