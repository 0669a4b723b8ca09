/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Shared fixtures for unit tests: temp XML files and a logger that records instead of printing.
*/

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { LogLevel, Logger } from '../common/logger';
import type { XmlEvent, XmlEventKind } from '../parser/types';

export interface LogRecord {
  level: Exclude<LogLevel, 'silent'>;
  context: string | undefined;
  message: string;
  attributes: unknown[];
}

export class RecordingLogger implements Logger {
  private context: string | undefined;

  constructor(readonly records: LogRecord[] = []) {
    this.context = undefined;
  }

  clone(): RecordingLogger {
    return new RecordingLogger(this.records);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  trace(message: string, ...attributes: unknown[]): void {
    this.record('trace', message, attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.record('debug', message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    this.record('info', message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.record('warn', message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    this.record('error', message, attributes);
  }

  at(level: LogRecord['level']): LogRecord[] {
    return this.records.filter((r) => r.level === level);
  }

  private record(level: LogRecord['level'], message: string, attributes: unknown[]): void {
    this.records.push({ level, context: this.context, message, attributes });
  }
}

/** A temp directory created on first write and removed by `cleanup()`. */
export class TempFiles {
  private dir: string | undefined;

  get root(): string {
    this.dir ??= fs.mkdtempSync(path.join(os.tmpdir(), 'xml-events-'));
    return this.dir;
  }

  write(name: string, content: string | Uint8Array): string {
    const filePath = path.join(this.root, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  cleanup(): void {
    if (this.dir) fs.rmSync(this.dir, { recursive: true, force: true });
    this.dir = undefined;
  }
}

export function pairs(events: Iterable<XmlEvent>): Array<[XmlEventKind, string]> {
  const out: Array<[XmlEventKind, string]> = [];
  for (const event of events) out.push([event.kind, event.value]);
  return out;
}

export function ev(index: number, kind: XmlEventKind, value: string): XmlEvent {
  return { index, kind, value };
}
