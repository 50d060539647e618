import { randomUUID } from 'node:crypto';
import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

export type OutcomeKind = 'decode_failure' | 'audit';

export interface DecodeOutcome {
  kind: OutcomeKind;
  tag: string;
  prompt: string;
  response: string;
}

export interface DecodeOutcomeSink {
  record(outcome: DecodeOutcome): Promise<void>;
}

/** Appends each outcome to `<dir>/<uuid>.txt`. */
export class FileOutcomeSink implements DecodeOutcomeSink {
  private readonly directory: string;

  private readonly generateId: () => string;

  constructor(directory: string, generateId: () => string = () => randomUUID().replace(/-/g, '')) {
    this.directory = directory;
    this.generateId = generateId;
  }

  async record(outcome: DecodeOutcome): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const file = path.join(this.directory, `${this.generateId()}.txt`);
    const body = [`[${outcome.kind}] ${outcome.tag}`, outcome.prompt, outcome.response].join('\n');
    await appendFile(file, `${body}\n\n`, 'utf-8');
  }
}

export class MemoryOutcomeSink implements DecodeOutcomeSink {
  readonly outcomes: DecodeOutcome[] = [];

  async record(outcome: DecodeOutcome): Promise<void> {
    this.outcomes.push(outcome);
  }
}
