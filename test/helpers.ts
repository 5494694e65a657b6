/**
 * @fileoverview Shared fixtures: temp project directories and a fake model backend.
 */

import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { CompletionBackend, CompletionRequest } from '../src/completion-backend.js';

export interface TempProject {
  dir: string;
  path(relative: string): string;
  write(relative: string, content: string): string;
  cleanup(): void;
}

export function createTempProject(prefix = 'promptcrafter-test-'): TempProject {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return {
    dir,
    path: (relative) => join(dir, relative),
    write: (relative, content) => {
      const full = join(dir, relative);
      mkdirSync(dirname(full), { recursive: true });
      writeFileSync(full, content, 'utf-8');
      return full;
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/**
 * Backend that answers from a fixed table and records every request.
 */
export class FakeBackend implements CompletionBackend {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly answers: Record<string, string> = {}) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const answer = this.answers[request.prompt];
    if (answer === undefined) {
      throw new Error(`No fake answer for prompt: ${request.prompt}`);
    }
    return answer;
  }
}

export const SAMPLE_TEMPLATE = 'Write a {style} poem about {subject}. Make it {style}.\n';

export const SAMPLE_CONFIG = `model:
  name: test-model
  temperature: 0.5
params:
  - name: style
    prompt: Pick a poetry style.
  - name: subject
    prompt: Pick a subject.
output:
  directory: out
  filename: prompt.txt
`;

export const SAMPLE_ANSWERS: Record<string, string> = {
  'Pick a poetry style.': 'haiku',
  'Pick a subject.': 'autumn rain',
};
