/**
 * @fileoverview Tests for the CLI commands
 *
 * Runs each command through commander against a temp project. The OpenAI
 * backend is replaced with a fixed-answer fake.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { createProgram } from '../src/cli.js';
import { getStore } from '../src/state-store.js';
import { createTempProject, SAMPLE_CONFIG, SAMPLE_TEMPLATE, type TempProject } from './helpers.js';

vi.mock('../src/completion-backend.js', async () => {
  const { FakeBackend, SAMPLE_ANSWERS } = await import('./helpers.js');
  class OpenAIBackend extends FakeBackend {
    constructor() {
      super(SAMPLE_ANSWERS);
    }
  }
  return { OpenAIBackend };
});

const RENDERED = 'Write a haiku poem about autumn rain. Make it haiku.\n';

describe('CLI commands', () => {
  let project: TempProject;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const run = (...args: string[]) => createProgram().parseAsync(['node', 'promptcrafter', ...args]);
  const projectArgs = () => ['-c', project.path('config.yaml'), '-t', project.path('prompts/template.txt')];
  const logged = () => logSpy.mock.calls.map((call) => String(call[0]));
  const errored = () => errorSpy.mock.calls.map((call) => String(call[0]));

  beforeEach(() => {
    project = createTempProject();
    project.write('config.yaml', SAMPLE_CONFIG);
    project.write('prompts/template.txt', SAMPLE_TEMPLATE);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    getStore().clearRuns();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    project.cleanup();
  });

  describe('inspect', () => {
    it('should list placeholders, model and output', async () => {
      await run('inspect', ...projectArgs());

      expect(logged()).toEqual([
        '\nTemplate placeholders:',
        '  - style',
        '  - subject',
        '\nModel: test-model, temperature 0.5',
        'Param prompts:',
        '  - style: Pick a poetry style.',
        '  - subject: Pick a subject.',
        `\nOutput file: ${project.path('out/prompt.txt')}`,
        '\n✓ Ready to generate',
      ]);
      expect(process.exitCode).toBeUndefined();
    });

    it('should report both sides of a placeholder mismatch', async () => {
      project.write('prompts/template.txt', 'A {style} poem in a {mood} mood.\n');

      await run('i', ...projectArgs());

      expect(errored()).toEqual([
        '✗ Inspection failed: Template and config placeholders do not match',
        '  - Config has no prompt for placeholders: mood',
        '  - Template has no placeholder for params: subject',
      ]);
      expect(process.exitCode).toBe(1);
    });

    it('should report a missing config file', async () => {
      await run('inspect', '-c', project.path('missing.yaml'), '-t', project.path('prompts/template.txt'));

      expect(errored()).toEqual([`✗ Inspection failed: Config file not found: ${project.path('missing.yaml')}`]);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('generate', () => {
    it('should write the rendered prompt and record the run', async () => {
      await run('generate', ...projectArgs());

      const outputFile = project.path('out/prompt.txt');
      expect(readFileSync(outputFile, 'utf-8')).toBe(RENDERED);
      expect(logged()).toContain(`\n✓ Prompt written to ${outputFile}`);

      const [record] = getStore().getRuns();
      expect(record).toMatchObject({
        status: 'completed',
        model: 'test-model',
        outputFile,
        placeholders: ['style', 'subject'],
        cacheHits: 0,
      });
      expect(getStore().getState().lastConfigPath).toBe(project.path('config.yaml'));
    });

    it('should print without writing on a dry run', async () => {
      await run('g', ...projectArgs(), '--dry-run', '--model', 'other-model');

      expect(existsSync(project.path('out/prompt.txt'))).toBe(false);
      const lines = logged();
      expect(lines).toContain(RENDERED);
      expect(lines).toContain('\nDry run: output file not written');
      expect(getStore().getRuns()[0].model).toBe('other-model');
    });

    it('should write to the -o path instead of the config output', async () => {
      const target = project.path('elsewhere/result.txt');

      await run('generate', ...projectArgs(), '-o', target);

      expect(readFileSync(target, 'utf-8')).toBe(RENDERED);
      expect(existsSync(project.path('out/prompt.txt'))).toBe(false);
    });

    it('should show progress for every param', async () => {
      await run('generate', ...projectArgs());

      const lines = logged();
      expect(lines).toContain('→ Generating style...');
      expect(lines).toContain('✓ style: haiku');
      expect(lines).toContain('✓ subject: autumn rain');
    });

    it('should reject a temperature outside 0..2 before generating', async () => {
      const program = createProgram();
      for (const command of program.commands) {
        command.exitOverride().configureOutput({ writeErr: () => {} });
      }

      await expect(
        program.parseAsync(['node', 'promptcrafter', 'generate', ...projectArgs(), '--temperature', '5']),
      ).rejects.toMatchObject({
        code: 'commander.invalidArgument',
        message: expect.stringContaining('Must be between 0 and 2.'),
      });
      expect(getStore().getRuns()).toEqual([]);
      expect(existsSync(project.path('out/prompt.txt'))).toBe(false);
    });

    it('should accept a temperature at the upper bound', async () => {
      await run('generate', ...projectArgs(), '--temperature', '2');

      expect(getStore().getRuns()[0].status).toBe('completed');
    });

    it('should record a failed run and set the exit code', async () => {
      project.write('config.yaml', SAMPLE_CONFIG.replace('Pick a subject.', 'Pick anything.'));

      await run('generate', ...projectArgs());

      expect(errored()).toEqual(['✗ Generation failed: No fake answer for prompt: Pick anything.']);
      expect(process.exitCode).toBe(1);
      expect(getStore().getRuns()[0]).toMatchObject({
        status: 'failed',
        error: 'No fake answer for prompt: Pick anything.',
        outputFile: null,
      });
    });
  });

  describe('schedule', () => {
    it('should run until the run count is reached', async () => {
      await run('schedule', ...projectArgs(), '--every', '1', '--runs', '1');

      const lines = logged();
      expect(lines[0]).toMatch(/^✓ Schedule started: /);
      expect(lines).toContain(`✓ Run 1 completed → ${project.path('out/prompt.txt')}`);
      expect(lines).toContain('  Completed runs: 1');
      expect(readFileSync(project.path('out/prompt.txt'), 'utf-8')).toBe(RENDERED);

      const [record] = getStore().getRuns();
      expect(record.scheduleId).toEqual(expect.any(String));
      expect(process.exitCode).toBeUndefined();
    });

    it('should reject an interval below the minimum', async () => {
      await run('s', ...projectArgs(), '--every', '0');

      expect(errored()).toEqual(['✗ Schedule failed: Interval must be at least 0.1 minutes, got 0']);
      expect(process.exitCode).toBe(1);
      expect(getStore().getRuns()).toEqual([]);
    });

    it('should not start when the project is invalid', async () => {
      project.write('prompts/template.txt', 'Only {style}.\n');

      await run('schedule', ...projectArgs(), '--every', '1');

      expect(errored()[0]).toBe('✗ Schedule failed: Template and config placeholders do not match');
      expect(getStore().getRuns()).toEqual([]);
    });
  });

  describe('history', () => {
    it('should say when there is nothing to show', async () => {
      await run('history');

      expect(logged()).toEqual(['No runs recorded']);
    });

    it('should list recorded runs and clear them', async () => {
      await run('generate', ...projectArgs());
      logSpy.mockClear();

      await run('history', '--limit', '5');
      const lines = logged();
      expect(lines[0]).toBe('\nRecent runs:');
      expect(lines[1]).toContain(`completed  `);
      expect(lines[1]).toContain(`test-model ${project.path('out/prompt.txt')}`);

      logSpy.mockClear();
      await run('h', '--clear');
      expect(logged()).toEqual(['✓ Cleared 1 run(s)']);
      expect(getStore().getRuns()).toEqual([]);
    });
  });
});
