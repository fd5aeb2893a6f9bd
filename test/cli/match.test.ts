jest.mock('chalk', () => {
  const chalk = {
    cyan: (value: string) => value,
    white: (...values: string[]) => values.join(' '),
    green: (value: string) => value,
    red: (value: string) => value,
    yellow: (value: string) => value,
    bold: (value: string) => value,
    dim: (value: string) => value,
  };

  return {
    __esModule: true,
    default: chalk,
    ...chalk,
  };
});

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createMatchCommand } from '../../src/cli/commands/match.js';
import { getBundledDataDir } from '../../src/infra/config/config-paths.js';

describe('advisor match', () => {
  const completeAnswers = {
    q1: 'prototype-hardware',
    q2: 'code-backend',
    q3: 'lab-experiments',
    q4: 'architecture',
    q5: 'hands-on',
    q6: 'debug-mechanics',
  };

  let tempDir: string;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let exitSpy: jest.SpyInstance;

  function writeAnswers(content: object): string {
    const file = path.join(tempDir, 'answers.json');
    fs.writeFileSync(file, JSON.stringify(content));
    return file;
  }

  async function runMatch(args: string[]): Promise<void> {
    // commander keeps parsed option values on the instance
    await createMatchCommand().parseAsync([...args, '--data-dir', getBundledDataDir()], { from: 'user' });
  }

  function logged(): string {
    return logSpy.mock.calls.map((call) => call.join(' ')).join('\n');
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'advisor-match-'));
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    exitSpy = jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`process.exit: ${code}`);
    });
  });

  afterEach(() => {
    delete process.env.OPENAI_API_KEY;
    jest.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test('prints the ranked programmes', async () => {
    await runMatch(['--answers', writeAnswers({ answers: completeAnswers }), '--top', '2']);

    const output = logged();
    expect(output).toContain('You are a Builder: you learn by making things and testing them with your own hands.');
    expect(output).toContain('1. Mechanical Engineering — College of Design and Engineering');
    expect(output).toContain('2. Electrical Engineering — College of Design and Engineering');
    expect(output).not.toContain('3. ');
    expect(exitSpy).not.toHaveBeenCalled();
  });

  test('prints the full response as JSON', async () => {
    await runMatch(['--answers', writeAnswers({ answers: completeAnswers }), '--json']);

    const first = logSpy.mock.calls[0]?.[0];
    expect(typeof first).toBe('string');
    const response = JSON.parse(String(first));
    expect(response.profile).toEqual([8, 3, 0, 0, 1, 0, 6]);
    expect(response.matches).toHaveLength(5);
    expect(response.matches[0]).toMatchObject({ itemId: 'mech-eng', rank: 1, score: 98 });
    expect(response.dominance).toEqual({ kind: 'single', trait: 'builder' });
  });

  test('uses the about text from the command line', async () => {
    await runMatch(['--answers', writeAnswers({ answers: completeAnswers }), '--json', '--about', 'robot club']);

    const response = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(response.profile).toEqual([11, 3, 3, 0, 1, 0, 6]);
  });

  test('writes a plain-text export', async () => {
    const exportFile = path.join(tempDir, 'results.txt');

    await runMatch(['--answers', writeAnswers({ answers: completeAnswers }), '--top', '1', '--export', exportFile]);

    expect(fs.readFileSync(exportFile, 'utf-8').split('\n').slice(-3)).toEqual([
      '1. Mechanical Engineering (College of Design and Engineering) - Match: 98%',
      '   why: shares Builder, Systems thinker, Analyst',
      '',
    ]);
    expect(logged()).toContain(`Results written to ${exportFile}`);
  });

  test('adds the AI explanation when an API key is set', async () => {
    process.env.OPENAI_API_KEY = 'test-key';
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(
        new Response(JSON.stringify({ choices: [{ message: { content: 'You build, so build more.' } }] }), {
          status: 200,
        })
      );

    await runMatch(['--answers', writeAnswers({ answers: completeAnswers }), '--top', '1']);

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('🤖 Why these fit (AI)\n');
    expect(logSpy).toHaveBeenCalledWith('You build, so build more.');
  });

  test('skips the AI explanation with --no-explain', async () => {
    process.env.OPENAI_API_KEY = 'test-key';
    const fetchSpy = jest.spyOn(globalThis, 'fetch');

    await runMatch(['--answers', writeAnswers({ answers: completeAnswers }), '--no-explain']);

    expect(fetchSpy).not.toHaveBeenCalled();
    expect(logged()).not.toContain('Why these fit');
  });

  test('reports an export path that cannot be written', async () => {
    const exportFile = path.join(tempDir, 'missing', 'results.txt');

    await expect(
      runMatch(['--answers', writeAnswers({ answers: completeAnswers }), '--export', exportFile])
    ).rejects.toThrow('process.exit: 1');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^✗ \[EXPORT_FAILED\] Could not write .+results\.txt: ENOENT/)
    );
  });

  test('reports missing answers and exits with status 1', async () => {
    const partial: Record<string, string> = { ...completeAnswers };
    delete partial.q6;

    await expect(runMatch(['--answers', writeAnswers({ answers: partial })])).rejects.toThrow('process.exit: 1');
    expect(errorSpy).toHaveBeenCalledWith('✗ [INCOMPLETE_RESPONSE] Missing answers for: q6');
  });

  test('reports an invalid topK', async () => {
    await expect(
      runMatch(['--answers', writeAnswers({ answers: completeAnswers }), '--top', 'lots'])
    ).rejects.toThrow('process.exit: 1');
    expect(errorSpy).toHaveBeenCalledWith(
      '✗ [INVALID_OPTIONS] Invalid options: topK must be a positive integer, got NaN'
    );
  });
});
