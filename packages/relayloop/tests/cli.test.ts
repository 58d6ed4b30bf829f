import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { createProgram } from '../src/cli/cli.js';
import { readProblemStatement } from '../src/cli/commands/plan.js';
import { resolveWorkdir } from '../src/cli/lib/run-options.js';
import { makeTempDir, writePlan } from './support.js';

describe('readProblemStatement', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('takes the inline statement', async () => {
    await expect(readProblemStatement({ problem: 'Add greetings' })).resolves.toBe('Add greetings');
  });

  it('reads the statement from a file', async () => {
    const path = join(dir, 'problem.md');
    await writeFile(path, 'Add greetings\n');
    await expect(readProblemStatement({ problemFile: path })).resolves.toBe('Add greetings\n');
  });

  it('rejects missing, conflicting and blank statements', async () => {
    await expect(readProblemStatement({})).rejects.toThrow(
      'A problem statement is required. Use --problem or --problem-file',
    );
    await expect(readProblemStatement({ problem: 'a', problemFile: 'b' })).rejects.toThrow(
      '--problem and --problem-file are mutually exclusive',
    );
    await expect(readProblemStatement({ problem: '   ' })).rejects.toThrow(
      'Problem statement cannot be empty',
    );
  });

  it('rejects an unreadable statement file', async () => {
    const error = await readProblemStatement({ problemFile: join(dir, 'missing.md') }).catch(
      (e: unknown) => e,
    );
    expect(error).toMatchObject({ code: 'E_VALIDATION' });
  });
});

describe('resolveWorkdir', () => {
  it('rejects a directory that does not exist', async () => {
    await expect(resolveWorkdir('/nonexistent/relayloop-workdir')).rejects.toThrow(
      'Working directory not found: /nonexistent/relayloop-workdir',
    );
  });
});

describe('relayloop status', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it('prints the session status as JSON', async () => {
    await writePlan(dir, 'demo', 1);
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createProgram().parseAsync(['node', 'relayloop', '--json', 'status', '--name', 'demo', '--workdir', dir]);

    expect(log).toHaveBeenCalledTimes(1);
    const status: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(status).toMatchObject({
      session: 'demo',
      plan: { state: 'draft_ready', summary: null },
      execution: { steps: [{ stepNum: 1, state: 'initial' }], stepsCompleted: 0 },
    });
    expect(process.exitCode).toBe(0);
  });

  it('reports an invalid session name with exit code 2', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await createProgram().parseAsync([
      'node',
      'relayloop',
      '--no-color',
      'status',
      '--name',
      'bad-name',
      '--workdir',
      dir,
    ]);

    expect(error).toHaveBeenCalledWith(
      'Error [E_VALIDATION]: Invalid session name: "bad-name". Use letters, digits and underscores only.',
    );
    expect(process.exitCode).toBe(2);
  });
});
