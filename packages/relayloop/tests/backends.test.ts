/**
 * Backend tests. Process tests spawn the running Node binary with inline
 * scripts so no agent CLI is needed.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { spawnProcess, toAgentResult } from '../src/cli/lib/loop/backends/backend.js';
import { ChatBackend } from '../src/cli/lib/loop/backends/chat.js';
import { SubprocessBackend } from '../src/cli/lib/loop/backends/subprocess.js';
import { createAgentBackend } from '../src/cli/lib/loop/backends/detect.js';
import { parseRelayConfig } from '../src/lib/config.js';
import { makeTempDir } from './support.js';

describe('ChatBackend.buildArgs', () => {
  it('runs non-interactively with the trusted tool list', () => {
    const backend = new ChatBackend({ path: '/x/agent', trustTools: 'read,write', trustAllTools: false });
    expect(backend.buildArgs('do the step', false)).toEqual([
      'chat',
      '--no-interactive',
      '--trust-tools',
      'read,write',
      'do the step',
    ]);
  });

  it('drops --no-interactive for an interactive attempt', () => {
    const backend = new ChatBackend({
      path: '/x/agent',
      trustTools: 'read',
      trustAllTools: true,
      profile: 'dev',
    });
    expect(backend.buildArgs('do the step', true)).toEqual([
      'chat',
      '--trust-all-tools',
      '--agent',
      'dev',
      'do the step',
    ]);
  });
});

describe('SubprocessBackend.buildCommand', () => {
  it('appends the prompt as the last argument', () => {
    const backend = new SubprocessBackend('my-agent --fast  --quiet');
    expect(backend.buildCommand('hello there')).toEqual({
      executable: 'my-agent',
      args: ['--fast', '--quiet', 'hello there'],
    });
  });
});

describe('spawnProcess', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports the exit code', async () => {
    const result = await spawnProcess(process.execPath, ['-e', 'process.exit(3)'], {
      cwd: dir,
      timeout: 10_000,
      stdio: 'ignore',
    });
    expect(result.exitCode).toBe(3);
    expect(result.timedOut).toBe(false);
    expect(toAgentResult(result).status).toBe('failure');
  });

  it('maps exit code 0 to success', async () => {
    const result = await spawnProcess(process.execPath, ['-e', 'process.exit(0)'], {
      cwd: dir,
      timeout: 10_000,
      stdio: 'ignore',
    });
    expect(toAgentResult(result)).toMatchObject({ status: 'success', exitCode: 0 });
  });

  it('kills a process that runs past its timeout', async () => {
    const result = await spawnProcess(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], {
      cwd: dir,
      timeout: 300,
      killGraceMs: 200,
      stdio: 'ignore',
    });
    expect(result.timedOut).toBe(true);
    expect(toAgentResult(result).status).toBe('timeout');
  });

  it('resolves with a failure when the executable is missing', async () => {
    const result = await spawnProcess(join(dir, 'no-such-agent'), [], {
      cwd: dir,
      timeout: 10_000,
      stdio: 'ignore',
    });
    expect(result).toMatchObject({ exitCode: 1, timedOut: false });
  });

  it('passes the role to subprocess agents', async () => {
    const backend = new SubprocessBackend(
      `${process.execPath} -e process.exit(process.env.RELAYLOOP_ROLE==="worker"?0:4)`,
    );
    const worker = await backend.invoke({
      role: 'worker',
      prompt: 'p',
      workdir: dir,
      timeout: 10_000,
      interactive: false,
    });
    const reviewer = await backend.invoke({
      role: 'reviewer',
      prompt: 'p',
      workdir: dir,
      timeout: 10_000,
      interactive: false,
    });
    expect(worker.status).toBe('success');
    expect(reviewer).toMatchObject({ status: 'failure', exitCode: 4 });
  });
});

describe('createAgentBackend', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('requires an agent path for the chat backend', async () => {
    await expect(createAgentBackend(parseRelayConfig({}))).rejects.toThrow(
      'Agent CLI path is required. Use --agent-path <path>',
    );
  });

  it('rejects a missing executable', async () => {
    const path = join(dir, 'agent');
    await expect(createAgentBackend(parseRelayConfig({ agent: { path } }))).rejects.toThrow(
      `Agent CLI not found: ${path}`,
    );
  });

  it('rejects a directory', async () => {
    const path = join(dir, 'agent-dir');
    await mkdir(path);
    await expect(createAgentBackend(parseRelayConfig({ agent: { path } }))).rejects.toThrow(
      `Agent CLI is not a file: ${path}`,
    );
  });

  it('rejects a file without execute permission', async () => {
    const path = join(dir, 'agent');
    await writeFile(path, '#!/bin/sh\n');
    await chmod(path, 0o644);
    await expect(createAgentBackend(parseRelayConfig({ agent: { path } }))).rejects.toThrow(
      `Agent CLI is not executable: ${path}`,
    );
  });

  it('builds a chat backend for an executable path', async () => {
    const path = join(dir, 'agent');
    await writeFile(path, '#!/bin/sh\n');
    await chmod(path, 0o755);
    const backend = await createAgentBackend(parseRelayConfig({ agent: { path } }));
    expect(backend).toBeInstanceOf(ChatBackend);
  });

  it('requires a command for the subprocess backend', async () => {
    await expect(
      createAgentBackend(parseRelayConfig({ agent: { backend: 'subprocess' } })),
    ).rejects.toThrow('Subprocess backend requires agent.command in config');

    const backend = await createAgentBackend(
      parseRelayConfig({ agent: { backend: 'subprocess', command: 'my-agent --fast' } }),
    );
    expect(backend.name).toBe('subprocess');
  });
});
