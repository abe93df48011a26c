import { readFileSync } from 'fs';
import { describe, expect, it } from 'vitest';
import { silentLogger } from '../src/logger';
import { ProcessRunner } from '../src/process/runner';

const NODE = process.execPath;
const SLEEP = 'setTimeout(() => {}, 60000)';

function makeRunner(overrides: { maxConcurrency?: number; maxOutputBytes?: number } = {}) {
  return new ProcessRunner({
    maxConcurrency: overrides.maxConcurrency ?? 4,
    killGraceMs: 500,
    maxOutputBytes: overrides.maxOutputBytes ?? 1024 * 1024,
    logger: silentLogger,
  });
}

/** True while the pid names a live, non-zombie process. */
function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch {
    return false;
  }
  if (process.platform !== 'linux') return true;
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, 'utf8');
    // state is the first field after the parenthesised command name
    return stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3) !== 'Z';
  } catch {
    return false;
  }
}

async function waitUntilGone(pid: number, withinMs = 2000): Promise<boolean> {
  const deadline = Date.now() + withinMs;
  while (Date.now() < deadline) {
    if (!isAlive(pid)) return true;
    await new Promise((resolve) => setTimeout(resolve, 25));
  }
  return !isAlive(pid);
}

describe('ProcessRunner', () => {
  it('delivers stdin and captures stdout of a clean exit', async () => {
    const result = await makeRunner().run({
      executable: NODE,
      args: ['-e', 'process.stdin.pipe(process.stdout)'],
      input: 'hello from stdin',
      timeoutMs: 10_000,
    });

    expect(result).toMatchObject({ status: 'exited', exitCode: 0, stdout: 'hello from stdin' });
  });

  it('reports a non-zero exit with stderr', async () => {
    const result = await makeRunner().run({
      executable: NODE,
      args: ['-e', "process.stderr.write('boom'); process.exit(3)"],
      timeoutMs: 10_000,
    });

    expect(result).toMatchObject({ status: 'exited', exitCode: 3, stderr: 'boom' });
  });

  it('times out a hung process and leaves nothing running', async () => {
    const result = await makeRunner().run({ executable: NODE, args: ['-e', SLEEP], timeoutMs: 300 });

    expect(result.status).toBe('timed_out');
    expect(result.durationMs).toBeLessThan(5_000);
    expect(result.pid).toBeDefined();
    if (result.pid !== undefined) expect(isAlive(result.pid)).toBe(false);
  });

  it('kills processes the child started when it times out', async () => {
    // liveness is read from /proc
    if (process.platform !== 'linux') return;
    const script = [
      "const { spawn } = require('child_process');",
      `const g = spawn(process.execPath, ['-e', ${JSON.stringify(SLEEP)}], { stdio: 'ignore' });`,
      "process.stdout.write(String(g.pid) + '\\n');",
      SLEEP,
    ].join('\n');

    const result = await makeRunner().run({ executable: NODE, args: ['-e', script], timeoutMs: 1_000 });

    expect(result.status).toBe('timed_out');
    const grandchild = Number(result.stdout.trim());
    expect(Number.isInteger(grandchild)).toBe(true);
    expect(await waitUntilGone(grandchild)).toBe(true);
  });

  it('terminates the process when the caller aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 200);

    const result = await makeRunner().run({ executable: NODE, args: ['-e', SLEEP], timeoutMs: 10_000, signal: controller.signal });

    expect(result.status).toBe('cancelled');
    expect(result.durationMs).toBeLessThan(5_000);
  });

  it('never spawns when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await makeRunner().run({ executable: NODE, args: ['-e', SLEEP], timeoutMs: 10_000, signal: controller.signal });

    expect(result.status).toBe('cancelled');
    expect(result.pid).toBeUndefined();
  });

  it('stops a process whose output exceeds the cap', async () => {
    const result = await makeRunner({ maxOutputBytes: 1024 }).run({
      executable: NODE,
      args: ['-e', `process.stdout.write('x'.repeat(100000)); ${SLEEP}`],
      timeoutMs: 10_000,
    });

    expect(result.status).toBe('overflow');
    expect(result.stdout.length).toBeLessThanOrEqual(1024);
  });

  it('reports a missing executable', async () => {
    const result = await makeRunner().run({ executable: '/nonexistent/fable-tool', args: [], timeoutMs: 5_000 });

    expect(result.status).toBe('spawn_failed');
    if (result.status === 'spawn_failed') expect(result.error).toContain('ENOENT');
  });

  it('queues callers beyond the concurrency limit', async () => {
    const runner = makeRunner({ maxConcurrency: 1 });

    const first = runner.run({ executable: NODE, args: ['-e', "setTimeout(() => process.stdout.write('one'), 200)"], timeoutMs: 10_000 });
    const second = runner.run({ executable: NODE, args: ['-e', "process.stdout.write('two')"], timeoutMs: 10_000 });

    expect(runner.running).toBe(1);
    expect(runner.queued).toBe(1);
    await expect(first).resolves.toMatchObject({ status: 'exited', stdout: 'one' });
    await expect(second).resolves.toMatchObject({ status: 'exited', stdout: 'two' });
    expect(runner.running).toBe(0);
  });

  it('counts time spent waiting for a slot against the deadline', async () => {
    const runner = makeRunner({ maxConcurrency: 1 });

    const blocker = runner.run({ executable: NODE, args: ['-e', "setTimeout(() => {}, 1500)"], timeoutMs: 10_000 });
    const waiting = await runner.run({ executable: NODE, args: ['-e', "process.stdout.write('late')"], timeoutMs: 200 });

    expect(waiting.status).toBe('timed_out');
    expect(waiting.pid).toBeUndefined();
    expect(runner.queued).toBe(0);
    await expect(blocker).resolves.toMatchObject({ status: 'exited', exitCode: 0 });
  });
});
