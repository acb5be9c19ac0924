import { describe, it, expect, vi, afterEach } from 'vitest';
import { fileURLToPath } from 'url';
import { buildProgram } from '../../packages/archscope-cli/src/cli.js';

const fixture = fileURLToPath(new URL('./fixtures/library', import.meta.url));

afterEach(() => {
  process.exitCode = undefined;
});

function run(...args: string[]): Promise<unknown> {
  return buildProgram().parseAsync(['node', 'archscope', '--dir', fixture, '--json', ...args]);
}

describe('archscope program', () => {
  it('registers every command', () => {
    expect(buildProgram().commands.map((c) => c.name())).toEqual([
      'summary',
      'order',
      'component',
      'module',
      'patterns',
      'doctor',
    ]);
  });

  it('passes the global options to the command', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await run('order');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[0]).toBe(
      JSON.stringify([['library/catalog', 'library/loans'], ['library', 'plugins']], null, 2),
    );
    expect(process.exitCode).toBeUndefined();
  });

  it('sets a failing exit code for an unknown component', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await run('component', 'library.Nope');
    expect(process.exitCode).toBe(1);
  });
});
