import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { initCommand } from '../commands/init';
import { run } from '../index';
import type { CLIOptions } from '../index';

const baseOptions: CLIOptions = {
  configPath: null,
  format: 'text',
};

describe('initCommand', () => {
  let originalCwd: string;
  let tempDir: string;

  beforeEach(() => {
    originalCwd = process.cwd();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gdfmt-init-test-'));
    process.chdir(tempDir);
  });

  afterEach(() => {
    process.chdir(originalCwd);
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('writes the default configuration', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(initCommand(baseOptions, [])).toBe(0);

    const written = JSON.parse(fs.readFileSync('gdfmt.json', 'utf-8'));
    expect(written.formatter).toEqual({ indentStyle: 'tabs', indentSize: 4, reorder: false, safe: false });
    expect(written.engine.kind).toBe('topiary');
  });

  it('keeps an existing file without --force', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    fs.writeFileSync('gdfmt.json', '{"engine":{"kind":"none"}}');

    expect(initCommand(baseOptions, [])).toBe(0);
    expect(fs.readFileSync('gdfmt.json', 'utf-8')).toBe('{"engine":{"kind":"none"}}');
  });

  it('overwrites with --force', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    fs.writeFileSync('gdfmt.json', '{}');

    initCommand(baseOptions, ['--force']);
    expect(JSON.parse(fs.readFileSync('gdfmt.json', 'utf-8')).formatter.indentSize).toBe(4);
  });

  it('is reachable through run', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    expect(await run(['init', '--config', 'conf/gdfmt.json'])).toBe(0);
    expect(fs.existsSync(path.join('conf', 'gdfmt.json'))).toBe(true);
  });
});

describe('run', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the version', async () => {
    const logs: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((msg: string) => {
      logs.push(msg);
    });
    expect(await run(['--version'])).toBe(0);
    expect(logs).toEqual(['gdfmt v0.1.0']);
  });

  it('rejects an unknown output format', async () => {
    await expect(run(['--format', 'xml'])).rejects.toThrow('Invalid --format value: xml. Use text or json.');
  });
});
