import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { runCli } from '../cli';

jest.mock('../utils/logger');

const parFixture = path.join(__dirname, '..', 'par', '__tests__', 'fixtures', 'groningen-v4.1.PAR');

function captureIO(): { lines: string[]; io: { out: (line: string) => void } } {
  const lines: string[] = [];
  return { lines, io: { out: line => lines.push(line) } };
}

describe('runCli', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'par-cli-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should print usage and fail without a command', async () => {
    const { lines, io } = captureIO();

    await expect(runCli([], io)).resolves.toBe(1);
    expect(lines[0]).toContain('Usage:');
  });

  it('should print usage for --help', async () => {
    const { lines, io } = captureIO();

    await expect(runCli(['--help'], io)).resolves.toBe(0);
    expect(lines[0]).toContain('par-bids extract <file.PAR>');
  });

  it('should reject unknown commands', async () => {
    const { lines, io } = captureIO();

    await expect(runCli(['convert'], io)).resolves.toBe(1);
    expect(lines[0]).toBe('Unknown command: convert');
  });

  it('should print inferred fields as JSON', async () => {
    const { lines, io } = captureIO();

    await expect(runCli(['extract', parFixture], io)).resolves.toBe(0);

    const output = JSON.parse(lines[0]);
    expect(output.fields.RepetitionTime).toBe(3);
    expect(output.fields.TaskName).toBe('nback');
    expect(output.site.siteLabel).toBe('Groningen');
    expect(output.site.characteristics).toEqual(['sense-acceleration', 'spir-suppression', 'v4.1-format']);
  });

  it('should report an unreadable PAR file', async () => {
    const { lines, io } = captureIO();
    const missing = path.join(dir, 'missing.PAR');

    await expect(runCli(['extract', missing], io)).resolves.toBe(1);
    expect(lines[0]).toBe(`Error: Unable to read PAR header: ${missing} (ENOENT: no such file or directory, open '${missing}')`);
  });

  it('should update a sidecar given on the command line', async () => {
    const { lines, io } = captureIO();
    const sidecar = path.join(dir, 'bold.json');
    await fs.writeFile(sidecar, '{"RepetitionTime": 3}');

    await expect(runCli(['update', parFixture, sidecar], io)).resolves.toBe(0);

    expect(lines[0]).toMatch(new RegExp(`^OK   ${sidecar.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')} updated \\(\\+\\d+, ~0, backup `));
    expect(lines[1]).toMatch(/^1\/1 succeeded, 0 failed/);
    const written = JSON.parse(await fs.readFile(sidecar, 'utf-8'));
    expect(written.PhaseEncodingDirection).toBe('i');
  });

  it('should not write on a dry run', async () => {
    const { lines, io } = captureIO();
    const sidecar = path.join(dir, 'bold.json');
    await fs.writeFile(sidecar, '{}');

    await expect(runCli(['update', parFixture, sidecar, '--dry-run'], io)).resolves.toBe(0);

    expect(lines[0]).toContain('would update');
    await expect(fs.readFile(sidecar, 'utf-8')).resolves.toBe('{}');
  });

  it('should process a pairs file and fail when any pair fails', async () => {
    const { lines, io } = captureIO();
    const good = path.join(dir, 'good.json');
    const pairsFile = path.join(dir, 'pairs.json');
    await fs.writeFile(good, '{}');
    await fs.writeFile(
      pairsFile,
      JSON.stringify([
        { par: parFixture, sidecar: good },
        { par: path.join(dir, 'missing.PAR'), sidecar: good },
      ])
    );

    await expect(runCli(['update', '--pairs', pairsFile], io)).resolves.toBe(1);

    expect(lines[1]).toMatch(/^FAIL .*good\.json \[extract\] Unable to read PAR header/);
    expect(lines[2]).toMatch(/^1\/2 succeeded, 1 failed/);
  });

  it('should reject an invalid pairs file', async () => {
    const { lines, io } = captureIO();
    const pairsFile = path.join(dir, 'pairs.json');
    await fs.writeFile(pairsFile, JSON.stringify([{ par: 'scan.PAR' }]));

    await expect(runCli(['update', '--pairs', pairsFile], io)).resolves.toBe(1);
    expect(lines[0]).toMatch(/^Error: Invalid pairs file /);
  });

  it('should validate the phase fallback option', async () => {
    const { lines, io } = captureIO();

    await expect(runCli(['update', parFixture, 'x.json', '--phase-fallback', 'k'], io)).resolves.toBe(1);
    expect(lines[0]).toBe('Invalid --phase-fallback "k" (expected i, i-, j or j-)');
  });
});
