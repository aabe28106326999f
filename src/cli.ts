#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Infers BIDS fields from Philips PAR headers and merges them into existing
 * JSON sidecars. File pairing is the caller's job: paths are given explicitly.
 */

import fs from 'fs/promises';
import { z } from 'zod';
import { resolveInferenceSettings } from './config/inference';
import { extractFromParFile } from './par';
import { processPairs, PairOutcome } from './pipeline';
import type { InferenceResult } from './types/bids';
import { logger } from './utils/logger';

const USAGE = `
par-bids - infer BIDS fields from Philips PAR headers

Usage:
  par-bids extract <file.PAR>                       Print inferred fields as JSON
  par-bids update <file.PAR> <sidecar.json> [opts]  Merge inferred fields into a sidecar
  par-bids update --pairs <pairs.json> [opts]       Process a list of { "par", "sidecar" } pairs

Options:
  --dry-run                 Report what would change without writing or backing up
  --phase-fallback <dir>    Phase encoding direction when the header has none (i, i-, j, j-)

Every write is preceded by a backup at <sidecar>.backup_<YYYYMMDDHHMMSS>.
`;

const PairsFileSchema = z.array(
  z.object({
    par: z.string().min(1),
    sidecar: z.string().min(1),
  })
);

const PhaseFallbackSchema = z.enum(['i', 'i-', 'j', 'j-']);

export interface CliIO {
  out: (line: string) => void;
}

const defaultIO: CliIO = {
  out: line => console.log(line),
};

function getOption(args: string[], name: string): string | undefined {
  const index = args.findIndex(arg => arg === `--${name}`);
  if (index !== -1 && index + 1 < args.length) {
    return args[index + 1];
  }
  return undefined;
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

/** Arguments that are neither options nor option values */
function positionals(args: string[], optionsWithValues: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (optionsWithValues.includes(arg.slice(2))) i++;
      continue;
    }
    result.push(arg);
  }
  return result;
}

export function serializeInference(result: InferenceResult): object {
  return {
    fields: result.fields,
    site: { ...result.site, characteristics: [...result.site.characteristics].sort() },
    provenance: result.provenance,
  };
}

function describeOutcome(outcome: PairOutcome): string {
  if (outcome.success) {
    const { summary, backupPath, written } = outcome.update;
    const action = written ? 'updated' : 'would update';
    const backup = backupPath ? `, backup ${backupPath}` : '';
    return `OK   ${outcome.sidecarFile} ${action} (+${summary.fieldsAdded.length}, ~${summary.fieldsUpdated.length}${backup})`;
  }
  return `FAIL ${outcome.sidecarFile} [${outcome.stage}] ${outcome.error.message}`;
}

async function runExtract(args: string[], io: CliIO): Promise<number> {
  const [parFile] = positionals(args, []);
  if (!parFile) {
    io.out(USAGE);
    return 1;
  }

  const result = await extractFromParFile(parFile);
  io.out(JSON.stringify(serializeInference(result), null, 2));
  return 0;
}

async function readPairsFile(filePath: string): Promise<Array<{ par: string; sidecar: string }>> {
  const text = await fs.readFile(filePath, 'utf-8');
  const parsed = PairsFileSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error(`Invalid pairs file ${filePath}: ${parsed.error.issues.map(i => i.message).join(', ')}`);
  }
  return parsed.data;
}

async function runUpdate(args: string[], io: CliIO): Promise<number> {
  const phaseOption = getOption(args, 'phase-fallback');
  const phaseFallback = phaseOption === undefined ? undefined : PhaseFallbackSchema.safeParse(phaseOption);
  if (phaseFallback && !phaseFallback.success) {
    io.out(`Invalid --phase-fallback "${phaseOption}" (expected i, i-, j or j-)`);
    return 1;
  }

  const settings = resolveInferenceSettings(
    phaseFallback ? { phaseEncodingFallback: phaseFallback.data } : {}
  );
  const dryRun = hasFlag(args, 'dry-run');

  const pairsFile = getOption(args, 'pairs');
  let pairs: Array<{ par: string; sidecar: string }>;
  if (pairsFile) {
    pairs = await readPairsFile(pairsFile);
  } else {
    const [parFile, sidecarFile] = positionals(args, ['phase-fallback', 'pairs']);
    if (!parFile || !sidecarFile) {
      io.out(USAGE);
      return 1;
    }
    pairs = [{ par: parFile, sidecar: sidecarFile }];
  }

  const summary = await processPairs(pairs, { settings, dryRun });
  for (const outcome of summary.outcomes) {
    io.out(describeOutcome(outcome));
  }
  io.out(
    `${summary.successes}/${summary.pairs} succeeded, ${summary.failures} failed ` +
      `(+${summary.fieldsAdded} added, ~${summary.fieldsUpdated} updated)`
  );

  return summary.failures === 0 ? 0 : 1;
}

export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const [command, ...args] = argv;

  if (!command || command === '--help' || command === '-h') {
    io.out(USAGE);
    return command ? 0 : 1;
  }

  try {
    switch (command) {
      case 'extract':
        return await runExtract(args, io);
      case 'update':
        return await runUpdate(args, io);
      default:
        io.out(`Unknown command: ${command}`);
        io.out(USAGE);
        return 1;
    }
  } catch (error) {
    logger.error({ command, error: error instanceof Error ? error.message : error }, 'Command failed');
    io.out(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error({ error: error instanceof Error ? error.message : error }, 'Unexpected CLI failure');
      process.exitCode = 1;
    });
}
