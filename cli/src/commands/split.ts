/**
 * list-splitter split — split a PDF into one PDF per key, packed as a ZIP.
 *
 * Usage:
 *   list-splitter split calls.pdf --tool call-list
 *   list-splitter split groups.pdf -t gl --out-dir ./out
 *   list-splitter call-list calls.pdf --dry-run
 *   list-splitter split calls.pdf            # prompts for the tool
 */
import chalk from 'chalk';
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, resolve } from 'node:path';
import { Command } from 'commander';
import prompts from 'prompts';
import { createZipArchive } from '../core/archive/zip.js';
import { resolveOutputPath } from '../core/config.js';
import { openPdf } from '../core/pdf/index.js';
import {
  SplitInputError,
  VARIANTS,
  errorMessage,
  findVariant,
  formatPageLine,
  printSplitHeader,
  printSplitResult,
  splitDocument,
  splitResultJson,
} from '../core/split/index.js';
import type { CreateArchive, OpenDocument, SplitVariant, VariantId } from '../core/split/index.js';
import { splitAction } from './action.js';

export interface SplitCommandOptions {
  tool?: string;
  out?: string;
  outDir?: string;
  dryRun?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/** Collaborators, replaceable in tests. */
export interface SplitCommandDeps {
  openDocument: OpenDocument;
  createArchive: CreateArchive;
  writeArchive: (path: string, bytes: Uint8Array) => void;
  isInteractive: () => boolean;
}

const VALID_TOOLS = Object.keys(VARIANTS).join(', ');

function writeArchiveFile(path: string, bytes: Uint8Array): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, bytes);
}

const DEFAULT_DEPS: SplitCommandDeps = {
  openDocument: openPdf,
  createArchive: createZipArchive,
  writeArchive: writeArchiveFile,
  isInteractive: () => Boolean(process.stdin.isTTY && process.stdout.isTTY),
};

// ── Input ────────────────────────────────────────────────────────

/** Read a PDF from disk. @throws SplitInputError for a missing, non-file or non-.pdf path. */
export function readInputPdf(file: string): Uint8Array {
  const filePath = resolve(file);
  if (!existsSync(filePath) || !statSync(filePath).isFile()) {
    throw new SplitInputError(`File not found: ${file}`);
  }
  if (extname(filePath).toLowerCase() !== '.pdf') {
    throw new SplitInputError(`Only .pdf files can be split (got "${basename(filePath)}")`);
  }
  return new Uint8Array(readFileSync(filePath));
}

/** Resolve --tool, or ask for it when running interactively. */
async function resolveVariant(opts: SplitCommandOptions, deps: SplitCommandDeps): Promise<SplitVariant> {
  if (opts.tool) {
    const variant = findVariant(opts.tool);
    if (!variant) {
      throw new SplitInputError(`Unknown tool "${opts.tool}". Valid: ${VALID_TOOLS}`);
    }
    return variant;
  }

  if (opts.json || !deps.isInteractive()) {
    throw new SplitInputError(`--tool is required (${VALID_TOOLS})`);
  }

  const { tool } = await prompts({
    type: 'select',
    name: 'tool',
    message: 'Select tool',
    choices: Object.values(VARIANTS).map((v) => ({ title: v.title, value: v.id })),
  });
  const variant = typeof tool === 'string' ? findVariant(tool) : undefined;
  if (!variant) {
    throw new SplitInputError('Aborted — no tool selected.');
  }
  return variant;
}

// ── Run ──────────────────────────────────────────────────────────

async function runSplit(file: string, opts: SplitCommandOptions, deps: SplitCommandDeps): Promise<void> {
  const bytes = readInputPdf(file);
  const variant = await resolveVariant(opts, deps);
  const fileName = basename(file);
  const narrate = !opts.json && !opts.quiet;

  const outcome = await splitDocument(bytes, variant, {
    openDocument: deps.openDocument,
    createArchive: deps.createArchive,
    onOpen: (pageCount) => {
      if (!opts.json) printSplitHeader(variant, fileName, pageCount);
    },
    onPage: narrate ? (a) => console.log(formatPageLine(variant, a)) : undefined,
    onTextError: (page, err) => {
      if (!opts.json) {
        process.stderr.write(chalk.yellow(`  Page ${page}: text could not be read (${errorMessage(err)}); treated as blank\n`));
      }
    },
    onCloseError: (err) => {
      process.stderr.write(chalk.yellow(`  Warning: could not close ${fileName} (${errorMessage(err)})\n`));
    },
  });

  let savedTo: string | undefined;
  if (!opts.dryRun) {
    savedTo = resolveOutputPath(variant, opts);
    deps.writeArchive(savedTo, outcome.archive.bytes);
  }

  if (opts.json) {
    console.log(JSON.stringify(splitResultJson(fileName, outcome, savedTo), null, 2));
  } else {
    printSplitResult(variant, outcome, savedTo);
  }
}

// ── Registration ─────────────────────────────────────────────────

function addSplitOptions(cmd: Command): Command {
  return cmd
    .option('-o, --out <path>', 'Archive path (default: <out-dir>/<tool archive name>)')
    .option('--out-dir <dir>', 'Directory for the archive (default: $LIST_SPLITTER_OUT_DIR or cwd)')
    .option('--dry-run', 'Group pages and report only — do not write the archive')
    .option('-q, --quiet', 'Do not print a line per page')
    .option('--json', 'Output as JSON');
}

export function registerSplitCommand(program: Command, overrides: Partial<SplitCommandDeps> = {}): void {
  const deps: SplitCommandDeps = { ...DEFAULT_DEPS, ...overrides };

  // ── list-splitter split ──────────────────────────────────────
  addSplitOptions(
    program
      .command('split <file>')
      .description('Split a PDF into one PDF per key and pack them into a ZIP')
      .option('-t, --tool <tool>', `Splitting tool: ${VALID_TOOLS} (prompts when omitted)`),
  ).action(splitAction<SplitCommandOptions>((file, opts) => runSplit(file, opts, deps)));

  // ── list-splitter call-list / group-list ─────────────────────
  for (const id of Object.keys(VARIANTS) as VariantId[]) {
    const variant = VARIANTS[id];
    addSplitOptions(
      program
        .command(`${id} <file>`)
        .description(`${variant.title}: group pages by ${variant.keyLabel}`),
    ).action(splitAction<SplitCommandOptions>((file, opts) => runSplit(file, { ...opts, tool: id }, deps)));
  }

  // ── list-splitter tools ──────────────────────────────────────
  program
    .command('tools')
    .description('List available splitting tools')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) => {
      const tools = Object.values(VARIANTS);
      if (opts.json) {
        console.log(JSON.stringify(tools.map((v) => ({
          id: v.id,
          title: v.title,
          key: v.keyLabel,
          unmatchedPages: v.policy,
          archive: v.archiveName,
        })), null, 2));
        return;
      }
      for (const v of tools) {
        const policy = v.policy === 'drop' ? 'ignored' : 'attached to the previous group';
        console.log(`${chalk.bold(v.id.padEnd(12))} ${v.title}`);
        console.log(chalk.dim(`${' '.repeat(13)}key: ${v.keyLabel}; unmatched pages ${policy}; archive: ${v.archiveName}`));
      }
    });
}
