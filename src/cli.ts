import { parseArgs } from 'node:util';

import { config } from './config/index.js';
import { WrapperDecoder } from './services/decoder.js';
import type { LinkDecoder, ResolutionOutcome } from './types/resolution.js';
import { getErrorMessage } from './utils/error-utils.js';

interface CliValues {
  readonly json: boolean;
  readonly probe: boolean;
  readonly help: boolean;
  readonly version: boolean;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
  readonly links: readonly string[];
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

type CliParseResult = CliParseSuccess | CliParseFailure;

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

export interface CliDeps {
  readonly io?: CliIo;
  readonly decoder?: WrapperDecoder;
}

export const EXIT_CODES = {
  OK: 0,
  UNRESOLVED: 1,
  USAGE: 2,
} as const;

const usageLines = [
  'Recover the destination URL behind wrapped news links',
  '',
  'Usage:',
  '  link-unwrap [--json|-j] [--probe|-p] <url...>',
  '',
  'Options:',
  '  --json, -j    Print results as JSON.',
  '  --probe, -p   Only report which encoding each link uses.',
  '  --help, -h    Show this help message.',
  '  --version, -v Show version.',
  '',
] as const;

const optionSchema = {
  json: { type: 'boolean', short: 'j', default: false },
  probe: { type: 'boolean', short: 'p', default: false },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

type ParsedValues = ReturnType<typeof parseArgs>['values'];
type CliFlagKey = keyof CliValues;

function readCliFlag(values: ParsedValues, key: CliFlagKey): boolean {
  return values[key] === true;
}

function buildCliValues(values: ParsedValues): CliValues {
  return {
    json: readCliFlag(values, 'json'),
    probe: readCliFlag(values, 'probe'),
    help: readCliFlag(values, 'help'),
    version: readCliFlag(values, 'version'),
  };
}

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  try {
    const { values, positionals } = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: true,
    });

    const cliValues = buildCliValues(values);
    if (!cliValues.help && !cliValues.version && positionals.length === 0) {
      return { ok: false, message: 'At least one URL is required' };
    }

    return { ok: true, values: cliValues, links: positionals };
  } catch (error: unknown) {
    return {
      ok: false,
      message: getErrorMessage(error),
    };
  }
}

export function formatOutcome(
  link: string,
  outcome: ResolutionOutcome
): string {
  switch (outcome.status) {
    case 'resolved':
      return `resolved\t${link}\t${outcome.url}`;
    case 'blocked':
      return `blocked\t${link}\t${outcome.reason}`;
    case 'failed':
      return `failed\t${link}\t${outcome.message}`;
  }
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

interface LinkResult {
  readonly link: string;
  readonly outcome: ResolutionOutcome;
}

async function decodeAll(
  decoder: LinkDecoder,
  links: readonly string[]
): Promise<LinkResult[]> {
  const results: LinkResult[] = [];
  for (const link of links) {
    results.push({ link, outcome: await decoder.decode(link) });
  }
  return results;
}

export async function runCli(
  args: readonly string[],
  deps: CliDeps = {}
): Promise<number> {
  const io = deps.io ?? defaultIo;
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    io.stderr(`${parsed.message}\n\n${renderCliUsage()}`);
    return EXIT_CODES.USAGE;
  }

  const { values, links } = parsed;
  if (values.help) {
    io.stdout(renderCliUsage());
    return EXIT_CODES.OK;
  }
  if (values.version) {
    io.stdout(`${config.app.version}\n`);
    return EXIT_CODES.OK;
  }

  const decoder = deps.decoder ?? new WrapperDecoder();

  if (values.probe) {
    const variants = links.map((link) => ({
      link,
      variant: decoder.detectVariant(link),
    }));
    io.stdout(
      values.json
        ? `${JSON.stringify(variants, null, 2)}\n`
        : variants
            .map(({ link, variant }) => `${variant}\t${link}\n`)
            .join('')
    );
    return EXIT_CODES.OK;
  }

  const results = await decodeAll(decoder, links);
  io.stdout(
    values.json
      ? `${JSON.stringify(
          results.map(({ link, outcome }) => ({ link, ...outcome })),
          null,
          2
        )}\n`
      : results
          .map(({ link, outcome }) => `${formatOutcome(link, outcome)}\n`)
          .join('')
  );

  return results.every(({ outcome }) => outcome.status === 'resolved')
    ? EXIT_CODES.OK
    : EXIT_CODES.UNRESOLVED;
}
