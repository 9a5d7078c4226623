import { parseArgs } from 'node:util';

import type { HeaderRecord } from './services/transfer/types.js';

export interface CliValues {
  readonly url: string | undefined;
  readonly method: string;
  readonly headers: HeaderRecord;
  readonly data: string | undefined;
  readonly bucket: string;
  readonly trace: boolean;
  readonly debugHttp: boolean;
  readonly stats: boolean;
  readonly help: boolean;
  readonly version: boolean;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

export type CliParseResult = CliParseSuccess | CliParseFailure;

const usageLines = [
  'Instrumented HTTP transfer client',
  '',
  'Usage:',
  '  transfer-meter [options] <url>',
  '',
  'Options:',
  '  --method, -X <method>   HTTP method (default GET).',
  '  --header, -H <header>   Request header "Name: value"; repeatable.',
  '  --data, -d <body>       Request body.',
  '  --bucket, -b <key>      Statistics bucket (default "cli").',
  '  --trace                 Dump request and response heads to stderr.',
  '  --debug-http            Do not redact Basic credentials in traces.',
  '  --stats                 Write transfer statistics to the log directory.',
  '  --help, -h              Show this help message.',
  '  --version, -v           Show client version.',
  '',
] as const;

const optionSchema = {
  method: { type: 'string', short: 'X', default: 'GET' },
  header: { type: 'string', short: 'H', multiple: true },
  data: { type: 'string', short: 'd' },
  bucket: { type: 'string', short: 'b', default: 'cli' },
  trace: { type: 'boolean', default: false },
  'debug-http': { type: 'boolean', default: false },
  stats: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

export function parseHeaderArg(raw: string): [string, string] {
  const separator = raw.indexOf(':');
  if (separator <= 0) {
    throw new Error(`Invalid header "${raw}": expected "Name: value"`);
  }
  return [raw.slice(0, separator).trim(), raw.slice(separator + 1).trim()];
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  try {
    const { values, positionals } = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: true,
    });

    if (positionals.length > 1) {
      return { ok: false, message: 'Expected a single URL argument' };
    }

    return {
      ok: true,
      values: {
        url: positionals[0],
        method: (values.method ?? 'GET').toUpperCase(),
        headers: Object.fromEntries(
          (values.header ?? []).map(parseHeaderArg)
        ),
        data: values.data,
        bucket: values.bucket ?? 'cli',
        trace: values.trace ?? false,
        debugHttp: values['debug-http'] ?? false,
        stats: values.stats ?? false,
        help: values.help ?? false,
        version: values.version ?? false,
      },
    };
  } catch (error: unknown) {
    return {
      ok: false,
      message: toErrorMessage(error),
    };
  }
}
