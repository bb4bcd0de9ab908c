import { parseArgs } from 'util';
import { loadConfig, type TemplateConfig } from '../config';
import { TemplateEngineError, describeError } from '../errors';
import { readMappingFile } from '../engine/mappingFile';
import { withTemplateEditor, type TemplateEditorOptions } from '../engine/templateEditor';
import { formatFieldListing, listPdfFields, setPdfFields } from '../service/fieldService';
import { configureLogging } from '../utils/logger';
import type { ApplyReport, ColorFilter } from '../types';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: pdf-template <command> [options]

Commands:
  generate <pdf> <out.yaml> [--filter-color red]  Write a mapping file of the document's fields
  replace <pdf> <mapping.yaml>                    Apply the values of a mapping file
  clear <pdf> [--pattern <regex>]                 Remove leftover placeholders
  list <pdf>                                      Print red fields as name: "text"
  set <pdf> <name=value>...                       Set fields by alias or key`;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

class UsageError extends Error {}

interface CommandContext {
  args: string[];
  options: { 'filter-color'?: string; pattern?: string };
  config: TemplateConfig;
  io: CliIO;
  editor: TemplateEditorOptions;
}

function expectArgs(args: string[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    throw new UsageError(`Expected ${min === max ? min : `${min}-${max}`} arguments, got ${args.length}`);
  }
}

function parseFilter(value: string | undefined): ColorFilter | undefined {
  if (value === undefined) return undefined;
  if (value !== 'red') throw new UsageError(`Unsupported filter color: ${value}`);
  return value;
}

function parseAssignments(pairs: string[]): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) throw new UsageError(`Expected name=value, got: ${pair}`);
    fields[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return fields;
}

function reportOutcomes(report: ApplyReport, io: CliIO): number {
  for (const outcome of report.outcomes) {
    if (outcome.status === 'skipped') {
      io.out(`skipped ${outcome.key}: ${outcome.reason}${outcome.detail ? ` (${outcome.detail})` : ''}`);
    } else if (outcome.usedFallback) {
      io.out(`fallback font used for ${outcome.key}`);
    }
  }
  io.out(`Replaced ${report.applied} of ${report.requested} fields`);
  return report.applied > 0 ? EXIT_OK : EXIT_FAILURE;
}

const commands: Record<string, (ctx: CommandContext) => Promise<number>> = {
  async generate({ args, options, io, editor }) {
    expectArgs(args, 2);
    const [pdf, out] = args;
    const colorFilter = parseFilter(options['filter-color']);
    const runs = await withTemplateEditor(
      pdf,
      (e) => e.findFields({ colorFilter, sortByPosition: true, mappingFile: out }),
      editor,
    );
    if (runs.length === 0) {
      io.out('No template fields found');
      return EXIT_OK;
    }
    io.out(`Found ${runs.length} fields, mapping saved to ${out}`);
    return EXIT_OK;
  },

  async replace({ args, config, io, editor }) {
    expectArgs(args, 2);
    const [pdf, mapping] = args;
    const request = await readMappingFile(mapping);
    const report = await withTemplateEditor(pdf, (e) => e.replaceFields(request, config.textColor), editor);
    return reportOutcomes(report, io);
  },

  async clear({ args, options, config, io, editor }) {
    expectArgs(args, 1);
    const pattern = options.pattern ?? config.placeholderPattern;
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new UsageError(`Invalid pattern: ${describeError(error)}`);
    }
    const result = await withTemplateEditor(
      args[0],
      (e) => e.removePlaceholders(pattern, config.textColor),
      editor,
    );
    if (!result.success) {
      io.err('Placeholder removal failed');
      return EXIT_FAILURE;
    }
    io.out(`Removed ${result.removed} placeholders`);
    return EXIT_OK;
  },

  async list({ args, config, io, editor }) {
    expectArgs(args, 1);
    const fields = await listPdfFields(args[0], { ...editor, filterColor: config.filterColor });
    io.out(fields.length > 0 ? formatFieldListing(fields) : 'No template fields found');
    return EXIT_OK;
  },

  async set({ args, config, io, editor }) {
    expectArgs(args, 2, Infinity);
    const [pdf, ...pairs] = args;
    const report = await setPdfFields(pdf, parseAssignments(pairs), {
      ...editor,
      textColor: config.textColor,
    });
    return reportOutcomes(report, io);
  },
};

type Prepared = { ctx: CommandContext; run: (ctx: CommandContext) => Promise<number> } | number;

function prepare(
  argv: string[],
  io: CliIO,
  env: NodeJS.ProcessEnv,
  editor: TemplateEditorOptions,
): Prepared {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'filter-color': { type: 'string' },
      pattern: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
  const [command, ...args] = positionals;
  if (values.help || command === undefined) {
    io.out(USAGE);
    return values.help ? EXIT_OK : EXIT_USAGE;
  }
  const run = Object.hasOwn(commands, command) ? commands[command] : undefined;
  if (!run) {
    throw new UsageError(`Unknown command: ${command}`);
  }

  const config = loadConfig(env);
  configureLogging({ level: config.logLevel, format: config.logFormat });
  return { ctx: { args, options: values, config, io, editor }, run };
}

/**
 * Run one CLI invocation and return its exit code. `argv` excludes the
 * node binary and script path.
 */
export async function runCli(
  argv: string[],
  io: CliIO = consoleIO,
  env: NodeJS.ProcessEnv = process.env,
  editor: TemplateEditorOptions = {},
): Promise<number> {
  try {
    const prepared = prepare(argv, io, env, editor);
    if (typeof prepared === 'number') return prepared;
    return await prepared.run(prepared.ctx);
  } catch (error) {
    return failure(error, io);
  }
}

function isParseArgsError(error: unknown): error is TypeError {
  return (
    error instanceof TypeError &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

function failure(error: unknown, io: CliIO): number {
  if (error instanceof UsageError || isParseArgsError(error)) {
    io.err(`Error: ${error.message}`);
    io.err(USAGE);
    return EXIT_USAGE;
  }
  if (error instanceof TemplateEngineError) {
    io.err(`Error [${error.code}]: ${error.message}`);
    return EXIT_FAILURE;
  }
  io.err(`Error: ${describeError(error)}`);
  return EXIT_FAILURE;
}
