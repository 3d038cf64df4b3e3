#!/usr/bin/env node
/**
 * @file exportmain.ts
 * @description Command line driver: reads a program dump, exports the
 * selected functions and writes the artifacts.
 */

import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';

import { ConfigError, explainError } from '../core/error.js';
import { type ExportOptions, parseOptionList, toConflictPolicy, toRenderConfig, toSelectionConfig,
  validateOptions } from '../exporter/options.js';
import { run } from '../exporter/pipeline.js';
import { Logger } from '../util/log.js';
import { ConsoleWriter, ErrorWriter, type Writer } from '../util/writer.js';
import { JsonProgramSource } from './jsonsource.js';

const USAGE = `usage: closure-export --input dump.json [--name value ...]

Export the decompiled functions of a program dump as a C translation unit
holding only the declarations those functions need.

Boolean values accept true/false, 1/0, yes/no, on/off, enable/disable.

Options:
  input                      Program dump to read (required)
  output_dir                 Output directory path (default: ".")
  base_name                  Base name for output files (default: program name)
  create_c_file              Create C implementation file (default: true)
  create_header_file         Create header file (default: false)
  structured                 Write a JSON document instead of C files (default: false)
  use_cpp_style_comments     Use // instead of /* */ banners (default: true)
  banners                    Print section banners (default: true)
  emit_type_definitions      Include type definitions and defines (default: true)
  emit_referenced_globals    Include referenced global variables (default: true)
  emit_function_declarations Include function prototypes (default: true)
  declare_selected           Also declare the exported functions (default: true)
  failure_stubs              Comment in place of failed functions (default: true)
  function_tag_filters       Function tags to filter by ("TAG1,TAG2")
  function_tag_exclude       Exclude (vs include) matching tags (default: true)
  address_set_str            Address ranges to process ("0x1000-0x2000,0x3000")
  include_functions_only     Include only named functions ("foo,bar")
  tolerate_bad_ranges        Ignore a malformed address set (default: false)
  strict_conflicts           Fail on conflicting declarations (default: false)
  concurrency                Functions decompiled at once (default: 1)
  log_level                  debug, info, warning or error (default: info)
`;

export interface Artifact {
  path: string;
  text: string;
}

/**
 * True when a help flag stands where an option name is expected. A value
 * that happens to read `-h` does not count.
 */
export function wantsHelp(argv: readonly string[]): boolean {
  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') return true;
    i += arg.includes('=') ? 1 : 2;
  }
  return false;
}

/**
 * Run one export with the given arguments.
 * @returns the process exit code
 */
export async function main(argv: readonly string[], out: Writer = new ConsoleWriter(),
  err: Writer = new ErrorWriter()): Promise<number> {
  if (wantsHelp(argv)) {
    out.write(USAGE);
    return 0;
  }
  const logger = new Logger(err);

  let opts: ExportOptions;
  let input: string;
  try {
    const parsed = parseOptionList(argv);
    opts = parsed.options;
    logger.setThreshold(opts.logLevel);
    for (const msg of parsed.messages) logger.debug(msg);
    validateOptions(opts);
    if (opts.input === null)
      throw new ConfigError('input', 'No input program dump given');
    input = opts.input;
  } catch (e) {
    logger.error(explainError(e));
    err.write('Try --help for the list of options\n');
    return 1;
  }

  let source: JsonProgramSource;
  try {
    source = JsonProgramSource.fromFile(input);
  } catch (e) {
    logger.error(`Unable to read ${input}: ${explainError(e)}`);
    return 1;
  }
  const baseName = opts.baseName ?? source.programName;
  logger.info(`Program: ${source.programName}`);
  logger.info(`Output Dir: ${opts.outputDir}`);
  logger.info(`Base Name: ${baseName}`);

  const result = await run(source, toSelectionConfig(opts), toRenderConfig(opts, baseName), {
    policy: toConflictPolicy(opts),
    concurrency: opts.concurrency,
    logger,
  });
  for (const w of source.warnings) logger.warning(w);

  const artifacts: Artifact[] = [];
  const target = (ext: string): string => path.join(opts.outputDir, baseName + ext);
  if (result.headerArtifactText !== undefined)
    artifacts.push({ path: target('.h'), text: result.headerArtifactText });
  if (result.primaryArtifactText !== undefined)
    artifacts.push({ path: target('.c'), text: result.primaryArtifactText });
  if (result.structuredDocument !== undefined)
    artifacts.push({ path: target('.json'), text: JSON.stringify(result.structuredDocument, null, 2) + '\n' });

  try {
    if (artifacts.length > 0) fs.mkdirSync(opts.outputDir, { recursive: true });
    for (const a of artifacts) {
      fs.writeFileSync(a.path, a.text);
      logger.info(`Created ${a.path}`);
    }
  } catch (e) {
    logger.error(`Unable to write output: ${explainError(e)}`);
    return 1;
  }

  if (!result.ok) {
    logger.error('Export failed');
    return 1;
  }
  logger.info('Export completed successfully.');
  return 0;
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => { process.exitCode = code; },
    (e: unknown) => {
      process.stderr.write(`ERROR: ${explainError(e)}\n`);
      process.exitCode = 1;
    },
  );
}
