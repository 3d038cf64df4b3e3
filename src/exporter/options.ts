/**
 * @file options.ts
 * @description Classes for processing export configuration options.
 *
 * Options arrive as name/value strings (from the command line or any other
 * key/value source) and are applied to an ExportOptions object. The typed
 * selection and render configurations are derived from the result.
 */

import { ConfigError } from '../core/error.js';
import { LogLevel, parseLogLevel } from '../util/log.js';
import type { RenderConfig } from './render.js';
import type { SelectionConfig } from './selection.js';
import type { ConflictPolicy } from './declset.js';

/**
 * Every setting of one export run.
 */
export interface ExportOptions {
  /** Program dump to read */
  input: string | null;
  outputDir: string;
  /** Base name of the artifacts; the program name when null */
  baseName: string | null;
  createCFile: boolean;
  createHeaderFile: boolean;
  structured: boolean;
  useCppStyleComments: boolean;
  banners: boolean;
  emitTypeDefinitions: boolean;
  emitReferencedGlobals: boolean;
  emitFunctionDeclarations: boolean;
  declareSelected: boolean;
  failureStubs: boolean;
  functionTagFilters: string;
  functionTagExclude: boolean;
  addressSetStr: string | null;
  includeFunctionsOnly: string | null;
  tolerateBadRanges: boolean;
  strictConflicts: boolean;
  concurrency: number;
  logLevel: LogLevel;
}

export function defaultExportOptions(): ExportOptions {
  return {
    input: null,
    outputDir: '.',
    baseName: null,
    createCFile: true,
    createHeaderFile: false,
    structured: false,
    useCppStyleComments: true,
    banners: true,
    emitTypeDefinitions: true,
    emitReferencedGlobals: true,
    emitFunctionDeclarations: true,
    declareSelected: true,
    failureStubs: true,
    functionTagFilters: '',
    functionTagExclude: true,
    addressSetStr: null,
    includeFunctionsOnly: null,
    tolerateBadRanges: false,
    strictConflicts: false,
    concurrency: 1,
    logLevel: LogLevel.INFO,
  };
}

// ---------------------------------------------------------------------------
// ExportOption
// ---------------------------------------------------------------------------

const TRUE_WORDS = new Set(['true', '1', 'yes', 'on', 'enable', 'enabled']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off', 'disable', 'disabled']);

/**
 * Base class for options classes that affect the configuration of an export.
 *
 * Each class instance affects configuration through its apply() method, which
 * is handed the options being configured along with the string value. The
 * method returns a confirmation message.
 */
export abstract class ExportOption {
  protected readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  /** Return the name of the option */
  getName(): string {
    return this.name;
  }

  abstract apply(opts: ExportOptions, value: string): string;

  /**
   * Parse a boolean toggle: true/1/yes/on/enable(d) or
   * false/0/no/off/disable(d), in any case.
   * @throws ConfigError for anything else
   */
  static onOrOff(option: string, p: string): boolean {
    const val = p.trim().toLowerCase();
    if (TRUE_WORDS.has(val)) return true;
    if (FALSE_WORDS.has(val)) return false;
    throw new ConfigError(option, `Boolean value expected for ${option} (true/false, 1/0, yes/no, on/off): ${p}`);
  }
}

type BooleanKey = {
  [K in keyof ExportOptions]: ExportOptions[K] extends boolean ? K : never
}[keyof ExportOptions];

type NullableStringKey = 'input' | 'baseName' | 'addressSetStr' | 'includeFunctionsOnly';

/** A toggle stored in one boolean field */
class OptionToggle extends ExportOption {
  private readonly key: BooleanKey;

  constructor(name: string, key: BooleanKey) {
    super(name);
    this.key = key;
  }

  apply(opts: ExportOptions, value: string): string {
    const val = ExportOption.onOrOff(this.name, value);
    opts[this.key] = val;
    return `${this.name} ${val ? 'enabled' : 'disabled'}`;
  }
}

/** A string stored in one field; an empty value clears it */
class OptionString extends ExportOption {
  private readonly key: NullableStringKey;

  constructor(name: string, key: NullableStringKey) {
    super(name);
    this.key = key;
  }

  apply(opts: ExportOptions, value: string): string {
    const val = value.trim();
    opts[this.key] = val.length === 0 ? null : val;
    return `${this.name} set to ${val.length === 0 ? '<none>' : val}`;
  }
}

class OptionOutputDir extends ExportOption {
  constructor() { super('output_dir'); }

  apply(opts: ExportOptions, value: string): string {
    if (value.trim().length === 0)
      throw new ConfigError(this.name, 'Output directory must not be empty');
    opts.outputDir = value.trim();
    return `Output directory set to ${opts.outputDir}`;
  }
}

class OptionTagFilters extends ExportOption {
  constructor() { super('function_tag_filters'); }

  apply(opts: ExportOptions, value: string): string {
    opts.functionTagFilters = value;
    return `Function tag filters set to ${value}`;
  }
}

class OptionConcurrency extends ExportOption {
  constructor() { super('concurrency'); }

  apply(opts: ExportOptions, value: string): string {
    const tok = value.trim();
    if (!/^[0-9]+$/.test(tok) || Number(tok) < 1)
      throw new ConfigError(this.name, `Concurrency must be a positive integer: ${value}`);
    opts.concurrency = Number(tok);
    return `Concurrency set to ${opts.concurrency}`;
  }
}

class OptionLogLevel extends ExportOption {
  constructor() { super('log_level'); }

  apply(opts: ExportOptions, value: string): string {
    const lvl = parseLogLevel(value);
    if (lvl === null)
      throw new ConfigError(this.name, `Unknown log level: ${value}`);
    opts.logLevel = lvl;
    return `Log level set to ${value.trim().toLowerCase()}`;
  }
}

// ---------------------------------------------------------------------------
// OptionDatabase
// ---------------------------------------------------------------------------

/**
 * A dispatcher for option commands.
 *
 * Takes care of handing each name/value pair to the ExportOption registered
 * under that name, which does the work of modifying the configuration.
 */
export class OptionDatabase {
  private readonly opts: ExportOptions;
  private readonly optionmap = new Map<string, ExportOption>();

  private registerOption(option: ExportOption): void {
    this.optionmap.set(option.getName(), option);
  }

  constructor(opts: ExportOptions) {
    this.opts = opts;
    this.registerOption(new OptionString('input', 'input'));
    this.registerOption(new OptionOutputDir());
    this.registerOption(new OptionString('base_name', 'baseName'));
    this.registerOption(new OptionToggle('create_c_file', 'createCFile'));
    this.registerOption(new OptionToggle('create_header_file', 'createHeaderFile'));
    this.registerOption(new OptionToggle('structured', 'structured'));
    this.registerOption(new OptionToggle('use_cpp_style_comments', 'useCppStyleComments'));
    this.registerOption(new OptionToggle('banners', 'banners'));
    this.registerOption(new OptionToggle('emit_type_definitions', 'emitTypeDefinitions'));
    this.registerOption(new OptionToggle('emit_referenced_globals', 'emitReferencedGlobals'));
    this.registerOption(new OptionToggle('emit_function_declarations', 'emitFunctionDeclarations'));
    this.registerOption(new OptionToggle('declare_selected', 'declareSelected'));
    this.registerOption(new OptionToggle('failure_stubs', 'failureStubs'));
    this.registerOption(new OptionTagFilters());
    this.registerOption(new OptionToggle('function_tag_exclude', 'functionTagExclude'));
    this.registerOption(new OptionString('address_set_str', 'addressSetStr'));
    this.registerOption(new OptionString('include_functions_only', 'includeFunctionsOnly'));
    this.registerOption(new OptionToggle('tolerate_bad_ranges', 'tolerateBadRanges'));
    this.registerOption(new OptionToggle('strict_conflicts', 'strictConflicts'));
    this.registerOption(new OptionConcurrency());
    this.registerOption(new OptionLogLevel());
  }

  /** Names of every registered option, in registration order */
  getNames(): string[] {
    return [...this.optionmap.keys()];
  }

  /**
   * Issue an option command.
   * @returns the confirmation message
   * @throws ConfigError for an unknown option or a bad value
   */
  set(name: string, value: string): string {
    const opt = this.optionmap.get(name);
    if (opt === undefined)
      throw new ConfigError(name, `Unknown option: ${name}`);
    return opt.apply(this.opts, value);
  }
}

// ---------------------------------------------------------------------------
// Argument lists
// ---------------------------------------------------------------------------

/**
 * Apply an argument list of `--name value`, `--name=value` or bare
 * `name value` pairs to a fresh set of options.
 * @returns the options and one confirmation message per option set
 * @throws ConfigError for an unknown option, a missing or bad value
 */
export function parseOptionList(args: readonly string[]): { options: ExportOptions; messages: string[] } {
  const options = defaultExportOptions();
  const db = new OptionDatabase(options);
  const messages: string[] = [];
  let i = 0;
  while (i < args.length) {
    let key = args[i].replace(/^--?/, '');
    let value: string | undefined;
    const eq = key.indexOf('=');
    if (eq >= 0) {
      value = key.substring(eq + 1);
      key = key.substring(0, eq);
      i += 1;
    } else {
      value = args[i + 1];
      if (value === undefined)
        throw new ConfigError(key, `Missing value for option: ${key}`);
      i += 2;
    }
    messages.push(db.set(key, value));
  }
  return { options, messages };
}

/** Split a comma separated list, dropping blank entries */
export function splitList(s: string | null): string[] {
  if (s === null) return [];
  return s.split(',').map((p) => p.trim()).filter((p) => p.length > 0);
}

/**
 * Check options that are fine on their own but not together.
 * @throws ConfigError when no artifact would be produced
 */
export function validateOptions(opts: ExportOptions): void {
  if (!opts.structured && !opts.createCFile && !opts.createHeaderFile)
    throw new ConfigError('create_c_file', 'No output files selected');
}

export function toSelectionConfig(opts: ExportOptions): SelectionConfig {
  const config: SelectionConfig = {
    names: splitList(opts.includeFunctionsOnly),
    tags: splitList(opts.functionTagFilters),
    excludeTags: opts.functionTagExclude,
    tolerateBadRanges: opts.tolerateBadRanges,
  };
  return opts.addressSetStr === null ? config : { ...config, addressRanges: opts.addressSetStr };
}

export function toRenderConfig(opts: ExportOptions, baseName: string): RenderConfig {
  return {
    createSource: opts.createCFile,
    createHeader: opts.createHeaderFile,
    structured: opts.structured,
    headerName: baseName + '.h',
    commentStyle: opts.useCppStyleComments ? 'cpp' : 'c',
    banners: opts.banners,
    emitTypes: opts.emitTypeDefinitions,
    emitGlobals: opts.emitReferencedGlobals,
    emitDeclarations: opts.emitFunctionDeclarations,
    declareSelected: opts.declareSelected,
    failureStubs: opts.failureStubs,
  };
}

export function toConflictPolicy(opts: ExportOptions): ConflictPolicy {
  return opts.strictConflicts ? 'strict' : 'first-seen';
}
