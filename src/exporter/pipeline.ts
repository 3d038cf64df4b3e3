/**
 * @file pipeline.ts
 * @description One export run: selection, per-function closure, aggregation
 * and rendering.
 */

import { explainError } from '../core/error.js';
import { type Logger, silentLogger } from '../util/log.js';
import { type AggregatedModel, aggregate } from './aggregate.js';
import type { ConflictPolicy, ExportWarning } from './declset.js';
import type { DecompilerSource, FunctionInfo } from './record.js';
import { type RenderConfig, type StructuredDocument, render } from './render.js';
import { type SelectionConfig, selectFunctions } from './selection.js';

export interface RunOptions {
  policy?: ConflictPolicy;
  concurrency?: number;
  logger?: Logger;
}

export interface RunResult {
  ok: boolean;
  primaryArtifactText?: string;
  headerArtifactText?: string;
  structuredDocument?: StructuredDocument;
  warnings: ExportWarning[];
  errors: string[];
  selectedCount: number;
  decompiledCount: number;
}

function failed(errors: string[], warnings: ExportWarning[], selectedCount = 0): RunResult {
  return { ok: false, warnings, errors, selectedCount, decompiledCount: 0 };
}

function describeWarning(w: ExportWarning): string {
  return w.origin === undefined ? w.message : `${w.origin}: ${w.message}`;
}

/**
 * Export the functions chosen by `selectionConfig` as the artifacts
 * `renderConfig` asks for.
 *
 * Configuration problems fail the run before anything is decompiled. Problems
 * with single functions or declarations become warnings.
 */
export async function run(
  source: DecompilerSource,
  selectionConfig: SelectionConfig,
  renderConfig: RenderConfig,
  runOptions: RunOptions = {}
): Promise<RunResult> {
  const logger = runOptions.logger ?? silentLogger;

  if (!renderConfig.structured && !renderConfig.createSource && !renderConfig.createHeader) {
    logger.error('No output files selected');
    return failed(['No output files selected'], []);
  }

  let universe: readonly FunctionInfo[];
  try {
    universe = source.listFunctions();
  } catch (err) {
    const msg = `Unable to list functions: ${explainError(err)}`;
    logger.error(msg);
    return failed([msg], []);
  }

  const selection = selectFunctions(universe, selectionConfig);
  const warnings: ExportWarning[] = [...selection.warnings];
  for (const w of selection.warnings) logger.warning(describeWarning(w));
  if (selection.errors.length > 0) {
    for (const e of selection.errors) logger.error(e);
    return failed(selection.errors, warnings);
  }
  const selected = selection.selected;
  logger.info(`Selected ${selected.length} of ${universe.length} functions`);

  let model: AggregatedModel;
  try {
    model = await aggregate(source, selected, {
      includeGlobals: renderConfig.emitGlobals,
      policy: runOptions.policy ?? 'first-seen',
      concurrency: runOptions.concurrency ?? 1,
      logger,
    });
  } catch (err) {
    const msg = explainError(err);
    logger.error(msg);
    return failed([msg], warnings, selected.length);
  }

  for (const w of model.warnings) {
    warnings.push(w);
    logger.warning(describeWarning(w));
  }
  const decompiledCount = model.implementations.filter((impl) => impl.kind === 'body').length;
  logger.info(`Decompiled ${decompiledCount} of ${selected.length} functions; ` +
    `${model.types.length} types, ${model.globals.length} globals, ${model.calledFunctions.length} declarations`);

  const errors: string[] = [];
  if (selected.length > 0 && decompiledCount === 0) {
    errors.push('None of the selected functions could be decompiled');
    logger.error(errors[0]);
  }

  const out = render(model, renderConfig);
  const res: RunResult = {
    ok: errors.length === 0,
    warnings,
    errors,
    selectedCount: selected.length,
    decompiledCount,
  };
  if (out.primaryText !== undefined) res.primaryArtifactText = out.primaryText;
  if (out.headerText !== undefined) res.headerArtifactText = out.headerText;
  if (out.structuredDocument !== undefined) res.structuredDocument = out.structuredDocument;
  return res;
}
