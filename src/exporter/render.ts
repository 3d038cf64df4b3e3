/**
 * @file render.ts
 * @description Printing the aggregated model as C source, header or a
 * structured document.
 */

import { formatAddress } from '../core/address.js';
import { StringWriter } from '../util/writer.js';
import type { AggregatedModel, Implementation } from './aggregate.js';
import {
  type Banner,
  type CommentStyle,
  DECLARATIONS_BANNER,
  EQUATES_BANNER,
  GLOBALS_BANNER,
  IMPLEMENTATIONS_BANNER,
  TYPES_BANNER,
  failureComment,
  formatBanner,
} from './comment.js';
import { PrintC, declareVariable, formatEquateValue } from './printc.js';
import { asDeclaration } from './record.js';

const EOL = '\n';

export interface RenderConfig {
  createSource: boolean;
  createHeader: boolean;
  /** Produce the structured document instead of any text artifact */
  structured: boolean;
  /** File name the source includes when a header is produced */
  headerName: string;
  commentStyle: CommentStyle;
  banners: boolean;
  emitTypes: boolean;
  emitGlobals: boolean;
  emitDeclarations: boolean;
  /** Also declare the selected functions themselves */
  declareSelected: boolean;
  /** Put a comment in place of each function that failed to decompile */
  failureStubs: boolean;
}

export function defaultRenderConfig(): RenderConfig {
  return {
    createSource: true,
    createHeader: false,
    structured: false,
    headerName: 'exported_program.h',
    commentStyle: 'cpp',
    banners: true,
    emitTypes: true,
    emitGlobals: true,
    emitDeclarations: true,
    declareSelected: true,
    failureStubs: true,
  };
}

export interface StructuredFunction {
  name: string;
  signature: string;
  body: string;
}

export interface StructuredDocument {
  /** Everything but the implementations, as header text without a guard */
  header: string;
  /** Keyed by hex entry address, or by name when there is none */
  functions: Record<string, StructuredFunction>;
}

export interface RenderOutput {
  primaryText?: string;
  headerText?: string;
  structuredDocument?: StructuredDocument;
}

type SectionKind = 'types' | 'equates' | 'declarations' | 'globals' | 'implementations';

const DECLARATION_SECTIONS: readonly SectionKind[] = ['types', 'equates', 'declarations', 'globals'];
const ALL_SECTIONS: readonly SectionKind[] = [...DECLARATION_SECTIONS, 'implementations'];

function stripTrailingEol(s: string): string {
  return s.replace(/\n+$/, '');
}

/**
 * Prints sections of one model. The same renderer prints every artifact, so
 * header and source always agree.
 */
class SectionRenderer {
  private readonly model: AggregatedModel;
  private readonly config: RenderConfig;

  constructor(model: AggregatedModel, config: RenderConfig) {
    this.model = model;
    this.config = config;
  }

  private banner(b: Banner): string {
    return this.config.banners ? formatBanner(b, this.config.commentStyle, EOL) + EOL : '';
  }

  /** Content of a section, or null when there is nothing to print */
  private content(kind: SectionKind): string | null {
    switch (kind) {
      case 'types': return this.typesContent();
      case 'equates': return this.equatesContent();
      case 'declarations': return this.declarationsContent();
      case 'globals': return this.globalsContent();
      case 'implementations': return this.implementationsContent();
    }
  }

  private bannerFor(kind: SectionKind): Banner {
    switch (kind) {
      case 'types': return TYPES_BANNER;
      case 'equates': return EQUATES_BANNER;
      case 'declarations': return DECLARATIONS_BANNER;
      case 'globals': return GLOBALS_BANNER;
      case 'implementations': return IMPLEMENTATIONS_BANNER;
    }
  }

  private typesContent(): string | null {
    if (!this.config.emitTypes || this.model.types.length === 0) return null;
    const out = new StringWriter();
    new PrintC(out, { eol: EOL }).docTypeDefinitions(this.model.types);
    return out.toString();
  }

  private equatesContent(): string | null {
    if (!this.config.emitTypes || this.model.equates.length === 0) return null;
    return this.model.equates
      .map((eq) => `#define ${eq.name} ${formatEquateValue(eq.value)}`)
      .join(EOL);
  }

  /** Selected prototypes first, then everything the bodies call */
  declarationLines(): string[] {
    const res: string[] = [];
    const seen = new Set<string>();
    if (this.config.declareSelected) {
      for (const impl of this.model.implementations) {
        if (impl.kind !== 'body' || seen.has(impl.record.name)) continue;
        seen.add(impl.record.name);
        res.push(asDeclaration(impl.record.signature));
      }
    }
    for (const decl of this.model.calledFunctions) {
      if (seen.has(decl.name)) continue;
      seen.add(decl.name);
      res.push(decl.declaration);
    }
    return res;
  }

  private declarationsContent(): string | null {
    if (!this.config.emitDeclarations) return null;
    const lines = this.declarationLines();
    return lines.length === 0 ? null : lines.join(EOL);
  }

  private globalsContent(): string | null {
    if (!this.config.emitGlobals || this.model.globals.length === 0) return null;
    return this.model.globals
      .map((g) => `extern ${declareVariable(g.type, g.name, g)};`)
      .join(EOL);
  }

  private implementationText(impl: Implementation): string | null {
    if (impl.kind === 'body') return stripTrailingEol(impl.record.body);
    if (!this.config.failureStubs) return null;
    return stripTrailingEol(failureComment(impl.fn.name, impl.reason, EOL));
  }

  private implementationsContent(): string | null {
    const parts: string[] = [];
    for (const impl of this.model.implementations) {
      const txt = this.implementationText(impl);
      if (txt !== null) parts.push(txt);
    }
    return parts.length === 0 ? null : parts.join(EOL + EOL);
  }

  /**
   * Print the given sections in their fixed order, skipping empty ones.
   * Sections are separated by one blank line.
   */
  renderSections(kinds: readonly SectionKind[]): string {
    const parts: string[] = [];
    for (const kind of ALL_SECTIONS) {
      if (!kinds.includes(kind)) continue;
      const body = this.content(kind);
      if (body === null) continue;
      parts.push(this.banner(this.bannerFor(kind)) + stripTrailingEol(body) + EOL);
    }
    return parts.join(EOL);
  }

  structured(): StructuredDocument {
    const functions: Record<string, StructuredFunction> = {};
    for (const impl of this.model.implementations) {
      if (impl.kind !== 'body') continue;
      const rec = impl.record;
      const addr = rec.address ?? impl.fn.address;
      const key = addr === undefined ? rec.name : formatAddress(addr);
      functions[key] = { name: rec.name, signature: rec.signature, body: rec.body };
    }
    return { header: this.renderSections(DECLARATION_SECTIONS), functions };
  }
}

/** `prog.h` becomes `PROG_H` */
export function includeGuard(headerName: string): string {
  const base = headerName.replace(/^.*[\\/]/, '');
  const guard = base.toUpperCase().replace(/[^A-Z0-9]/g, '_');
  return /^[0-9]/.test(guard) ? '_' + guard : guard;
}

function wrapGuard(headerName: string, text: string): string {
  const guard = includeGuard(headerName);
  const lines = [`#ifndef ${guard}`, `#define ${guard}`, ''];
  if (text.length !== 0) lines.push(stripTrailingEol(text), '');
  lines.push(`#endif /* ${guard} */`);
  return lines.join(EOL) + EOL;
}

/**
 * Render the model to the artifacts the configuration asks for.
 *
 * Source only: every section in the source. Header requested: the
 * declaration sections go to the header; the source includes the header and
 * keeps the implementations. Structured: only the document.
 */
export function render(model: AggregatedModel, config: RenderConfig): RenderOutput {
  const sections = new SectionRenderer(model, config);
  if (config.structured)
    return { structuredDocument: sections.structured() };

  const res: RenderOutput = {};
  if (config.createHeader) {
    res.headerText = wrapGuard(config.headerName, sections.renderSections(DECLARATION_SECTIONS));
    if (config.createSource) {
      const impl = sections.renderSections(['implementations']);
      const include = `#include "${config.headerName}"` + EOL;
      res.primaryText = impl.length === 0 ? include : include + EOL + impl;
    }
  } else if (config.createSource) {
    res.primaryText = sections.renderSections(ALL_SECTIONS);
  }
  return res;
}
