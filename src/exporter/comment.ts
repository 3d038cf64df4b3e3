/**
 * @file comment.ts
 * @description Section banners and the comment blocks standing in for
 * functions that could not be decompiled.
 */

/** Width of the rule lines, not counting the comment markers */
const RULE_WIDTH = 78;
/** Column the title and description are padded to */
const TEXT_WIDTH = 74;

export type CommentStyle = 'cpp' | 'c';

export interface Banner {
  readonly title: string;
  readonly description: string;
}

export const TYPES_BANNER: Banner = {
  title: 'DATA TYPES',
  description: 'These types were decompiled from the binary and may not match original source',
};

export const EQUATES_BANNER: Banner = {
  title: 'EQUATES / DEFINES',
  description: 'Constants and named values extracted from the binary',
};

export const DECLARATIONS_BANNER: Banner = {
  title: 'FUNCTION DECLARATIONS',
  description: 'These function prototypes were extracted from binary analysis',
};

export const GLOBALS_BANNER: Banner = {
  title: 'GLOBAL VARIABLES',
  description: 'These global variables were referenced in the decompiled functions',
};

export const IMPLEMENTATIONS_BANNER: Banner = {
  title: 'FUNCTION IMPLEMENTATIONS',
  description: 'Decompiled code from the binary',
};

/**
 * Format a four line banner.
 *
 * Text lines are padded to a fixed width, so `/* *\/` banners keep their
 * closing markers in one column. `//` banners have no trailing blanks.
 */
export function formatBanner(banner: Banner, style: CommentStyle, eol = '\n'): string {
  const open = style === 'cpp' ? '//' : '/*';
  const close = style === 'cpp' ? '' : ' */';
  const rule = open + '='.repeat(RULE_WIDTH) + close;
  const text = (s: string): string => {
    const ln = `${open} ${s.padEnd(TEXT_WIDTH)}${close}`;
    return style === 'cpp' ? ln.trimEnd() : ln;
  };
  return [rule, text(banner.title), text(banner.description), rule].join(eol) + eol;
}

/** Stub placed in the implementations for a function that failed */
export function failureComment(name: string, reason: string, eol = '\n'): string {
  const cause = reason.replace(/\*\//g, '* /');
  return ['/*', `Unable to decompile '${name}'`, `Cause: ${cause}`, '*/'].join(eol) + eol;
}
