/**
 * FunctionIdentity
 *
 * Derives the registry key and the report title for a call site.
 * The key keeps every field whole; only the title is cut to column width,
 * so functions whose displayed fields collide still get separate records.
 */

import { fitColumn, padColumn, zeroPad } from '../report/format.js';
import type { CallSiteMetadata, ResolvedCallSite } from '../core/types.js';

export const ANONYMOUS_NAME = 'anonymous';
export const NATIVE_SOURCE = '[native]';

export const SOURCE_COLUMN_WIDTH = 50;
export const NAME_COLUMN_WIDTH = 40;
export const LINE_COLUMN_WIDTH = 20;
export const LINE_DIGITS = 4;

const KEY_SEPARATOR = '\u0000';

export function resolveCallSite(metadata: CallSiteMetadata): ResolvedCallSite {
  const native = metadata.isNative === true;
  const line = metadata.definedAtLine;

  return {
    source: native || !metadata.source ? NATIVE_SOURCE : metadata.source,
    name: metadata.name ? metadata.name : ANONYMOUS_NAME,
    definedAtLine: !native && line !== undefined && Number.isInteger(line) && line >= 0 ? line : 0
  };
}

export function identityKey(site: ResolvedCallSite): string {
  return site.source + KEY_SEPARATOR + site.name + KEY_SEPARATOR + site.definedAtLine;
}

/**
 * `source : name : line` with the source cut to 50 columns, the name to 40,
 * and the zero-padded line left-justified in 20.
 */
export function formatTitle(site: ResolvedCallSite): string {
  return [
    fitColumn(site.source, SOURCE_COLUMN_WIDTH),
    fitColumn(site.name, NAME_COLUMN_WIDTH),
    padColumn(zeroPad(site.definedAtLine, LINE_DIGITS), LINE_COLUMN_WIDTH)
  ].join(': ');
}
