/**
 * @fileoverview Template loading, placeholder extraction and rendering.
 *
 * Placeholders are written `{name}`: a name is any run of characters other
 * than `{` and `}`. Names are case-sensitive and used exactly as written.
 *
 * @module template
 */

import { PlaceholderMismatchError, TemplateError } from './errors.js';
import { isMissingFileError, readTextFile } from './io-helper.js';
import { getErrorMessage, type ParamSpec, type TemplateInfo } from './types.js';

/** Creates a fresh global placeholder pattern (global regexes carry lastIndex state). */
function createPlaceholderPattern(): RegExp {
  return /\{([^{}]+)\}/g;
}

/**
 * Returns the unique placeholder names of a template in first-appearance order.
 */
export function extractPlaceholders(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(createPlaceholderPattern())) {
    seen.add(match[1]);
  }
  return Array.from(seen);
}

/**
 * Reads a template file and extracts its placeholders.
 *
 * @throws TemplateError when the file cannot be read
 */
export async function loadTemplate(templatePath: string): Promise<TemplateInfo> {
  let content: string;
  try {
    content = await readTextFile(templatePath);
  } catch (err) {
    if (isMissingFileError(err)) {
      throw new TemplateError('TEMPLATE_NOT_FOUND', `Template file not found: ${templatePath}`, { cause: err });
    }
    throw new TemplateError('TEMPLATE_UNREADABLE', `Failed to read template ${templatePath}: ${getErrorMessage(err)}`, { cause: err });
  }
  return { content, placeholders: extractPlaceholders(content) };
}

/**
 * Checks that every placeholder has a param prompt and every param prompt
 * has a placeholder.
 *
 * @throws PlaceholderMismatchError listing both sides of the difference
 */
export function validatePlaceholders(placeholders: readonly string[], params: readonly ParamSpec[]): void {
  const templateSet = new Set(placeholders);
  const configSet = new Set(params.map((param) => param.name));

  const missingInConfig = [...templateSet].filter((name) => !configSet.has(name)).sort();
  const missingInTemplate = [...configSet].filter((name) => !templateSet.has(name)).sort();

  if (missingInConfig.length > 0 || missingInTemplate.length > 0) {
    throw new PlaceholderMismatchError(missingInConfig, missingInTemplate);
  }
}

/**
 * Describes a mismatch the way the CLI reports it, one line per side.
 */
export function describeMismatch(err: PlaceholderMismatchError): string[] {
  const lines: string[] = [];
  if (err.missingInConfig.length > 0) {
    lines.push(`Config has no prompt for placeholders: ${err.missingInConfig.join(', ')}`);
  }
  if (err.missingInTemplate.length > 0) {
    lines.push(`Template has no placeholder for params: ${err.missingInTemplate.join(', ')}`);
  }
  return lines;
}

/**
 * Substitutes every `{name}` that has a value; other markers are left as-is.
 * Values are inserted verbatim and are not scanned for further placeholders.
 */
export function renderTemplate(content: string, values: Record<string, string>): string {
  return content.replace(createPlaceholderPattern(), (marker: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : marker,
  );
}
