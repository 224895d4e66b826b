/**
 * Patterns for raw-text HTML inspection. All are global so they can be used
 * with String.prototype.matchAll, which iterates over a private copy.
 */

/** `<!-- ... -->`, non-greedy, spanning lines */
export const HTML_COMMENT_PATTERN = /<!--([\s\S]*?)-->/g;

/** `<script attrs>body</script>`; group 1 = attributes, group 2 = body */
export const SCRIPT_BLOCK_PATTERN = /<script\b([^>]*)>([\s\S]*?)<\/script>/gi;

/** `src` attribute of a script tag */
export const EXTERNAL_SCRIPT_PATTERN = /<script\b[^>]*\bsrc\s*=\s*["']([^"']+)["']/gi;

export const SRC_ATTRIBUTE_PATTERN = /\bsrc\s*=/i;

/** `<form attrs>body</form>`; group 1 = attributes, group 2 = body */
export const FORM_BLOCK_PATTERN = /<form\b([^>]*)>([\s\S]*?)<\/form>/gi;

export const FORM_ACTION_PATTERN = /\baction\s*=\s*["']([^"']+)["']/i;

export const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

/** `api_key = "..."` style assignments; group 1 = key name, group 2 = value (20+ chars) */
export const SECRET_ASSIGNMENT_PATTERN = /(api[_-]?key|token|secret|password)["']?\s*[:=]\s*["']([^"']{20,})["']/gi;

/**
 * `version: 1.2.3` style strings; group 1 = the version.
 * Deliberately loose, so it also fires on unrelated version fields.
 */
export const VERSION_STRING_PATTERN = /version["']?\s*[:=]\s*["']?([0-9]+\.[0-9]+\.[0-9]+)/gi;
