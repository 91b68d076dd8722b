/**
 * Markdown Rendering Utilities
 *
 * Pretty terminal rendering for dry-run previews
 */

import { Marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import { logger } from './logger.js';
import { errorMessage } from './errors.js';

// Create marked instance with terminal renderer
const marked = new Marked(
  markedTerminal({
    // Width for text wrapping
    width: 100,
    showSectionPrefix: false,
    unescape: true,
    emoji: false,
    tab: 2,
  })
);

/**
 * Render markdown text for terminal display
 */
export function renderMarkdown(text: string): string {
  try {
    const output = marked.parse(text);
    return typeof output === 'string' ? output : text;
  } catch (error) {
    logger.debug(`Markdown rendering failed, showing plain text: ${errorMessage(error)}`);
    return text;
  }
}
