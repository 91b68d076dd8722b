/**
 * Logic-less template engine for the Markdown render targets
 *
 * Supported tags:
 *   {{path}}              value lookup, dotted paths allowed, {{.}} is the current item
 *   {{#path}}...{{/path}} repeat for each array item, or render once for a truthy value
 *   {{^path}}...{{/path}} render when the value is falsy or an empty array
 *
 * Section tags alone on their line take the whole line with them. Values are
 * inserted as-is (no HTML escaping); the output is Markdown.
 */

import { TemplateError } from '../utils/errors.js';

type TemplateNode =
  | { type: 'text'; value: string }
  | { type: 'variable'; path: string }
  | { type: 'section'; path: string; inverted: boolean; children: TemplateNode[] };

interface OpenSection {
  path: string;
  inverted: boolean;
  children: TemplateNode[];
}

const TAG_REGEX = /\{\{\s*([#^/]?)\s*([A-Za-z0-9_.-]+)\s*\}\}/g;

/**
 * Whether the tag spanning [start, end) is the only thing on its line.
 * Returns the range to drop (the whole line, newline included) when it is.
 */
function standaloneRange(source: string, start: number, end: number): [number, number] | undefined {
  const lineStart = source.lastIndexOf('\n', start - 1) + 1;
  const newline = source.indexOf('\n', end);
  const lineEnd = newline === -1 ? source.length : newline + 1;

  const before = source.slice(lineStart, start);
  const after = source.slice(end, newline === -1 ? source.length : newline);

  if (before.trim() === '' && after.trim() === '') {
    return [lineStart, lineEnd];
  }
  return undefined;
}

/**
 * Parse a template into a node tree. Throws TemplateError on unbalanced sections.
 */
export function parseTemplate(source: string, templateId?: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: OpenSection[] = [];
  let cursor = 0;

  const current = () => (stack.length > 0 ? stack[stack.length - 1].children : root);
  const pushText = (value: string) => {
    if (value.length > 0) current().push({ type: 'text', value });
  };

  for (const match of source.matchAll(TAG_REGEX)) {
    const [tag, sigil, path] = match;
    const start = match.index ?? 0;
    const end = start + tag.length;

    if (sigil === '') {
      pushText(source.slice(cursor, start));
      current().push({ type: 'variable', path });
      cursor = end;
      continue;
    }

    const standalone = standaloneRange(source, start, end);
    if (standalone && standalone[0] >= cursor) {
      pushText(source.slice(cursor, standalone[0]));
      cursor = standalone[1];
    } else {
      pushText(source.slice(cursor, start));
      cursor = end;
    }

    if (sigil === '/') {
      const open = stack.pop();
      if (!open) {
        throw new TemplateError(`Unexpected closing tag {{/${path}}}`, templateId);
      }
      if (open.path !== path) {
        throw new TemplateError(`Closing tag {{/${path}}} does not match {{#${open.path}}}`, templateId);
      }
      current().push({ type: 'section', path: open.path, inverted: open.inverted, children: open.children });
    } else {
      stack.push({ path, inverted: sigil === '^', children: [] });
    }
  }

  if (stack.length > 0) {
    throw new TemplateError(`Unclosed section {{#${stack[stack.length - 1].path}}}`, templateId);
  }

  pushText(source.slice(cursor));
  return root;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Resolve a dotted path against the context stack, innermost frame first
 */
function lookup(stack: readonly unknown[], path: string): unknown {
  if (path === '.') {
    return stack[stack.length - 1];
  }

  const [head, ...rest] = path.split('.');

  for (let i = stack.length - 1; i >= 0; i--) {
    const frame = stack[i];
    if (!isRecord(frame) || !(head in frame)) continue;

    let value: unknown = frame[head];
    for (const key of rest) {
      value = isRecord(value) ? value[key] : undefined;
    }
    return value;
  }

  return undefined;
}

function stringify(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (Array.isArray(value)) return value.map(stringify).join(', ');
  if (isRecord(value)) return JSON.stringify(value);
  return String(value);
}

function isTruthy(value: unknown): boolean {
  return Array.isArray(value) ? value.length > 0 : Boolean(value);
}

function renderNodes(nodes: readonly TemplateNode[], stack: unknown[]): string {
  let output = '';

  for (const node of nodes) {
    switch (node.type) {
      case 'text':
        output += node.value;
        break;
      case 'variable':
        output += stringify(lookup(stack, node.path));
        break;
      case 'section': {
        const value = lookup(stack, node.path);
        if (node.inverted) {
          if (!isTruthy(value)) output += renderNodes(node.children, stack);
        } else if (Array.isArray(value)) {
          for (const item of value) {
            output += renderNodes(node.children, [...stack, item]);
          }
        } else if (isTruthy(value)) {
          output += renderNodes(node.children, [...stack, value]);
        }
        break;
      }
    }
  }

  return output;
}

/**
 * A parsed template, reusable across contexts
 */
export class Template {
  private readonly nodes: TemplateNode[];

  constructor(source: string, readonly id?: string) {
    this.nodes = parseTemplate(source, id);
  }

  render(context: object): string {
    return renderNodes(this.nodes, [context]);
  }
}

export function renderTemplate(source: string, context: object, templateId?: string): string {
  return new Template(source, templateId).render(context);
}
