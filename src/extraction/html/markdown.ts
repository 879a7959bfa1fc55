/**
 * HTML to markdown conversion over a cheerio/domhandler tree
 *
 * Covers the elements release-note pages are written with: headings,
 * paragraphs, lists, emphasis, links, inline and block code, quotes and
 * simple tables. Images, media and scripts are dropped.
 */

import { isTag, isText, type AnyNode, type Element } from 'domhandler';

const DROPPED_TAGS = new Set(['script', 'style', 'noscript', 'img', 'video', 'audio', 'source', 'iframe', 'svg', 'picture', 'template', 'button', 'form', 'input']);

const BLOCK_TAGS = new Set([
  'p', 'div', 'section', 'article', 'main', 'aside', 'header', 'footer', 'figure', 'figcaption',
  'details', 'summary', 'dl', 'dt', 'dd', 'center',
]);

export interface MarkdownOptions {
  /** Base URL to resolve relative links against */
  baseUrl?: string;
}

/**
 * Resolve an href against a base URL; null for unusable hrefs (javascript:, bad syntax)
 */
export function resolveHref(href: string | undefined, baseUrl?: string): string | null {
  if (!href) {
    return null;
  }
  const trimmed = href.trim();
  if (trimmed === '' || /^(?:javascript|mailto|tel|data):/i.test(trimmed)) {
    return null;
  }
  if (trimmed.startsWith('#') && !baseUrl) {
    return null;
  }
  if (!URL.canParse(trimmed, baseUrl)) {
    return null;
  }
  return new URL(trimmed, baseUrl).toString();
}

/**
 * Text content of a node tree with whitespace collapsed
 */
export function textOf(nodes: AnyNode | AnyNode[]): string {
  const list = Array.isArray(nodes) ? nodes : [nodes];
  let text = '';
  for (const node of list) {
    if (isText(node)) {
      text += node.data;
    } else if (isTag(node) && !DROPPED_TAGS.has(node.name)) {
      text += textOf(node.children);
    }
  }
  return text.replace(/\s+/g, ' ').trim();
}

function block(content: string): string {
  const trimmed = content.trim();
  return trimmed ? `\n\n${trimmed}\n\n` : '';
}

function indentContinuation(text: string, indent: string): string {
  return text
    .split('\n')
    .map((line, index) => (index === 0 || line === '' ? line : `${indent}${line}`))
    .join('\n');
}

function convertList(element: Element, options: MarkdownOptions): string {
  const ordered = element.name === 'ol';
  const items: string[] = [];
  let counter = 1;

  for (const child of element.children) {
    if (!isTag(child) || child.name !== 'li') {
      continue;
    }
    const content = convertNodes(child.children, options)
      .trim()
      .replace(/\n{2,}/g, '\n');
    if (!content) {
      continue;
    }
    const marker = ordered ? `${counter}. ` : '- ';
    counter++;
    items.push(`${marker}${indentContinuation(content, ' '.repeat(marker.length))}`);
  }

  return items.length > 0 ? `\n\n${items.join('\n')}\n\n` : '';
}

function convertTable(element: Element): string {
  const rows: string[][] = [];
  const collectRows = (node: Element): void => {
    for (const child of node.children) {
      if (!isTag(child)) continue;
      if (child.name === 'tr') {
        const cells = child.children
          .filter((cell): cell is Element => isTag(cell) && (cell.name === 'td' || cell.name === 'th'))
          .map(cell => textOf(cell).replace(/\|/g, '\\|'));
        if (cells.length > 0) {
          rows.push(cells);
        }
      } else if (child.name === 'thead' || child.name === 'tbody' || child.name === 'tfoot') {
        collectRows(child);
      }
    }
  };
  collectRows(element);

  if (rows.length === 0) {
    return '';
  }

  const width = Math.max(...rows.map(row => row.length));
  const pad = (row: string[]): string[] => [...row, ...Array<string>(width - row.length).fill('')];
  const lines = [
    `| ${pad(rows[0]).join(' | ')} |`,
    `| ${Array<string>(width).fill('---').join(' | ')} |`,
    ...rows.slice(1).map(row => `| ${pad(row).join(' | ')} |`),
  ];
  return `\n\n${lines.join('\n')}\n\n`;
}

function convertElement(element: Element, options: MarkdownOptions): string {
  const name = element.name;

  if (DROPPED_TAGS.has(name)) {
    return '';
  }

  const headingMatch = /^h([1-6])$/.exec(name);
  if (headingMatch) {
    const text = textOf(element);
    return text ? block(`${'#'.repeat(parseInt(headingMatch[1], 10))} ${text}`) : '';
  }

  switch (name) {
    case 'br':
      return '\n';
    case 'hr':
      return block('---');
    case 'ul':
    case 'ol':
      return convertList(element, options);
    case 'table':
      return convertTable(element);
    case 'pre': {
      const code = textContentRaw(element).replace(/^\n+|\s+$/g, '');
      return code ? `\n\n\`\`\`\n${code}\n\`\`\`\n\n` : '';
    }
    case 'blockquote': {
      const inner = convertNodes(element.children, options).trim();
      return inner ? block(inner.split('\n').map(line => (line ? `> ${line}` : '>')).join('\n')) : '';
    }
    case 'strong':
    case 'b': {
      const inner = convertNodes(element.children, options).trim();
      return inner ? `**${inner}**` : '';
    }
    case 'em':
    case 'i': {
      const inner = convertNodes(element.children, options).trim();
      return inner ? `*${inner}*` : '';
    }
    case 'code':
    case 'kbd': {
      const inner = textOf(element);
      return inner ? `\`${inner}\`` : '';
    }
    case 'a': {
      const inner = convertNodes(element.children, options).trim();
      const href = resolveHref(element.attribs.href, options.baseUrl);
      if (!inner) return '';
      return href ? `[${inner}](${href})` : inner;
    }
    default:
      if (BLOCK_TAGS.has(name)) {
        return block(convertNodes(element.children, options));
      }
      return convertNodes(element.children, options);
  }
}

function textContentRaw(node: AnyNode): string {
  if (isText(node)) {
    return node.data;
  }
  if (isTag(node)) {
    return node.children.map(textContentRaw).join('');
  }
  return '';
}

function convertNodes(nodes: AnyNode[], options: MarkdownOptions): string {
  let output = '';
  for (const node of nodes) {
    if (isText(node)) {
      const text = node.data.replace(/\s+/g, ' ');
      output += output === '' || output.endsWith('\n') ? text.trimStart() : text;
    } else if (isTag(node)) {
      output += convertElement(node, options);
    }
  }
  return output;
}

/**
 * Convert a list of sibling nodes to markdown
 */
export function nodesToMarkdown(nodes: AnyNode[], options: MarkdownOptions = {}): string {
  return convertNodes(nodes, options)
    .split('\n')
    .map(line => line.replace(/[ \t]+$/, ''))
    .map(line => (/^\s+$/.test(line) ? '' : line))
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
