import type {
  TemplateDocument,
  TemplateElement,
  TemplateMiscNode,
  TemplateNode,
  XmlDeclaration,
} from './types.js';

/**
 * Writes a template tree back to text.
 *
 * Untouched start tags are emitted verbatim; everything else is written in
 * one canonical form so that serialize(parse(serialize(parse(x)))) equals
 * serialize(parse(x)).
 */
export function serializeTemplate(document: TemplateDocument): string {
  const parts: string[] = [];

  if (document.declaration) {
    parts.push(formatDeclaration(document.declaration));
  }
  for (const node of document.prolog) {
    parts.push(formatMisc(node));
  }
  parts.push(formatElement(document.root));
  for (const node of document.epilog) {
    parts.push(formatMisc(node));
  }

  let text = parts.join('\n');
  if (document.trailingNewline) {
    text += '\n';
  }
  return document.lineEnding === '\r\n' ? text.replace(/\n/g, '\r\n') : text;
}

function isUtf8Label(encoding: string): boolean {
  return /^utf-?8$/i.test(encoding);
}

/**
 * Output is always UTF-8, so a declared legacy encoding is rewritten.
 */
function formatDeclaration(declaration: XmlDeclaration): string {
  const encoding = declaration.encoding;
  if (declaration.raw && (encoding === undefined || isUtf8Label(encoding))) {
    return declaration.raw;
  }
  let text = `<?xml version="${declaration.version}"`;
  if (encoding !== undefined) {
    text += ` encoding="${isUtf8Label(encoding) ? encoding : 'UTF-8'}"`;
  }
  if (declaration.standalone !== undefined) {
    text += ` standalone="${declaration.standalone}"`;
  }
  return `${text}?>`;
}

function formatMisc(node: TemplateMiscNode): string {
  switch (node.kind) {
    case 'comment':
      return `<!--${node.value}-->`;
    case 'instruction':
      return node.body.length > 0 ? `<?${node.target} ${node.body}?>` : `<?${node.target}?>`;
    case 'doctype':
      return /^\s/.test(node.value) ? `<!DOCTYPE${node.value}>` : `<!DOCTYPE ${node.value}>`;
  }
}

function formatNode(node: TemplateNode): string {
  switch (node.kind) {
    case 'element':
      return formatElement(node);
    case 'text':
      return escapeText(node.value);
    case 'cdata':
      return `<![CDATA[${node.value}]]>`;
    case 'comment':
    case 'instruction':
      return formatMisc(node);
  }
}

export function formatElement(element: TemplateElement): string {
  const selfClosing = element.selfClosing && element.children.length === 0;
  const raw = element.rawStartTag;
  const startTag =
    raw !== undefined && raw.endsWith('/>') === selfClosing ? raw : formatStartTag(element, selfClosing);
  if (selfClosing) {
    return startTag;
  }
  return `${startTag}${element.children.map(formatNode).join('')}</${element.name}>`;
}

export function formatStartTag(element: TemplateElement, selfClosing: boolean): string {
  let text = `<${element.name}`;
  for (const [name, value] of element.attributes) {
    text += ` ${name}="${escapeAttribute(value)}"`;
  }
  return selfClosing ? `${text}/>` : `${text}>`;
}

export function escapeText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/"/g, '&quot;')
    .replace(/\t/g, '&#9;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;');
}
