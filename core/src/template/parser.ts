import { SaxesParser } from 'saxes';
import { createParserError, ParserErrorCode } from '../errors/index.js';
import type {
  TemplateDocument,
  TemplateElement,
  TemplateMiscNode,
  TemplateNode,
  XmlDeclaration,
} from './types.js';

export interface ParseTemplateOptions {
  /** Used in error locations only */
  filePath?: string;
}

/**
 * Parses normalized template text into an ordered tree.
 *
 * Whitespace inside the root element is kept as text nodes. Whitespace
 * between top-level nodes is not kept; the serializer writes one newline
 * there.
 */
export function parseTemplate(text: string, options: ParseTemplateOptions = {}): TemplateDocument {
  const unmarked = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const source = unmarked.replace(/\r\n?/g, '\n');
  const parser = new SaxesParser({ xmlns: false, position: true });

  const stack: TemplateElement[] = [];
  const prolog: TemplateMiscNode[] = [];
  const epilog: TemplateMiscNode[] = [];
  // Assigned from parser callbacks
  const found: { root?: TemplateElement; declaration?: XmlDeclaration } = {};

  const appendMisc = (node: TemplateMiscNode & TemplateNode): void => {
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else if (found.root) {
      epilog.push(node);
    } else {
      prolog.push(node);
    }
  };

  parser.on('xmldecl', (decl) => {
    const end = source.indexOf('?>');
    found.declaration = {
      version: decl.version ?? '1.0',
      encoding: decl.encoding,
      standalone: decl.standalone,
      raw: source.startsWith('<?xml') && end > 0 ? source.slice(0, end + 2) : undefined,
    };
  });

  parser.on('doctype', (doctype) => {
    prolog.push({ kind: 'doctype', value: doctype });
  });

  parser.on('comment', (comment) => {
    appendMisc({ kind: 'comment', value: comment });
  });

  parser.on('processinginstruction', (instruction) => {
    appendMisc({ kind: 'instruction', target: instruction.target, body: instruction.body });
  });

  parser.on('opentag', (tag) => {
    const rawStartTag = readRawStartTag(source, parser.position, tag.name);
    const element: TemplateElement = {
      kind: 'element',
      name: tag.name,
      attributes: readAttributes(tag.attributes),
      children: [],
      selfClosing: rawStartTag?.endsWith('/>') ?? false,
      rawStartTag,
    };
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(element);
    } else {
      found.root = element;
    }
    stack.push(element);
  });

  // Fires for self-closing tags too, right after their opentag
  parser.on('closetag', () => {
    stack.pop();
  });

  parser.on('text', (value) => {
    const parent = stack[stack.length - 1];
    if (!parent) {
      return;
    }
    const last = parent.children[parent.children.length - 1];
    if (last && last.kind === 'text') {
      last.value += value;
    } else {
      parent.children.push({ kind: 'text', value });
    }
  });

  parser.on('cdata', (value) => {
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push({ kind: 'cdata', value });
    }
  });

  try {
    parser.write(source).close();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw createParserError(
      ParserErrorCode.INVALID_TEMPLATE_XML,
      `Template is not well-formed XML: ${reason}`,
      { filePath: options.filePath, context: `line ${parser.line}, column ${parser.column}`, cause: error },
    );
  }

  const { root, declaration } = found;
  if (!root) {
    throw createParserError(ParserErrorCode.INVALID_TEMPLATE_XML, 'Template has no root element.', {
      filePath: options.filePath,
    });
  }

  return {
    declaration,
    prolog,
    root,
    epilog,
    lineEnding: unmarked.includes('\r\n') ? '\r\n' : '\n',
    trailingNewline: source.endsWith('\n'),
  };
}

function readAttributes(attributes: Record<string, unknown>): Map<string, string> {
  const map = new Map<string, string>();
  for (const [name, value] of Object.entries(attributes)) {
    if (typeof value === 'string') {
      map.set(name, value);
    }
  }
  return map;
}

/**
 * Recovers the verbatim start tag ending at (or just after) `position`.
 * `<` cannot occur inside a start tag, so the last `<` before the closing
 * `>` opens it.
 */
function readRawStartTag(source: string, position: number, name: string): string | undefined {
  const close = source.indexOf('>', Math.max(0, position - 1));
  if (close < 0) {
    return undefined;
  }
  const open = source.lastIndexOf('<', close);
  if (open < 0) {
    return undefined;
  }
  const raw = source.slice(open, close + 1);
  const afterName = raw.charAt(name.length + 1);
  if (!raw.startsWith(`<${name}`) || !/[\s/>]/.test(afterName)) {
    return undefined;
  }
  return raw;
}
