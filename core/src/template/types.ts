/**
 * In-memory model of a strategy template.
 *
 * The tree is ordered and mutable. Attribute order is the insertion order
 * of the `attributes` map, so updating an existing attribute keeps its slot
 * and adding one appends it.
 */

export interface TemplateElement {
  kind: 'element';
  name: string;
  attributes: Map<string, string>;
  children: TemplateNode[];
  /** True when the source wrote the element as `<Tag/>` */
  selfClosing: boolean;
  /**
   * Start tag exactly as read from the source (line endings normalized).
   * Written back as-is until the element's attributes change.
   */
  rawStartTag?: string;
}

export interface TemplateText {
  kind: 'text';
  value: string;
}

export interface TemplateCData {
  kind: 'cdata';
  value: string;
}

export interface TemplateComment {
  kind: 'comment';
  value: string;
}

export interface TemplateInstruction {
  kind: 'instruction';
  target: string;
  body: string;
}

export interface TemplateDoctype {
  kind: 'doctype';
  value: string;
}

export type TemplateNode =
  | TemplateElement
  | TemplateText
  | TemplateCData
  | TemplateComment
  | TemplateInstruction;

export type TemplateMiscNode = TemplateComment | TemplateInstruction | TemplateDoctype;

export interface XmlDeclaration {
  version: string;
  encoding?: string;
  standalone?: string;
  /** Declaration exactly as read from the source */
  raw?: string;
}

export type LineEnding = '\n' | '\r\n';

export interface TemplateDocument {
  declaration?: XmlDeclaration;
  /** Comments, processing instructions and doctype before the root */
  prolog: TemplateMiscNode[];
  root: TemplateElement;
  /** Comments and processing instructions after the root */
  epilog: TemplateMiscNode[];
  lineEnding: LineEnding;
  trailingNewline: boolean;
}

export function createElement(name: string, attributes: Iterable<[string, string]> = []): TemplateElement {
  return {
    kind: 'element',
    name,
    attributes: new Map(attributes),
    children: [],
    selfClosing: false,
  };
}

export function createText(value: string): TemplateText {
  return { kind: 'text', value };
}

export function isElement(node: TemplateNode): node is TemplateElement {
  return node.kind === 'element';
}

export function childElements(element: TemplateElement): TemplateElement[] {
  return element.children.filter(isElement);
}

/**
 * Text content of an element: the concatenation of its text and CDATA children.
 */
export function textContent(element: TemplateElement): string {
  let value = '';
  for (const child of element.children) {
    if (child.kind === 'text' || child.kind === 'cdata') {
      value += child.value;
    }
  }
  return value;
}
