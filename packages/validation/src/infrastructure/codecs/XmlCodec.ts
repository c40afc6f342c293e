import type { RawRecord } from '@customer360/core';
import { MalformedFileError } from '@customer360/core';
import type { RecordCodec, ParsedItem } from '../../domain/ports/RecordCodec.js';

export interface XmlCodecOptions {
  /** Tag name that wraps each record. Default: `'Customer'`. */
  readonly recordTag?: string;
  /** Root tag used when serializing. Default: `'Customers'`. */
  readonly rootTag?: string;
}

interface XmlElement {
  readonly name: string;
  readonly children: XmlElement[];
  /** Text and CDATA segments directly inside this element, entity-decoded. */
  readonly text: string[];
  /** Child elements and text in document order, for text-content extraction. */
  readonly content: (XmlElement | string)[];
}

const NAME = '[A-Za-z_][\\w.:-]*';
const OPEN_TAG = new RegExp(`^(${NAME})((?:\\s+${NAME}\\s*=\\s*(?:"[^"]*"|'[^']*'))*)\\s*$`);
const CLOSE_TAG = new RegExp(`^/(${NAME})\\s*$`);
const XML_NAME = new RegExp(`^${NAME}$`);
const ENTITY = /&(#x[0-9a-fA-F]+|#\d+|[A-Za-z]+);/y;

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

/**
 * XML codec. Zero dependencies: a small scanner checks that the document is
 * well formed (single root, balanced and properly nested tags, valid entities)
 * before any record is extracted.
 *
 * Expected format:
 * ```xml
 * <Customers>
 *   <Customer>
 *     <CustomerID>1</CustomerID>
 *     <Name>Ana</Name>
 *     <City>Lisbon</City>
 *   </Customer>
 * </Customers>
 * ```
 *
 * Every `recordTag` element below the root becomes a record; its child elements
 * become fields holding their trimmed text content. Attributes are ignored.
 * A document that is not well formed fails as a whole with `MalformedFileError`.
 */
export class XmlCodec implements RecordCodec {
  readonly format = 'xml';
  private readonly recordTag: string;
  private readonly rootTag: string;

  constructor(options?: XmlCodecOptions) {
    this.recordTag = options?.recordTag ?? 'Customer';
    this.rootTag = options?.rootTag ?? 'Customers';
  }

  parse(data: string | Buffer): readonly ParsedItem[] {
    const content = typeof data === 'string' ? data : data.toString('utf-8');
    const trimmed = content.replace(/^\uFEFF/, '').trim();

    if (trimmed === '') {
      throw new MalformedFileError('xml', 'document is empty');
    }

    const root = this.parseDocument(trimmed);
    const items: ParsedItem[] = [];
    for (const element of this.findRecords(root)) {
      items.push({ raw: this.toRecord(element) });
    }
    return items;
  }

  serialize(records: readonly RawRecord[]): string {
    const lines = ['<?xml version="1.0" encoding="UTF-8"?>', `<${this.rootTag}>`];

    for (const record of records) {
      lines.push(`  <${this.recordTag}>`);
      for (const [key, value] of Object.entries(record)) {
        if (value === undefined || value === null || !XML_NAME.test(key)) continue;
        lines.push(`    <${key}>${escapeText(String(value))}</${key}>`);
      }
      lines.push(`  </${this.recordTag}>`);
    }

    lines.push(`</${this.rootTag}>`);
    return `${lines.join('\n')}\n`;
  }

  private parseDocument(content: string): XmlElement {
    const stack: XmlElement[] = [];
    let root: XmlElement | null = null;
    let pos = 0;

    while (pos < content.length) {
      const lt = content.indexOf('<', pos);
      const textEnd = lt === -1 ? content.length : lt;

      if (textEnd > pos) {
        const text = content.slice(pos, textEnd);
        const parent = stack[stack.length - 1];
        if (parent) {
          const decoded = decodeEntities(text);
          parent.text.push(decoded);
          parent.content.push(decoded);
        } else if (text.trim() !== '') {
          throw new MalformedFileError('xml', 'text outside the root element');
        }
      }
      if (lt === -1) break;

      if (content.startsWith('<!--', lt)) {
        pos = this.skipPast(content, lt, '-->', 'unterminated comment');
        continue;
      }

      if (content.startsWith('<![CDATA[', lt)) {
        const end = content.indexOf(']]>', lt);
        const parent = stack[stack.length - 1];
        if (end === -1) throw new MalformedFileError('xml', 'unterminated CDATA section');
        if (!parent) throw new MalformedFileError('xml', 'CDATA outside the root element');
        const text = content.slice(lt + '<![CDATA['.length, end);
        parent.text.push(text);
        parent.content.push(text);
        pos = end + 3;
        continue;
      }

      if (content.startsWith('<?', lt)) {
        pos = this.skipPast(content, lt, '?>', 'unterminated processing instruction');
        continue;
      }

      if (content.startsWith('<!', lt)) {
        const end = content.indexOf('>', lt);
        if (end === -1) throw new MalformedFileError('xml', 'unterminated declaration');
        if (root !== null) throw new MalformedFileError('xml', 'declaration after the root element');
        if (content.slice(lt, end).includes('[')) {
          throw new MalformedFileError('xml', 'DTD internal subsets are not supported');
        }
        pos = end + 1;
        continue;
      }

      const gt = findTagEnd(content, lt);
      if (gt === -1) throw new MalformedFileError('xml', 'unterminated tag');
      const inner = content.slice(lt + 1, gt);
      pos = gt + 1;

      const close = CLOSE_TAG.exec(inner);
      if (close) {
        const open = stack.pop();
        if (!open || open.name !== close[1]) {
          throw new MalformedFileError('xml', `mismatched closing tag </${String(close[1])}>`);
        }
        continue;
      }

      const selfClosing = inner.endsWith('/');
      const open = OPEN_TAG.exec(selfClosing ? inner.slice(0, -1) : inner);
      if (!open?.[1]) throw new MalformedFileError('xml', `invalid tag <${inner}>`);

      const element: XmlElement = { name: open[1], children: [], text: [], content: [] };
      const parent = stack[stack.length - 1];
      if (parent) {
        parent.children.push(element);
        parent.content.push(element);
      } else if (root !== null) {
        throw new MalformedFileError('xml', 'multiple root elements');
      } else {
        root = element;
      }
      if (!selfClosing) stack.push(element);
    }

    const unclosed = stack[stack.length - 1];
    if (unclosed) throw new MalformedFileError('xml', `unclosed element <${unclosed.name}>`);
    if (!root) throw new MalformedFileError('xml', 'no root element');
    return root;
  }

  private skipPast(content: string, from: number, terminator: string, message: string): number {
    const end = content.indexOf(terminator, from);
    if (end === -1) throw new MalformedFileError('xml', message);
    return end + terminator.length;
  }

  private findRecords(root: XmlElement): XmlElement[] {
    const found: XmlElement[] = [];
    const visit = (element: XmlElement): void => {
      for (const child of element.children) {
        if (child.name === this.recordTag) found.push(child);
        visit(child);
      }
    };
    visit(root);
    return found;
  }

  private toRecord(element: XmlElement): RawRecord {
    const fields: Record<string, unknown> = {};
    for (const child of element.children) {
      if (!(child.name in fields)) {
        fields[child.name] = textContent(child).trim();
      }
    }
    return fields;
  }
}

function findTagEnd(content: string, from: number): number {
  let quote: string | null = null;
  for (let i = from + 1; i < content.length; i++) {
    const ch = content[i];
    if (quote) {
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '<') {
      return -1;
    } else if (ch === '>') {
      return i;
    }
  }
  return -1;
}

function textContent(element: XmlElement): string {
  return element.content.map((part) => (typeof part === 'string' ? part : textContent(part))).join('');
}

function decodeEntities(text: string): string {
  let result = '';
  let pos = 0;

  while (pos < text.length) {
    const amp = text.indexOf('&', pos);
    if (amp === -1) {
      result += text.slice(pos);
      break;
    }
    result += text.slice(pos, amp);

    ENTITY.lastIndex = amp;
    const match = ENTITY.exec(text);
    const name = match?.[1];
    if (!match || name === undefined) {
      throw new MalformedFileError('xml', 'unescaped & in text');
    }
    result += resolveEntity(name);
    pos = amp + match[0].length;
  }

  return result;
}

function resolveEntity(name: string): string {
  if (name.startsWith('#')) {
    const codePoint = name.startsWith('#x') ? Number.parseInt(name.slice(2), 16) : Number.parseInt(name.slice(1), 10);
    if (!isCharacter(codePoint)) throw new MalformedFileError('xml', `invalid character reference &${name};`);
    return String.fromCodePoint(codePoint);
  }
  const named = NAMED_ENTITIES[name];
  if (named === undefined) throw new MalformedFileError('xml', `undefined entity &${name};`);
  return named;
}

/** Unicode scalar values other than NUL; surrogate halves cannot be referenced. */
function isCharacter(codePoint: number): boolean {
  return codePoint >= 0x1 && codePoint <= 0x10ffff && !(codePoint >= 0xd800 && codePoint <= 0xdfff);
}

function escapeText(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
