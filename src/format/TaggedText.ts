/**
 * Nested tagged-block text encoding
 * 嵌套标签块文本编码
 *
 * Blocks look like `<tag>...</tag>`. A block holds either child blocks or a
 * single text value, never both. Whitespace between child blocks is ignored;
 * text values are kept verbatim after unescaping.
 * 块要么包含子块，要么包含单个文本值，不会同时包含两者。
 */

import { RecordingFormatError } from '../core/Errors';
import type { Vec2 } from '../core/Types';

const TAG_PATTERN = /<(\/?)([A-Za-z][A-Za-z0-9_]*)>/g;

export function escapeText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function unescapeText(value: string): string {
  return value.replace(/&(amp|lt|gt);/g, (_match, name: string) => {
    switch (name) {
      case 'lt':
        return '<';
      case 'gt':
        return '>';
      default:
        return '&';
    }
  });
}

/**
 * Incremental writer producing indented tagged text
 * 生成带缩进标签文本的增量写入器
 *
 * @example
 * ```typescript
 * const w = new TaggedTextWriter();
 * w.open('tick');
 * w.leaf('netid', 7);
 * w.close();
 * w.toString(); // "<tick>\n  <netid>7</netid>\n</tick>\n"
 * ```
 */
export class TaggedTextWriter {
  private lines: string[] = [];
  private stack: string[] = [];

  constructor(private readonly indent = '  ') {}

  open(tag: string): this {
    this.push(`<${tag}>`);
    this.stack.push(tag);
    return this;
  }

  close(): this {
    const tag = this.stack.pop();
    if (tag === undefined) {
      throw new Error('TaggedTextWriter.close() called with no open block');
    }
    this.push(`</${tag}>`);
    return this;
  }

  leaf(tag: string, value: string | number): this {
    const text = typeof value === 'number' ? String(value) : escapeText(value);
    this.push(`<${tag}>${text}</${tag}>`);
    return this;
  }

  vec2(tag: string, value: Vec2): this {
    return this.leaf(tag, `${value.x},${value.y}`);
  }

  toString(): string {
    if (this.stack.length > 0) {
      throw new Error(`Unclosed blocks: ${this.stack.join(' > ')}`);
    }
    return this.lines.length > 0 ? this.lines.join('\n') + '\n' : '';
  }

  private push(content: string): void {
    this.lines.push(this.indent.repeat(this.stack.length) + content);
  }
}

interface RawNode {
  tag: string;
  children: RawNode[];
  text: string;
}

/**
 * Read-only view over a parsed block with typed accessors
 * 已解析块的只读视图，提供类型化访问器
 */
export class TaggedBlock {
  private constructor(
    private readonly node: RawNode,
    readonly path: string
  ) {}

  /**
   * Parse text holding exactly one top-level block
   * 解析恰好包含一个顶层块的文本
   */
  static parse(source: string): TaggedBlock {
    const root: RawNode = { tag: '', children: [], text: '' };
    const stack: RawNode[] = [root];
    let cursor = 0;

    TAG_PATTERN.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = TAG_PATTERN.exec(source)) !== null) {
      const top = stack[stack.length - 1];
      top.text += source.slice(cursor, match.index);
      cursor = match.index + match[0].length;

      const closing = match[1] === '/';
      const tag = match[2];

      if (!closing) {
        const node: RawNode = { tag, children: [], text: '' };
        top.children.push(node);
        stack.push(node);
        continue;
      }

      if (stack.length === 1) {
        throw new RecordingFormatError(`Unexpected closing tag </${tag}>`);
      }
      if (top.tag !== tag) {
        throw new RecordingFormatError(`Mismatched closing tag </${tag}>, expected </${top.tag}>`, pathOf(stack));
      }
      if (top.children.length > 0 && top.text.trim() !== '') {
        throw new RecordingFormatError(`Block <${tag}> mixes text and child blocks`, pathOf(stack));
      }
      if (top.text.includes('<') || top.text.includes('>')) {
        throw new RecordingFormatError(`Stray angle bracket inside <${tag}>`, pathOf(stack));
      }
      stack.pop();
    }

    root.text += source.slice(cursor);
    if (stack.length > 1) {
      throw new RecordingFormatError(`Unclosed block <${stack[stack.length - 1].tag}>`, pathOf(stack));
    }
    if (root.text.trim() !== '') {
      throw new RecordingFormatError('Text outside the top-level block');
    }
    if (root.children.length !== 1) {
      throw new RecordingFormatError(`Expected exactly one top-level block, found ${root.children.length}`);
    }

    const top = root.children[0];
    return new TaggedBlock(top, top.tag);
  }

  get tag(): string {
    return this.node.tag;
  }

  /** Unescaped text value of this block 该块的反转义文本值 */
  get value(): string {
    if (this.node.children.length > 0) {
      throw new RecordingFormatError(`Expected a value, found child blocks`, this.path);
    }
    return unescapeText(this.node.text);
  }

  has(tag: string): boolean {
    return this.node.children.some(c => c.tag === tag);
  }

  /**
   * First child with the tag; throws when absent
   * 获取第一个匹配标签的子块，不存在时抛出
   */
  child(tag: string): TaggedBlock {
    const found = this.optionalChild(tag);
    if (!found) {
      throw new RecordingFormatError(`Missing <${tag}>`, this.path);
    }
    return found;
  }

  optionalChild(tag: string): TaggedBlock | undefined {
    const node = this.node.children.find(c => c.tag === tag);
    return node ? new TaggedBlock(node, `${this.path}/${tag}`) : undefined;
  }

  /**
   * All children with the tag, in document order
   * 按文档顺序返回所有匹配标签的子块
   */
  children(tag: string): TaggedBlock[] {
    const out: TaggedBlock[] = [];
    this.node.children.forEach((node, i) => {
      if (node.tag === tag) {
        out.push(new TaggedBlock(node, `${this.path}/${tag}[${i}]`));
      }
    });
    return out;
  }

  text(tag: string): string {
    return this.child(tag).value;
  }

  float(tag: string): number {
    const block = this.child(tag);
    return parseNumber(block.value, block.path);
  }

  int(tag: string): number {
    const block = this.child(tag);
    const n = parseNumber(block.value, block.path);
    if (!Number.isInteger(n)) {
      throw new RecordingFormatError(`Expected an integer, got "${block.value}"`, block.path);
    }
    return n;
  }

  uint(tag: string, max = Number.MAX_SAFE_INTEGER): number {
    const block = this.child(tag);
    const n = this.int(tag);
    if (n < 0 || n > max) {
      throw new RecordingFormatError(`Value ${n} out of range [0, ${max}]`, block.path);
    }
    return n;
  }

  vec2(tag: string): Vec2 {
    const block = this.child(tag);
    const parts = block.value.split(',');
    if (parts.length !== 2) {
      throw new RecordingFormatError(`Expected "x,y", got "${block.value}"`, block.path);
    }
    return {
      x: parseNumber(parts[0], block.path),
      y: parseNumber(parts[1], block.path)
    };
  }
}

// decimal as String(number) writes it; exponents always carry a sign
const NUMBER_PATTERN = /^-?\d+(\.\d+)?(e[+-]\d+)?$/;

function parseNumber(raw: string, path: string): number {
  const trimmed = raw.trim();
  const n = Number(trimmed);
  if (!NUMBER_PATTERN.test(trimmed) || !Number.isFinite(n)) {
    throw new RecordingFormatError(`Expected a number, got "${raw}"`, path);
  }
  return n;
}

function pathOf(stack: RawNode[]): string {
  return stack.slice(1).map(n => n.tag).join('/');
}
