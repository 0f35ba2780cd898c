import { Node, parseTree, ParseError, ParseOptions, printParseErrorCode } from 'jsonc-parser';
import { NodeModel, Offset, Span } from './nodeModel';

export const defaultParseOptions: ParseOptions = {
  allowTrailingComma: true,
  disallowComments: false
};

export interface JsonAnalysisResult {
  errors: ParseError[];
  root: NodeModel;
}

export interface TextPosition {
  line: number;
  character: number;
}

// Adapts a jsonc-parser node. Children are wrapped on first access so large
// documents are not copied up front.
class JsonTreeNode implements NodeModel {
  public readonly span: Readonly<Span>;
  private wrappedChildren: readonly NodeModel[] | undefined;

  constructor(private readonly node: Node) {
    this.span = { start: node.offset, end: node.offset + node.length };
  }

  public get type(): string {
    return this.node.type;
  }

  public get children(): readonly NodeModel[] {
    if (!this.wrappedChildren) {
      this.wrappedChildren = (this.node.children ?? []).map((child) => new JsonTreeNode(child));
    }
    return this.wrappedChildren;
  }
}

export function toNodeModel(node: Node): NodeModel {
  return new JsonTreeNode(node);
}

export function analyzeJsonText(text: string, options: ParseOptions = defaultParseOptions): JsonAnalysisResult {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, options);
  return {
    errors,
    root: root ? toNodeModel(root) : { type: 'document', span: { start: 0, end: text.length }, children: [] }
  };
}

export function positionAt(text: string, offset: Offset): TextPosition {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let line = 0;
  let lineStart = 0;
  for (let index = 0; index < clamped; index += 1) {
    if (text.charCodeAt(index) === 10) {
      line += 1;
      lineStart = index + 1;
    }
  }
  return { line, character: clamped - lineStart };
}

export function lineAt(text: string, line: number): string {
  return text.split(/\r?\n/)[line] ?? '';
}

export function describeParseError(text: string, error: ParseError): string {
  const position = positionAt(text, error.offset);
  return `${printParseErrorCode(error.error)} at ${position.line + 1}:${position.character + 1}`;
}
