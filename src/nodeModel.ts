export type Offset = number;

export interface Span {
  start: Offset;
  end: Offset;
}

// Read-only view of one parse-tree node. Parsers adapt their own node type to
// this shape; nothing in the core mutates it.
export interface NodeModel {
  readonly type: string;
  readonly span: Readonly<Span>;
  readonly children: readonly NodeModel[];
}

export function spanContains(span: Readonly<Span>, offset: Offset): boolean {
  return offset >= span.start && offset < span.end;
}

export function formatSpan(span: Readonly<Span>): string {
  return `[${span.start}, ${span.end})`;
}
