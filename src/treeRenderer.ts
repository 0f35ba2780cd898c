import { formatSpan, NodeModel, Span } from './nodeModel';
import { walkTree } from './treeSearch';

export interface DisplayLine {
  readonly indentLevel: number;
  readonly label: string;
  readonly navigableSpan?: Readonly<Span>;
}

const INDENT = '  ';

// One line per node in forward pre-order. Pure: the same tree and flag always
// produce the same lines.
export function renderTree(root: NodeModel, navigationEnabled: boolean): DisplayLine[] {
  const lines: DisplayLine[] = [];
  walkTree(root, (node, depth) => {
    lines.push(
      navigationEnabled
        ? { indentLevel: depth, label: node.type, navigableSpan: { start: node.span.start, end: node.span.end } }
        : { indentLevel: depth, label: node.type }
    );
  });
  return lines;
}

export function formatDisplayLine(line: DisplayLine): string {
  const text = `${INDENT.repeat(line.indentLevel)}${line.label}:`;
  return line.navigableSpan ? `${text} ${formatSpan(line.navigableSpan)}` : text;
}

export function formatDisplayLines(lines: readonly DisplayLine[]): string[] {
  return lines.map(formatDisplayLine);
}
