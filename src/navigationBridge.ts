import { NavigationError, SourceUnavailableError } from './errors';
import { TreeHost } from './host';
import { Offset, Span, spanContains } from './nodeModel';
import { DisplayLine } from './treeRenderer';
import { ViewSession } from './viewSession';

export interface NavigationResult {
  span: Readonly<Span>;
  highlighted: boolean;
}

// Focuses the source span behind a rendered line. Preconditions are checked
// before the host is touched, so a failed jump has no effect.
export function jumpTo<TSource, TView>(
  host: TreeHost<TSource, TView>,
  session: ViewSession<TSource, TView>,
  line: DisplayLine
): NavigationResult {
  assertBound(session);

  const span = line.navigableSpan;
  if (!span) {
    throw new NavigationError('not-navigable', `Cannot navigate: "${line.label}" is not a navigable line.`);
  }
  if (!host.isSourceAvailable(session.source)) {
    throw new SourceUnavailableError(session.title);
  }

  const highlighted = session.options.enableNavigation && session.options.highlightOnNavigate;
  host.focusAndSelect(session.source, span, highlighted);
  return { span, highlighted };
}

export function navigateToLine<TSource, TView>(
  host: TreeHost<TSource, TView>,
  session: ViewSession<TSource, TView>,
  lineIndex: number
): NavigationResult {
  assertBound(session);

  const line = Number.isInteger(lineIndex) ? session.lines[lineIndex] : undefined;
  if (!line) {
    throw new NavigationError(
      'no-such-line',
      `Cannot navigate: line ${lineIndex} does not exist (view has ${session.lines.length} lines).`
    );
  }
  return jumpTo(host, session, line);
}

// Index of the deepest rendered line covering `offset`. Sibling spans do not
// overlap, so the last covering line in pre-order is the innermost one.
export function locateLine<TSource, TView>(session: ViewSession<TSource, TView>, offset: Offset): number | undefined {
  const lines = session.lines;
  for (let index = lines.length - 1; index >= 0; index -= 1) {
    const span = lines[index].navigableSpan;
    if (span && spanContains(span, offset)) {
      return index;
    }
  }
  return undefined;
}

function assertBound<TSource, TView>(session: ViewSession<TSource, TView>) {
  if (session.state === 'active') {
    return;
  }
  if (session.teardownReason === 'source-destroyed') {
    throw new SourceUnavailableError(session.title);
  }
  throw new NavigationError('no-source-bound', 'Cannot navigate: no source is bound to this tree view.');
}
