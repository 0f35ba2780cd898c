import { beforeEach, describe, expect, it } from 'vitest';
import { NavigationError, SourceUnavailableError } from '../src/errors';
import { jumpTo, locateLine } from '../src/navigationBridge';
import { TreeViewDebugger } from '../src/treeDebugger';
import { TreeViewOptions } from '../src/viewSession';
import { FakeHost, FakeSource, FakeView, fakeSource } from './helpers/fakeHost';
import { binaryProgram } from './helpers/trees';

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('expected the action to throw');
}

describe('navigation', () => {
  let host: FakeHost;
  let treeDebugger: TreeViewDebugger<FakeSource, FakeView>;
  let source: FakeSource;

  const enable = (options: Partial<TreeViewOptions>) => treeDebugger.enableDebugging(source, options);

  beforeEach(() => {
    host = new FakeHost();
    treeDebugger = new TreeViewDebugger(host);
    source = fakeSource('main.src', binaryProgram());
  });

  it('focuses the span of the clicked line', () => {
    const session = enable({ enableNavigation: true });

    const result = treeDebugger.navigate(session, 3);

    expect(result).toEqual({ span: { start: 4, end: 5 }, highlighted: false });
    expect(host.focusRequests).toEqual([{ source, span: { start: 4, end: 5 }, highlight: false }]);
  });

  it('highlights when asked to', () => {
    const session = enable({ enableNavigation: true, highlightOnNavigate: true });

    treeDebugger.navigate(session, 1);

    expect(host.focusRequests).toEqual([{ source, span: { start: 0, end: 5 }, highlight: true }]);
  });

  it('fails on lines without a span when navigation is disabled', () => {
    const session = enable({ highlightOnNavigate: true });

    const error = captureError(() => treeDebugger.navigate(session, 2));

    expect(error).toBeInstanceOf(NavigationError);
    expect(error).toMatchObject({ reason: 'not-navigable', code: 'navigation' });
    expect(host.focusRequests).toEqual([]);
  });

  it('fails on an index outside the view', () => {
    const session = enable({ enableNavigation: true });

    expect(() => treeDebugger.navigate(session, 4)).toThrow(
      'Cannot navigate: line 4 does not exist (view has 4 lines).'
    );
    expect(captureError(() => treeDebugger.navigate(session, -1))).toMatchObject({ reason: 'no-such-line' });
  });

  it('reports an unbound session after disable', () => {
    const session = enable({ enableNavigation: true });
    treeDebugger.disableDebugging(session);

    const error = captureError(() => treeDebugger.navigate(session, 0));

    expect(error).toBeInstanceOf(NavigationError);
    expect(error).not.toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({ reason: 'no-source-bound' });
  });

  it('reports a destroyed source', () => {
    const session = enable({ enableNavigation: true });
    host.destroy(source);

    const error = captureError(() => treeDebugger.navigate(session, 0));

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({
      reason: 'source-unavailable',
      message: 'Cannot navigate: source no longer available: main.src.'
    });
  });

  it('checks the host before focusing a source it has already dropped', () => {
    const session = enable({ enableNavigation: true });
    const line = session.lines[0];
    source.available = false;

    expect(() => jumpTo(host, session, line)).toThrow(SourceUnavailableError);
    expect(session.state).toBe('active');
    expect(host.focusRequests).toEqual([]);
  });

  it('locates the deepest line covering an offset', () => {
    const session = enable({ enableNavigation: true });

    expect(locateLine(session, 4)).toBe(3);
    expect(locateLine(session, 2)).toBe(1);
    expect(locateLine(session, 5)).toBe(0);
    expect(locateLine(session, 9)).toBeUndefined();
  });

  it('cannot locate offsets without rendered spans', () => {
    const session = enable({});

    expect(locateLine(session, 0)).toBeUndefined();
  });
});
