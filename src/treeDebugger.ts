import { describeError, LifecycleError } from './errors';
import { TreeHost } from './host';
import { jumpTo, navigateToLine, NavigationResult } from './navigationBridge';
import { Logger, silentLogger } from './outputChannel';
import { DisplayLine } from './treeRenderer';
import { resolveTreeViewOptions, TreeViewOptions, ViewSession } from './viewSession';

/**
 * Entry point a host calls to turn tree debugging on and off for a source.
 * Keeps at most one active session per source.
 */
export class TreeViewDebugger<TSource, TView> {
  private readonly sessions = new Map<TSource, ViewSession<TSource, TView>>();

  constructor(private readonly host: TreeHost<TSource, TView>, private readonly logger: Logger = silentLogger) {}

  public enableDebugging(source: TSource, options?: Partial<TreeViewOptions>): ViewSession<TSource, TView> {
    const existing = this.sessions.get(source);
    if (existing) {
      throw new LifecycleError(
        'enable',
        existing.state,
        `Cannot enable: ${existing.title} already has an active tree view.`
      );
    }

    const session = new ViewSession(this.host, source, resolveTreeViewOptions(options), this.logger, (closed) =>
      this.forget(closed)
    );
    session.enable();
    this.sessions.set(source, session);
    return session;
  }

  public disableDebugging(session: ViewSession<TSource, TView>): void {
    session.disable();
  }

  public navigate(session: ViewSession<TSource, TView>, lineIndex: number): NavigationResult {
    return this.logNavigation(session, () => navigateToLine(this.host, session, lineIndex));
  }

  public jumpTo(session: ViewSession<TSource, TView>, line: DisplayLine): NavigationResult {
    return this.logNavigation(session, () => jumpTo(this.host, session, line));
  }

  public sessionFor(source: TSource): ViewSession<TSource, TView> | undefined {
    return this.sessions.get(source);
  }

  public get activeSessionCount(): number {
    return this.sessions.size;
  }

  public dispose(): void {
    for (const session of Array.from(this.sessions.values())) {
      session.disable();
    }
  }

  private logNavigation(session: ViewSession<TSource, TView>, navigation: () => NavigationResult): NavigationResult {
    try {
      const result = navigation();
      this.logger.log(`Navigated ${session.title} to [${result.span.start}, ${result.span.end}).`);
      return result;
    } catch (error) {
      this.logger.log(`Navigation failed: ${describeError(error)}`);
      throw error;
    }
  }

  private forget(session: ViewSession<TSource, TView>) {
    if (this.sessions.get(session.source) === session) {
      this.sessions.delete(session.source);
    }
  }
}
