import { describeError, LifecycleError, LifecycleOperation } from './errors';
import { Disposable, TreeHost } from './host';
import { Logger, silentLogger } from './outputChannel';
import { DisplayLine, renderTree } from './treeRenderer';

export type LifecycleState = 'inactive' | 'active';

export type TeardownReason = 'disabled' | 'source-destroyed';

export interface TreeViewOptions {
  enableNavigation: boolean;
  highlightOnNavigate: boolean;
}

export const defaultTreeViewOptions: Readonly<TreeViewOptions> = {
  enableNavigation: false,
  highlightOnNavigate: false
};

export function resolveTreeViewOptions(options: Partial<TreeViewOptions> = {}): TreeViewOptions {
  return {
    enableNavigation: options.enableNavigation ?? defaultTreeViewOptions.enableNavigation,
    highlightOnNavigate: options.highlightOnNavigate ?? defaultTreeViewOptions.highlightOnNavigate
  };
}

interface ActiveBinding<TView> {
  view: TView;
  lines: readonly DisplayLine[];
  subscriptions: Disposable[];
}

/**
 * Binds one source to one rendered tree view. Every sync point re-renders the
 * whole tree; the view never holds partial state.
 *
 * Instances are created and torn down by `TreeViewDebugger` only.
 */
export class ViewSession<TSource, TView> {
  private binding: ActiveBinding<TView> | undefined;
  private lastTeardown: TeardownReason | undefined;

  constructor(
    private readonly host: TreeHost<TSource, TView>,
    public readonly source: TSource,
    public readonly options: Readonly<TreeViewOptions>,
    private readonly logger: Logger = silentLogger,
    private readonly onDeactivated?: (session: ViewSession<TSource, TView>) => void
  ) {}

  public get state(): LifecycleState {
    return this.binding ? 'active' : 'inactive';
  }

  public get view(): TView | undefined {
    return this.binding?.view;
  }

  public get lines(): readonly DisplayLine[] {
    return this.binding?.lines ?? [];
  }

  public get teardownReason(): TeardownReason | undefined {
    return this.lastTeardown;
  }

  public get title(): string {
    return this.host.describeSource(this.source);
  }

  public enable(): void {
    if (this.binding) {
      throw new LifecycleError('enable', this.state);
    }

    const title = this.title;
    const view = this.host.createViewSurface(`Parse Tree: ${title}`);
    const subscriptions: Disposable[] = [];
    let binding: ActiveBinding<TView>;
    try {
      const lines = this.renderInto(view);
      subscriptions.push(this.host.onCommit(this.source, () => this.handleNotification('sourceChanged')));
      subscriptions.push(this.host.onDestroy(this.source, () => this.handleNotification('sourceDestroyed')));
      binding = { view, lines, subscriptions };
    } catch (error) {
      this.rollback(title, view, subscriptions);
      throw error;
    }

    this.binding = binding;
    this.lastTeardown = undefined;
    this.logger.log(`Enabled tree view for ${title} (${binding.lines.length} nodes).`);
  }

  public onSourceChanged(): void {
    const binding = this.requireActive('sourceChanged');
    binding.lines = this.renderInto(binding.view);
    this.logger.log(`Re-rendered tree view for ${this.title} (${binding.lines.length} nodes).`);
  }

  public onSourceDestroyed(): void {
    this.teardown('sourceDestroyed', 'source-destroyed');
  }

  public disable(): void {
    this.teardown('disable', 'disabled');
  }

  private renderInto(view: TView): DisplayLine[] {
    const lines = renderTree(this.host.getTree(this.source), this.options.enableNavigation);
    this.host.setViewContent(view, lines);
    return lines;
  }

  // Cleanup failures are logged so the error that aborted enable() is the one
  // the caller sees.
  private rollback(title: string, view: TView, subscriptions: Disposable[]) {
    try {
      disposeAll(subscriptions);
    } catch (cleanupError) {
      this.logger.log(`Rollback of tree view for ${title} failed: ${describeError(cleanupError)}`);
    }
    try {
      this.host.destroyViewSurface(view);
    } catch (cleanupError) {
      this.logger.log(`Rollback of tree view for ${title} failed: ${describeError(cleanupError)}`);
    }
  }

  private teardown(operation: LifecycleOperation, reason: TeardownReason) {
    const binding = this.requireActive(operation);
    const title = this.title;
    disposeAll(binding.subscriptions);
    this.binding = undefined;
    this.lastTeardown = reason;
    this.host.destroyViewSurface(binding.view);
    this.logger.log(
      reason === 'source-destroyed'
        ? `Source ${title} was destroyed; tree view closed.`
        : `Disabled tree view for ${title}.`
    );
    this.onDeactivated?.(this);
  }

  // Subscriptions are disposed on teardown; anything a host still delivers
  // afterwards is stale.
  private handleNotification(operation: 'sourceChanged' | 'sourceDestroyed') {
    if (!this.binding) {
      this.logger.log(`Ignored stale ${operation} notification for ${this.title}.`);
      return;
    }
    if (operation === 'sourceChanged') {
      this.onSourceChanged();
    } else {
      this.onSourceDestroyed();
    }
  }

  private requireActive(operation: LifecycleOperation): ActiveBinding<TView> {
    if (!this.binding) {
      throw new LifecycleError(operation, this.state);
    }
    return this.binding;
  }
}

function disposeAll(disposables: Disposable[]) {
  while (disposables.length) {
    disposables.pop()?.dispose();
  }
}
