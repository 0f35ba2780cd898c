import { NodeModel, Span } from './nodeModel';
import { DisplayLine } from './treeRenderer';

export interface Disposable {
  dispose(): void;
}

/**
 * What the core needs from the editor (or other host) that owns the source
 * text and the view surfaces. `TSource` and `TView` are opaque handles.
 */
export interface TreeHost<TSource, TView> {
  /** Root of the current parse tree for `source`. */
  getTree(source: TSource): NodeModel;
  /** Fires at commit-level checkpoints (e.g. save), not per keystroke. */
  onCommit(source: TSource, callback: () => void): Disposable;
  onDestroy(source: TSource, callback: () => void): Disposable;
  isSourceAvailable(source: TSource): boolean;
  describeSource(source: TSource): string;

  createViewSurface(title: string): TView;
  setViewContent(view: TView, lines: readonly DisplayLine[]): void;
  destroyViewSurface(view: TView): void;

  focusAndSelect(source: TSource, span: Readonly<Span>, highlight: boolean): void;
}

export function toDisposable(dispose: () => void): Disposable {
  let disposed = false;
  return {
    dispose() {
      if (disposed) {
        return;
      }
      disposed = true;
      dispose();
    }
  };
}
