export type { NodeModel, Offset, Span } from './nodeModel';
export { formatSpan, spanContains } from './nodeModel';
export type { NodePredicate, SearchDirection } from './treeSearch';
export { searchTree, Unbounded, walkTree } from './treeSearch';
export type { DisplayLine } from './treeRenderer';
export { formatDisplayLine, formatDisplayLines, renderTree } from './treeRenderer';
export type { Disposable, TreeHost } from './host';
export { toDisposable } from './host';
export type { LifecycleState, TeardownReason, TreeViewOptions } from './viewSession';
export { defaultTreeViewOptions, resolveTreeViewOptions, ViewSession } from './viewSession';
export type { NavigationResult } from './navigationBridge';
export { jumpTo, locateLine, navigateToLine } from './navigationBridge';
export { TreeViewDebugger } from './treeDebugger';
export type { LifecycleOperation, NavigationFailure, TreeViewErrorCode } from './errors';
export {
  ConfigError,
  LifecycleError,
  NavigationError,
  SourceOpenError,
  SourceUnavailableError,
  TreeViewError
} from './errors';
export type { JsonAnalysisResult, TextPosition } from './jsonAnalysis';
export { analyzeJsonText, positionAt, toNodeModel } from './jsonAnalysis';
export type { FileTreeHostOptions } from './fileHost';
export { FileSource, FileTreeHost, TextPane } from './fileHost';
export type { LoadConfigRequest, LoadedConfig } from './config';
export { CONFIG_FILE, CONFIG_SECTION, loadConfig, parseConfigText } from './config';
export type { Logger } from './outputChannel';
export { OutputChannel, silentLogger } from './outputChannel';
