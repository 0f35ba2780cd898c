export type TreeViewErrorCode = 'lifecycle' | 'navigation' | 'config' | 'source-open';

export class TreeViewError extends Error {
  constructor(message: string, public readonly code: TreeViewErrorCode) {
    super(message);
    this.name = new.target.name;
  }
}

export type LifecycleOperation = 'enable' | 'disable' | 'sourceChanged' | 'sourceDestroyed';

export class LifecycleError extends TreeViewError {
  constructor(public readonly operation: LifecycleOperation, public readonly state: string, detail?: string) {
    super(detail ?? `Cannot ${describeOperation(operation)}: session is ${state}.`, 'lifecycle');
  }
}

export type NavigationFailure = 'no-source-bound' | 'no-such-line' | 'not-navigable' | 'source-unavailable';

export class NavigationError extends TreeViewError {
  constructor(public readonly reason: NavigationFailure, message: string) {
    super(message, 'navigation');
  }
}

export class SourceUnavailableError extends NavigationError {
  constructor(sourceTitle: string) {
    super('source-unavailable', `Cannot navigate: source no longer available: ${sourceTitle}.`);
  }
}

export class ConfigError extends TreeViewError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length ? `${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message, 'config');
  }
}

export class SourceOpenError extends TreeViewError {
  constructor(message: string, public readonly path: string) {
    super(message, 'source-open');
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function describeOperation(operation: LifecycleOperation): string {
  switch (operation) {
    case 'enable':
      return 'enable';
    case 'disable':
      return 'disable';
    case 'sourceChanged':
      return 'refresh on source change';
    case 'sourceDestroyed':
      return 'tear down on source destruction';
  }
}
