import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import { minimatch } from 'minimatch';
import { ParseError } from 'jsonc-parser';
import { describeError, isNodeError, SourceOpenError } from './errors';
import { Disposable, toDisposable, TreeHost } from './host';
import { analyzeJsonText, describeParseError, lineAt, positionAt } from './jsonAnalysis';
import { NodeModel, Span } from './nodeModel';
import { Logger, silentLogger } from './outputChannel';
import { DisplayLine, formatDisplayLine } from './treeRenderer';

// Slash-free patterns are matched against the file name only.
export const SUPPORTED_FILES = '*.{json,jsonc}';

export interface FileTreeHostOptions {
  output?: NodeJS.WritableStream;
  logger?: Logger;
  /** Turn external saves and deletions into commit / destroy notifications. */
  watch?: boolean;
  include?: string;
}

type SourceEvent = 'commit' | 'destroy';

// An open JSON/JSONC document. Edits reparse immediately; only saves are
// announced as commits.
export class FileSource {
  public readonly path: string;
  public readonly displayName: string;
  public selection: Readonly<Span> | undefined;
  public highlighted = false;
  private currentText = '';
  private savedText = '';
  private tree: NodeModel | undefined;
  private errors: ParseError[] = [];
  private closed = false;
  private watcher: fs.FSWatcher | undefined;
  private readonly events = new EventEmitter();

  constructor(filePath: string) {
    this.path = filePath;
    this.displayName = path.basename(filePath);
  }

  public get text(): string {
    return this.currentText;
  }

  public get savedContent(): string {
    return this.savedText;
  }

  public get isDirty(): boolean {
    return this.currentText !== this.savedText;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public get parseErrors(): readonly ParseError[] {
    return this.errors;
  }

  public getTree(): NodeModel {
    if (this.closed || !this.tree) {
      throw new SourceOpenError(`Source ${this.displayName} is closed.`, this.path);
    }
    return this.tree;
  }

  public on(event: SourceEvent, callback: () => void): Disposable {
    this.events.on(event, callback);
    return toDisposable(() => this.events.off(event, callback));
  }

  public update(text: string, saved: boolean) {
    const analysis = analyzeJsonText(text);
    this.currentText = text;
    this.tree = analysis.root;
    this.errors = analysis.errors;
    if (saved) {
      this.savedText = text;
    }
  }

  public emit(event: SourceEvent) {
    this.events.emit(event);
  }

  public attachWatcher(watcher: fs.FSWatcher | undefined) {
    this.watcher?.close();
    this.watcher = watcher;
  }

  public markClosed() {
    this.closed = true;
    this.attachWatcher(undefined);
    this.selection = undefined;
  }

  public dispose() {
    this.events.removeAllListeners();
  }
}

export class TextPane {
  public lines: string[] = [];
  public disposed = false;

  constructor(public readonly title: string) {}
}

/**
 * Node host: sources are files on disk, view surfaces are text panes printed
 * to an output stream.
 */
export class FileTreeHost implements TreeHost<FileSource, TextPane> {
  private readonly output: NodeJS.WritableStream;
  private readonly logger: Logger;
  private readonly watch: boolean;
  private readonly include: string;

  constructor(options: FileTreeHostOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.logger = options.logger ?? silentLogger;
    this.watch = options.watch ?? false;
    this.include = options.include ?? SUPPORTED_FILES;
  }

  public open(filePath: string): FileSource {
    const absolute = path.resolve(filePath);
    if (!minimatch(absolute, this.include, { nocase: true, dot: true, matchBase: true })) {
      throw new SourceOpenError(`Unsupported file ${filePath}: expected a path matching ${this.include}.`, filePath);
    }

    let text: string;
    try {
      text = fs.readFileSync(absolute, 'utf8');
    } catch (error) {
      throw new SourceOpenError(`Unable to read ${filePath}: ${describeError(error)}`, filePath);
    }

    const source = new FileSource(absolute);
    source.update(text, true);
    this.reportParseErrors(source);
    if (this.watch) {
      this.startWatching(source);
    }
    this.logger.log(`Opened ${source.displayName}.`);
    return source;
  }

  public edit(source: FileSource, text: string): void {
    this.assertOpen(source);
    source.update(text, false);
  }

  public save(source: FileSource, text?: string): void {
    this.assertOpen(source);
    if (text !== undefined) {
      source.update(text, false);
    }
    fs.writeFileSync(source.path, source.text, 'utf8');
    source.update(source.text, true);
    this.reportParseErrors(source);
    this.logger.log(`Saved ${source.displayName}.`);
    source.emit('commit');
  }

  public close(source: FileSource): void {
    if (source.isClosed) {
      return;
    }
    source.markClosed();
    this.logger.log(`Closed ${source.displayName}.`);
    source.emit('destroy');
    source.dispose();
  }

  public getTree(source: FileSource): NodeModel {
    return source.getTree();
  }

  public onCommit(source: FileSource, callback: () => void): Disposable {
    return source.on('commit', callback);
  }

  public onDestroy(source: FileSource, callback: () => void): Disposable {
    return source.on('destroy', callback);
  }

  public isSourceAvailable(source: FileSource): boolean {
    return !source.isClosed;
  }

  public describeSource(source: FileSource): string {
    return source.displayName;
  }

  public createViewSurface(title: string): TextPane {
    return new TextPane(title);
  }

  public setViewContent(pane: TextPane, lines: readonly DisplayLine[]): void {
    const width = String(Math.max(lines.length - 1, 0)).length;
    pane.lines = lines.map((line, index) => `${String(index).padStart(width)} | ${formatDisplayLine(line)}`);
    this.printPane(pane);
  }

  public destroyViewSurface(pane: TextPane): void {
    pane.disposed = true;
    this.output.write(`=== closed: ${pane.title} ===\n`);
  }

  public printPane(pane: TextPane): void {
    this.output.write([`=== ${pane.title} ===`, ...pane.lines].join('\n') + '\n');
  }

  public focusAndSelect(source: FileSource, span: Readonly<Span>, highlight: boolean): void {
    this.assertOpen(source);
    source.selection = span;
    source.highlighted = highlight;

    const start = positionAt(source.text, span.start);
    const end = positionAt(source.text, span.end);
    const text = lineAt(source.text, start.line);
    const gutter = String(start.line + 1);
    const out = [`${source.displayName}:${start.line + 1}:${start.character + 1}`, `${gutter} | ${text}`];
    if (highlight) {
      const endCharacter = end.line === start.line ? end.character : text.length;
      const width = Math.max(1, endCharacter - start.character);
      out.push(`${' '.repeat(gutter.length)} | ${' '.repeat(start.character)}${'^'.repeat(width)}`);
    }
    this.output.write(out.join('\n') + '\n');
  }

  private startWatching(source: FileSource) {
    const watcher = fs.watch(source.path, (eventType) => this.handleFileEvent(source, eventType));
    watcher.on('error', (error) => {
      this.logger.log(`Watcher for ${source.displayName} failed: ${describeError(error)}`);
      this.close(source);
    });
    source.attachWatcher(watcher);
  }

  private handleFileEvent(source: FileSource, eventType: string) {
    if (source.isClosed) {
      return;
    }
    // Atomic saves replace the file, which ends the current watch. A deleted
    // file cannot be watched or read again.
    if (eventType === 'rename') {
      try {
        this.startWatching(source);
      } catch (error) {
        this.logger.log(`Stopped watching ${source.displayName}: ${describeError(error)}`);
        this.close(source);
        return;
      }
    }

    let text: string;
    try {
      text = fs.readFileSync(source.path, 'utf8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        this.close(source);
        return;
      }
      this.logger.log(`Unable to reload ${source.displayName}: ${describeError(error)}`);
      return;
    }
    if (text === source.savedContent) {
      return;
    }
    source.update(text, true);
    this.reportParseErrors(source);
    this.logger.log(`${source.displayName} changed on disk.`);
    source.emit('commit');
  }

  private reportParseErrors(source: FileSource) {
    for (const error of source.parseErrors) {
      this.logger.log(`${source.displayName}: ${describeParseError(source.text, error)}`);
    }
  }

  private assertOpen(source: FileSource) {
    if (source.isClosed) {
      throw new SourceOpenError(`Source ${source.displayName} is closed.`, source.path);
    }
  }
}
