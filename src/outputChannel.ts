export interface Logger {
  log(message: string): void;
}

export const silentLogger: Logger = {
  log() {
    // discarded
  }
};

// Line-oriented log sink, one timestamped entry per call.
export class OutputChannel implements Logger {
  constructor(
    public readonly name: string,
    private readonly stream: NodeJS.WritableStream = process.stderr,
    private readonly now: () => Date = () => new Date()
  ) {}

  public appendLine(value: string): void {
    this.stream.write(`${value}\n`);
  }

  public log(message: string): void {
    this.appendLine(`[${this.now().toISOString()}] ${message}`);
  }
}
