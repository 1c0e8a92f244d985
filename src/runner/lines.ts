import type { Readable, Writable } from 'stream';

/** Yields the stream's text one line at a time, line terminators included. */
export async function* readLines(stream: Readable): AsyncGenerator<string> {
  stream.setEncoding('utf8');
  let buffer = '';
  for await (const chunk of stream) {
    buffer += String(chunk);
    let newlineIndex: number;
    while ((newlineIndex = buffer.indexOf('\n')) !== -1) {
      yield buffer.slice(0, newlineIndex + 1);
      buffer = buffer.slice(newlineIndex + 1);
    }
  }
  if (buffer.length > 0) yield buffer;
}

export interface LineSink {
  write(line: string): void;
}

/** Accumulates lines for the caller. */
export class CaptureSink implements LineSink {
  private readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }

  get text(): string {
    return this.lines.join('');
  }
}

/** Echoes lines to a stream, each ending in exactly one newline. */
export class EchoSink implements LineSink {
  constructor(private readonly out: Writable) {}

  write(line: string): void {
    this.out.write(line.replace(/\r?\n$/, '') + '\n');
  }
}

export async function drainLines(stream: Readable, sinks: readonly LineSink[]): Promise<void> {
  for await (const line of readLines(stream)) {
    for (const sink of sinks) sink.write(line);
  }
}
