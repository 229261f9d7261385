/**
 * Output sinks for generated text
 *
 * The host program decides where output goes and opens it; generators only write.
 */

export interface OutputStream {
  write(data: string): void;
  flush(): void;
}

/**
 * Anything that accepts string chunks, e.g. process.stdout or an fs.WriteStream
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * In-memory output, read back with getOutput()
 */
export class BufferedOutput implements OutputStream {
  private parts: string[] = [];

  write(data: string): void {
    if (!data) return;
    this.parts.push(data);
  }

  flush(): void {
    // Nothing is held back
  }

  getOutput(): string {
    return this.parts.join('');
  }
}

/**
 * Output forwarded to a stream the host already opened
 *
 * Each write goes straight to the sink, so text written before a failed
 * hook stays in place.
 */
export class WritableOutput implements OutputStream {
  constructor(private readonly sink: TextSink) {}

  write(data: string): void {
    if (!data) return;
    this.sink.write(data);
  }

  flush(): void {
    // The sink owns its own buffering
  }
}
