export interface OutputSink {
  write: (chunk: string) => void;
  toString: () => string;
}

/** Append-only in-memory buffer. */
export class StringSink implements OutputSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}
