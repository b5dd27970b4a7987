// src/ports/output.ts
// Where side-effecting natives write their bytes

export interface OutputPort {
  write(bytes: Uint8Array): void;
}

/** Writes straight to the process's stdout. */
export class StdoutPort implements OutputPort {
  write(bytes: Uint8Array): void {
    process.stdout.write(bytes);
  }
}

/** Collects writes in memory; used by tests and embedders. */
export class BufferOutputPort implements OutputPort {
  private readonly chunks: Uint8Array[] = [];

  write(bytes: Uint8Array): void {
    this.chunks.push(Uint8Array.from(bytes));
  }

  /** Every chunk written so far, in order. */
  writes(): Uint8Array[] {
    return [...this.chunks];
  }

  text(): string {
    return this.chunks.map((c) => Buffer.from(c).toString("utf8")).join("");
  }
}
