export interface DiagnosticsSink {
  onRecord(record: DiagnosticRecord): void
}

export interface DiagnosticRecord {
  readonly timestamp: number
  readonly level: 'debug' | 'info' | 'warn' | 'error'
  readonly code: DiagnosticCode
  readonly message: string
  readonly detail?: unknown
}

export type DiagnosticCode =
  | 'decoder-registered'
  | 'decoder-unregistered'
  | 'decoder-fallback'
  | 'malformed-layer'

/**
 * Sink that keeps every record in memory. Handy for tests and for tooling
 * that wants to show decode warnings next to a dissected packet.
 */
export class MemoryDiagnosticsSink implements DiagnosticsSink {
  readonly #records: DiagnosticRecord[] = []

  get records(): readonly DiagnosticRecord[] {
    return [...this.#records]
  }

  onRecord(record: DiagnosticRecord): void {
    this.#records.push(record)
  }

  clear(): void {
    this.#records.length = 0
  }
}
