export class DecisionLedgerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecisionLedgerError";
  }
}

export class IngestError extends DecisionLedgerError {
  constructor(
    message: string,
    public readonly decisionId: string | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "IngestError";
  }
}

export class SinkConnectionError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, null, options);
    this.name = "SinkConnectionError";
  }
}

export class InvalidEventError extends DecisionLedgerError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidEventError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
