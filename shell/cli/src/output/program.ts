// cli/src/output/program.ts — JSON envelope formatter for --json
//
// Exit codes:
//   0 — every system succeeded
//   1 — at least one system failed a stage
//   2 — CLI error (bad args, bad configuration)

export interface ProgramEnvelope {
  status: 'ok' | 'error';
  data?: unknown;
  error?: string;
}

export function emitEnvelope(envelope: ProgramEnvelope): void {
  try {
    console.log(JSON.stringify(envelope, null, 2));
  } catch (err) {
    console.log(JSON.stringify({ status: 'error', error: `Failed to serialize response: ${err instanceof Error ? err.message : String(err)}` }));
  }
}

export function emitOk(data?: unknown): void {
  const envelope: ProgramEnvelope = { status: 'ok' };
  if (data !== undefined) envelope.data = data;
  emitEnvelope(envelope);
}

export function emitError(message: string, data?: unknown): void {
  const envelope: ProgramEnvelope = { status: 'error', error: message };
  if (data !== undefined) envelope.data = data;
  emitEnvelope(envelope);
}
