import fs from 'node:fs';
import path from 'node:path';
import { RemoteWorkerConfig } from '../config/schema.js';
import { TimeoutExceededError, WorkerCallError } from '../types/errors.js';
import { classifyHttpStatus } from '../reliability/classify.js';
import { parseArtifactDeclarations } from './artifacts.js';
import { AttemptResult, WorkerContext } from './types.js';

export type RemoteWorkerSpec = RemoteWorkerConfig & { id: string };

export interface RemoteRequestPayload {
  run_id: string;
  phase: string;
  worker: string;
  request: string;
  phase_artifacts: Record<string, string[]>;
}

const TEXT_FIELDS = ['output', 'text', 'content'] as const;

/**
 * Pull the reply text out of a response body.
 * JSON bodies with an `output`, `text` or `content` string use that field;
 * anything else is taken verbatim.
 */
export function extractResponseText(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === 'object') {
      for (const field of TEXT_FIELDS) {
        const value: unknown = Reflect.get(parsed, field);
        if (typeof value === 'string') return value;
      }
    }
  } catch {
    // not JSON, use the raw body
  }
  return body;
}

export function transcriptDir(context: WorkerContext, phase: string, workerId: string): string {
  return path.join(context.run_dir, 'transcripts', phase, workerId);
}

function writeTranscript(dir: string, name: string, content: string): void {
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, name), content);
}

function buildHeaders(worker: RemoteWorkerSpec): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    ...worker.headers
  };
  if (worker.api_key_env) {
    const token = process.env[worker.api_key_env];
    if (!token) {
      throw new WorkerCallError(`${worker.id}: env var ${worker.api_key_env} is not set`, {
        kind: 'worker_failed'
      });
    }
    headers.Authorization = `Bearer ${token}`;
  }
  return headers;
}

/**
 * Run one attempt of a remote worker: send the rendered request, read the reply.
 *
 * The request and the raw reply are written to the worker's transcript
 * directory before anything is parsed, so failed calls are auditable too.
 */
export async function runRemoteAttempt(
  worker: RemoteWorkerSpec,
  phase: string,
  context: WorkerContext,
  signal: AbortSignal
): Promise<AttemptResult> {
  const payload: RemoteRequestPayload = {
    run_id: context.run_id,
    phase,
    worker: worker.id,
    request: worker.request,
    phase_artifacts: context.phase_artifacts
  };
  const body = JSON.stringify(payload, null, 2);
  const dir = transcriptDir(context, phase, worker.id);
  writeTranscript(dir, 'request.json', body);

  const headers = buildHeaders(worker);

  let response: Response;
  try {
    response = await fetch(worker.endpoint, {
      method: worker.method,
      headers,
      body,
      signal
    });
  } catch (error) {
    if (signal.aborted && signal.reason instanceof TimeoutExceededError) {
      throw signal.reason;
    }
    const message = error instanceof Error ? error.message : String(error);
    writeTranscript(dir, 'response.txt', `<no response: ${message}>`);
    throw new WorkerCallError(`Request to ${worker.endpoint} failed: ${message}`, { kind: 'network' });
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    if (signal.aborted && signal.reason instanceof TimeoutExceededError) {
      throw signal.reason;
    }
    const message = error instanceof Error ? error.message : String(error);
    writeTranscript(dir, 'response.txt', `<unreadable response: HTTP ${response.status}: ${message}>`);
    throw new WorkerCallError(`${worker.id} sent a response that could not be read: ${message}`, {
      kind: 'invalid_response'
    });
  }
  writeTranscript(dir, 'response.txt', text);

  if (!response.ok) {
    throw new WorkerCallError(`${worker.id} returned HTTP ${response.status}`, {
      kind: classifyHttpStatus(response.status),
      output: text.slice(0, 500)
    });
  }

  const output = extractResponseText(text);
  return {
    exit_code: 0,
    output,
    artifacts: parseArtifactDeclarations(output)
  };
}
