import { fetch } from 'undici';
import type { AnomalyKind, TargetProtocol } from '@evsim/domain';

export type FetchLike = typeof fetch;

export class ApiRequestError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

export interface StartSessionBody {
  durationSeconds: number;
  anomalyKinds: AnomalyKind[];
  speedFactor: number;
}

export interface InjectAnomalyBody {
  kind: AnomalyKind;
  targetProtocol: TargetProtocol;
  severity: number;
}

function errorMessage(body: unknown, status: number): string {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return `request failed with status ${status}`;
}

/** Thin client for the simulator HTTP API. */
export class SimulatorApiClient {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  listScenarios(): Promise<unknown> {
    return this.request('GET', '/api/scenarios');
  }

  startSession(body: StartSessionBody): Promise<unknown> {
    return this.request('POST', '/api/sessions', body);
  }

  getSession(sessionId: string): Promise<unknown> {
    return this.request('GET', `/api/sessions/${encodeURIComponent(sessionId)}`);
  }

  stopSession(sessionId: string): Promise<unknown> {
    return this.request('POST', `/api/sessions/${encodeURIComponent(sessionId)}/stop`);
  }

  injectAnomaly(sessionId: string, body: InjectAnomalyBody): Promise<unknown> {
    return this.request('POST', `/api/sessions/${encodeURIComponent(sessionId)}/anomalies`, body);
  }

  runScenario(sessionId: string, scenarioId: string): Promise<unknown> {
    return this.request(
      'POST',
      `/api/sessions/${encodeURIComponent(sessionId)}/scenarios/${encodeURIComponent(scenarioId)}/run`,
    );
  }

  private async request(method: string, path: string, body?: object): Promise<unknown> {
    const resp = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    const text = await resp.text();
    const parsed: unknown = text === '' ? null : JSON.parse(text);
    if (!resp.ok) throw new ApiRequestError(resp.status, errorMessage(parsed, resp.status));
    return parsed;
  }
}
