import type { ExistenceProbe, ProbeOutcome } from '../contracts.js';
import { errorMessage } from '../errors.js';

export interface HttpProbeConfig {
  /** Public location of published artifacts; files live at `{baseUrl}/{fileName}`. */
  baseUrl: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

/** Statuses that confirm the file is absent. Anything else that is not 2xx is inconclusive. */
const ABSENT_STATUSES = new Set([404, 410]);

export function isProbeBaseUrlAllowed(baseUrl: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch {
    return false;
  }
  return parsed.protocol === 'http:' || parsed.protocol === 'https:';
}

export function outcomeForStatus(status: number): ProbeOutcome {
  if (status >= 200 && status < 300) return { status: 'found' };
  if (ABSENT_STATUSES.has(status)) return { status: 'not-found' };
  return { status: 'indeterminate', reason: `HTTP ${status}` };
}

/** Existence probe that issues `HEAD {baseUrl}/{fileName}` against a public store. */
export class HttpExistenceProbe implements ExistenceProbe {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(config: HttpProbeConfig) {
    if (!isProbeBaseUrlAllowed(config.baseUrl)) {
      throw new Error(`Probe base URL must be http(s): ${config.baseUrl}`);
    }
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.headers = config.headers ?? {};
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  urlFor(fileName: string): string {
    return `${this.baseUrl}/${encodeURIComponent(fileName)}`;
  }

  async probe(fileName: string, opts: { signal?: AbortSignal } = {}): Promise<ProbeOutcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(this.urlFor(fileName), {
        method: 'HEAD',
        headers: this.headers,
        signal: controller.signal
      });
      return outcomeForStatus(response.status);
    } catch (err) {
      const reason = controller.signal.aborted && !opts.signal?.aborted ? `timed out after ${this.timeoutMs}ms` : errorMessage(err);
      return { status: 'indeterminate', reason };
    } finally {
      clearTimeout(timeout);
      opts.signal?.removeEventListener('abort', onAbort);
    }
  }
}
