import type { ExistenceProbe, ProbeOutcome, StagedArtifactFile } from '../contracts.js';
import { errorMessage, ProbeIndeterminateError } from '../errors.js';
import { getLogger, type Logger } from '../logging/logger.js';

export const DEFAULT_RECONCILE_CONCURRENCY = 8;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 500;

export type FileOutcome = 'published' | 'needs-upload' | 'indeterminate';

export interface ReconcileProgress {
  file: StagedArtifactFile;
  outcome: FileOutcome;
  settled: number;
  total: number;
}

export interface ReconcileOptions {
  /** Maximum probes in flight at once. */
  concurrency?: number;
  /** Extra attempts after the first indeterminate probe of a file. */
  maxRetries?: number;
  retryDelayMs?: number;
  /** Cancels the pass when aborted, like {@link ReconciliationTask.cancel}. */
  signal?: AbortSignal;
  onProgress?: (progress: ReconcileProgress) => void;
  logger?: Logger;
}

export interface ReconcileResult {
  /** Confirmed absent from the remote store, in input order. */
  needsUpload: StagedArtifactFile[];
  /** Confirmed present in the remote store, in input order. */
  published: StagedArtifactFile[];
  /** Files still indeterminate after every retry. */
  errors: ProbeIndeterminateError[];
  /** Files without a settled outcome when the pass was cancelled. */
  cancelled: StagedArtifactFile[];
  /** Probe calls issued, retries included. */
  attempts: number;
}

type Settlement =
  | { kind: 'published' }
  | { kind: 'needs-upload' }
  | { kind: 'indeterminate'; error: ProbeIndeterminateError };

/** Resolves `true` after `ms`, or `false` as soon as the signal aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/** Settles with the probe outcome, or with `undefined` once the signal aborts. */
function untilAborted(promise: Promise<ProbeOutcome>, signal: AbortSignal): Promise<ProbeOutcome | undefined> {
  if (signal.aborted) return Promise.resolve(undefined);
  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(undefined);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (outcome) => {
        signal.removeEventListener('abort', onAbort);
        resolve(outcome);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

function integerAtLeast(value: number, name: string, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`${name} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}

/**
 * One reconciliation pass over a set of staged files.
 *
 * The pass starts on construction. Await {@link done} for the result, poll
 * {@link settled}, or {@link cancel} it; a cancelled pass still resolves with every
 * outcome settled before cancellation.
 */
export class ReconciliationTask {
  readonly total: number;
  readonly done: Promise<ReconcileResult>;

  private readonly controller = new AbortController();
  private readonly slots: Array<Settlement | undefined>;
  private readonly concurrency: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private settledCount = 0;
  private attemptCount = 0;
  private finished = false;

  constructor(
    private readonly staged: readonly StagedArtifactFile[],
    private readonly probe: ExistenceProbe,
    private readonly opts: ReconcileOptions = {}
  ) {
    this.total = staged.length;
    this.slots = new Array<Settlement | undefined>(staged.length).fill(undefined);
    this.concurrency = integerAtLeast(opts.concurrency ?? DEFAULT_RECONCILE_CONCURRENCY, 'concurrency', 1);
    this.maxRetries = integerAtLeast(opts.maxRetries ?? DEFAULT_MAX_RETRIES, 'maxRetries', 0);
    this.retryDelayMs = integerAtLeast(opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS, 'retryDelayMs', 0);
    this.logger = opts.logger ?? getLogger('reconcile');
    this.done = this.run();
  }

  get settled(): number {
    return this.settledCount;
  }

  get isDone(): boolean {
    return this.finished;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    if (this.finished || this.controller.signal.aborted) return;
    this.logger.info('Reconciliation cancelled', { settled: this.settledCount, total: this.total });
    this.controller.abort();
  }

  private async run(): Promise<ReconcileResult> {
    const external = this.opts.signal;
    const onExternalAbort = (): void => this.cancel();
    if (external?.aborted) {
      this.controller.abort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    this.logger.info('Reconciling staged artifacts', {
      files: this.total,
      concurrency: this.concurrency,
      maxRetries: this.maxRetries
    });

    let next = 0;
    const worker = async (): Promise<void> => {
      while (!this.controller.signal.aborted) {
        const index = next++;
        if (index >= this.staged.length) return;

        const file = this.staged[index];
        const settlement = await this.resolveFile(file);
        if (!settlement) return;

        this.slots[index] = settlement;
        this.settledCount++;
        this.reportProgress({ file, outcome: settlement.kind, settled: this.settledCount, total: this.total });
      }
    };

    try {
      const workers = Array.from({ length: Math.min(this.concurrency, this.staged.length) }, () => worker());
      await Promise.all(workers);
    } finally {
      external?.removeEventListener('abort', onExternalAbort);
      this.finished = true;
    }

    const result = this.collect();
    this.logger.info('Reconciliation finished', {
      needsUpload: result.needsUpload.length,
      published: result.published.length,
      errors: result.errors.length,
      cancelled: result.cancelled.length,
      attempts: result.attempts
    });
    return result;
  }

  /** A failing progress callback is logged; it never stops the pass. */
  private reportProgress(progress: ReconcileProgress): void {
    if (!this.opts.onProgress) return;
    try {
      this.opts.onProgress(progress);
    } catch (err) {
      this.logger.error(`Progress callback failed for ${progress.file.fileName}`, err instanceof Error ? err : new Error(errorMessage(err)));
    }
  }

  private async probeOnce(file: StagedArtifactFile): Promise<ProbeOutcome | undefined> {
    const signal = this.controller.signal;
    try {
      return await untilAborted(this.probe.probe(file.fileName, { signal }), signal);
    } catch (err) {
      // A probe that throws could not reach a verdict; it never means "absent".
      return { status: 'indeterminate', reason: errorMessage(err) };
    }
  }

  /** Returns `undefined` when the pass was cancelled before the file settled. */
  private async resolveFile(file: StagedArtifactFile): Promise<Settlement | undefined> {
    const signal = this.controller.signal;
    const maxAttempts = this.maxRetries + 1;
    let lastReason = 'no probe attempted';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1 && !(await sleep(this.retryDelayMs, signal))) return undefined;
      if (signal.aborted) return undefined;

      this.attemptCount++;
      const outcome = await this.probeOnce(file);
      if (!outcome) return undefined;

      if (outcome.status === 'found') return { kind: 'published' };
      if (outcome.status === 'not-found') return { kind: 'needs-upload' };

      lastReason = outcome.reason;
      this.logger.debug(`Probe for ${file.fileName} was indeterminate`, { attempt, maxAttempts, reason: lastReason });
    }

    const error = new ProbeIndeterminateError(file, maxAttempts, lastReason);
    this.logger.warn(error.message, { fileName: file.fileName, attempts: maxAttempts });
    return { kind: 'indeterminate', error };
  }

  private collect(): ReconcileResult {
    const result: ReconcileResult = {
      needsUpload: [],
      published: [],
      errors: [],
      cancelled: [],
      attempts: this.attemptCount
    };

    this.slots.forEach((slot, index) => {
      const file = this.staged[index];
      if (!slot) {
        result.cancelled.push(file);
      } else if (slot.kind === 'published') {
        result.published.push(file);
      } else if (slot.kind === 'needs-upload') {
        result.needsUpload.push(file);
      } else {
        result.errors.push(slot.error);
      }
    });

    return result;
  }
}

/** Starts a pass in the background and returns its handle immediately. */
export function startReconciliation(
  staged: readonly StagedArtifactFile[],
  probe: ExistenceProbe,
  opts: ReconcileOptions = {}
): ReconciliationTask {
  return new ReconciliationTask(staged, probe, opts);
}

/**
 * Runs a pass to completion, every retry included, before returning. Batch callers use
 * this so the process never exits with probes still pending.
 */
export async function reconcile(
  staged: readonly StagedArtifactFile[],
  probe: ExistenceProbe,
  opts: ReconcileOptions = {}
): Promise<ReconcileResult> {
  return startReconciliation(staged, probe, opts).done;
}
