/**
 * Metrics sinks: the per-epoch report goes to a local JSONL log and,
 * optionally, a remote ingest endpoint.
 *
 * Sinks are fire-and-forget: a failing sink never stalls the epoch loop.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { errorMessage } from "@tensorpeer/core";
import { silentLog, type Log } from "@tensorpeer/effect-runtime";

export type MetricsRecord = Readonly<Record<string, number>>;

export interface MetricsSink {
  log(record: MetricsRecord, step: number): void;
  flush(): Promise<void>;
  close(): Promise<void>;
}

// ── JSONL file ─────────────────────────────────────────────────────────────

/**
 * Appends one `{"step":…, …}` line per record to `file`. Lines are buffered
 * and written every `flushEvery` records, on flush() and on close().
 */
export async function openJsonlMetricsSink(file: string, flushEvery = 10, log: Log = silentLog): Promise<MetricsSink> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const handle = await fs.open(file, "a");
  let buffer: string[] = [];
  let writing: Promise<void> = Promise.resolve();
  let closed = false;

  function flushLines(): Promise<void> {
    if (buffer.length === 0) return writing;
    const chunk = buffer.join("");
    buffer = [];
    // chain writes so lines land in order
    writing = writing
      .then(async () => {
        await handle.write(chunk);
      })
      .catch((e: unknown) => log.warn("metrics write failed", { file, error: errorMessage(e) }));
    return writing;
  }

  return {
    log(record, step) {
      if (closed) return;
      buffer.push(JSON.stringify({ step, ...record }) + "\n");
      if (buffer.length >= flushEvery) void flushLines();
    },
    flush: flushLines,
    async close() {
      if (closed) return;
      closed = true;
      await flushLines();
      await handle.close();
    },
  };
}

// ── Remote ingest ──────────────────────────────────────────────────────────

export interface RemoteMetricsSinkConfig {
  /** Base URL of the ingest server. */
  url: string;
  /** Bearer token for authentication. */
  secret: string;
  /** Identifies this neuron's stream on the server. */
  runId: string;
  /** Records buffered before a flush (default 1: every record). */
  batchSize?: number;
  /** Max time between flushes in ms (default 5000). */
  flushInterval?: number;
  log?: Log;
}

/** Buffers records and POSTs them to `${url}/api/ingest`. */
export function createRemoteMetricsSink(config: RemoteMetricsSinkConfig): MetricsSink {
  const { url, secret, runId } = config;
  const batchSize = config.batchSize ?? 1;
  const flushInterval = config.flushInterval ?? 5000;
  const log = config.log ?? silentLog;

  let buffer: Array<{ step: number } & MetricsRecord> = [];
  let timer: ReturnType<typeof setInterval> | null = null;
  let postErrorCount = 0;

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Authorization: `Bearer ${secret}`,
  };

  async function post(route: string, body: unknown): Promise<void> {
    try {
      const res = await fetch(`${url}${route}`, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(15_000),
      });
      if (!res.ok) {
        postErrorCount++;
        // first 5 errors, then every 100th
        if (postErrorCount <= 5 || postErrorCount % 100 === 0) {
          log.warn(`metrics POST ${route} failed`, { status: res.status, errors: postErrorCount });
        }
      } else if (postErrorCount > 0) {
        log.info(`metrics POST ${route} recovered`, { errors: postErrorCount });
        postErrorCount = 0;
      }
    } catch (e) {
      postErrorCount++;
      if (postErrorCount <= 5 || postErrorCount % 100 === 0) {
        log.warn(`metrics POST ${route} error`, { error: errorMessage(e), errors: postErrorCount });
      }
    }
  }

  async function flushBuffer(): Promise<void> {
    if (buffer.length === 0) return;
    const batch = buffer;
    buffer = [];
    await post("/api/ingest", { type: "metrics", runId, metrics: batch });
  }

  function startTimer(): void {
    if (timer) return;
    timer = setInterval(() => {
      void flushBuffer();
    }, flushInterval);
    timer.unref();
  }

  function stopTimer(): void {
    if (timer) {
      clearInterval(timer);
      timer = null;
    }
  }

  return {
    log(record, step) {
      startTimer();
      buffer.push({ step, ...record });
      if (buffer.length >= batchSize) void flushBuffer();
    },
    flush: flushBuffer,
    async close() {
      stopTimer();
      await flushBuffer();
    },
  };
}

// ── Fan-out ────────────────────────────────────────────────────────────────

export function fanoutMetricsSink(sinks: readonly MetricsSink[]): MetricsSink {
  return {
    log(record, step) {
      for (const s of sinks) s.log(record, step);
    },
    async flush() {
      await Promise.all(sinks.map((s) => s.flush()));
    },
    async close() {
      await Promise.all(sinks.map((s) => s.close()));
    },
  };
}
