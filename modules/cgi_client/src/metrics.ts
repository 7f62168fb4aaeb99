import type { CgiMethod, ClientKind } from './types.js';

export type CallOutcome = 'success' | 'error';

interface LatencyStat {
  totalMs: number;
  count: number;
}

interface OutcomeStat {
  total: number;
  success: number;
  error: number;
}

export interface MetricsSnapshot {
  calls: Record<CgiMethod, OutcomeStat>;
  latency: Record<CgiMethod, { averageMs: number; samples: number }>;
  backends: Record<ClientKind, OutcomeStat>;
  classifications: Record<CgiMethod, Record<string, number>>;
}

export interface RecordCallParams {
  backend: ClientKind;
  method: CgiMethod;
  outcome: CallOutcome;
  durationMs: number;
  classification?: string;
}

let callCounters = createMethodCounters();
let backendCounters = createBackendCounters();
let latencyTotals = createLatencyTotals();
let classificationTotals: Record<CgiMethod, Record<string, number>> = { GET: {}, POST: {} };

export function recordCall(params: RecordCallParams): void {
  const { backend, method, outcome, durationMs, classification } = params;

  const methodCounter = callCounters[method];
  methodCounter.total += 1;
  methodCounter[outcome] += 1;

  const backendCounter = backendCounters[backend];
  backendCounter.total += 1;
  backendCounter[outcome] += 1;

  const latency = latencyTotals[method];
  if (Number.isFinite(durationMs) && durationMs >= 0) {
    latency.totalMs += durationMs;
    latency.count += 1;
  }

  if (classification) {
    const bucket = classificationTotals[method];
    bucket[classification] = (bucket[classification] ?? 0) + 1;
  }
}

export function getMetricsSnapshot(): MetricsSnapshot {
  return {
    calls: {
      GET: { ...callCounters.GET },
      POST: { ...callCounters.POST }
    },
    latency: {
      GET: createLatency(latencyTotals.GET),
      POST: createLatency(latencyTotals.POST)
    },
    backends: {
      local: { ...backendCounters.local },
      remote: { ...backendCounters.remote }
    },
    classifications: {
      GET: { ...classificationTotals.GET },
      POST: { ...classificationTotals.POST }
    }
  };
}

export function resetMetrics(): void {
  callCounters = createMethodCounters();
  backendCounters = createBackendCounters();
  latencyTotals = createLatencyTotals();
  classificationTotals = { GET: {}, POST: {} };
}

function createMethodCounters(): Record<CgiMethod, OutcomeStat> {
  return { GET: emptyStat(), POST: emptyStat() };
}

function createBackendCounters(): Record<ClientKind, OutcomeStat> {
  return { local: emptyStat(), remote: emptyStat() };
}

function emptyStat(): OutcomeStat {
  return { total: 0, success: 0, error: 0 };
}

function createLatencyTotals(): Record<CgiMethod, LatencyStat> {
  return {
    GET: { totalMs: 0, count: 0 },
    POST: { totalMs: 0, count: 0 }
  };
}

function createLatency(stat: LatencyStat): { averageMs: number; samples: number } {
  if (stat.count === 0) {
    return { averageMs: 0, samples: 0 };
  }
  return {
    averageMs: stat.totalMs / stat.count,
    samples: stat.count
  };
}
