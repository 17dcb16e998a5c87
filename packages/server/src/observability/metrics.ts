/**
 * In-process tool metrics: call and error counts, latency percentiles
 */

export interface LatencySummary {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

interface ToolStats {
  calls: number;
  errors: Map<string, number>;
  // Most recent latencies, oldest first
  samples: number[];
}

export const MAX_LATENCY_SAMPLES = 1000;

/**
 * Nearest-rank percentile of an ascending list
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const rank = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.min(sorted.length - 1, Math.max(0, rank))] ?? 0;
}

export class ToolMetrics {
  #tools = new Map<string, ToolStats>();

  #stats(tool: string): ToolStats {
    let stats = this.#tools.get(tool);
    if (!stats) {
      stats = { calls: 0, errors: new Map(), samples: [] };
      this.#tools.set(tool, stats);
    }
    return stats;
  }

  record(tool: string, durationMs: number, success: boolean, errCode = "UNKNOWN"): void {
    const stats = this.#stats(tool);
    stats.calls++;
    if (!success) {
      stats.errors.set(errCode, (stats.errors.get(errCode) ?? 0) + 1);
    }
    stats.samples.push(durationMs);
    if (stats.samples.length > MAX_LATENCY_SAMPLES) {
      stats.samples.shift();
    }
  }

  calls(tool: string): number {
    return this.#tools.get(tool)?.calls ?? 0;
  }

  /**
   * Errors for a tool, for one code or all of them
   */
  errors(tool: string, errCode?: string): number {
    const errors = this.#tools.get(tool)?.errors;
    if (!errors) return 0;
    if (errCode !== undefined) return errors.get(errCode) ?? 0;
    let total = 0;
    for (const count of errors.values()) total += count;
    return total;
  }

  /**
   * Latency over the retained samples, null before the first call
   */
  latency(tool: string): LatencySummary | null {
    const samples = this.#tools.get(tool)?.samples;
    if (!samples || samples.length === 0) {
      return null;
    }

    const sorted = [...samples].sort((a, b) => a - b);
    return {
      count: sorted.length,
      sum: sorted.reduce((acc, value) => acc + value, 0),
      p50: percentile(sorted, 50),
      p95: percentile(sorted, 95),
      p99: percentile(sorted, 99),
    };
  }

  /**
   * Snapshot keyed `leadlink.tool.<metric>{tool=...}` for the stats log line
   */
  snapshot(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [tool, stats] of this.#tools) {
      out[`leadlink.tool.calls_total{tool=${tool}}`] = stats.calls;
      for (const [code, count] of stats.errors) {
        out[`leadlink.tool.errors_total{tool=${tool},err_code=${code}}`] = count;
      }
      const latency = this.latency(tool);
      if (latency) {
        out[`leadlink.tool.latency_ms.p95{tool=${tool}}`] = latency.p95;
      }
    }
    return out;
  }
}

export const metrics = new ToolMetrics();

export function recordToolExecution(tool: string, durationMs: number, success: boolean, errCode?: string): void {
  metrics.record(tool, durationMs, success, errCode);
}
