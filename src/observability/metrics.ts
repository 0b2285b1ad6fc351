interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface OpenAIUsageSummary {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface MetricsState {
  ingestionLatency: LatencySummary;
  queryLatency: LatencySummary;
  retrievalLatency: LatencySummary;
  rerankLatency: LatencySummary;
  generationLatency: LatencySummary;
  openAIUsage: OpenAIUsageSummary;
  counters: Record<string, number>;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createUsageSummary = (): OpenAIUsageSummary => ({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0
});

const state: MetricsState = {
  ingestionLatency: createLatencySummary(),
  queryLatency: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  rerankLatency: createLatencySummary(),
  generationLatency: createLatencySummary(),
  openAIUsage: createUsageSummary(),
  counters: {},
  errorRates: {}
};

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordIngestionLatency = (durationMs: number): void => {
  recordLatency(state.ingestionLatency, durationMs);
};

export const recordQueryLatency = (durationMs: number): void => {
  recordLatency(state.queryLatency, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordRerankLatency = (durationMs: number): void => {
  recordLatency(state.rerankLatency, durationMs);
};

export const recordGenerationLatency = (durationMs: number): void => {
  recordLatency(state.generationLatency, durationMs);
};

export const recordOpenAIUsage = (usage: {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}): void => {
  state.openAIUsage.promptTokens += usage.promptTokens ?? 0;
  state.openAIUsage.completionTokens += usage.completionTokens ?? 0;
  state.openAIUsage.totalTokens += usage.totalTokens ?? 0;
};

export const incrementCounter = (key: string, amount = 1): void => {
  state.counters[key] = (state.counters[key] ?? 0) + amount;
};

export const recordErrorRate = (key: string): void => {
  state.errorRates[key] = (state.errorRates[key] ?? 0) + 1;
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  ingestion_latency: serializeLatency(state.ingestionLatency),
  query_latency: serializeLatency(state.queryLatency),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  rerank_latency: serializeLatency(state.rerankLatency),
  generation_latency: serializeLatency(state.generationLatency),
  openai_usage: { ...state.openAIUsage },
  counters: { ...state.counters },
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state.ingestionLatency = createLatencySummary();
  state.queryLatency = createLatencySummary();
  state.retrievalLatency = createLatencySummary();
  state.rerankLatency = createLatencySummary();
  state.generationLatency = createLatencySummary();
  state.openAIUsage = createUsageSummary();
  state.counters = {};
  state.errorRates = {};
};
