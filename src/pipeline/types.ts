import type { JsonObject, JsonValue } from "../runtime/task/index.js";

/**
 * Collaborators the trading pipeline tasks delegate to. The orchestrator
 * treats them as opaque; implementations live outside this package.
 */

export type UniverseRefreshResult = { tickers: string[]; [key: string]: JsonValue };

export type MarketIngestionResult = { rowsWritten: number; [key: string]: JsonValue };

export type NewsIngestionResult = { articlesWritten: number; [key: string]: JsonValue };

export type FeatureBuildResult = {
  windowsCreated: number;
  warnings: string[];
  [key: string]: JsonValue;
};

export type PredictionResult = JsonObject;

export type ValidationResult = { validated: number; [key: string]: JsonValue };

export type FeedbackSummary = {
  metrics: JsonObject;
  retrainSignals: JsonValue[];
};

export type TradingSummary = { executed: number; [key: string]: JsonValue };

export interface UniverseCurator {
  listTickers(): Promise<string[]>;
  refresh(): Promise<UniverseRefreshResult>;
}

export interface PipelineServices {
  universe: UniverseCurator;
  market: { ingest(tickers: string[]): Promise<MarketIngestionResult> };
  news: { ingest(tickers: string[]): Promise<NewsIngestionResult> };
  features: { build(tickers: string[]): Promise<FeatureBuildResult> };
  predictions: { predict(tickers: string[]): Promise<PredictionResult[]> };
  validator: { validateRecent(daysBack: number): Promise<ValidationResult> };
  feedback: { process(): Promise<FeedbackSummary> };
  trading: { runTradingCycle(): Promise<TradingSummary> };
}
