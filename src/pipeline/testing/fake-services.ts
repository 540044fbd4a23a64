import type { PipelineServices } from "../types.js";

export interface FakeServicesOptions {
  tickers?: string[];
  /** Tickers the universe holds after `refresh()`. Defaults to `tickers`. */
  refreshedTickers?: string[];
  rowsWritten?: number;
  executedTrades?: number;
}

/**
 * In-process stand-ins for the pipeline collaborators. Every call is appended
 * to `calls` so tests can assert the order bodies ran in.
 */
export function createFakeServices(options: FakeServicesOptions = {}): {
  services: PipelineServices;
  calls: string[];
} {
  const calls: string[] = [];
  let tickers = [...(options.tickers ?? ["AAPL", "MSFT"])];
  const refreshed = options.refreshedTickers ?? tickers;

  const services: PipelineServices = {
    universe: {
      listTickers: async () => [...tickers],
      refresh: async () => {
        calls.push("universe.refresh");
        tickers = [...refreshed];
        return { tickers: [...tickers] };
      },
    },
    market: {
      ingest: async (list) => {
        calls.push(`market.ingest:${list.join(",")}`);
        return { rowsWritten: options.rowsWritten ?? list.length * 10 };
      },
    },
    news: {
      ingest: async (list) => {
        calls.push(`news.ingest:${list.join(",")}`);
        return { articlesWritten: list.length * 3 };
      },
    },
    features: {
      build: async (list) => {
        calls.push(`features.build:${list.join(",")}`);
        return { windowsCreated: list.length, warnings: [] };
      },
    },
    predictions: {
      predict: async (list) => {
        calls.push(`predictions.predict:${list.join(",")}`);
        return list.map((ticker) => ({ ticker, score: 0.5 }));
      },
    },
    validator: {
      validateRecent: async (daysBack) => {
        calls.push(`validator.validateRecent:${daysBack}`);
        return { validated: 2 };
      },
    },
    feedback: {
      process: async () => {
        calls.push("feedback.process");
        return { metrics: { hitRate: 0.5 }, retrainSignals: [] };
      },
    },
    trading: {
      runTradingCycle: async () => {
        calls.push("trading.runTradingCycle");
        return { executed: options.executedTrades ?? 1 };
      },
    },
  };

  return { services, calls };
}
