import type { JsonObject, TaskRegistry } from "../runtime/task/index.js";
import type { PipelineServices } from "./types.js";

async function universeTickers(services: PipelineServices): Promise<string[]> {
  const tickers = await services.universe.listTickers();
  if (tickers.length > 0) return tickers;
  await services.universe.refresh();
  return services.universe.listTickers();
}

async function requireTickers(services: PipelineServices, purpose: string): Promise<string[]> {
  const tickers = await universeTickers(services);
  if (tickers.length === 0) {
    throw new Error(`Universe contains no tickers; cannot ${purpose}`);
  }
  return tickers;
}

/**
 * Register the daily trading pipeline:
 *
 * build_ticker_universe
 *   <- ingest_market_daily, ingest_news_hourly
 *   <- build_features_daily <- run_predictions_daily <- validate_predictions_daily
 *   <- feedback_daily <- trading_cycle_intraday
 */
export function registerPipelineTasks(registry: TaskRegistry, services: PipelineServices): void {
  registry.register(
    "ingest_market_daily",
    async () => {
      const tickers = await requireTickers(services, "run market ingestion");
      const result = await services.market.ingest(tickers);
      if (result.rowsWritten === 0) {
        throw new Error("Market ingestion produced no rows; check data providers");
      }
      return result;
    },
    {
      dependencies: ["build_ticker_universe"],
      cadence: "daily",
      description: "Fetch OHLCV data for universe tickers",
    },
  );

  registry.register(
    "ingest_news_hourly",
    async () => {
      const tickers = await requireTickers(services, "run news ingestion");
      const result = await services.news.ingest(tickers);
      if (result.articlesWritten === 0) {
        throw new Error("News ingestion produced no articles; check data providers");
      }
      return result;
    },
    {
      dependencies: ["build_ticker_universe"],
      cadence: "hourly",
      description: "Collect news and sentiment",
    },
  );

  registry.register("build_ticker_universe", () => services.universe.refresh(), {
    cadence: "daily",
    description: "Refresh dynamic ticker universe",
  });

  registry.register(
    "build_features_daily",
    async () => {
      const tickers = await requireTickers(services, "build features");
      const result = await services.features.build(tickers);
      if (result.windowsCreated === 0) {
        throw new Error("Feature build produced no windows; ensure market/news data available");
      }
      return { ...result, warnings: [...result.warnings] };
    },
    {
      dependencies: ["ingest_market_daily", "ingest_news_hourly"],
      cadence: "daily",
      description: "Generate feature windows for prediction",
    },
  );

  registry.register(
    "run_predictions_daily",
    async (): Promise<JsonObject> => {
      const tickers = await requireTickers(services, "run predictions");
      return { predictions: await services.predictions.predict(tickers) };
    },
    {
      dependencies: ["build_features_daily"],
      cadence: "daily",
      description: "Run model inference across universe",
    },
  );

  registry.register(
    "validate_predictions_daily",
    async () => {
      const result = await services.validator.validateRecent(1);
      if (result.validated === 0) {
        throw new Error("Validation processed zero predictions; ensure predictions exist");
      }
      return result;
    },
    {
      dependencies: ["run_predictions_daily"],
      cadence: "daily",
      description: "Validate predictions against market outcomes",
    },
  );

  registry.register(
    "feedback_daily",
    async (): Promise<JsonObject> => {
      const summary = await services.feedback.process();
      return { metrics: summary.metrics, retrainSignals: summary.retrainSignals };
    },
    {
      dependencies: ["validate_predictions_daily"],
      cadence: "daily",
      description: "Update feedback metrics and retrain signals",
    },
  );

  registry.register(
    "trading_cycle_intraday",
    async () => {
      const summary = await services.trading.runTradingCycle();
      if (summary.executed === 0) {
        throw new Error("Trading cycle executed zero trades; verify predictions and prioritizer");
      }
      return summary;
    },
    {
      dependencies: ["feedback_daily"],
      cadence: "intraday",
      description: "Execute trading cycle",
    },
  );
}
