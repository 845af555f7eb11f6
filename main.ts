import { Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Config, Console, Effect, Layer } from "effect";
import { resolveSelection } from "./src/catalog.ts";
import { loadDashboard } from "./src/dashboard.ts";
import { DEFAULT_PERIOD, LOOKBACK_PERIODS } from "./src/domain.ts";
import {
  DASHBOARD_SECTIONS,
  formatDashboard,
  formatUnknownStocks,
} from "./src/format.ts";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import { MarketDataSampleLive } from "./src/providers/market-data-sample.ts";

// --- CLI ---

const stock = Options.text("stock").pipe(
  Options.withAlias("s"),
  Options.withDescription(
    "Stock to track, by company name or ticker (e.g. \"BHP Group\", RIO.AX). " +
      "Repeat to track several. Defaults to the first three in the catalog.",
  ),
  Options.repeated,
);

const period = Options.choice("period", LOOKBACK_PERIODS).pipe(
  Options.withAlias("p"),
  Options.withDescription("Lookback period for every selected stock"),
  Options.withDefault(DEFAULT_PERIOD),
);

const view = Options.choice("view", DASHBOARD_SECTIONS).pipe(
  Options.withDescription("Which part of the dashboard to print"),
  Options.withDefault("all"),
);

const noColor = Options.boolean("no-color").pipe(
  Options.withDescription("Print without ANSI colours"),
);

const command = Command.make(
  "asx-mining-tracker",
  { stock, period, view, noColor },
).pipe(
  Command.withHandler(({ stock, period, view, noColor }) =>
    Effect.gen(function* () {
      const { selected, unknown } = resolveSelection(stock);
      if (unknown.length > 0) {
        yield* Console.error(formatUnknownStocks(unknown));
        yield* Effect.sync(() => {
          process.exitCode = 1;
        });
        return;
      }

      const dashboard = yield* loadDashboard(selected, period);
      yield* Console.log(
        formatDashboard(dashboard, { period, section: view, color: !noColor }),
      );
    })
  ),
);

// --- Layers ---
// Set MARKET_DATA_PROVIDER to "yahoo" (default) or "sample".

const MarketDataLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("MARKET_DATA_PROVIDER").pipe(
      Config.withDefault("yahoo"),
    );
    switch (provider) {
      case "sample":
        return MarketDataSampleLive;
      default:
        return YahooFinanceLive;
    }
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "asx-mining-tracker",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.provide(MarketDataLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
