// Instrument catalog — the fixed list of ASX mining stocks on offer.

import { Option } from "effect";
import type { Instrument } from "./domain.ts";

export const MINING_STOCKS: ReadonlyArray<Instrument> = Object.freeze([
  { name: "BHP Group", ticker: "BHP.AX" },
  { name: "Rio Tinto", ticker: "RIO.AX" },
  { name: "Fortescue Metals", ticker: "FMG.AX" },
  { name: "Northern Star", ticker: "NST.AX" },
  { name: "Evolution Mining", ticker: "EVN.AX" },
  { name: "Mineral Resources", ticker: "MIN.AX" },
  { name: "South32", ticker: "S32.AX" },
  { name: "Newcrest Mining", ticker: "NCM.AX" },
  { name: "Pilbara Minerals", ticker: "PLS.AX" },
  { name: "Lynas Rare Earths", ticker: "LYC.AX" },
].map((instrument) => Object.freeze(instrument)));

export const DEFAULT_SELECTION: ReadonlyArray<Instrument> = MINING_STOCKS.slice(0, 3);

/** Find an instrument by exact display name or case-insensitive ticker. */
export function findInstrument(query: string): Option.Option<Instrument> {
  const trimmed = query.trim();
  const upper = trimmed.toUpperCase();
  return Option.fromNullable(
    MINING_STOCKS.find((i) => i.name === trimmed) ??
      MINING_STOCKS.find((i) => i.ticker === upper),
  );
}

/** Resolve user queries to instruments in catalog order, without duplicates.
 *  An empty query list selects the default instruments. Unknown queries are
 *  returned in `unknown`. */
export function resolveSelection(queries: ReadonlyArray<string>): {
  readonly selected: ReadonlyArray<Instrument>;
  readonly unknown: ReadonlyArray<string>;
} {
  if (queries.length === 0) {
    return { selected: DEFAULT_SELECTION, unknown: [] };
  }

  const picked = new Set<Instrument>();
  const unknown: string[] = [];
  for (const query of queries) {
    Option.match(findInstrument(query), {
      onNone: () => {
        unknown.push(query);
      },
      onSome: (instrument) => {
        picked.add(instrument);
      },
    });
  }

  return {
    selected: MINING_STOCKS.filter((i) => picked.has(i)),
    unknown,
  };
}
