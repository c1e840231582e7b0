/**
 * Ticker and sector alias table.
 *
 * Vietnamese headlines rarely carry the bare ticker, so every query item is
 * expanded into the names the press actually uses: "VIC" also searches for
 * "Vingroup" and "tập đoàn Vin", and "banking" / "ngân hàng" map to the
 * NGANHANG sector entry.
 */

import { z } from 'zod';
import aliasData from './data/ticker-aliases.json';

const aliasTableSchema = z.object({
  tickers: z.record(z.string(), z.array(z.string().min(1)).min(1)),
  sectors: z.record(z.string(), z.string()),
});

export type AliasTableData = z.infer<typeof aliasTableSchema>;

export interface ExpandedQuery {
  /** Query items as given, trimmed and non-empty */
  items: string[];
  /** Distinct aliases across all items, in first-seen order */
  aliases: string[];
}

export class TickerAliasTable {
  private readonly tickers: Map<string, string[]>;
  private readonly sectors: Map<string, string>;

  private constructor(data: AliasTableData) {
    this.tickers = new Map(Object.entries(data.tickers).map(([key, aliases]) => [key.toUpperCase(), aliases]));
    this.sectors = new Map(Object.entries(data.sectors).map(([name, key]) => [name.normalize('NFC').toLowerCase(), key.toUpperCase()]));
  }

  static fromData(data: unknown): TickerAliasTable {
    return new TickerAliasTable(aliasTableSchema.parse(data));
  }

  static bundled(): TickerAliasTable {
    return TickerAliasTable.fromData(aliasData);
  }

  /**
   * Aliases of one ticker or sector name. Exchange suffixes (".VN", ".HNX")
   * are dropped; unknown items search for themselves.
   */
  getAliases(item: string): string[] {
    const raw = item.normalize('NFC').trim();
    const symbol = raw.split('.')[0].trim().toUpperCase();

    const key =
      this.sectors.get(symbol.toLowerCase()) ??
      this.sectors.get(raw.toLowerCase()) ??
      symbol;

    return this.tickers.get(key) ?? [symbol];
  }

  /** Expands a comma-separated query. */
  expandQuery(query: string): ExpandedQuery {
    const items = query.split(',').map(part => part.trim()).filter(part => part.length > 0);

    const seen = new Set<string>();
    const aliases: string[] = [];
    for (const item of items) {
      for (const alias of this.getAliases(item)) {
        const folded = alias.normalize('NFC').toLowerCase();
        if (seen.has(folded)) continue;
        seen.add(folded);
        aliases.push(alias);
      }
    }
    return { items, aliases };
  }

  /** Ticker symbols of the table, sector entries excluded. */
  supportedTickers(): string[] {
    const sectorKeys = new Set(this.sectors.values());
    return [...this.tickers.keys()].filter(key => !sectorKeys.has(key)).sort();
  }
}
