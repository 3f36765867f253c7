/**
 * CSV Market Data
 *
 * Loads the instrument universe and daily price histories from CSV files:
 * - universe file: `code,name`
 * - `<dataDir>/<code>.csv`: `date,open,high,low,close,volume`
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse';
import type { InstrumentDescriptor, MarketDataPort, PriceBar } from '@rebalancer/core';
import { validatePriceHistory } from '@rebalancer/simulation';
import { ValidationError } from '@rebalancer/utils';
import { logger } from '../logger.js';

export type CsvRow = Record<string, string>;

export interface CsvMarketDataOptions {
  /** Directory holding one `<code>.csv` per instrument */
  dataDir: string;
  universePath: string;
}

export function parseCsv(content: string): Promise<CsvRow[]> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      { columns: true, skip_empty_lines: true, trim: true },
      (err, records: CsvRow[]) => {
        if (err) reject(err);
        else resolve(records);
      }
    );
  });
}

/**
 * Blank or missing cells become NaN so history validation rejects the row
 */
function toNumber(value: string | undefined): number {
  if (value === undefined || value === '') {
    return Number.NaN;
  }
  return Number(value);
}

export function rowToBar(row: CsvRow): Record<string, unknown> {
  return {
    date: row.date,
    open: toNumber(row.open),
    high: toNumber(row.high),
    low: toNumber(row.low),
    close: toNumber(row.close),
    volume: toNumber(row.volume),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class CsvMarketData implements MarketDataPort {
  readonly name = 'csv';
  private universe: Promise<readonly InstrumentDescriptor[]> | undefined;

  constructor(private readonly options: CsvMarketDataOptions) {}

  getUniverse(): Promise<readonly InstrumentDescriptor[]> {
    this.universe ??= this.loadUniverse();
    return this.universe;
  }

  /**
   * Empty when the instrument has no price file
   *
   * @throws ValidationError when the file holds a malformed or unordered history
   */
  async getPriceHistory(code: string): Promise<readonly PriceBar[]> {
    const filePath = path.join(this.options.dataDir, `${code}.csv`);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.warn('No price file for instrument', { code, filePath });
        return [];
      }
      throw error;
    }
    const rows = await this.parseFile(filePath, content);
    return validatePriceHistory(code, rows.map(rowToBar));
  }

  private async loadUniverse(): Promise<readonly InstrumentDescriptor[]> {
    const { universePath } = this.options;
    let content: string;
    try {
      content = await readFile(universePath, 'utf-8');
    } catch (error) {
      throw new ValidationError(
        `Failed to read universe file ${universePath}: ${error instanceof Error ? error.message : String(error)}`,
        { universePath }
      );
    }

    const rows = await this.parseFile(universePath, content);
    const seen = new Set<string>();
    const universe: InstrumentDescriptor[] = [];
    rows.forEach((row, index) => {
      const code = row.code ?? '';
      if (code === '') {
        throw new ValidationError(`Missing code in universe file ${universePath} at row ${index}`, {
          universePath,
          row: index,
        });
      }
      if (seen.has(code)) {
        throw new ValidationError(`Duplicate code ${code} in universe file ${universePath}`, { universePath, code });
      }
      seen.add(code);
      universe.push({ code, name: row.name || code });
    });

    logger.debug('Universe loaded', { universePath, instruments: universe.length });
    return universe;
  }

  private async parseFile(filePath: string, content: string): Promise<CsvRow[]> {
    try {
      return await parseCsv(content);
    } catch (error) {
      throw new ValidationError(
        `Malformed CSV in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }
  }
}
