import { readFile } from 'node:fs/promises';

import { hasErrorCode } from '@/lib/errors';

export type CompanySet = {
  // Tickers in list-file casing, first occurrence wins.
  readonly tickers: readonly string[];
  readonly byUpper: ReadonlyMap<string, string>;
};

export function parseCompanyList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export function createCompanySet(entries: Iterable<string>): CompanySet {
  const byUpper = new Map<string, string>();
  for (const entry of entries) {
    const ticker = entry.trim();
    if (ticker.length === 0) continue;
    const key = ticker.toUpperCase();
    if (!byUpper.has(key)) byUpper.set(key, ticker);
  }
  return Object.freeze({
    tickers: Object.freeze(Array.from(byUpper.values())),
    byUpper,
  });
}

export function findCompany(companies: CompanySet, token: string): string | null {
  return companies.byUpper.get(token.toUpperCase()) ?? null;
}

export async function loadCompanySet(filePath: string): Promise<CompanySet> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new Error(`Company list not found at ${filePath}`);
    }
    throw err;
  }

  const companies = createCompanySet(parseCompanyList(text));
  if (companies.tickers.length === 0) {
    throw new Error(`Company list at ${filePath} has no tickers`);
  }
  return companies;
}
