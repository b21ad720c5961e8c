import { readFileSync } from 'node:fs';

const statesFile = new URL('../../../data/us-states.json', import.meta.url);

let stateCodes: ReadonlyMap<string, string> | null = null;

function loadStateCodes(): ReadonlyMap<string, string> {
  if (!stateCodes) {
    const raw: unknown = JSON.parse(readFileSync(statesFile, 'utf-8'));
    const entries = typeof raw === 'object' && raw !== null ? Object.entries(raw) : [];
    stateCodes = new Map(
      entries.filter((entry): entry is [string, string] => typeof entry[1] === 'string'),
    );
  }
  return stateCodes;
}

/** Two-letter postal code for a state given as code or full name; '' when blank. */
export function normalizeStateCode(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 2) return trimmed.toUpperCase();
  return loadStateCodes().get(trimmed.toLowerCase()) ?? trimmed.toUpperCase();
}
