import { FormUtils } from './FormUtils';

export interface HeaderMatchResult {
  /** mapping key → CSV header as spelled in the file */
  resolved: Map<string, string>;
  missing: string[];
}

/**
 * Matches the CSV columns a mapping names against the CSV header row.
 * This is the only validation the mapping gets against the data.
 */
export class HeaderMatchingService {
  match(mappingKeys: string[], csvHeaders: string[]): HeaderMatchResult {
    const resolved = new Map<string, string>();
    const missing: string[] = [];

    for (const key of mappingKeys) {
      if (resolved.has(key)) continue;

      const header = csvHeaders.includes(key)
        ? key
        : csvHeaders.find((candidate) => FormUtils.normSpace(candidate) === FormUtils.normSpace(key));

      if (header === undefined) {
        if (!missing.includes(key)) missing.push(key);
      } else {
        resolved.set(key, header);
      }
    }

    return { resolved, missing };
  }
}
