/**
 * One planned step of filling the survey for a respondent.
 * The same plan is printed by `plan` and executed page by page by `run`.
 */
export type FillAction =
  | { kind: 'navigate'; url: string }
  | {
      kind: 'type';
      selector: string;
      value: string;
      csv: string;
      /** used instead of `selector` when it matches something on the page */
      preferSelector?: string;
      /** filled directly when typing into the target fails */
      fallbackSelector?: string;
    }
  | {
      kind: 'click';
      selector: string;
      group: string;
      label: string;
      csv: string;
      csvValue: string;
      pauseAfterMs?: number;
    }
  | { kind: 'check'; selector: string; group: string; label: string; csv: string }
  | { kind: 'combobox'; comboId: string; selector: string; visibleText: string; csv: string }
  | {
      kind: 'skip';
      reason: string;
      csv: string;
      group?: string;
      selector?: string;
      csvValue?: string;
      unmatched?: string[];
    }
  | { kind: 'info'; note: string; columns: string[] };
