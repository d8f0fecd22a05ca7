/**
 * Pure utility functions for mapping CSV values onto survey controls
 */

const OTHER_PREFIX = /^\s*other/i;
const OTHER_TEXT = /^\s*other.*?:\s*/i;
const OTHER_DISPLAY_ID = /choice-display-(QID\d+)-(\d+)/;

export interface CheckboxResolution {
  toSelect: { selector: string; label: string }[];
  unmatched: string[];
}

export class FormUtils {

  /**
   * Collapses whitespace runs (including newlines and tabs) into single spaces
   */
  static normSpace(value: unknown): string {
    return String(value ?? '').replace(/\s+/g, ' ').trim();
  }

  static normCase(value: unknown): string {
    return FormUtils.normSpace(value).toLowerCase();
  }

  /**
   * Splits a multi-select CSV cell. Without an explicit delimiter both `;` and `,` separate values.
   */
  static parseMulti(cell: string, delimiter?: string): string[] {
    if (!cell) return [];
    const parts = delimiter ? cell.split(delimiter) : cell.split(/[;,]/);
    return parts.map((part) => FormUtils.normSpace(part)).filter((part) => part.length > 0);
  }

  static cssFromEntry(entry: { id?: string; css?: string }): string {
    if (entry.id) {
      return `#${entry.id}`;
    }
    if (entry.css) {
      return entry.css.startsWith('css=') ? entry.css.slice('css='.length) : entry.css;
    }
    throw new Error("Mapping entry missing 'id' or 'css'.");
  }

  /**
   * Qualtrics renders choice N of question QIDx as `#mc-choice-input-QIDx-N`
   */
  static choiceInputSelector(group: string, index: string): string {
    return `#mc-choice-input-${group}-${index}`;
  }

  /**
   * Finds the value-map key for a CSV value: exact first, then case/space-insensitive.
   */
  static lookupValueMap(
    valueMap: Record<string, string>,
    desired: string
  ): { label: string; index: string } | null {
    if (!desired) return null;
    if (Object.prototype.hasOwnProperty.call(valueMap, desired)) {
      return { label: desired, index: valueMap[desired] };
    }
    const want = FormUtils.normCase(desired);
    for (const [label, index] of Object.entries(valueMap)) {
      if (FormUtils.normCase(label) === want) {
        return { label, index };
      }
    }
    return null;
  }

  /**
   * Like `lookupValueMap`, but "Other: text" also matches the map's "Other" entry.
   * The free text itself is typed separately.
   */
  static lookupChoice(
    valueMap: Record<string, string>,
    desired: string
  ): { label: string; index: string } | null {
    const hit = FormUtils.lookupValueMap(valueMap, desired);
    if (hit || !FormUtils.isOtherValue(desired) || !desired.includes(':')) {
      return hit;
    }
    return FormUtils.lookupValueMap(valueMap, desired.slice(0, desired.indexOf(':')));
  }

  static resolveCheckboxes(
    group: string,
    valueMap: Record<string, string> | undefined,
    cell: string,
    delimiter?: string
  ): CheckboxResolution {
    const items = FormUtils.parseMulti(cell, delimiter);
    if (!valueMap) {
      return { toSelect: [], unmatched: items };
    }

    const resolution: CheckboxResolution = { toSelect: [], unmatched: [] };
    for (const item of items) {
      const hit = FormUtils.lookupChoice(valueMap, item);
      if (hit) {
        resolution.toSelect.push({
          selector: FormUtils.choiceInputSelector(group, hit.index),
          label: hit.label
        });
      } else {
        resolution.unmatched.push(item);
      }
    }
    return resolution;
  }

  static isOtherValue(value: string): boolean {
    return OTHER_PREFIX.test(value);
  }

  /**
   * "Other: bike share" → "bike share". Values without a colon carry no free text.
   */
  static extractOtherText(value: string): string {
    if (!FormUtils.isOtherValue(value) || !value.includes(':')) {
      return '';
    }
    return value.replace(OTHER_TEXT, '').trim();
  }

  /**
   * Computes the "Other" radio from a text-box selector such as
   * `input[aria-labelledby='choice-display-QID63-4']`.
   */
  static deriveOtherRadioSelector(group: string, otherTextCss: string): string | null {
    const match = OTHER_DISPLAY_ID.exec(otherTextCss);
    if (!match || match[1] !== group) {
      return null;
    }
    return FormUtils.choiceInputSelector(group, match[2]);
  }

  /**
   * Picks the dropdown entry for a wanted label: exact (normalised) text, then containment.
   */
  static pickOptionIndex(options: string[], wanted: string): number {
    const want = FormUtils.normCase(wanted);
    if (!want) return -1;
    const normalised = options.map((option) => FormUtils.normCase(option));

    const exact = normalised.indexOf(want);
    if (exact >= 0) return exact;

    return normalised.findIndex((option) => option.includes(want));
  }

  /**
   * Random integer in [max(0, base - spread), base + spread]
   */
  static jitter(baseMs: number, spread: number = 30): number {
    const lo = Math.max(0, baseMs - spread);
    const hi = baseMs + spread;
    return lo + Math.floor(Math.random() * (hi - lo + 1));
  }
}
